// === Conversion Types ===

/**
 * Outcome of one converter process run.
 * A process that could not be started at all is reported by rejection, not here.
 */
export type ConverterResult =
  | { status: 'exited'; exitCode: number; stdout: string; stderr: string }
  | { status: 'timed_out'; stdout: string; stderr: string };

export type ConversionOutcome =
  | 'success'
  | 'failed'
  | 'timeout'
  | 'output_missing'
  | 'internal_error';

export interface ConvertedDocument {
  content: Buffer;
  fileName: string;
  mimeType: string;
}

// === API Types ===

export interface ErrorResponseBody {
  error: string;
  details?: string;
}

export type HealthResponseBody =
  | { status: 'ok'; version: string; converter: string; timestamp: string }
  | { status: 'unhealthy'; timestamp: string };
