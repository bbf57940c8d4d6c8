import { execFile } from 'child_process';
import {
  CONVERTER_MAX_OUTPUT_BYTES,
  CONVERTER_VERSION_TIMEOUT_MS,
  DEFAULT_CONVERTER_PATH,
  type ConverterResult,
} from '@mdocx/shared';

/**
 * Effect boundary around the external converter binary.
 * Tests substitute fakes for each outcome branch.
 */
export interface Converter {
  run(inputPath: string, outputPath: string, timeoutMs: number): Promise<ConverterResult>;
  /** Identifies the installed converter; rejects when it cannot be run. */
  version(): Promise<string>;
}

/**
 * The converter process could not be run at all: binary missing, not
 * executable, or its output overflowed the capture buffer.
 */
export class ConverterProcessError extends Error {
  constructor(
    public readonly converterPath: string,
    public readonly reason: string,
  ) {
    super(`Converter process "${converterPath}" failed to run: ${reason}`);
    this.name = 'ConverterProcessError';
  }
}

/**
 * Converts Markdown to DOCX with pandoc.
 *
 * - Invoked as `pandoc <input> -o <output>`, arguments passed directly (no shell)
 * - Hard timeout; the process is killed with SIGKILL when it expires
 * - stdout/stderr captured as UTF-8 text
 */
export class PandocConverter implements Converter {
  constructor(private readonly converterPath: string = DEFAULT_CONVERTER_PATH) {}

  run(inputPath: string, outputPath: string, timeoutMs: number): Promise<ConverterResult> {
    return new Promise((resolve, reject) => {
      execFile(
        this.converterPath,
        [inputPath, '-o', outputPath],
        {
          timeout: timeoutMs,
          killSignal: 'SIGKILL',
          maxBuffer: CONVERTER_MAX_OUTPUT_BYTES,
          encoding: 'utf8',
          windowsHide: true,
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ status: 'exited', exitCode: 0, stdout, stderr });
            return;
          }

          // ENOENT, EACCES, ERR_CHILD_PROCESS_STDIO_MAXBUFFER
          if (typeof error.code === 'string') {
            reject(new ConverterProcessError(this.converterPath, error.code));
            return;
          }

          if (error.killed) {
            resolve({ status: 'timed_out', stdout, stderr });
            return;
          }

          // Killed by someone else's signal: no exit code, still a failed run.
          const exitCode = typeof error.code === 'number' ? error.code : 1;
          resolve({ status: 'exited', exitCode, stdout, stderr });
        },
      );
    });
  }

  /** First line of `pandoc --version`, e.g. "pandoc 3.1.11". */
  version(): Promise<string> {
    return new Promise((resolve, reject) => {
      execFile(
        this.converterPath,
        ['--version'],
        {
          timeout: CONVERTER_VERSION_TIMEOUT_MS,
          killSignal: 'SIGKILL',
          encoding: 'utf8',
          windowsHide: true,
        },
        (error, stdout) => {
          if (error) {
            reject(new ConverterProcessError(this.converterPath, error.message));
            return;
          }
          resolve(stdout.split('\n')[0]?.trim() ?? '');
        },
      );
    });
  }
}
