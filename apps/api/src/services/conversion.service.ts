/**
 * ConversionService
 *
 * Markdown → DOCX for a single request:
 * scratch input → converter process → outcome check → read output → cleanup.
 *
 * Holds no per-request state. Every call gets its own scratch token, so calls
 * may run concurrently against the same scratch directory without locking.
 */

import { access, readFile, writeFile } from 'fs/promises';
import {
  DOCX_MIME_TYPE,
  DOWNLOAD_FILE_NAME,
  type ConversionOutcome,
  type ConvertedDocument,
  type ConverterResult,
} from '@mdocx/shared';
import type { Converter } from '../renderers/pandoc-converter';
import { withScratchArtifacts, type ScratchArtifacts } from '../shared/scratch';
import {
  AppError,
  ConversionFailedError,
  ConversionTimeoutError,
  InternalError,
  OutputMissingError,
} from '../middleware/error-handler';
import {
  decInFlight,
  incConversionsTotal,
  incInFlight,
  observeConversionDuration,
} from '../modules/metrics/conversion-metrics';
import { logger } from '../shared/logger';

export interface ConversionServiceOptions {
  scratchDir: string;
  timeoutMs: number;
  /** Scratch token source. Defaults to crypto.randomUUID. */
  generateToken?: () => string;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function outcomeOf(err: unknown): ConversionOutcome {
  if (err instanceof ConversionFailedError) return 'failed';
  if (err instanceof ConversionTimeoutError) return 'timeout';
  if (err instanceof OutputMissingError) return 'output_missing';
  return 'internal_error';
}

export class ConversionService {
  constructor(
    private readonly converter: Converter,
    private readonly options: ConversionServiceOptions,
  ) {}

  /**
   * Converts one Markdown document. Resolves only after both scratch
   * artifacts have been removed; rejects with an AppError subclass.
   */
  async convert(markdown: string): Promise<ConvertedDocument> {
    incInFlight();
    try {
      const content = await withScratchArtifacts(
        this.options.scratchDir,
        (artifacts) => this.convertInScratch(markdown, artifacts),
        this.options.generateToken,
      );
      incConversionsTotal('success');
      return { content, fileName: DOWNLOAD_FILE_NAME, mimeType: DOCX_MIME_TYPE };
    } catch (err) {
      incConversionsTotal(outcomeOf(err));
      throw err instanceof AppError ? err : new InternalError(err);
    } finally {
      decInFlight();
    }
  }

  private async convertInScratch(markdown: string, artifacts: ScratchArtifacts): Promise<Buffer> {
    const { token, inputPath, outputPath } = artifacts;

    try {
      await writeFile(inputPath, markdown, { encoding: 'utf8' });
    } catch (err) {
      throw new InternalError(err);
    }

    logger.info({ token, inputSize: Buffer.byteLength(markdown, 'utf8') }, 'Starting conversion');

    const result = await this.runConverter(inputPath, outputPath);

    if (result.status === 'timed_out') {
      logger.warn({ token, timeoutMs: this.options.timeoutMs }, 'Pandoc conversion timed out, process killed');
      throw new ConversionTimeoutError(this.options.timeoutMs);
    }

    if (result.exitCode !== 0) {
      logger.error({ token, exitCode: result.exitCode, stderr: result.stderr }, 'Pandoc conversion failed');
      throw new ConversionFailedError(result.stderr);
    }

    if (!(await fileExists(outputPath))) {
      logger.error({ token }, 'Pandoc exited 0 but wrote no output file');
      throw new OutputMissingError();
    }

    let content: Buffer;
    try {
      content = await readFile(outputPath);
    } catch (err) {
      throw new InternalError(err);
    }

    logger.info({ token, outputSize: content.length }, 'Conversion successful');
    return content;
  }

  private async runConverter(inputPath: string, outputPath: string): Promise<ConverterResult> {
    const startedAt = Date.now();
    try {
      return await this.converter.run(inputPath, outputPath, this.options.timeoutMs);
    } catch (err) {
      throw new InternalError(err);
    } finally {
      observeConversionDuration((Date.now() - startedAt) / 1000);
    }
  }
}
