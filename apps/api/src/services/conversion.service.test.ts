/**
 * ConversionService Tests
 *
 * Real scratch directory per test, FakeConverter in place of pandoc.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { ConverterResult } from '@mdocx/shared';
import { ConversionService } from './conversion.service';
import type { Converter } from '../renderers/pandoc-converter';
import {
  ConversionFailedError,
  ConversionTimeoutError,
  InternalError,
  OutputMissingError,
} from '../middleware/error-handler';
import { resetMetrics, serializeMetrics } from '../modules/metrics/conversion-metrics';
import { FAKE_DOCX_PREFIX, FakeConverter } from '../__tests__/fake-converter';
import { logger } from '../shared/logger';

vi.mock('../shared/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

describe('ConversionService', () => {
  let scratchDir: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    resetMetrics();
    scratchDir = await mkdtemp(join(tmpdir(), 'mdocx-service-test-'));
  });

  afterEach(async () => {
    await rm(scratchDir, { recursive: true, force: true });
  });

  function serviceWith(converter: Converter, generateToken?: () => string): ConversionService {
    return new ConversionService(converter, { scratchDir, timeoutMs: 30_000, generateToken });
  }

  describe('success', () => {
    it('returns the converted bytes with the fixed download name and MIME type', async () => {
      const converter = new FakeConverter();

      const document = await serviceWith(converter).convert('# Hello\n\nWorld');

      expect(document.content.toString('utf8')).toBe(`${FAKE_DOCX_PREFIX}# Hello\n\nWorld`);
      expect(document.fileName).toBe('converted_document.docx');
      expect(document.mimeType).toBe(
        'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
      );
    });

    it('hands the converter token-named paths inside the scratch directory', async () => {
      const converter = new FakeConverter();

      await serviceWith(converter, () => 'tok-1').convert('text');

      expect(converter.runs).toHaveLength(1);
      expect(converter.runs[0]).toMatchObject({
        inputPath: join(scratchDir, 'tok-1.md'),
        outputPath: join(scratchDir, 'tok-1.docx'),
        timeoutMs: 30_000,
      });
    });

    it('writes the input as UTF-8 without losing characters', async () => {
      const converter = new FakeConverter();
      const markdown = '# 你好\n\nΩ ≈ ∑, Привет, مرحبا 🚀';

      const document = await serviceWith(converter).convert(markdown);

      expect(converter.runs[0]?.input).toBe(markdown);
      expect(document.content.toString('utf8')).toBe(FAKE_DOCX_PREFIX + markdown);
    });

    it('leaves no artifacts behind', async () => {
      await serviceWith(new FakeConverter()).convert('# Done');
      expect(await readdir(scratchDir)).toEqual([]);
    });

    it('never exposes the scratch token in the result', async () => {
      const document = await serviceWith(new FakeConverter(), () => 'secret-token').convert('x');
      expect(document.fileName).not.toContain('secret-token');
    });
  });

  describe('converter failures', () => {
    it('rejects with ConversionFailedError carrying stderr on non-zero exit', async () => {
      const converter = new FakeConverter({ kind: 'exit', exitCode: 64, stderr: 'YAML parse exception at line 2' });

      const conversion = serviceWith(converter).convert('---\nbad: [\n---');

      await expect(conversion).rejects.toBeInstanceOf(ConversionFailedError);
      await expect(conversion).rejects.toMatchObject({ details: 'YAML parse exception at line 2' });
      expect(logger.error).toHaveBeenCalledWith(
        expect.objectContaining({ exitCode: 64, stderr: 'YAML parse exception at line 2' }),
        'Pandoc conversion failed',
      );
      expect(await readdir(scratchDir)).toEqual([]);
    });

    it('rejects with OutputMissingError when exit 0 produced no file', async () => {
      const conversion = serviceWith(new FakeConverter({ kind: 'no-output' })).convert('# Hi');

      await expect(conversion).rejects.toBeInstanceOf(OutputMissingError);
      expect(await readdir(scratchDir)).toEqual([]);
    });

    it('rejects with ConversionTimeoutError and removes the partial output', async () => {
      const conversion = serviceWith(new FakeConverter({ kind: 'timeout' })).convert('# Slow');

      await expect(conversion).rejects.toBeInstanceOf(ConversionTimeoutError);
      await expect(conversion).rejects.toMatchObject({ timeoutMs: 30_000, statusCode: 504 });
      expect(await readdir(scratchDir)).toEqual([]);
    });

    it('wraps a converter that cannot start in InternalError', async () => {
      const cause = new Error('spawn pandoc ENOENT');

      const conversion = serviceWith(new FakeConverter({ kind: 'spawn-error', error: cause })).convert('# Hi');

      await expect(conversion).rejects.toBeInstanceOf(InternalError);
      await expect(conversion).rejects.toMatchObject({ cause });
      expect(await readdir(scratchDir)).toEqual([]);
    });
  });

  describe('local I/O failures', () => {
    it('fails with InternalError before converting when the input cannot be written', async () => {
      const converter = new FakeConverter();
      const service = new ConversionService(converter, {
        scratchDir: join(scratchDir, 'does-not-exist'),
        timeoutMs: 30_000,
      });

      await expect(service.convert('# Hi')).rejects.toBeInstanceOf(InternalError);
      expect(converter.runs).toHaveLength(0);
    });

    it('fails with InternalError when the output cannot be read, still removing the input', async () => {
      // Output path exists but is a directory: the existence check passes, the read does not.
      const converter: Converter = {
        async run(_inputPath: string, outputPath: string): Promise<ConverterResult> {
          await mkdir(outputPath);
          return { status: 'exited', exitCode: 0, stdout: '', stderr: '' };
        },
        async version() {
          return 'pandoc 3.1.11';
        },
      };

      const conversion = serviceWith(converter, () => 'tok-dir').convert('# Hi');

      await expect(conversion).rejects.toBeInstanceOf(InternalError);
      expect(await readdir(scratchDir)).toEqual(['tok-dir.docx']);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ token: 'tok-dir', path: join(scratchDir, 'tok-dir.docx') }),
        'Failed to remove scratch artifact',
      );
    });
  });

  describe('concurrency', () => {
    it('keeps concurrent conversions isolated', async () => {
      const converter = new FakeConverter();
      const service = serviceWith(converter);
      const inputs = Array.from({ length: 20 }, (_, i) => `# Document ${i}\n\nBody ${i}`);

      const documents = await Promise.all(inputs.map((markdown) => service.convert(markdown)));

      documents.forEach((document, i) => {
        expect(document.content.toString('utf8')).toBe(FAKE_DOCX_PREFIX + inputs[i]);
      });
      const inputPaths = new Set(converter.runs.map((run) => run.inputPath));
      expect(inputPaths.size).toBe(20);
      expect(await readdir(scratchDir)).toEqual([]);
    });
  });

  describe('metrics', () => {
    it('counts outcomes and returns the in-flight gauge to zero', async () => {
      await serviceWith(new FakeConverter()).convert('# ok');
      await expect(
        serviceWith(new FakeConverter({ kind: 'exit', exitCode: 1, stderr: 'x' })).convert('# bad'),
      ).rejects.toBeInstanceOf(ConversionFailedError);
      await expect(
        serviceWith(new FakeConverter({ kind: 'timeout' })).convert('# slow'),
      ).rejects.toBeInstanceOf(ConversionTimeoutError);

      const lines = serializeMetrics().split('\n');
      expect(lines).toContain('conversions_total{outcome="success"} 1');
      expect(lines).toContain('conversions_total{outcome="failed"} 1');
      expect(lines).toContain('conversions_total{outcome="timeout"} 1');
      expect(lines).toContain('conversions_total{outcome="output_missing"} 0');
      expect(lines).toContain('conversion_duration_seconds_count 3');
      expect(lines).toContain('conversions_in_flight 0');
    });
  });
});
