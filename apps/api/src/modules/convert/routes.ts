/**
 * Conversion API Routes
 *
 * Endpoints:
 * - POST  /  — Convert `{ "markdown": "..." }` to a DOCX attachment
 */

import { Router } from 'express';
import { z } from 'zod';
import { ERROR_MESSAGES } from '@mdocx/shared';
import type { ConversionService } from '../../services/conversion.service';
import { BadRequestError, UnsupportedMediaTypeError } from '../../middleware/error-handler';

// application/json, application/problem+json, ... with optional parameters
const JSON_CONTENT_TYPE = /^application\/(?:[\w.-]+\+)?json\s*(?:;|$)/i;

const convertRequestSchema = z.object({
  markdown: z.string({ invalid_type_error: ERROR_MESSAGES.markdownNotString }).nullish(),
});

/**
 * Extracts the Markdown source from a parsed body.
 * Absent, null and empty all count as missing.
 */
export function parseConvertRequest(body: unknown): string {
  const parsed = convertRequestSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    if (issue?.path[0] === 'markdown') {
      throw new BadRequestError(issue.message);
    }
    throw new BadRequestError(ERROR_MESSAGES.missingMarkdown);
  }

  const { markdown } = parsed.data;
  if (!markdown) {
    throw new BadRequestError(ERROR_MESSAGES.missingMarkdown);
  }
  return markdown;
}

export function createConvertRouter(conversionService: ConversionService): Router {
  const router = Router();

  router.post('/', async (req, res, next) => {
    try {
      if (!JSON_CONTENT_TYPE.test(req.get('Content-Type') ?? '')) {
        throw new UnsupportedMediaTypeError();
      }

      const markdown = parseConvertRequest(req.body);
      const document = await conversionService.convert(markdown);

      res.attachment(document.fileName);
      res.type(document.mimeType);
      res.send(document.content);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
