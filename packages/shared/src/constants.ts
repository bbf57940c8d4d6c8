// === Application Constants ===

export const APP_NAME = 'mdocx';
export const APP_VERSION = '0.1.0';

// === Server ===

export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_PORT = 5001;
export const DEFAULT_MAX_BODY_SIZE = '10mb';

// === Conversion ===

export const DEFAULT_CONVERTER_PATH = 'pandoc';
export const CONVERSION_TIMEOUT_MS = 30_000;
export const CONVERTER_VERSION_TIMEOUT_MS = 5_000;
export const CONVERTER_MAX_OUTPUT_BYTES = 4 * 1024 * 1024; // stdout + stderr capture limit

export const SOURCE_EXTENSION = '.md';
export const TARGET_EXTENSION = '.docx';

export const DOWNLOAD_FILE_NAME = 'converted_document.docx';
export const DOCX_MIME_TYPE =
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

// === Error Messages (wire contract) ===

export const ERROR_MESSAGES = {
  notJson: 'Request must be JSON',
  malformedJson: 'Malformed JSON in request body',
  missingMarkdown: "Missing 'markdown' key in request body",
  markdownNotString: "'markdown' must be a string",
  bodyTooLarge: 'Request body too large',
  conversionFailed: 'Pandoc conversion failed',
  conversionTimeout: 'Pandoc conversion timed out',
  outputMissing: 'Converted file not found on server',
  internal: 'An unexpected error occurred',
  notFound: 'Not found',
} as const;
