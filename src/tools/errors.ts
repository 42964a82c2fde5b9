/**
 * Errors caused by what a caller sent, as opposed to upstream failures.
 * The HTTP layer turns these into 4xx responses.
 */
export class InputError extends Error {
  readonly status: number = 400;
  constructor(
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = 'InputError';
  }
}

export class UnsupportedDocumentError extends InputError {
  constructor(readonly extension: string) {
    super('unsupported_document', `Unsupported file type "${extension || 'none'}". Upload a PDF, DOCX or TXT file.`);
    this.name = 'UnsupportedDocumentError';
  }
}

export class DocumentTooLargeError extends InputError {
  override readonly status = 413;
  constructor(readonly limitMb: number) {
    super('document_too_large', `File exceeds the ${limitMb} MB upload limit.`);
    this.name = 'DocumentTooLargeError';
  }
}

export class DocumentExtractionError extends InputError {
  constructor(filename: string, reason: string) {
    super('document_unreadable', `Could not read text from ${filename}: ${reason}`);
    this.name = 'DocumentExtractionError';
  }
}
