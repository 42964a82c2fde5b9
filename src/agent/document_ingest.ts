import type { DocumentMemory } from '../core/documents.js';
import { getThreadId } from '../core/memory.js';
import type { DocumentUploadResponse } from '../schemas/upload.js';
import { chunkText, extractText, defaultExtractors, type TextExtractors } from '../tools/documents.js';
import { DocumentExtractionError } from '../tools/errors.js';
import type { Logger } from '../util/logging.js';

export interface IngestDeps {
  documents: DocumentMemory;
  log: Logger;
  extractors?: TextExtractors;
}

/** Reads an uploaded file, chunks it and files the chunks under the session. */
export async function ingestDocument(
  deps: IngestDeps,
  filename: string,
  bytes: Buffer,
  sessionId?: string,
): Promise<DocumentUploadResponse> {
  const id = getThreadId(sessionId);
  const extracted = await extractText(filename, bytes, deps.extractors ?? defaultExtractors);
  const chunks = chunkText(extracted.text);
  if (chunks.length === 0) throw new DocumentExtractionError(filename, 'no readable text');

  const stored = await deps.documents.add(
    id,
    chunks,
    chunks.map((_, i) => ({ filename, chunk_index: i, total_chunks: chunks.length })),
  );
  const pages = extracted.pages ?? Math.max(1, Math.floor(chunks.length / 2));
  deps.log.info({ sessionId: id, chunks: stored, pages }, 'document ingested');

  return {
    filename,
    pages,
    chunks: stored,
    status: 'success',
    message: `Processed ${filename}: ${stored} chunks ready for questions.`,
    session_id: id,
  };
}
