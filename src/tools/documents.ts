import path from 'node:path';
import { DocumentExtractionError, UnsupportedDocumentError } from './errors.js';

export const SUPPORTED_EXTENSIONS = ['.pdf', '.docx', '.doc', '.txt'] as const;
export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export interface ExtractedText {
  text: string;
  /** Page count reported by the format, when it has one. */
  pages?: number;
}

/** Format-specific readers, swappable in tests. */
export interface TextExtractors {
  pdf(bytes: Buffer): Promise<ExtractedText>;
  docx(bytes: Buffer): Promise<ExtractedText>;
}

export const defaultExtractors: TextExtractors = {
  async pdf(bytes) {
    // Loaded on first use: pdf-parse reads a sample file when imported eagerly
    const pdfParse: typeof import('pdf-parse') = require('pdf-parse');
    const out = await pdfParse(bytes);
    return { text: out.text, pages: out.numpages };
  },
  async docx(bytes) {
    const mammoth: typeof import('mammoth') = require('mammoth');
    const out = await mammoth.extractRawText({ buffer: bytes });
    return { text: out.value };
  },
};

function isSupported(ext: string): ext is SupportedExtension {
  return SUPPORTED_EXTENSIONS.some((supported) => supported === ext);
}

export function documentExtension(filename: string): SupportedExtension {
  const ext = path.extname(filename).toLowerCase();
  if (!isSupported(ext)) throw new UnsupportedDocumentError(ext);
  return ext;
}

function decodeText(bytes: Buffer): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return bytes.toString('latin1');
  }
}

export async function extractText(filename: string, bytes: Buffer, extractors: TextExtractors = defaultExtractors): Promise<ExtractedText> {
  const ext = documentExtension(filename);
  if (ext === '.txt') return { text: decodeText(bytes) };

  try {
    return ext === '.pdf' ? await extractors.pdf(bytes) : await extractors.docx(bytes);
  } catch (err) {
    throw new DocumentExtractionError(filename, err instanceof Error ? err.message : String(err));
  }
}

/**
 * Splits text into overlapping windows, preferring to end a window at a
 * sentence or line break once it is past half its size. Fragments of 50
 * characters or fewer are dropped.
 */
export function chunkText(text: string, chunkSize = 1000, overlap = 200): string[] {
  const chunks: string[] = [];
  let start = 0;

  while (start < text.length) {
    let end = start + chunkSize;
    let piece = text.slice(start, end);

    if (end < text.length) {
      const breakAt = Math.max(piece.lastIndexOf('.'), piece.lastIndexOf('\n'));
      if (breakAt > chunkSize * 0.5) {
        piece = piece.slice(0, breakAt + 1);
        end = start + breakAt + 1;
      }
    }

    const trimmed = piece.trim();
    if (trimmed.length > 50) chunks.push(trimmed);

    if (end >= text.length) break;
    start = Math.max(end - overlap, start + 1);
  }

  return chunks;
}
