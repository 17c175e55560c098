/**
 * Document loading and line access.
 *
 * @module document/document
 */

import { createHash } from 'crypto';
import { readFile } from 'fs/promises';
import { DocumentReadError } from '../utils/errors.js';
import type { Document } from '../types/document.js';

/**
 * Deterministic fingerprint of a document's raw text.
 */
export function contentHash(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/**
 * Build a Document from text already in memory.
 *
 * A leading BOM is dropped and line endings are normalized to `\n`
 * before hashing, so the same content saved on different platforms
 * shares one cache entry.
 */
export function createDocument(text: string, path = '<memory>'): Document {
  const normalized = text.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');
  const lines = normalized.endsWith('\n')
    ? normalized.slice(0, -1).split('\n')
    : normalized.split('\n');

  return Object.freeze({
    path,
    hash: contentHash(normalized),
    text: normalized,
    lines: Object.freeze(lines),
  });
}

/**
 * Read a document from disk.
 *
 * @throws DocumentReadError if the file cannot be read or is empty
 */
export async function loadDocument(filePath: string): Promise<Document> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new DocumentReadError(`Cannot read document ${filePath}: ${cause.message}`, filePath, cause);
  }

  if (text.trim().length === 0) {
    throw new DocumentReadError(`Document ${filePath} is empty`, filePath);
  }

  return createDocument(text, filePath);
}

/**
 * Lines `start..end` (1-based, inclusive), clamped to the document.
 */
export function sliceLines(document: Document, start: number, end: number): string[] {
  const from = Math.max(1, start);
  const to = Math.min(document.lines.length, end);
  if (from > to) {
    return [];
  }
  return document.lines.slice(from - 1, to);
}

/**
 * Prefix every line with its 1-based number, as sent to the extraction service.
 */
export function numberLines(document: Document, maxChars = Infinity): string {
  const out: string[] = [];
  let size = 0;
  for (let i = 0; i < document.lines.length; i++) {
    const row = `${i + 1}: ${document.lines[i]}`;
    if (size + row.length + 1 > maxChars) {
      break;
    }
    out.push(row);
    size += row.length + 1;
  }
  return out.join('\n');
}
