import type { DocumentMetadata } from '../ports/VectorStore';
import { ValidationError } from './errors';

export function validateIds(ids: string[]): void {
  const seen = new Set<string>();
  for (const id of ids) {
    if (typeof id !== 'string' || id.length === 0) {
      throw new ValidationError('Document IDs must be non-empty strings');
    }
    if (seen.has(id)) {
      throw new ValidationError(`Duplicate document ID: ${id}`);
    }
    seen.add(id);
  }
}

export function validateDocuments(documents: string[], ids: string[], metadatas?: DocumentMetadata[]): void {
  if (documents.length !== ids.length) {
    throw new ValidationError('Number of documents must match number of IDs');
  }
  if (metadatas && metadatas.length !== documents.length) {
    throw new ValidationError('Number of metadatas must match number of documents');
  }
  validateIds(ids);
}

export function validateTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK < 0) {
    throw new ValidationError(`topK must be a non-negative integer, got ${topK}`);
  }
}

/**
 * Keeps the scalar entries of a metadata record coming back from a backend.
 */
export function toDocumentMetadata(raw: Record<string, unknown> | null | undefined, omit: string[] = []): DocumentMetadata {
  const metadata: DocumentMetadata = {};
  if (!raw) return metadata;

  for (const [key, value] of Object.entries(raw)) {
    if (omit.includes(key)) continue;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      metadata[key] = value;
    }
  }
  return metadata;
}
