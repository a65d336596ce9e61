import { FormattingError } from './errors.js';
import type { DocumentMetadata, RetrievedDocument } from './providers.js';

function hasMetadata(metadata: DocumentMetadata | undefined): metadata is DocumentMetadata {
  return metadata !== undefined && Object.keys(metadata).length > 0;
}

function formatScore(score: unknown, position: number): string {
  if (score === undefined || score === null) return 'N/A';
  if (typeof score !== 'number' || !Number.isFinite(score)) {
    throw new FormattingError(`document ${position} has a non-numeric score (${String(score)})`);
  }
  return score.toFixed(3);
}

function sourceLine(metadata: DocumentMetadata, position: number): string {
  const source = metadata.source === undefined || metadata.source === null ? 'unknown' : String(metadata.source);
  return `[Source: ${source} | Score: ${formatScore(metadata.score, position)}]`;
}

/**
 * Render retrieved documents as numbered context blocks, in the order the
 * index returned them. An empty list gives an empty string.
 *
 * @throws FormattingError when a document's `score` is present but not a finite number
 */
export function formatDocuments(documents: readonly RetrievedDocument[]): string {
  return documents
    .map((doc, i) => {
      const position = i + 1;
      const block = `Document ${position}:\n${doc.content.trim()}`;
      return hasMetadata(doc.metadata) ? `${block}\n${sourceLine(doc.metadata, position)}` : block;
    })
    .join('\n\n');
}
