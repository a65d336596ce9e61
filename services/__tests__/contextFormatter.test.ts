import { describe, it, expect } from 'vitest';
import { formatDocuments } from '../contextFormatter.js';
import { FormattingError } from '../errors.js';
import type { RetrievedDocument } from '../providers.js';

function docs(count: number): RetrievedDocument[] {
  return Array.from({ length: count }, (_, i) => ({
    content: `passage ${i + 1}`,
    metadata: { source: `page-${i + 1}.md`, score: 0.9 - i * 0.1 },
  }));
}

describe('formatDocuments', () => {
  it('returns an empty string for no documents', () => {
    expect(formatDocuments([])).toBe('');
  });

  it('formats a document with its source and score', () => {
    const result = formatDocuments([
      {
        content: '  CISNR conducts research in intelligent systems.\n',
        metadata: { source: 'about.md', score: 0.912 },
      },
    ]);

    expect(result).toBe(
      'Document 1:\nCISNR conducts research in intelligent systems.\n[Source: about.md | Score: 0.912]',
    );
  });

  it('separates blocks with a blank line', () => {
    const result = formatDocuments([
      { content: 'first', metadata: { source: 'a.md', score: 0.9 } },
      { content: 'second' },
    ]);

    expect(result).toBe('Document 1:\nfirst\n[Source: a.md | Score: 0.900]\n\nDocument 2:\nsecond');
  });

  it.each([0, 1, 2, 3, 4, 5, 6])('numbers %i documents contiguously in input order', (count) => {
    const result = formatDocuments(docs(count));
    const headers = result.match(/^Document \d+:$/gm) ?? [];

    expect(headers).toEqual(Array.from({ length: count }, (_, i) => `Document ${i + 1}:`));
    for (let i = 1; i < count; i++) {
      expect(result.indexOf(`passage ${i}`)).toBeLessThan(result.indexOf(`passage ${i + 1}`));
    }
  });

  describe('source annotation', () => {
    it('is omitted when metadata is missing', () => {
      expect(formatDocuments([{ content: 'hello' }])).toBe('Document 1:\nhello');
    });

    it('is omitted when metadata is empty', () => {
      expect(formatDocuments([{ content: 'hello', metadata: {} }])).toBe('Document 1:\nhello');
    });

    it('shows N/A when the score is missing', () => {
      expect(formatDocuments([{ content: 'hello', metadata: { source: 'x.md' } }])).toBe(
        'Document 1:\nhello\n[Source: x.md | Score: N/A]',
      );
    });

    it('shows unknown when the source is missing', () => {
      expect(formatDocuments([{ content: 'hello', metadata: { score: 0.5 } }])).toBe(
        'Document 1:\nhello\n[Source: unknown | Score: 0.500]',
      );
    });

    it('rounds scores to three decimal places', () => {
      expect(formatDocuments([{ content: 'hello', metadata: { source: 'x.md', score: 0.87654 } }])).toBe(
        'Document 1:\nhello\n[Source: x.md | Score: 0.877]',
      );
    });
  });

  describe('malformed scores', () => {
    it('throws FormattingError for a string score', () => {
      expect(() => formatDocuments([{ content: 'hello', metadata: { source: 'x.md', score: 'high' } }])).toThrow(
        FormattingError,
      );
    });

    it('throws FormattingError for NaN', () => {
      expect(() => formatDocuments([{ content: 'hello', metadata: { score: Number.NaN } }])).toThrow(
        'Formatting failed: document 1 has a non-numeric score (NaN)',
      );
    });

    it('names the offending position', () => {
      const input: RetrievedDocument[] = [
        { content: 'ok', metadata: { score: 0.4 } },
        { content: 'bad', metadata: { score: '0.3' } },
      ];

      expect(() => formatDocuments(input)).toThrow('document 2 has a non-numeric score (0.3)');
    });
  });
});
