import { Inject, Injectable } from '@nestjs/common';
import {
  ChunkDraft,
  ChunkOptions,
  ChunkOptionsSchema,
  ConfigurationError,
  formatIssues,
} from '@docqa/core';
import { Tokenizer } from './tokenizer.js';
import { TOKENIZER } from '../tokens.js';

interface PageSpan {
  pageNumber: number;
  start: number;
  end: number;
}

export function validateChunkOptions(options: ChunkOptions): ChunkOptions {
  const result = ChunkOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid chunking options: ${formatIssues(result.error)}`,
      { chunkSize: options.chunkSize, overlap: options.overlap }
    );
  }
  return result.data;
}

/**
 * Sliding window over a token sequence: a window of `chunkSize` tokens every
 * `chunkSize - overlap` tokens, the last one possibly shorter. Window edges
 * are moved back onto tokens accepted by `isBoundary`, when one exists inside
 * the window, so no character is split between chunks.
 */
export function slideWindows(
  tokenCount: number,
  { chunkSize, overlap }: ChunkOptions,
  isBoundary: (index: number) => boolean = () => true
): Array<[number, number]> {
  const windows: Array<[number, number]> = [];
  let start = 0;
  while (start < tokenCount) {
    const limit = Math.min(start + chunkSize, tokenCount);
    let end = limit;
    while (end > start + 1 && !isBoundary(end)) {
      end--;
    }
    if (!isBoundary(end)) {
      end = limit;
    }
    windows.push([start, end]);
    if (end === tokenCount) {
      break;
    }

    let next = Math.max(end - overlap, start + 1);
    while (next > start + 1 && !isBoundary(next)) {
      next--;
    }
    start = isBoundary(next) ? next : end;
  }
  return windows;
}

@Injectable()
export class ChunkingService {
  constructor(@Inject(TOKENIZER) private readonly tokenizer: Tokenizer) {}

  get tokenizerKind() {
    return this.tokenizer.kind;
  }

  countTokens(text: string): number {
    return this.tokenizer.encode(text).length;
  }

  chunkText(text: string, options: ChunkOptions): ChunkDraft[] {
    const { chunkSize, overlap } = validateChunkOptions(options);
    const tokens = this.tokenizer.encode(text);
    return this.buildDrafts(tokens, { chunkSize, overlap });
  }

  /**
   * Chunk a paginated document. Pages are tokenized one by one and their
   * token sequences concatenated; each chunk lists the 1-based pages its
   * token range touches.
   */
  chunkPages(pages: string[], options: ChunkOptions): ChunkDraft[] {
    const { chunkSize, overlap } = validateChunkOptions(options);
    const tokens: unknown[] = [];
    const spans: PageSpan[] = [];

    pages.forEach((page, idx) => {
      const pageTokens = this.tokenizer.encode(page);
      if (pageTokens.length === 0) {
        return;
      }
      spans.push({
        pageNumber: idx + 1,
        start: tokens.length,
        end: tokens.length + pageTokens.length,
      });
      for (const token of pageTokens) {
        tokens.push(token);
      }
    });

    return this.buildDrafts(tokens, { chunkSize, overlap }).map((draft) => ({
      ...draft,
      pageNumbers: spans
        .filter(
          (span) => span.start < draft.endToken && span.end > draft.startToken
        )
        .map((span) => span.pageNumber),
    }));
  }

  private buildDrafts(tokens: unknown[], options: ChunkOptions): ChunkDraft[] {
    const windows = slideWindows(tokens.length, options, (index) =>
      this.tokenizer.isBoundary(tokens, index)
    );
    return windows.map(([start, end], index) => {
      const slice = tokens.slice(start, end);
      return {
        chunkIndex: index,
        text: this.tokenizer.decode(slice),
        tokenCount: slice.length,
        startToken: start,
        endToken: end,
      };
    });
  }
}
