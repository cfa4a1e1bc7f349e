import { getEncoding, Tiktoken } from 'js-tiktoken';
import { TokenizerKind } from '@docqa/core';

/**
 * Deterministic text <-> token mapping. `decode(encode(text))` need not
 * reproduce whitespace exactly, but equal inputs always give equal tokens.
 */
export interface Tokenizer<T = unknown> {
  readonly kind: TokenizerKind;
  encode(text: string): T[];
  decode(tokens: T[]): string;
  /**
   * Whether cutting `tokens` before `index` splits no character, so both
   * sides decode to text that concatenates back to the whole.
   */
  isBoundary(tokens: T[], index: number): boolean;
}

export class WhitespaceTokenizer implements Tokenizer<string> {
  readonly kind = 'whitespace' as const;

  encode(text: string): string[] {
    return text.match(/\S+/g) ?? [];
  }

  decode(tokens: string[]): string {
    return tokens.join(' ');
  }

  isBoundary(): boolean {
    return true;
  }
}

// A UTF-8 character spans at most 4 bytes, hence at most 4 BPE tokens.
const MAX_CHAR_TOKENS = 4;

let cl100k: Tiktoken | null = null;

/**
 * BPE tokenizer using the cl100k_base encoding. The rank table ships with
 * js-tiktoken and is loaded once per process.
 */
export class TiktokenTokenizer implements Tokenizer<number> {
  readonly kind = 'tiktoken' as const;
  private readonly encoding: Tiktoken;

  constructor() {
    if (!cl100k) {
      cl100k = getEncoding('cl100k_base');
    }
    this.encoding = cl100k;
  }

  encode(text: string): number[] {
    return this.encoding.encode(text);
  }

  decode(tokens: number[]): string {
    return this.encoding.decode(tokens);
  }

  isBoundary(tokens: number[], index: number): boolean {
    if (index <= 0 || index >= tokens.length) {
      return true;
    }
    const from = Math.max(0, index - MAX_CHAR_TOKENS);
    const to = Math.min(tokens.length, index + MAX_CHAR_TOKENS);
    const left = this.decode(tokens.slice(from, index));
    const right = this.decode(tokens.slice(index, to));
    return left + right === this.decode(tokens.slice(from, to));
  }
}

export function createTokenizer(kind: TokenizerKind): Tokenizer {
  switch (kind) {
    case 'whitespace':
      return new WhitespaceTokenizer();
    case 'tiktoken':
      return new TiktokenTokenizer();
  }
}
