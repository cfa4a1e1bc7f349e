import { Inject, Injectable } from '@nestjs/common';
import {
  Citation,
  ContextChunk,
  Generation,
  LanguageModelClient,
  NO_RELEVANT_CONTENT_ANSWER,
  QueryResult,
  RagConfig,
  RetrievedChunk,
  SynthesisError,
  logger,
} from '@docqa/core';
import { LANGUAGE_MODEL, RAG_CONFIG } from '../tokens.js';

export function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export function toSnippet(text: string, length: number): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}

@Injectable()
export class AnswerSynthesizerService {
  constructor(
    @Inject(LANGUAGE_MODEL) private readonly model: LanguageModelClient,
    @Inject(RAG_CONFIG) private readonly config: RagConfig
  ) {}

  async synthesize(
    question: string,
    ranked: RetrievedChunk[]
  ): Promise<QueryResult> {
    if (ranked.length === 0) {
      return {
        answer: NO_RELEVANT_CONTENT_ANSWER,
        confidence: 0,
        confidenceSource: 'none',
        citations: [],
      };
    }

    const selected = this.selectContext(ranked);
    const context: ContextChunk[] = selected.map(
      ({ chunk, documentTitle }) => ({
        chunkId: chunk.id,
        documentId: chunk.documentId,
        documentTitle,
        text: chunk.text,
        pageNumbers: chunk.pageNumbers,
      })
    );

    let generation: Generation;
    try {
      generation = await this.model.generate(question, context);
    } catch (err) {
      if (err instanceof SynthesisError) {
        throw err;
      }
      throw new SynthesisError('Answer generation failed', err);
    }

    const result: QueryResult = {
      answer: generation.answer,
      ...this.confidenceOf(generation, ranked),
      citations: this.citationsFor(selected, generation.usedChunkIds),
    };
    if (generation.reasoning) {
      result.reasoning = generation.reasoning;
    }
    return result;
  }

  /**
   * Rank-ordered prefix of `ranked` capped by chunk count and token budget.
   * The best chunk is always kept, whatever its size.
   */
  selectContext(ranked: RetrievedChunk[]): RetrievedChunk[] {
    const { maxChunksForContext, maxContextTokens } = this.config;
    const selected: RetrievedChunk[] = [];
    let tokens = 0;

    for (const candidate of ranked.slice(0, maxChunksForContext)) {
      const next = tokens + candidate.chunk.tokenCount;
      if (selected.length > 0 && next > maxContextTokens) {
        break;
      }
      selected.push(candidate);
      tokens = next;
    }

    if (selected.length < ranked.length) {
      logger.debug(
        `Context holds ${selected.length}/${ranked.length} chunks (${tokens} tokens)`
      );
    }
    return selected;
  }

  private confidenceOf(
    generation: Generation,
    ranked: RetrievedChunk[]
  ): Pick<QueryResult, 'confidence' | 'confidenceSource'> {
    const { confidence } = generation;
    if (confidence !== null && Number.isFinite(confidence)) {
      return { confidence: clamp01(confidence), confidenceSource: 'model' };
    }
    const topScore = Math.max(...ranked.map((r) => r.score));
    return { confidence: clamp01(topScore), confidenceSource: 'similarity' };
  }

  private citationsFor(
    selected: RetrievedChunk[],
    usedChunkIds?: string[]
  ): Citation[] {
    const used = usedChunkIds ? new Set(usedChunkIds) : undefined;
    return selected
      .filter(({ chunk }) => !used || used.has(chunk.id))
      .map(({ chunk, score }) => {
        const citation: Citation = {
          documentId: chunk.documentId,
          chunkId: chunk.id,
          chunkIndex: chunk.chunkIndex,
          score,
          snippet: toSnippet(chunk.text, this.config.snippetLength),
        };
        if (chunk.pageNumbers?.length) {
          citation.pageNumbers = chunk.pageNumbers;
        }
        return citation;
      });
  }
}
