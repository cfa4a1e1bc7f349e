import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { BaseMessage } from '@langchain/core/messages';
import { ChatPromptTemplate } from '@langchain/core/prompts';
import { z } from 'zod';
import {
  ContextChunk,
  Generation,
  LanguageModelClient,
  SynthesisError,
  formatIssues,
  logger,
  toError,
} from '@docqa/core';
import { metrics } from '@docqa/metrics';
import {
  ANSWER_CONTEXT_PROMPT,
  ANSWER_SYSTEM_PROMPT,
} from '../prompts/answer.prompts.js';

export const AnswerSchema = z.object({
  answer: z.string().describe('Answer grounded in the context blocks'),
  confidence: z
    .number()
    .nullable()
    .describe('Confidence between 0 and 1 that the context supports the answer'),
  reasoning: z
    .string()
    .nullable()
    .describe('Short explanation of how the answer follows from the context'),
  used_context: z
    .array(z.number().int())
    .nullable()
    .describe('Numbers of the [Context n] blocks the answer relies on'),
});

export type StructuredAnswer = z.infer<typeof AnswerSchema>;

/** Chat model already bound to `AnswerSchema`. */
export interface StructuredAnswerModel {
  invoke(input: BaseMessage[]): Promise<unknown>;
}

export function bindAnswerSchema(model: BaseChatModel): StructuredAnswerModel {
  return model.withStructuredOutput(AnswerSchema, { name: 'grounded_answer' });
}

export function formatContext(context: ContextChunk[]): string {
  return context
    .map((chunk, idx) => {
      const title = chunk.documentTitle
        ? ` Document: "${chunk.documentTitle}"`
        : '';
      const pages = chunk.pageNumbers?.length
        ? ` (Page ${chunk.pageNumbers.join(', ')})`
        : '';
      return `[Context ${idx + 1}]${title}${pages}\n${chunk.text}`;
    })
    .join('\n\n');
}

/**
 * LanguageModelClient over a LangChain chat model. Context blocks are
 * numbered for the model; the numbers it reports back are mapped to chunk
 * ids.
 */
export class AnswerModelService implements LanguageModelClient {
  private readonly prompt = ChatPromptTemplate.fromMessages([
    ['system', ANSWER_SYSTEM_PROMPT],
    ['human', ANSWER_CONTEXT_PROMPT],
  ]);

  constructor(private readonly model: StructuredAnswerModel) {}

  async generate(
    question: string,
    context: ContextChunk[]
  ): Promise<Generation> {
    let raw: unknown;
    try {
      const messages = await this.prompt.formatMessages({
        context: formatContext(context),
        question,
      });
      raw = await this.model.invoke(messages);
    } catch (err) {
      metrics.externalCallFailed('language_model');
      logger.error(`Answer generation failed: ${toError(err).message}`);
      throw new SynthesisError('Answer generation failed', err);
    }

    const parsed = AnswerSchema.safeParse(raw);
    if (!parsed.success) {
      metrics.externalCallFailed('language_model');
      throw new SynthesisError(
        `Malformed model output: ${formatIssues(parsed.error)}`
      );
    }
    return this.toGeneration(parsed.data, context);
  }

  private toGeneration(
    output: StructuredAnswer,
    context: ContextChunk[]
  ): Generation {
    const generation: Generation = {
      answer: output.answer,
      confidence: output.confidence,
    };
    if (output.reasoning) {
      generation.reasoning = output.reasoning;
    }
    if (output.used_context) {
      const ids = new Set<string>();
      for (const label of output.used_context) {
        const chunk = context[label - 1];
        if (chunk) {
          ids.add(chunk.chunkId);
        } else {
          logger.warn(`Model cited unknown context block ${label}`);
        }
      }
      generation.usedChunkIds = [...ids];
    }
    return generation;
  }
}
