import type { BaseMessage } from '@langchain/core/messages';
import { ContextChunk, SynthesisError } from '@docqa/core';
import {
  AnswerModelService,
  StructuredAnswerModel,
  formatContext,
} from '../answer-model.service.js';

jest.mock('@docqa/metrics', () => ({
  metrics: { externalCallFailed: jest.fn() },
}));

const { metrics: mockMetrics } = jest.requireMock('@docqa/metrics');

const context: ContextChunk[] = [
  { chunkId: 'doc1-0', documentId: 'doc1', text: 'alpha', pageNumbers: [2] },
  { chunkId: 'doc1-1', documentId: 'doc1', text: 'beta' },
];

function scripted(output: unknown) {
  const invoke = jest.fn(async (_input: BaseMessage[]) => output);
  const model: StructuredAnswerModel = { invoke };
  return { model, invoke };
}

describe('formatContext', () => {
  it('labels blocks with their number and pages', () => {
    expect(formatContext(context)).toBe(
      '[Context 1] (Page 2)\nalpha\n\n[Context 2]\nbeta'
    );
  });

  it('names the source document when its title is known', () => {
    expect(
      formatContext([
        {
          chunkId: 'doc2-0',
          documentId: 'doc2',
          documentTitle: 'Refund policy',
          text: 'gamma',
          pageNumbers: [1, 3],
        },
      ])
    ).toBe('[Context 1] Document: "Refund policy" (Page 1, 3)\ngamma');
  });
});

describe('AnswerModelService', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('sends the system prompt and the numbered context', async () => {
    const { model, invoke } = scripted({
      answer: 'A',
      confidence: 0.5,
      reasoning: null,
      used_context: [1],
    });

    await new AnswerModelService(model).generate('What?', context);

    const messages = invoke.mock.calls[0][0];
    expect(messages).toHaveLength(2);
    expect(messages[1].content).toBe(
      'CONTEXT:\n[Context 1] (Page 2)\nalpha\n\n[Context 2]\nbeta\n\nQUESTION:\nWhat?'
    );
  });

  it('maps context numbers back to chunk ids', async () => {
    const { model } = scripted({
      answer: 'Beta it is',
      confidence: 0.8,
      reasoning: 'found in block 2',
      used_context: [2, 2, 7],
    });

    await expect(
      new AnswerModelService(model).generate('Which?', context)
    ).resolves.toEqual({
      answer: 'Beta it is',
      confidence: 0.8,
      reasoning: 'found in block 2',
      usedChunkIds: ['doc1-1'],
    });
  });

  it('hands back an out-of-range confidence unchanged', async () => {
    const { model } = scripted({
      answer: 'A',
      confidence: 1.2,
      reasoning: null,
      used_context: null,
    });

    await expect(
      new AnswerModelService(model).generate('Q', context)
    ).resolves.toEqual({ answer: 'A', confidence: 1.2 });
  });

  it('leaves usedChunkIds unset when the model reports none', async () => {
    const { model } = scripted({
      answer: 'A',
      confidence: null,
      reasoning: null,
      used_context: null,
    });

    await expect(
      new AnswerModelService(model).generate('Q', context)
    ).resolves.toEqual({ answer: 'A', confidence: null });
  });

  it('wraps model failures as SynthesisError', async () => {
    const model: StructuredAnswerModel = {
      invoke: jest.fn().mockRejectedValue(new Error('timeout')),
    };

    const error = await new AnswerModelService(model)
      .generate('Q', context)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SynthesisError);
    expect(error).toMatchObject({
      message: 'Answer generation failed',
      retryable: true,
    });
    expect(mockMetrics.externalCallFailed).toHaveBeenCalledWith(
      'language_model'
    );
  });

  it('rejects malformed structured output', async () => {
    const { model } = scripted({ answer: 42 });

    await expect(
      new AnswerModelService(model).generate('Q', context)
    ).rejects.toBeInstanceOf(SynthesisError);
  });
});
