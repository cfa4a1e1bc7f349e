import { Module } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import {
  DEFAULT_RAG_CONFIG,
  EmbeddingClient,
  LanguageModelClient,
  RagConfig,
} from '@docqa/core';
import { configureApp } from '../../../common/setup-app.js';
import { DocumentsController } from '../documents.controller.js';
import { MetricsController } from '../metrics.controller.js';
import { RagOrchestrator } from '../../services/rag.orchestrator.js';
import { ChunkingService } from '../../chunking/chunking.service.js';
import { WhitespaceTokenizer } from '../../chunking/tokenizer.js';
import { RetrieverService } from '../../retrieval/retriever.service.js';
import { AnswerSynthesizerService } from '../../synthesis/answer-synthesizer.service.js';
import { InMemoryVectorIndex } from '../../vector-store/in-memory-vector-index.js';
import { InMemoryChunkRepository } from '../../repositories/in-memory-chunk.repository.js';

const keywords = ['refund', 'shipping', 'warranty'];

function vectorFor(text: string): number[] {
  const lower = text.toLowerCase();
  return keywords.map((k) => (lower.includes(k) ? 1 : 0));
}

const embedder: EmbeddingClient = {
  embed: async (text) => vectorFor(text),
  embedBatch: async (texts) => texts.map(vectorFor),
};

const model: LanguageModelClient = {
  generate: async (_question, context) => ({
    answer: `Based on ${context.length} passage(s).`,
    confidence: 0.75,
    usedChunkIds: context.slice(0, 1).map((c) => c.chunkId),
  }),
};

function buildOrchestrator(): RagOrchestrator {
  const config: RagConfig = { ...DEFAULT_RAG_CONFIG, tokenizer: 'whitespace' };
  const index = new InMemoryVectorIndex();
  const repository = new InMemoryChunkRepository();
  return new RagOrchestrator(
    new ChunkingService(new WhitespaceTokenizer()),
    new RetrieverService(embedder, index, repository, config),
    new AnswerSynthesizerService(model, config),
    embedder,
    index,
    repository,
    config
  );
}

describe('DocumentsController (HTTP)', () => {
  let app: NestFastifyApplication;

  beforeEach(async () => {
    @Module({
      controllers: [DocumentsController, MetricsController],
      providers: [{ provide: RagOrchestrator, useValue: buildOrchestrator() }],
    })
    class TestModule {}

    app = await NestFactory.create<NestFastifyApplication>(
      TestModule,
      new FastifyAdapter(),
      { logger: false }
    );
    configureApp(app, { isProduction: false });
    await app.init();
    await app.getHttpAdapter().getInstance().ready();
  });

  afterEach(async () => {
    await app.close();
  });

  const ingest = (payload: Record<string, unknown>) =>
    app.inject({ method: 'POST', url: '/api/documents', payload });

  it('ingests a document', async () => {
    const response = await ingest({
      documentId: 'policy',
      title: 'Store policy',
      text: 'Refund within 30 days. Shipping takes a week.',
    });

    expect(response.statusCode).toBe(201);
    expect(response.json()).toMatchObject({
      id: 'policy',
      title: 'Store policy',
      chunkCount: 1,
      tokenCount: 8,
      pageCount: 1,
    });
  });

  it('rejects a duplicate with 409', async () => {
    await ingest({ documentId: 'policy', text: 'Refund policy' });

    const response = await ingest({ documentId: 'policy', text: 'Refund' });

    expect(response.statusCode).toBe(409);
    expect(response.json()).toMatchObject({
      error: 'DuplicateDocumentError',
      message: 'Document policy is already indexed',
    });
  });

  it('validates the request body', async () => {
    const response = await ingest({ documentId: 'bad id!' });

    expect(response.statusCode).toBe(400);
    const body = response.json();
    expect(body.message).toBe('Validation failed');
    expect(Object.keys(body.errors).sort()).toEqual(['documentId', 'text']);
  });

  it('answers a question with citations', async () => {
    await ingest({ documentId: 'policy', text: 'Refund within 30 days.' });
    await ingest({ documentId: 'terms', text: 'Warranty lasts a year.' });

    const response = await app.inject({
      method: 'POST',
      url: '/api/documents/query',
      payload: { question: 'How does the refund work?' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      answer: 'Based on 2 passage(s).',
      confidence: 0.75,
      confidenceSource: 'model',
      citations: [
        {
          documentId: 'policy',
          chunkId: 'policy-0',
          chunkIndex: 0,
          score: 1,
          snippet: 'Refund within 30 days.',
        },
      ],
    });
  });

  it('reports stats, lists and fetches documents', async () => {
    await ingest({ documentId: 'policy', text: 'Refund within 30 days.' });

    const stats = await app.inject({ method: 'GET', url: '/api/documents/stats' });
    const list = await app.inject({ method: 'GET', url: '/api/documents' });
    const one = await app.inject({ method: 'GET', url: '/api/documents/policy' });

    expect(stats.json()).toEqual({
      totalDocuments: 1,
      totalChunks: 1,
      totalTokens: 4,
      index: { documents: 1, entries: 1, dimensions: 3, approximateBytes: 24 },
    });
    expect(list.json().map((d: { id: string }) => d.id)).toEqual(['policy']);
    expect(one.json().chunks).toHaveLength(1);
  });

  it('returns 404 for an unknown document', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/api/documents/missing',
    });

    expect(response.statusCode).toBe(404);
  });

  it('deletes documents idempotently', async () => {
    await ingest({ documentId: 'policy', text: 'Refund within 30 days.' });

    const first = await app.inject({
      method: 'DELETE',
      url: '/api/documents/policy',
    });
    const second = await app.inject({
      method: 'DELETE',
      url: '/api/documents/policy',
    });

    expect(first.json()).toEqual({ deleted: true });
    expect(second.json()).toEqual({ deleted: false });
  });

  it('serves Prometheus metrics', async () => {
    await ingest({ documentId: 'policy', text: 'Refund within 30 days.' });

    const response = await app.inject({ method: 'GET', url: '/api/metrics' });

    expect(response.statusCode).toBe(200);
    expect(response.body).toContain('documents_ingested_total{status="success"}');
  });
});
