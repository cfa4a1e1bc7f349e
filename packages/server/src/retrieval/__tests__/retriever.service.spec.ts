import {
  Chunk,
  DEFAULT_RAG_CONFIG,
  EmbeddingClient,
  EmbeddingUnavailableError,
  RagConfig,
  VectorIndex,
} from '@docqa/core';
import { RetrieverService } from '../retriever.service.js';
import { InMemoryVectorIndex } from '../../vector-store/in-memory-vector-index.js';
import { InMemoryChunkRepository } from '../../repositories/in-memory-chunk.repository.js';

function makeChunk(documentId: string, chunkIndex: number): Chunk {
  return {
    id: `${documentId}-${chunkIndex}`,
    documentId,
    chunkIndex,
    text: `${documentId} chunk ${chunkIndex}`,
    tokenCount: 3,
    startToken: chunkIndex * 3,
    endToken: chunkIndex * 3 + 3,
  };
}

function fixedEmbedder(vector: number[]): EmbeddingClient {
  return {
    embed: jest.fn().mockResolvedValue(vector),
    embedBatch: jest.fn(),
  };
}

describe('RetrieverService', () => {
  let index: InMemoryVectorIndex;
  let repository: InMemoryChunkRepository;

  const config = (overrides: Partial<RagConfig> = {}): RagConfig => ({
    ...DEFAULT_RAG_CONFIG,
    ...overrides,
  });

  beforeEach(async () => {
    index = new InMemoryVectorIndex();
    repository = new InMemoryChunkRepository();
    await index.insert('doc1', [
      { documentId: 'doc1', chunkId: 'doc1-0', chunkIndex: 0, vector: [1, 0] },
      { documentId: 'doc1', chunkId: 'doc1-1', chunkIndex: 1, vector: [0, 1] },
    ]);
    await repository.save(
      {
        id: 'doc1',
        title: 'Handbook',
        chunkCount: 2,
        tokenCount: 6,
        pageCount: 1,
        createdAt: '2026-01-01T00:00:00.000Z',
      },
      [makeChunk('doc1', 0), makeChunk('doc1', 1)]
    );
  });

  it('resolves hits to chunks, best first', async () => {
    const retriever = new RetrieverService(
      fixedEmbedder([1, 0]),
      index,
      repository,
      config()
    );

    const result = await retriever.retrieve('q', 2);

    expect(result).toEqual([
      { chunk: makeChunk('doc1', 0), score: 1, documentTitle: 'Handbook' },
      { chunk: makeChunk('doc1', 1), score: 0, documentTitle: 'Handbook' },
    ]);
  });

  it('drops hits below minScore', async () => {
    const retriever = new RetrieverService(
      fixedEmbedder([1, 0]),
      index,
      repository,
      config({ minScore: 0.5 })
    );

    const result = await retriever.retrieve('q', 2);

    expect(result.map((r) => r.chunk.id)).toEqual(['doc1-0']);
  });

  it('skips entries whose chunk is gone', async () => {
    await index.insert('doc2', [
      { documentId: 'doc2', chunkId: 'doc2-0', chunkIndex: 0, vector: [1, 0] },
    ]);
    const retriever = new RetrieverService(
      fixedEmbedder([1, 0]),
      index,
      repository,
      config()
    );

    const result = await retriever.retrieve('q', 3);

    expect(result.map((r) => r.chunk.id)).toEqual(['doc1-0', 'doc1-1']);
  });

  it('returns nothing on an empty index', async () => {
    const retriever = new RetrieverService(
      fixedEmbedder([1, 0]),
      new InMemoryVectorIndex(),
      repository,
      config()
    );

    await expect(retriever.retrieve('q', 5)).resolves.toEqual([]);
  });

  it('keeps the first occurrence of a repeated chunk', async () => {
    const duplicating: VectorIndex = {
      metric: 'cosine',
      insert: jest.fn(),
      remove: jest.fn(),
      stats: jest.fn(),
      search: jest.fn().mockResolvedValue([
        { documentId: 'doc1', chunkId: 'doc1-1', chunkIndex: 1, score: 0.9 },
        { documentId: 'doc1', chunkId: 'doc1-1', chunkIndex: 1, score: 0.4 },
      ]),
    };
    const retriever = new RetrieverService(
      fixedEmbedder([1, 0]),
      duplicating,
      repository,
      config()
    );

    await expect(retriever.retrieve('q', 2)).resolves.toEqual([
      { chunk: makeChunk('doc1', 1), score: 0.9, documentTitle: 'Handbook' },
    ]);
  });

  it('forwards the document filter to the index', async () => {
    const search = jest.spyOn(index, 'search');
    const retriever = new RetrieverService(
      fixedEmbedder([1, 0]),
      index,
      repository,
      config()
    );

    await retriever.retrieve('q', 4, 'doc1');

    expect(search).toHaveBeenCalledWith([1, 0], 4, 'doc1');
  });

  it('reports embedding failures as EmbeddingUnavailableError', async () => {
    const embedder: EmbeddingClient = {
      embed: jest.fn().mockRejectedValue(new Error('socket hang up')),
      embedBatch: jest.fn(),
    };
    const retriever = new RetrieverService(
      embedder,
      index,
      repository,
      config()
    );

    await expect(retriever.retrieve('q', 2)).rejects.toBeInstanceOf(
      EmbeddingUnavailableError
    );
  });
});
