import {
  Chunk,
  ChunkRepository,
  ChunkRepositoryStats,
  Document,
} from '@docqa/core';
import { documents } from '@docqa/database';
import { metrics } from '@docqa/metrics';

function toDocument(row: documents.DocumentRow): Document {
  return {
    id: row.id,
    title: row.title,
    chunkCount: row.chunk_count,
    tokenCount: row.token_count,
    pageCount: row.page_count,
    createdAt: row.created_at.toISOString(),
  };
}

function toChunk(row: documents.ChunkRow): Chunk {
  const chunk: Chunk = {
    id: row.id,
    documentId: row.document_id,
    chunkIndex: row.chunk_index,
    text: row.content,
    tokenCount: row.token_count,
    startToken: row.start_token,
    endToken: row.end_token,
  };
  if (row.page_numbers) {
    chunk.pageNumbers = row.page_numbers;
  }
  return chunk;
}

/**
 * Document and chunk store kept in PostgreSQL next to `chunk_vectors`, so
 * both sides of the index survive a restart.
 */
export class PgChunkRepository implements ChunkRepository {
  async save(document: Document, chunks: Chunk[]): Promise<void> {
    await documents.init();
    await metrics.dbResponseTime('documents.save', () =>
      documents.save(
        {
          id: document.id,
          title: document.title,
          chunk_count: document.chunkCount,
          token_count: document.tokenCount,
          page_count: document.pageCount,
          created_at: new Date(document.createdAt),
        },
        chunks.map((chunk) => ({
          id: chunk.id,
          document_id: chunk.documentId,
          chunk_index: chunk.chunkIndex,
          content: chunk.text,
          token_count: chunk.tokenCount,
          start_token: chunk.startToken,
          end_token: chunk.endToken,
          page_numbers: chunk.pageNumbers ?? null,
        }))
      )
    );
  }

  async delete(documentId: string): Promise<boolean> {
    await documents.init();
    return metrics.dbResponseTime('documents.delete', () =>
      documents.remove(documentId)
    );
  }

  async getDocument(documentId: string): Promise<Document | undefined> {
    await documents.init();
    const row = await documents.getDocument(documentId);
    return row ? toDocument(row) : undefined;
  }

  async getChunk(chunkId: string): Promise<Chunk | undefined> {
    await documents.init();
    const row = await metrics.dbResponseTime('documents.getChunk', () =>
      documents.getChunk(chunkId)
    );
    return row ? toChunk(row) : undefined;
  }

  async getChunks(documentId: string): Promise<Chunk[]> {
    await documents.init();
    const rows = await documents.getChunks(documentId);
    return rows.map(toChunk);
  }

  async listDocuments(): Promise<Document[]> {
    await documents.init();
    const rows = await documents.list();
    return rows.map(toDocument);
  }

  async stats(): Promise<ChunkRepositoryStats> {
    await documents.init();
    return documents.totals();
  }
}
