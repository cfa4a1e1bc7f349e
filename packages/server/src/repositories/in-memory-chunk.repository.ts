import {
  Chunk,
  ChunkRepository,
  ChunkRepositoryStats,
  Document,
} from '@docqa/core';

/**
 * Process-local document and chunk store. Documents are listed newest first.
 */
export class InMemoryChunkRepository implements ChunkRepository {
  private readonly documents = new Map<string, Document>();
  private readonly chunksByDocument = new Map<string, Chunk[]>();
  private readonly chunksById = new Map<string, Chunk>();

  async save(document: Document, chunks: Chunk[]): Promise<void> {
    if (this.documents.has(document.id)) {
      this.drop(document.id);
    }
    const ordered = [...chunks].sort((a, b) => a.chunkIndex - b.chunkIndex);
    this.documents.set(document.id, document);
    this.chunksByDocument.set(document.id, ordered);
    for (const chunk of ordered) {
      this.chunksById.set(chunk.id, chunk);
    }
  }

  async delete(documentId: string): Promise<boolean> {
    return this.drop(documentId);
  }

  async getDocument(documentId: string): Promise<Document | undefined> {
    return this.documents.get(documentId);
  }

  async getChunk(chunkId: string): Promise<Chunk | undefined> {
    return this.chunksById.get(chunkId);
  }

  async getChunks(documentId: string): Promise<Chunk[]> {
    return [...(this.chunksByDocument.get(documentId) ?? [])];
  }

  async listDocuments(): Promise<Document[]> {
    return [...this.documents.values()].sort((a, b) =>
      b.createdAt.localeCompare(a.createdAt)
    );
  }

  async stats(): Promise<ChunkRepositoryStats> {
    let chunks = 0;
    let tokens = 0;
    for (const document of this.documents.values()) {
      chunks += document.chunkCount;
      tokens += document.tokenCount;
    }
    return { documents: this.documents.size, chunks, tokens };
  }

  private drop(documentId: string): boolean {
    const chunks = this.chunksByDocument.get(documentId) ?? [];
    for (const chunk of chunks) {
      this.chunksById.delete(chunk.id);
    }
    this.chunksByDocument.delete(documentId);
    return this.documents.delete(documentId);
  }
}
