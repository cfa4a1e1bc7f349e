export interface ChunkOptions {
  chunkSize: number;
  overlap: number;
}

/**
 * Chunker output. `startToken`/`endToken` delimit the half-open range of the
 * document's token sequence covered by the chunk.
 */
export interface ChunkDraft {
  chunkIndex: number;
  text: string;
  tokenCount: number;
  startToken: number;
  endToken: number;
  pageNumbers?: number[];
}

export interface Chunk extends ChunkDraft {
  id: string;
  documentId: string;
}

export function chunkIdFor(documentId: string, chunkIndex: number): string {
  return `${documentId}-${chunkIndex}`;
}
