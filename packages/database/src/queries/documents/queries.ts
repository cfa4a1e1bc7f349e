import { Postgres } from '../../database.js';

let initPromise: Promise<void> | null = null;
let isInitialized = false;

export namespace documents {
  /**
   * Creates the `documents` and `document_chunks` tables. Chunks are removed
   * together with their document.
   */
  export async function init(): Promise<void> {
    if (isInitialized) {
      return;
    }

    if (initPromise) {
      return await initPromise;
    }

    initPromise = performInit();

    try {
      await initPromise;
      isInitialized = true;
    } finally {
      initPromise = null;
    }
  }

  async function performInit(): Promise<void> {
    const t = [
      new Postgres.Query(`
        CREATE TABLE IF NOT EXISTS documents(
          id VARCHAR PRIMARY KEY,
          title TEXT NOT NULL,
          chunk_count INTEGER NOT NULL,
          token_count INTEGER NOT NULL,
          page_count INTEGER NOT NULL,
          created_at TIMESTAMPTZ NOT NULL
        );
      `),
      new Postgres.Query(`
        CREATE TABLE IF NOT EXISTS document_chunks(
          id VARCHAR PRIMARY KEY,
          document_id VARCHAR NOT NULL
            REFERENCES documents(id) ON DELETE CASCADE,
          chunk_index INTEGER NOT NULL,
          content TEXT NOT NULL,
          token_count INTEGER NOT NULL,
          start_token INTEGER NOT NULL,
          end_token INTEGER NOT NULL,
          page_numbers INTEGER[]
        );
      `),
      new Postgres.Query(
        `CREATE INDEX IF NOT EXISTS document_chunks_document_idx
           ON document_chunks(document_id, chunk_index);`
      ),
    ];
    await Postgres.transaction(t);
  }

  export interface DocumentRow {
    id: string;
    title: string;
    chunk_count: number;
    token_count: number;
    page_count: number;
    created_at: Date;
  }

  export interface ChunkRow {
    id: string;
    document_id: string;
    chunk_index: number;
    content: string;
    token_count: number;
    start_token: number;
    end_token: number;
    page_numbers: number[] | null;
  }

  /**
   * Replaces the document and all of its chunks in one transaction.
   */
  export async function save(
    document: DocumentRow,
    chunks: ChunkRow[]
  ): Promise<void> {
    const t = [
      new Postgres.Query(`DELETE FROM documents WHERE id = $1;`, [
        document.id,
      ]),
      new Postgres.Query(
        `INSERT INTO documents(id, title, chunk_count, token_count, page_count, created_at)
         VALUES ($1, $2, $3, $4, $5, $6);`,
        [
          document.id,
          document.title,
          document.chunk_count,
          document.token_count,
          document.page_count,
          document.created_at,
        ]
      ),
      ...chunks.map(
        (chunk) =>
          new Postgres.Query(
            `INSERT INTO document_chunks(id, document_id, chunk_index, content,
               token_count, start_token, end_token, page_numbers)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8);`,
            [
              chunk.id,
              chunk.document_id,
              chunk.chunk_index,
              chunk.content,
              chunk.token_count,
              chunk.start_token,
              chunk.end_token,
              chunk.page_numbers,
            ]
          )
      ),
    ];
    await Postgres.transaction(t);
  }

  export async function remove(documentId: string): Promise<boolean> {
    const q = new Postgres.Query(
      `DELETE FROM documents WHERE id = $1 RETURNING id`,
      [documentId]
    );
    const res = await Postgres.query<{ id: string }>(q);
    return res.length > 0;
  }

  export async function getDocument(
    documentId: string
  ): Promise<DocumentRow | undefined> {
    const q = new Postgres.Query(`SELECT * FROM documents WHERE id = $1`, [
      documentId,
    ]);
    const res = await Postgres.query<DocumentRow>(q);
    return res[0];
  }

  export async function list(): Promise<DocumentRow[]> {
    const q = new Postgres.Query(
      `SELECT * FROM documents ORDER BY created_at DESC, id ASC`
    );
    return await Postgres.query<DocumentRow>(q);
  }

  export async function getChunk(
    chunkId: string
  ): Promise<ChunkRow | undefined> {
    const q = new Postgres.Query(
      `SELECT * FROM document_chunks WHERE id = $1`,
      [chunkId]
    );
    const res = await Postgres.query<ChunkRow>(q);
    return res[0];
  }

  export async function getChunks(documentId: string): Promise<ChunkRow[]> {
    const q = new Postgres.Query(
      `SELECT * FROM document_chunks
       WHERE document_id = $1
       ORDER BY chunk_index ASC`,
      [documentId]
    );
    return await Postgres.query<ChunkRow>(q);
  }

  export type TotalsRow = {
    documents: string;
    chunks: string;
    tokens: string;
  };

  export async function totals(): Promise<{
    documents: number;
    chunks: number;
    tokens: number;
  }> {
    const q = new Postgres.Query(
      `SELECT COUNT(*) AS documents,
              COALESCE(SUM(chunk_count), 0) AS chunks,
              COALESCE(SUM(token_count), 0) AS tokens
       FROM documents`
    );
    const res = await Postgres.query<TotalsRow>(q);
    return {
      documents: parseInt(res[0]?.documents || '0', 10),
      chunks: parseInt(res[0]?.chunks || '0', 10),
      tokens: parseInt(res[0]?.tokens || '0', 10),
    };
  }
}
