import { Postgres } from '../../database.js';

let initPromise: Promise<void> | null = null;
let initializedDimensions: number | null = null;

export namespace vectors {
  /**
   * Creates the `chunk_vectors` table for embeddings of `dimensions`
   * components, with a cosine ivfflat index.
   */
  export async function init(dimensions: number): Promise<void> {
    if (initializedDimensions === dimensions) {
      return;
    }

    if (initPromise) {
      return await initPromise;
    }

    initPromise = performInit(dimensions);

    try {
      await initPromise;
      initializedDimensions = dimensions;
    } finally {
      initPromise = null;
    }
  }

  async function performInit(dimensions: number): Promise<void> {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new RangeError(`Invalid embedding dimensions: ${dimensions}`);
    }
    const t = [
      new Postgres.Query(`CREATE EXTENSION IF NOT EXISTS vector;`),
      new Postgres.Query(`
        CREATE TABLE IF NOT EXISTS chunk_vectors(
          chunk_id VARCHAR PRIMARY KEY,
          document_id VARCHAR NOT NULL,
          chunk_index INTEGER NOT NULL,
          embedding vector(${dimensions}) NOT NULL
        );
      `),
      new Postgres.Query(
        `CREATE INDEX IF NOT EXISTS chunk_vectors_document_idx
           ON chunk_vectors(document_id);`
      ),
      new Postgres.Query(
        `CREATE INDEX IF NOT EXISTS chunk_vectors_embedding_idx
           ON chunk_vectors USING ivfflat (embedding vector_cosine_ops);`
      ),
    ];
    await Postgres.transaction(t);
  }

  export interface VectorRow {
    chunk_id: string;
    document_id: string;
    chunk_index: number;
    embedding: number[];
  }

  /**
   * Inserts every row in a single transaction.
   */
  export async function insert(rows: VectorRow[]): Promise<void> {
    if (rows.length === 0) {
      return;
    }
    const t = rows.map(
      (row) =>
        new Postgres.Query(
          `INSERT INTO chunk_vectors(chunk_id, document_id, chunk_index, embedding)
           VALUES ($1, $2, $3, $4::vector);`,
          [
            row.chunk_id,
            row.document_id,
            row.chunk_index,
            JSON.stringify(row.embedding),
          ]
        )
    );
    await Postgres.transaction(t);
  }

  export async function deleteDocument(documentId: string): Promise<number> {
    const q = new Postgres.Query(
      `WITH deleted AS (
         DELETE FROM chunk_vectors WHERE document_id = $1 RETURNING chunk_id
       )
       SELECT COUNT(*) AS count FROM deleted`,
      [documentId]
    );
    const res = await Postgres.query<{ count: string }>(q);
    return parseInt(res[0]?.count || '0', 10);
  }

  export type SearchRow = {
    document_id: string;
    chunk_id: string;
    chunk_index: number;
    score: number;
  };

  /**
   * Cosine similarity search, ties broken by chunk index then document id.
   * Ordering on the distance expression itself lets pgvector use the ivfflat
   * index.
   */
  export async function search(
    embedding: number[],
    limit: number,
    documentId?: string
  ): Promise<SearchRow[]> {
    const filter = documentId === undefined ? '' : 'WHERE document_id = $3';
    const values: unknown[] = [JSON.stringify(embedding), limit];
    if (documentId !== undefined) {
      values.push(documentId);
    }
    const q = new Postgres.Query(
      `SELECT document_id, chunk_id, chunk_index,
              1 - (embedding <=> $1::vector) AS score
       FROM chunk_vectors
       ${filter}
       ORDER BY embedding <=> $1::vector ASC, chunk_index ASC, document_id ASC
       LIMIT $2`,
      values
    );
    return await Postgres.query<SearchRow>(q);
  }

  export async function countForDocument(documentId: string): Promise<number> {
    const q = new Postgres.Query(
      `SELECT COUNT(*) AS count FROM chunk_vectors WHERE document_id = $1`,
      [documentId]
    );
    const res = await Postgres.query<{ count: string }>(q);
    return parseInt(res[0]?.count || '0', 10);
  }

  export type TotalsRow = {
    entries: string;
    documents: string;
  };

  export async function totals(): Promise<{
    entries: number;
    documents: number;
  }> {
    const q = new Postgres.Query(
      `SELECT COUNT(*) AS entries, COUNT(DISTINCT document_id) AS documents
       FROM chunk_vectors`
    );
    const res = await Postgres.query<TotalsRow>(q);
    return {
      entries: parseInt(res[0]?.entries || '0', 10),
      documents: parseInt(res[0]?.documents || '0', 10),
    };
  }
}
