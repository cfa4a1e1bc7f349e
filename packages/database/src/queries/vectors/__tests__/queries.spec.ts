import { vectors } from '../queries.js';
import { Postgres } from '../../../database.js';

jest.mock('../../../database.js', () => {
  const actual = jest.requireActual('../../../database.js');
  return {
    ...actual,
    Postgres: {
      ...actual.Postgres,
      query: jest.fn(),
      transaction: jest.fn(),
    },
  };
});

const mockPostgres = jest.mocked(Postgres);

describe('vectors queries', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    mockPostgres.transaction.mockResolvedValue([]);
  });

  it('creates the table once per dimensionality', async () => {
    await vectors.init(3);
    await vectors.init(3);

    expect(mockPostgres.transaction).toHaveBeenCalledTimes(1);
    const [statements] = mockPostgres.transaction.mock.calls[0];
    expect(statements).toHaveLength(4);
    expect(statements[1].query).toContain('embedding vector(3) NOT NULL');
  });

  it('rejects invalid dimensions', async () => {
    await expect(vectors.init(0)).rejects.toThrow(
      'Invalid embedding dimensions: 0'
    );
  });

  it('inserts every row in one transaction', async () => {
    await vectors.insert([
      { chunk_id: 'd-0', document_id: 'd', chunk_index: 0, embedding: [1, 0] },
      { chunk_id: 'd-1', document_id: 'd', chunk_index: 1, embedding: [0, 1] },
    ]);

    const [statements] = mockPostgres.transaction.mock.calls[0];
    expect(statements.map((s) => s.values)).toEqual([
      ['d-0', 'd', 0, '[1,0]'],
      ['d-1', 'd', 1, '[0,1]'],
    ]);
  });

  it('skips the transaction for no rows', async () => {
    await vectors.insert([]);

    expect(mockPostgres.transaction).not.toHaveBeenCalled();
  });

  it('searches across all documents', async () => {
    mockPostgres.query.mockResolvedValue([]);

    await vectors.search([0.5, 0.5], 4);

    const [q] = mockPostgres.query.mock.calls[0];
    expect(q.values).toEqual(['[0.5,0.5]', 4]);
    expect(q.query).not.toContain('WHERE');
    expect(q.query).toContain(
      'ORDER BY embedding <=> $1::vector ASC, chunk_index ASC, document_id ASC'
    );
    expect(q.query).not.toContain('ORDER BY score');
  });

  it('binds the document filter as the third parameter', async () => {
    mockPostgres.query.mockResolvedValue([]);

    await vectors.search([1, 0], 2, 'doc1');

    const [q] = mockPostgres.query.mock.calls[0];
    expect(q.values).toEqual(['[1,0]', 2, 'doc1']);
    expect(q.query).toContain('WHERE document_id = $3');
  });

  it('parses counts returned as strings', async () => {
    mockPostgres.query.mockResolvedValueOnce([{ count: '3' }]);
    mockPostgres.query.mockResolvedValueOnce([
      { entries: '12', documents: '2' },
    ]);

    await expect(vectors.deleteDocument('doc1')).resolves.toBe(3);
    await expect(vectors.totals()).resolves.toEqual({
      entries: 12,
      documents: 2,
    });
  });

  it('reports zero when no row comes back', async () => {
    mockPostgres.query.mockResolvedValue([]);

    await expect(vectors.countForDocument('doc1')).resolves.toBe(0);
  });
});
