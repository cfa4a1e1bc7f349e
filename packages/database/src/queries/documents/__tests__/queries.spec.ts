import { documents } from '../queries.js';
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

const createdAt = new Date('2024-05-01T10:00:00.000Z');

describe('documents queries', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    mockPostgres.transaction.mockResolvedValue([]);
  });

  it('creates both tables once', async () => {
    await documents.init();
    await documents.init();

    expect(mockPostgres.transaction).toHaveBeenCalledTimes(1);
    const [statements] = mockPostgres.transaction.mock.calls[0];
    expect(statements).toHaveLength(3);
    expect(statements[1].query).toContain('ON DELETE CASCADE');
  });

  it('replaces the document and its chunks in one transaction', async () => {
    await documents.save(
      {
        id: 'doc1',
        title: 'Handbook',
        chunk_count: 1,
        token_count: 12,
        page_count: 2,
        created_at: createdAt,
      },
      [
        {
          id: 'doc1-0',
          document_id: 'doc1',
          chunk_index: 0,
          content: 'Refunds take five days.',
          token_count: 12,
          start_token: 0,
          end_token: 12,
          page_numbers: [1, 2],
        },
      ]
    );

    expect(mockPostgres.transaction).toHaveBeenCalledTimes(1);
    const [statements] = mockPostgres.transaction.mock.calls[0];
    expect(statements.map((s) => s.values)).toEqual([
      ['doc1'],
      ['doc1', 'Handbook', 1, 12, 2, createdAt],
      ['doc1-0', 'doc1', 0, 'Refunds take five days.', 12, 0, 12, [1, 2]],
    ]);
    expect(statements[0].query).toContain('DELETE FROM documents');
  });

  it('reports whether a document was removed', async () => {
    mockPostgres.query.mockResolvedValueOnce([{ id: 'doc1' }]);
    mockPostgres.query.mockResolvedValueOnce([]);

    await expect(documents.remove('doc1')).resolves.toBe(true);
    await expect(documents.remove('doc1')).resolves.toBe(false);
  });

  it('returns undefined for an unknown document', async () => {
    mockPostgres.query.mockResolvedValue([]);

    await expect(documents.getDocument('missing')).resolves.toBeUndefined();
    await expect(documents.getChunk('missing-0')).resolves.toBeUndefined();
  });

  it('lists chunks in index order', async () => {
    mockPostgres.query.mockResolvedValue([]);

    await documents.getChunks('doc1');

    const [q] = mockPostgres.query.mock.calls[0];
    expect(q.values).toEqual(['doc1']);
    expect(q.query).toContain('ORDER BY chunk_index ASC');
  });

  it('parses totals returned as strings', async () => {
    mockPostgres.query.mockResolvedValue([
      { documents: '2', chunks: '7', tokens: '3100' },
    ]);

    await expect(documents.totals()).resolves.toEqual({
      documents: 2,
      chunks: 7,
      tokens: 3100,
    });
  });
});
