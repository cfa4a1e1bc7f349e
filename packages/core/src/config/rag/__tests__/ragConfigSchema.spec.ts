import { ConfigurationError } from '../../../common/errors/index.js';
import { DEFAULT_RAG_CONFIG } from '../../../common/constant/default-rag.constant.js';
import { ChunkOptionsSchema, parseRagConfig } from '../ragConfigSchema.js';

describe('ChunkOptionsSchema', () => {
  it('accepts overlap smaller than chunk size', () => {
    expect(
      ChunkOptionsSchema.safeParse({ chunkSize: 500, overlap: 50 }).success
    ).toBe(true);
  });

  it.each([
    [{ chunkSize: 100, overlap: 100 }],
    [{ chunkSize: 100, overlap: 0 }],
    [{ chunkSize: 0, overlap: 1 }],
    [{ chunkSize: 10.5, overlap: 1 }],
  ])('rejects %j', (options) => {
    expect(ChunkOptionsSchema.safeParse(options).success).toBe(false);
  });
});

describe('parseRagConfig', () => {
  it('returns the defaults when nothing is overridden', () => {
    expect(parseRagConfig()).toEqual(DEFAULT_RAG_CONFIG);
  });

  it('merges retry overrides onto the default policy', () => {
    expect(
      parseRagConfig({ retry: { attempts: 5, baseDelayMs: 250 } }).retry
    ).toEqual({ attempts: 5, baseDelayMs: 250 });
  });

  it('throws ConfigurationError naming the offending field', () => {
    expect(() =>
      parseRagConfig({ chunkSizeTokens: 40, overlapTokens: 50 })
    ).toThrow(
      new ConfigurationError(
        'Invalid RAG configuration: overlapTokens: overlapTokens must be smaller than chunkSizeTokens'
      )
    );
  });
});
