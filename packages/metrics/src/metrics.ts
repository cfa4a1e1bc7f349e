/**
 * @module metrics
 * @packageDocumentation
 *
 * Registers and updates Prometheus metrics via [prom-client].
 *
 * Metrics endpoint exposed on /metrics (ex. curl -GET localhost:3002/api/metrics).
 *
 * [prometheus]: https://prometheus.io/docs/introduction/overview/
 * [prom-client]: https://github.com/siimon/prom-client
 */

import client from 'prom-client';

export type IngestStatus = 'success' | 'failure' | 'rollback_failed';
export type QueryScope = 'document' | 'all';
export type ExternalService = 'embedding' | 'language_model';

interface Instruments {
  documentsIngested: client.Counter<'status'>;
  chunksIndexed: client.Counter;
  documentsDeleted: client.Counter;
  queryResponseTime: client.Histogram<'scope'>;
  externalCallFailures: client.Counter<'service'>;
  dbQueryTime: client.Histogram<'query'>;
}

/**
 * Singleton class managing Prometheus metrics.
 */
class Metrics {
  private instruments?: Instruments;

  public get contentType() {
    return client.register.contentType;
  }

  /**
   * Return the dump text of Prometheus metrics.
   *
   * @returns Plaintext Prometheus format.
   */
  public async metrics(): Promise<string> {
    this.registered();
    return client.register.metrics();
  }

  private registered(): Instruments {
    if (!this.instruments) {
      this.instruments = this.register();
    }
    return this.instruments;
  }

  private register(): Instruments {
    return {
      documentsIngested: new client.Counter({
        name: 'documents_ingested_total',
        help: 'Ingest attempts since server start, by outcome',
        labelNames: ['status'] as const,
      }),
      chunksIndexed: new client.Counter({
        name: 'chunks_indexed_total',
        help: 'Chunks embedded and inserted into the vector index',
      }),
      documentsDeleted: new client.Counter({
        name: 'documents_deleted_total',
        help: 'Documents removed from the index',
      }),
      queryResponseTime: new client.Histogram({
        name: 'query_response_time_seconds',
        help: 'Time taken to answer a question, in seconds',
        labelNames: ['scope'] as const,
        buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10, 30, 60],
      }),
      externalCallFailures: new client.Counter({
        name: 'external_call_failures_total',
        help: 'Failed calls to the embedding service or language model',
        labelNames: ['service'] as const,
      }),
      dbQueryTime: new client.Histogram({
        name: 'db_response_time_seconds',
        help: 'Time the database takes to respond to queries, in seconds',
        labelNames: ['query'] as const,
        buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
      }),
    };
  }

  public documentIngested(status: IngestStatus, chunkCount = 0): void {
    const { documentsIngested, chunksIndexed } = this.registered();
    documentsIngested.labels({ status }).inc();
    if (status === 'success' && chunkCount > 0) {
      chunksIndexed.inc(chunkCount);
    }
  }

  public documentDeleted(): void {
    this.registered().documentsDeleted.inc();
  }

  public externalCallFailed(service: ExternalService): void {
    this.registered().externalCallFailures.labels({ service }).inc();
  }

  /**
   * Measure the time taken to answer a question. The timer is recorded
   * whether `f` resolves or rejects.
   *
   * @param scope - Whether the query was restricted to one document
   * @param f - Function producing the answer
   * @returns Result of `f`
   */
  public async queryResponseTimeMeasure<T>(
    scope: QueryScope,
    f: () => Promise<T>
  ): Promise<T> {
    const end = this.registered().queryResponseTime.startTimer();
    try {
      return await f();
    } finally {
      end({ scope });
    }
  }

  public async dbResponseTime<T>(
    query: string,
    f: () => Promise<T>
  ): Promise<T> {
    const end = this.registered().dbQueryTime.startTimer();
    try {
      return await f();
    } finally {
      end({ query });
    }
  }
}

const metrics = new Metrics();
export default metrics;
export { metrics };
