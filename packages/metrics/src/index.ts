export { default, metrics } from './metrics.js';
export type { IngestStatus, QueryScope, ExternalService } from './metrics.js';
