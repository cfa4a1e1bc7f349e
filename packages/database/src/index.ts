export { Postgres, DatabaseError } from './database.js';
export type { DatabaseCredentials } from './database.js';
export { vectors, documents } from './queries/index.js';
