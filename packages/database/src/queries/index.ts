import { vectors } from './vectors/queries.js';
import { documents } from './documents/queries.js';
import { Postgres } from '../database.js';

export { vectors, documents, Postgres };
