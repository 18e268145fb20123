// Types
export * from './types/index.js';

// Schema
export * from './schema/index.js';

// Database
export { createDb, createTestDb, getDefaultDbPath, getDbPath, withRetry } from './db.js';
export type { TasklineDb } from './db.js';

// Temporal
export * from './temporal/index.js';

// Ordering
export * from './ordering/index.js';

// Parsers
export { parseDate, formatDate, isIsoDate, parseInstant, parseClockTime } from './parsers/index.js';

// Queries
export * from './queries/index.js';
