// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { getPool, closePool } from './postgres/pool.js';
export type { DbPool, Queryable } from './postgres/pool.js';
export { PgRecordStore } from './postgres/record-store.js';

// ─── In-memory Adapters ───────────────────────────────────────────────────────
export { InMemoryRecordStore } from './memory/in-memory-record-store.js';
export type { RecordStoreSeed } from './memory/in-memory-record-store.js';
export { parseRecordSnapshot, loadRecordSnapshot, recordSnapshotSchema } from './memory/snapshot.js';
