// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { getPool, closePool, withTransaction, applySchema } from './postgres/pool.js';
export type { DbPool, DbClient } from './postgres/pool.js';
export { PgDatasetRepository } from './postgres/dataset.repository.js';
export { PgAnalysisRequestRepository } from './postgres/analysis-request.repository.js';

// ─── In-memory Adapters ───────────────────────────────────────────────────────
export { InMemoryDatasetRepository } from './memory/in-memory-dataset.repository.js';
export { InMemoryAnalysisRequestRepository } from './memory/in-memory-analysis-request.repository.js';

// ─── Dataset files ────────────────────────────────────────────────────────────
export { writeDatasetFile, readDatasetFile } from './file/dataset-file.js';

// ─── Clock / RNG ──────────────────────────────────────────────────────────────
export { DeterministicClock, wallClockNow } from './clock/deterministic-clock.js';
export { SeededRng, mathRandomSource, createRandomSource } from './random/seeded-rng.js';
