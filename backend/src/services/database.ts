import pg from 'pg';
import type { Pool } from 'pg';
import { config } from '../config.js';
import { ConflictError, ValidationError } from '../errors.js';

const SCHEMA_LOCK_KEY = 7319001;

let pool: Pool | null = null;

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    username VARCHAR(50) NOT NULL UNIQUE,
    email VARCHAR(100) NOT NULL UNIQUE,
    full_name VARCHAR(100) NOT NULL,
    hashed_password TEXT NOT NULL,
    role VARCHAR(20) NOT NULL CHECK (role IN ('owner', 'caster', 'filer', 'setter', 'polisher')),
    is_active BOOLEAN NOT NULL DEFAULT TRUE,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );

  CREATE TABLE IF NOT EXISTS jobs (
    id TEXT PRIMARY KEY,
    design_no VARCHAR(50) NOT NULL,
    item_category VARCHAR(50) NOT NULL,
    initial_weight NUMERIC(10, 3) NOT NULL CHECK (initial_weight > 0),
    total_loss NUMERIC(10, 3) NOT NULL DEFAULT 0 CHECK (total_loss >= 0),
    loss_percentage NUMERIC(5, 2) NOT NULL DEFAULT 0,
    status VARCHAR(20) NOT NULL DEFAULT 'created'
      CHECK (status IN ('created', 'in_progress', 'pending_assignment', 'completed', 'cancelled')),
    current_stage VARCHAR(20) CHECK (current_stage IN ('casting', 'filing', 'setting', 'polishing')),
    current_worker_id TEXT REFERENCES users(id),
    created_by TEXT NOT NULL REFERENCES users(id),
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    description TEXT
  );

  CREATE TABLE IF NOT EXISTS transactions (
    id TEXT PRIMARY KEY,
    job_id TEXT NOT NULL REFERENCES jobs(id) ON DELETE CASCADE,
    worker_id TEXT NOT NULL REFERENCES users(id),
    stage VARCHAR(20) NOT NULL CHECK (stage IN ('casting', 'filing', 'setting', 'polishing')),
    issued_weight NUMERIC(10, 3) NOT NULL CHECK (issued_weight > 0),
    returned_weight NUMERIC(10, 3),
    loss NUMERIC(10, 3) CHECK (loss >= 0),
    loss_percentage NUMERIC(5, 2),
    issued_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    returned_at TIMESTAMPTZ,
    status VARCHAR(20) NOT NULL DEFAULT 'in_progress'
      CHECK (status IN ('in_progress', 'completed', 'cancelled')),
    notes TEXT
  );

  CREATE UNIQUE INDEX IF NOT EXISTS uq_transactions_active_job
    ON transactions (job_id) WHERE status = 'in_progress';

  CREATE INDEX IF NOT EXISTS idx_jobs_status ON jobs (status);
  CREATE INDEX IF NOT EXISTS idx_jobs_current_worker ON jobs (current_worker_id);
  CREATE INDEX IF NOT EXISTS idx_transactions_job ON transactions (job_id);
  CREATE INDEX IF NOT EXISTS idx_transactions_worker ON transactions (worker_id);
  CREATE INDEX IF NOT EXISTS idx_transactions_status ON transactions (status);
  CREATE INDEX IF NOT EXISTS idx_users_role ON users (role);
`;

/** Creates the connection pool, applies the schema and verifies connectivity */
export async function initializeDatabase(): Promise<Pool> {
  const created = new pg.Pool({
    connectionString: config.database.url,
    ssl: config.database.ssl ? { rejectUnauthorized: false } : undefined,
  });
  pool = created;

  await ensureSchema(created);
  await created.query('SELECT 1');
  return created;
}

/** Applies the schema under an advisory lock so parallel instances don't race */
export async function ensureSchema(target: Pool): Promise<void> {
  await target.query('SELECT pg_advisory_lock($1)', [SCHEMA_LOCK_KEY]);
  try {
    await target.query(SCHEMA_SQL);
  } finally {
    await target.query('SELECT pg_advisory_unlock($1)', [SCHEMA_LOCK_KEY]);
  }
}

export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

interface PgErrorFields {
  code: string;
  constraint: string | null;
}

function pgErrorFields(error: unknown): PgErrorFields | null {
  if (typeof error !== 'object' || error === null || !('code' in error) || typeof error.code !== 'string') {
    return null;
  }
  const constraint = 'constraint' in error && typeof error.constraint === 'string' ? error.constraint : null;
  return { code: error.code, constraint };
}

const UNIQUE_MESSAGES: Record<string, string> = {
  users_username_key: 'Username already exists',
  users_email_key: 'Email already exists',
  uq_transactions_active_job: 'Job already has an active assignment',
};

/**
 * Maps PostgreSQL constraint violations onto the API error taxonomy.
 * Anything that is not a constraint violation is returned unchanged.
 */
export function translateDatabaseError(error: unknown): unknown {
  const fields = pgErrorFields(error);
  if (!fields) {
    return error;
  }

  switch (fields.code) {
    case '23505':
      return new ConflictError(
        (fields.constraint && UNIQUE_MESSAGES[fields.constraint]) || 'Record already exists',
      );
    case '23503':
      return new ConflictError('Record is referenced by other records');
    case '22003':
      return new ValidationError('Numeric value is out of range');
    case '23514':
    case '23502':
      return new ValidationError(
        fields.constraint ? `Value violates constraint ${fields.constraint}` : 'Value violates a database constraint',
      );
    default:
      return error;
  }
}
