import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { translateDatabaseError } from './database.js';
import { logger } from '../middleware/requestLogger.js';
import type {
  JobChanges,
  JobFilters,
  JobRepository,
  NewJob,
  NewTransaction,
  NewUser,
  Store,
  TransactionChanges,
  TransactionFilters,
  TransactionRepository,
  UserChanges,
  UserFilters,
  UserRepository,
} from './store.js';
import { USER_ROLES, type UserRecord } from '../types/auth.js';
import {
  JOB_STATUSES,
  STAGES,
  TRANSACTION_STATUSES,
  type JobRecord,
  type TransactionRecord,
} from '../types/job.js';

/** The part of a pg `Pool` or `PoolClient` the store talks to */
export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface SqlConnection extends SqlExecutor {
  release(err?: Error | boolean): void;
}

export interface SqlPool extends SqlExecutor {
  connect(): Promise<SqlConnection>;
}

type RowSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

type QueryFn = <T>(schema: RowSchema<T>, text: string, values?: unknown[]) => Promise<T[]>;

function queryOn(executor: SqlExecutor): QueryFn {
  return async <T>(schema: RowSchema<T>, text: string, values: unknown[] = []) => {
    let rows: unknown[];
    try {
      ({ rows } = await executor.query(text, values));
    } catch (error) {
      throw translateDatabaseError(error);
    }
    return rows.map((row) => schema.parse(row));
  };
}

/** Builds `col = $n` assignments for the defined keys of `changes` */
export function buildAssignments(
  changes: Record<string, unknown>,
  columns: Record<string, string>,
  firstIndex: number,
): { assignments: string[]; values: unknown[] } {
  const assignments: string[] = [];
  const values: unknown[] = [];
  for (const [key, value] of Object.entries(changes)) {
    const column = columns[key];
    if (value === undefined || !column) continue;
    values.push(value);
    assignments.push(`${column} = $${firstIndex + values.length - 1}`);
  }
  return { assignments, values };
}

// NUMERIC columns arrive as strings, timestamps as Date
const numeric = z.coerce.number();
const timestamp = z.coerce.date().transform((date) => date.toISOString());

const idRowSchema = z.object({ id: z.string() });

// ── Users ─────────────────────────────────────────────────────

const userRowSchema = z
  .object({
    id: z.string(),
    username: z.string(),
    email: z.string(),
    full_name: z.string(),
    hashed_password: z.string(),
    role: z.enum(USER_ROLES),
    is_active: z.boolean(),
    created_at: timestamp,
  })
  .transform(
    (row): UserRecord => ({
      id: row.id,
      username: row.username,
      email: row.email,
      fullName: row.full_name,
      passwordHash: row.hashed_password,
      role: row.role,
      isActive: row.is_active,
      createdAt: row.created_at,
    }),
  );

const USER_COLUMNS: Record<keyof UserChanges, string> = {
  email: 'email',
  fullName: 'full_name',
  role: 'role',
  isActive: 'is_active',
  passwordHash: 'hashed_password',
};

class PgUserRepository implements UserRepository {
  constructor(private readonly query: QueryFn) {}

  async create(user: NewUser): Promise<UserRecord> {
    const rows = await this.query(
      userRowSchema,
      `INSERT INTO users (id, username, email, full_name, hashed_password, role, is_active, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, TRUE, $7)
       RETURNING *`,
      [randomUUID(), user.username, user.email, user.fullName, user.passwordHash, user.role, new Date().toISOString()],
    );
    return rows[0];
  }

  async findById(id: string): Promise<UserRecord | null> {
    const rows = await this.query(userRowSchema, 'SELECT * FROM users WHERE id = $1', [id]);
    return rows[0] ?? null;
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    const rows = await this.query(userRowSchema, 'SELECT * FROM users WHERE username = $1', [username]);
    return rows[0] ?? null;
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const rows = await this.query(userRowSchema, 'SELECT * FROM users WHERE email = $1', [email.toLowerCase()]);
    return rows[0] ?? null;
  }

  async list(filters: UserFilters = {}): Promise<UserRecord[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (filters.role) {
      values.push(filters.role);
      conditions.push(`role = $${values.length}`);
    }
    if (filters.isActive !== undefined) {
      values.push(filters.isActive);
      conditions.push(`is_active = $${values.length}`);
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    return this.query(userRowSchema, `SELECT * FROM users ${whereClause} ORDER BY created_at ASC, id ASC`, values);
  }

  async update(id: string, changes: UserChanges): Promise<UserRecord | null> {
    const { assignments, values } = buildAssignments(changes, USER_COLUMNS, 2);
    if (assignments.length === 0) {
      return this.findById(id);
    }
    const rows = await this.query(
      userRowSchema,
      `UPDATE users SET ${assignments.join(', ')} WHERE id = $1 RETURNING *`,
      [id, ...values],
    );
    return rows[0] ?? null;
  }

  async delete(id: string): Promise<boolean> {
    const rows = await this.query(idRowSchema, 'DELETE FROM users WHERE id = $1 RETURNING id', [id]);
    return rows.length > 0;
  }
}

// ── Jobs ──────────────────────────────────────────────────────

const jobRowSchema = z
  .object({
    id: z.string(),
    design_no: z.string(),
    item_category: z.string(),
    initial_weight: numeric,
    total_loss: numeric,
    loss_percentage: numeric,
    status: z.enum(JOB_STATUSES),
    current_stage: z.enum(STAGES).nullable(),
    current_worker_id: z.string().nullable(),
    created_by: z.string(),
    created_at: timestamp,
    description: z.string().nullable(),
  })
  .transform(
    (row): JobRecord => ({
      id: row.id,
      designNo: row.design_no,
      itemCategory: row.item_category,
      initialWeight: row.initial_weight,
      totalLoss: row.total_loss,
      lossPercentage: row.loss_percentage,
      status: row.status,
      currentStage: row.current_stage,
      currentWorkerId: row.current_worker_id,
      createdBy: row.created_by,
      createdAt: row.created_at,
      description: row.description,
    }),
  );

const JOB_COLUMNS: Record<keyof JobChanges, string> = {
  designNo: 'design_no',
  itemCategory: 'item_category',
  description: 'description',
  status: 'status',
  currentStage: 'current_stage',
  currentWorkerId: 'current_worker_id',
  totalLoss: 'total_loss',
  lossPercentage: 'loss_percentage',
};

class PgJobRepository implements JobRepository {
  constructor(private readonly query: QueryFn) {}

  async create(job: NewJob): Promise<JobRecord> {
    const rows = await this.query(
      jobRowSchema,
      `INSERT INTO jobs (id, design_no, item_category, initial_weight, total_loss, loss_percentage, status, created_by, created_at, description)
       VALUES ($1, $2, $3, $4, 0, 0, 'created', $5, $6, $7)
       RETURNING *`,
      [randomUUID(), job.designNo, job.itemCategory, job.initialWeight, job.createdBy, new Date().toISOString(), job.description],
    );
    return rows[0];
  }

  async findById(id: string): Promise<JobRecord | null> {
    const rows = await this.query(jobRowSchema, 'SELECT * FROM jobs WHERE id = $1', [id]);
    return rows[0] ?? null;
  }

  async lockById(id: string): Promise<JobRecord | null> {
    const rows = await this.query(jobRowSchema, 'SELECT * FROM jobs WHERE id = $1 FOR UPDATE', [id]);
    return rows[0] ?? null;
  }

  async list(filters: JobFilters = {}): Promise<JobRecord[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (filters.status) {
      values.push(filters.status);
      conditions.push(`j.status = $${values.length}`);
    }
    if (filters.itemCategory) {
      values.push(filters.itemCategory);
      conditions.push(`j.item_category = $${values.length}`);
    }
    if (filters.stage) {
      values.push(filters.stage);
      conditions.push(`j.current_stage = $${values.length}`);
    }
    if (filters.workerId) {
      values.push(filters.workerId);
      const param = `$${values.length}`;
      conditions.push(
        `(j.current_worker_id = ${param} OR EXISTS (SELECT 1 FROM transactions t WHERE t.job_id = j.id AND t.worker_id = ${param}))`,
      );
    }
    if (filters.createdFrom) {
      values.push(filters.createdFrom.toISOString());
      conditions.push(`j.created_at >= $${values.length}`);
    }
    if (filters.createdTo) {
      values.push(filters.createdTo.toISOString());
      conditions.push(`j.created_at <= $${values.length}`);
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    return this.query(
      jobRowSchema,
      `SELECT j.* FROM jobs j ${whereClause} ORDER BY j.created_at DESC, j.id ASC`,
      values,
    );
  }

  async update(id: string, changes: JobChanges): Promise<JobRecord | null> {
    const { assignments, values } = buildAssignments(changes, JOB_COLUMNS, 2);
    if (assignments.length === 0) {
      return this.findById(id);
    }
    const rows = await this.query(
      jobRowSchema,
      `UPDATE jobs SET ${assignments.join(', ')} WHERE id = $1 RETURNING *`,
      [id, ...values],
    );
    return rows[0] ?? null;
  }

  async delete(id: string): Promise<boolean> {
    const rows = await this.query(idRowSchema, 'DELETE FROM jobs WHERE id = $1 RETURNING id', [id]);
    return rows.length > 0;
  }
}

// ── Transactions ──────────────────────────────────────────────

const transactionRowSchema = z
  .object({
    id: z.string(),
    job_id: z.string(),
    worker_id: z.string(),
    stage: z.enum(STAGES),
    issued_weight: numeric,
    returned_weight: numeric.nullable(),
    loss: numeric.nullable(),
    loss_percentage: numeric.nullable(),
    issued_at: timestamp,
    returned_at: timestamp.nullable(),
    status: z.enum(TRANSACTION_STATUSES),
    notes: z.string().nullable(),
  })
  .transform(
    (row): TransactionRecord => ({
      id: row.id,
      jobId: row.job_id,
      workerId: row.worker_id,
      stage: row.stage,
      issuedWeight: row.issued_weight,
      returnedWeight: row.returned_weight,
      loss: row.loss,
      lossPercentage: row.loss_percentage,
      issuedAt: row.issued_at,
      returnedAt: row.returned_at,
      status: row.status,
      notes: row.notes,
    }),
  );

const TRANSACTION_COLUMNS: Record<keyof TransactionChanges, string> = {
  returnedWeight: 'returned_weight',
  loss: 'loss',
  lossPercentage: 'loss_percentage',
  returnedAt: 'returned_at',
  status: 'status',
  notes: 'notes',
};

class PgTransactionRepository implements TransactionRepository {
  constructor(private readonly query: QueryFn) {}

  async create(transaction: NewTransaction): Promise<TransactionRecord> {
    const rows = await this.query(
      transactionRowSchema,
      `INSERT INTO transactions (id, job_id, worker_id, stage, issued_weight, issued_at, status, notes)
       VALUES ($1, $2, $3, $4, $5, $6, 'in_progress', $7)
       RETURNING *`,
      [
        randomUUID(),
        transaction.jobId,
        transaction.workerId,
        transaction.stage,
        transaction.issuedWeight,
        new Date().toISOString(),
        transaction.notes,
      ],
    );
    return rows[0];
  }

  async findById(id: string): Promise<TransactionRecord | null> {
    const rows = await this.query(transactionRowSchema, 'SELECT * FROM transactions WHERE id = $1', [id]);
    return rows[0] ?? null;
  }

  async listByJob(jobId: string): Promise<TransactionRecord[]> {
    return this.query(
      transactionRowSchema,
      'SELECT * FROM transactions WHERE job_id = $1 ORDER BY issued_at ASC, id ASC',
      [jobId],
    );
  }

  async list(filters: TransactionFilters = {}): Promise<TransactionRecord[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (filters.status) {
      values.push(filters.status);
      conditions.push(`status = $${values.length}`);
    }
    if (filters.workerId) {
      values.push(filters.workerId);
      conditions.push(`worker_id = $${values.length}`);
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    return this.query(
      transactionRowSchema,
      `SELECT * FROM transactions ${whereClause} ORDER BY issued_at ASC, id ASC`,
      values,
    );
  }

  async findActiveByJob(jobId: string): Promise<TransactionRecord | null> {
    const rows = await this.query(
      transactionRowSchema,
      "SELECT * FROM transactions WHERE job_id = $1 AND status = 'in_progress'",
      [jobId],
    );
    return rows[0] ?? null;
  }

  async update(id: string, changes: TransactionChanges): Promise<TransactionRecord | null> {
    const { assignments, values } = buildAssignments(changes, TRANSACTION_COLUMNS, 2);
    if (assignments.length === 0) {
      return this.findById(id);
    }
    const rows = await this.query(
      transactionRowSchema,
      `UPDATE transactions SET ${assignments.join(', ')} WHERE id = $1 RETURNING *`,
      [id, ...values],
    );
    return rows[0] ?? null;
  }
}

// ── Store ─────────────────────────────────────────────────────

/** PostgreSQL-backed store. Bound to a pooled client while inside `withTransaction`. */
export class PgStore implements Store {
  readonly users: UserRepository;
  readonly jobs: JobRepository;
  readonly transactions: TransactionRepository;
  private readonly query: QueryFn;

  constructor(
    private readonly pool: SqlPool,
    private readonly client: SqlConnection | null = null,
  ) {
    this.query = queryOn(client ?? pool);
    this.users = new PgUserRepository(this.query);
    this.jobs = new PgJobRepository(this.query);
    this.transactions = new PgTransactionRepository(this.query);
  }

  async withTransaction<T>(work: (tx: Store) => Promise<T>): Promise<T> {
    if (this.client) {
      return work(this);
    }

    const client = await this.pool.connect();
    let broken: Error | undefined;
    try {
      await client.query('BEGIN');
      const result = await work(new PgStore(this.pool, client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        // release(err) drops the connection from the pool
        broken = rollbackError instanceof Error ? rollbackError : new Error('ROLLBACK failed');
        logger.error({ err: rollbackError }, 'Transaction rollback failed');
      }
      throw translateDatabaseError(error);
    } finally {
      client.release(broken);
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.query(z.unknown(), 'SELECT 1');
      return true;
    } catch {
      return false;
    }
  }
}
