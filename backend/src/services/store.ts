import type { UserRecord, UserRole } from '../types/auth.js';
import type {
  JobRecord,
  JobStatus,
  ProductionStage,
  TransactionRecord,
  TransactionStatus,
} from '../types/job.js';

export interface NewUser {
  username: string;
  email: string;
  fullName: string;
  passwordHash: string;
  role: UserRole;
}

export type UserChanges = Partial<Pick<UserRecord, 'email' | 'fullName' | 'role' | 'isActive' | 'passwordHash'>>;

export interface UserFilters {
  role?: UserRole;
  isActive?: boolean;
}

export interface NewJob {
  designNo: string;
  itemCategory: string;
  initialWeight: number;
  description: string | null;
  createdBy: string;
}

export type JobChanges = Partial<
  Pick<
    JobRecord,
    | 'designNo'
    | 'itemCategory'
    | 'description'
    | 'status'
    | 'currentStage'
    | 'currentWorkerId'
    | 'totalLoss'
    | 'lossPercentage'
  >
>;

export interface JobFilters {
  status?: JobStatus;
  itemCategory?: string;
  stage?: ProductionStage;
  /** Jobs the worker currently holds or has held a transaction on */
  workerId?: string;
  createdFrom?: Date;
  createdTo?: Date;
}

export interface NewTransaction {
  jobId: string;
  workerId: string;
  stage: ProductionStage;
  issuedWeight: number;
  notes: string | null;
}

export type TransactionChanges = Partial<
  Pick<TransactionRecord, 'returnedWeight' | 'loss' | 'lossPercentage' | 'returnedAt' | 'status' | 'notes'>
>;

export interface TransactionFilters {
  status?: TransactionStatus;
  workerId?: string;
}

export interface UserRepository {
  create(user: NewUser): Promise<UserRecord>;
  findById(id: string): Promise<UserRecord | null>;
  findByUsername(username: string): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  list(filters?: UserFilters): Promise<UserRecord[]>;
  update(id: string, changes: UserChanges): Promise<UserRecord | null>;
  /** Returns false when no row was deleted */
  delete(id: string): Promise<boolean>;
}

export interface JobRepository {
  create(job: NewJob): Promise<JobRecord>;
  findById(id: string): Promise<JobRecord | null>;
  /** Reads the job and holds a row lock until the surrounding transaction ends */
  lockById(id: string): Promise<JobRecord | null>;
  /** Newest first */
  list(filters?: JobFilters): Promise<JobRecord[]>;
  update(id: string, changes: JobChanges): Promise<JobRecord | null>;
  delete(id: string): Promise<boolean>;
}

export interface TransactionRepository {
  create(transaction: NewTransaction): Promise<TransactionRecord>;
  findById(id: string): Promise<TransactionRecord | null>;
  /** Ordered by issuedAt ascending */
  listByJob(jobId: string): Promise<TransactionRecord[]>;
  /** Ordered by issuedAt ascending */
  list(filters?: TransactionFilters): Promise<TransactionRecord[]>;
  findActiveByJob(jobId: string): Promise<TransactionRecord | null>;
  update(id: string, changes: TransactionChanges): Promise<TransactionRecord | null>;
}

/**
 * Data access used by the services. `withTransaction` runs `work` against a
 * store bound to a single database transaction: it commits when `work`
 * resolves and rolls back when it rejects.
 */
export interface Store {
  users: UserRepository;
  jobs: JobRepository;
  transactions: TransactionRepository;
  withTransaction<T>(work: (tx: Store) => Promise<T>): Promise<T>;
  ping(): Promise<boolean>;
}
