import { z } from 'zod';
import type { WorkerRole } from './auth.js';

/** Production stages in the order a job moves through them */
export const STAGES = ['casting', 'filing', 'setting', 'polishing'] as const;

export const JOB_STATUSES = ['created', 'in_progress', 'pending_assignment', 'completed', 'cancelled'] as const;

export const TRANSACTION_STATUSES = ['in_progress', 'completed', 'cancelled'] as const;

export type ProductionStage = (typeof STAGES)[number];
export type JobStatus = (typeof JOB_STATUSES)[number];
export type TransactionStatus = (typeof TRANSACTION_STATUSES)[number];

/** Worker role required to take each stage */
export const STAGE_ROLES: Record<ProductionStage, WorkerRole> = {
  casting: 'caster',
  filing: 'filer',
  setting: 'setter',
  polishing: 'polisher',
};

/** Statuses from which no further assignment or cancellation is possible */
export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = ['completed', 'cancelled'];

/** Job row as stored in the jobs table */
export interface JobRecord {
  id: string;
  designNo: string;
  itemCategory: string;
  initialWeight: number;
  totalLoss: number;
  lossPercentage: number;
  status: JobStatus;
  currentStage: ProductionStage | null;
  currentWorkerId: string | null;
  createdBy: string;
  createdAt: string;
  description: string | null;
}

/** Material issue/return record for one stage of one job */
export interface TransactionRecord {
  id: string;
  jobId: string;
  workerId: string;
  stage: ProductionStage;
  issuedWeight: number;
  returnedWeight: number | null;
  loss: number | null;
  lossPercentage: number | null;
  issuedAt: string;
  returnedAt: string | null;
  status: TransactionStatus;
  notes: string | null;
}

/** Transaction as shown in a job's history */
export interface TransactionWithWorker extends TransactionRecord {
  workerName: string | null;
  workerRole: WorkerRole | null;
}

/** Response body for GET /api/jobs/:id */
export interface JobDetail extends JobRecord {
  transactions: TransactionWithWorker[];
}

/** One entry of GET /api/worker/tasks */
export interface WorkerTask {
  transactionId: string;
  jobId: string;
  designNo: string;
  itemCategory: string;
  stage: ProductionStage;
  issuedWeight: number;
  issuedAt: string;
  notes: string | null;
}

/** Largest value a NUMERIC(10,3) weight column holds */
export const MAX_WEIGHT = 9_999_999.999;

const weightSchema = z.number().finite().max(MAX_WEIGHT);

/** Request body for POST /api/jobs */
export const createJobSchema = z.object({
  designNo: z.string().trim().min(1).max(50),
  itemCategory: z.string().trim().min(1).max(50),
  initialWeight: weightSchema.positive(),
  description: z.string().trim().max(2000).nullish(),
});

export type CreateJobRequest = z.infer<typeof createJobSchema>;

/** Request body for PUT /api/jobs/:id; derived loss fields are not accepted */
export const updateJobSchema = z
  .object({
    designNo: z.string().trim().min(1).max(50).optional(),
    itemCategory: z.string().trim().min(1).max(50).optional(),
    description: z.string().trim().max(2000).nullable().optional(),
    status: z.literal('cancelled').optional(),
  })
  .strict();

export type UpdateJobRequest = z.infer<typeof updateJobSchema>;

/** Request body for POST /api/jobs/:id/assign */
export const assignJobSchema = z.object({
  workerId: z.string().trim().min(1),
  stage: z.enum(STAGES),
  notes: z.string().trim().max(2000).nullish(),
});

export type AssignJobRequest = z.infer<typeof assignJobSchema>;

/** Request body for POST /api/worker/complete-task */
export const completeTaskSchema = z.object({
  transactionId: z.string().trim().min(1).optional(),
  returnedWeight: weightSchema.nonnegative(),
  notes: z.string().trim().max(2000).nullish(),
});

export type CompleteTaskRequest = z.infer<typeof completeTaskSchema>;

/** Query string for GET /api/jobs */
export const listJobsQuerySchema = z.object({
  status: z.enum(JOB_STATUSES).optional(),
  itemCategory: z.string().trim().min(1).optional(),
  stage: z.enum(STAGES).optional(),
  workerId: z.string().trim().min(1).optional(),
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
});

export type ListJobsQuery = z.infer<typeof listJobsQuerySchema>;

/** Query string for date-ranged reports */
export const reportRangeQuerySchema = z.object({
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
});

export type ReportRangeQuery = z.infer<typeof reportRangeQuerySchema>;
