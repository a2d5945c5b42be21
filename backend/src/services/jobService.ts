import { ConflictError, NotFoundError, ValidationError } from '../errors.js';
import { assertRole } from './authService.js';
import { lastCompletedStage, nextStage, roundWeight } from './lossCalculator.js';
import type { JobChanges, Store } from './store.js';
import { isWorkerRole, type PublicUser } from '../types/auth.js';
import {
  STAGE_ROLES,
  TERMINAL_JOB_STATUSES,
  type AssignJobRequest,
  type CreateJobRequest,
  type JobDetail,
  type JobRecord,
  type ListJobsQuery,
  type TransactionRecord,
  type TransactionWithWorker,
  type UpdateJobRequest,
} from '../types/job.js';

export interface AssignmentResult {
  transaction: TransactionRecord;
  job: JobRecord;
}

/** Opens a new job with its full initial weight and no loss */
export async function createJob(store: Store, owner: PublicUser, input: CreateJobRequest): Promise<JobRecord> {
  assertRole(owner, ['owner']);

  const initialWeight = roundWeight(input.initialWeight);
  if (!Number.isFinite(initialWeight) || initialWeight <= 0) {
    throw new ValidationError('initialWeight must be greater than 0');
  }

  return store.jobs.create({
    designNo: input.designNo,
    itemCategory: input.itemCategory,
    initialWeight,
    description: input.description ?? null,
    createdBy: owner.id,
  });
}

/** Lists jobs newest first. Workers only see jobs they hold or have worked on. */
export async function listJobs(store: Store, viewer: PublicUser, query: ListJobsQuery = {}): Promise<JobRecord[]> {
  return store.jobs.list({
    status: query.status,
    itemCategory: query.itemCategory,
    stage: query.stage,
    workerId: viewer.role === 'owner' ? query.workerId : viewer.id,
    createdFrom: query.from,
    createdTo: query.to,
  });
}

async function withWorkerNames(store: Store, transactions: TransactionRecord[]): Promise<TransactionWithWorker[]> {
  const workerIds = [...new Set(transactions.map((t) => t.workerId))];
  const workers = await Promise.all(workerIds.map((id) => store.users.findById(id)));
  const byId = new Map(workers.flatMap((worker) => (worker ? [[worker.id, worker] as const] : [])));

  return transactions.map((transaction) => {
    const worker = byId.get(transaction.workerId);
    return {
      ...transaction,
      workerName: worker?.fullName ?? null,
      workerRole: worker && isWorkerRole(worker.role) ? worker.role : null,
    };
  });
}

/** Returns a job with its transaction history in issue order */
export async function getJob(store: Store, viewer: PublicUser, id: string): Promise<JobDetail> {
  const job = await store.jobs.findById(id);
  if (!job) {
    throw new NotFoundError('Job not found');
  }

  const transactions = await store.transactions.listByJob(id);

  // Workers only see jobs they have been part of
  if (
    viewer.role !== 'owner' &&
    job.currentWorkerId !== viewer.id &&
    !transactions.some((t) => t.workerId === viewer.id)
  ) {
    throw new NotFoundError('Job not found');
  }

  return {
    ...job,
    transactions: await withWorkerNames(store, transactions),
  };
}

/**
 * Updates job metadata. `status: 'cancelled'` cancels the job, closing its
 * active transaction; loss totals are derived and never set here.
 */
export async function updateJob(
  store: Store,
  owner: PublicUser,
  id: string,
  input: UpdateJobRequest,
): Promise<JobRecord> {
  assertRole(owner, ['owner']);

  if (Object.values(input).every((value) => value === undefined)) {
    throw new ValidationError('No update data provided');
  }

  return store.withTransaction(async (tx) => {
    const job = await tx.jobs.lockById(id);
    if (!job) {
      throw new NotFoundError('Job not found');
    }

    const changes: JobChanges = {
      designNo: input.designNo,
      itemCategory: input.itemCategory,
      description: input.description,
    };

    if (input.status === 'cancelled') {
      if (TERMINAL_JOB_STATUSES.includes(job.status)) {
        throw new ConflictError(`Job is already ${job.status}`);
      }

      const active = await tx.transactions.findActiveByJob(id);
      if (active) {
        await tx.transactions.update(active.id, { status: 'cancelled' });
      }

      changes.status = 'cancelled';
      changes.currentWorkerId = null;
    }

    const updated = await tx.jobs.update(id, changes);
    if (!updated) {
      throw new NotFoundError('Job not found');
    }
    return updated;
  });
}

/** Deletes a job together with its transactions */
export async function deleteJob(store: Store, owner: PublicUser, id: string): Promise<void> {
  assertRole(owner, ['owner']);

  const deleted = await store.jobs.delete(id);
  if (!deleted) {
    throw new NotFoundError('Job not found');
  }
}

/**
 * Hands a job to a worker for its next stage. The issued weight is the job's
 * initial weight for casting and the previous stage's returned weight after.
 */
export async function assignJob(
  store: Store,
  owner: PublicUser,
  jobId: string,
  input: AssignJobRequest,
): Promise<AssignmentResult> {
  assertRole(owner, ['owner']);

  return store.withTransaction(async (tx) => {
    const job = await tx.jobs.lockById(jobId);
    if (!job) {
      throw new NotFoundError('Job not found');
    }

    const worker = await tx.users.findById(input.workerId);
    if (!worker || !worker.isActive) {
      throw new NotFoundError('Worker not found');
    }

    if (TERMINAL_JOB_STATUSES.includes(job.status)) {
      throw new ConflictError(`Cannot assign a ${job.status} job`);
    }

    const history = await tx.transactions.listByJob(job.id);
    if (history.some((t) => t.status === 'in_progress')) {
      throw new ConflictError('Job already has an active assignment');
    }

    const expected = nextStage(history);
    if (!expected) {
      throw new ConflictError('All stages of this job are already completed');
    }
    if (input.stage !== expected) {
      throw new ValidationError(`Job must be assigned to ${expected} next, not ${input.stage}`);
    }

    const requiredRole = STAGE_ROLES[input.stage];
    if (worker.role !== requiredRole) {
      throw new ValidationError(`Stage ${input.stage} requires a ${requiredRole}; worker is a ${worker.role}`);
    }

    const previous = lastCompletedStage(history);
    const issuedWeight = previous?.returnedWeight ?? job.initialWeight;
    if (previous && issuedWeight <= 0) {
      throw new ConflictError(`No metal left to issue after ${previous.stage}`);
    }

    const transaction = await tx.transactions.create({
      jobId: job.id,
      workerId: worker.id,
      stage: input.stage,
      issuedWeight,
      notes: input.notes ?? null,
    });

    const updated = await tx.jobs.update(job.id, {
      status: 'in_progress',
      currentStage: input.stage,
      currentWorkerId: worker.id,
    });
    if (!updated) {
      throw new NotFoundError('Job not found');
    }

    return { transaction, job: updated };
  });
}
