import { ConflictError, NotFoundError, ValidationError } from '../errors.js';
import { assertRole } from './authService.js';
import { calculateJobLoss, calculateLoss, isFinalStage, roundWeight } from './lossCalculator.js';
import type { Store } from './store.js';
import { WORKER_ROLES, type PublicUser } from '../types/auth.js';
import type {
  CompleteTaskRequest,
  JobRecord,
  TransactionRecord,
  WorkerTask,
} from '../types/job.js';

export interface CompletionResult {
  transaction: TransactionRecord;
  job: JobRecord;
}

/** The worker's open assignments, oldest first */
export async function listTasks(store: Store, worker: PublicUser): Promise<WorkerTask[]> {
  assertRole(worker, WORKER_ROLES);

  const active = await store.transactions.list({ workerId: worker.id, status: 'in_progress' });
  const tasks = await Promise.all(
    active.map(async (transaction): Promise<WorkerTask | null> => {
      const job = await store.jobs.findById(transaction.jobId);
      if (!job) return null;
      return {
        transactionId: transaction.id,
        jobId: job.id,
        designNo: job.designNo,
        itemCategory: job.itemCategory,
        stage: transaction.stage,
        issuedWeight: transaction.issuedWeight,
        issuedAt: transaction.issuedAt,
        notes: transaction.notes,
      };
    }),
  );

  return tasks.filter((task): task is WorkerTask => task !== null);
}

async function resolveTask(store: Store, worker: PublicUser, transactionId?: string): Promise<TransactionRecord> {
  if (transactionId) {
    const transaction = await store.transactions.findById(transactionId);
    if (!transaction || transaction.workerId !== worker.id) {
      throw new NotFoundError('Transaction not found or not assigned to you');
    }
    return transaction;
  }

  const active = await store.transactions.list({ workerId: worker.id, status: 'in_progress' });
  if (active.length === 0) {
    throw new NotFoundError('No active task found');
  }
  if (active.length > 1) {
    throw new ValidationError('transactionId is required when more than one task is active');
  }
  return active[0];
}

/**
 * Closes the worker's task with the weight they returned, records the stage
 * loss and recomputes the job's cumulative loss. Polishing completes the job;
 * any earlier stage leaves it waiting for the next assignment.
 */
export async function completeTask(
  store: Store,
  worker: PublicUser,
  input: CompleteTaskRequest,
): Promise<CompletionResult> {
  assertRole(worker, WORKER_ROLES);

  const returnedWeight = roundWeight(input.returnedWeight);
  if (!Number.isFinite(returnedWeight) || returnedWeight < 0) {
    throw new ValidationError('returnedWeight cannot be negative');
  }

  return store.withTransaction(async (tx) => {
    const task = await resolveTask(tx, worker, input.transactionId);

    const job = await tx.jobs.lockById(task.jobId);
    if (!job) {
      throw new NotFoundError('Job not found');
    }

    // Re-read under the job lock so a concurrent completion is seen
    const current = await tx.transactions.findById(task.id);
    if (!current) {
      throw new NotFoundError('Transaction not found or not assigned to you');
    }
    if (current.status !== 'in_progress') {
      throw new ConflictError(`Transaction is already ${current.status}`);
    }
    if (returnedWeight > current.issuedWeight) {
      throw new ValidationError('Returned weight cannot be greater than issued weight');
    }

    const { loss, lossPercentage } = calculateLoss(current.issuedWeight, returnedWeight);
    const transaction = await tx.transactions.update(current.id, {
      returnedWeight,
      loss,
      lossPercentage,
      returnedAt: new Date().toISOString(),
      status: 'completed',
      notes: input.notes ?? current.notes,
    });
    if (!transaction) {
      throw new NotFoundError('Transaction not found or not assigned to you');
    }

    const totals = calculateJobLoss(job.initialWeight, await tx.transactions.listByJob(job.id));
    const finished = isFinalStage(current.stage);

    const updatedJob = await tx.jobs.update(job.id, {
      totalLoss: totals.loss,
      lossPercentage: totals.lossPercentage,
      status: finished ? 'completed' : 'pending_assignment',
      currentWorkerId: null,
      currentStage: finished ? null : current.stage,
    });
    if (!updatedJob) {
      throw new NotFoundError('Job not found');
    }

    return { transaction, job: updatedJob };
  });
}
