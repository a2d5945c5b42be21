import { roundPercentage, roundWeight } from './lossCalculator.js';
import type { Store } from './store.js';
import type { UserRole } from '../types/auth.js';
import type { JobStatus, ReportRangeQuery } from '../types/job.js';

export interface WorkerPerformance {
  workerId: string;
  workerName: string;
  role: UserRole | null;
  completedTasks: number;
  totalIssuedWeight: number;
  totalLoss: number;
  averageLossPercentage: number;
}

export interface JobSummary {
  totalJobs: number;
  byStatus: Record<JobStatus, number>;
  totalInitialWeight: number;
  totalLoss: number;
  averageLossPercentage: number;
}

export interface MaterialConsumption {
  itemCategory: string;
  totalJobs: number;
  totalInitialWeight: number;
  totalIssuedWeight: number;
  totalLoss: number;
  lossPercentage: number;
}

function percentageOf(part: number, whole: number): number {
  return whole > 0 ? roundPercentage((part / whole) * 100) : 0;
}

/** Per-worker totals over completed transactions, highest average loss first */
export async function workerPerformance(store: Store): Promise<WorkerPerformance[]> {
  const [completed, users] = await Promise.all([
    store.transactions.list({ status: 'completed' }),
    store.users.list(),
  ]);
  const usersById = new Map(users.map((user) => [user.id, user]));

  const stats = new Map<string, { tasks: number; issued: number; loss: number; percentageSum: number }>();
  for (const transaction of completed) {
    const entry = stats.get(transaction.workerId) ?? { tasks: 0, issued: 0, loss: 0, percentageSum: 0 };
    entry.tasks += 1;
    entry.issued += transaction.issuedWeight;
    entry.loss += transaction.loss ?? 0;
    entry.percentageSum += transaction.lossPercentage ?? 0;
    stats.set(transaction.workerId, entry);
  }

  return [...stats.entries()]
    .map(([workerId, entry]) => {
      const user = usersById.get(workerId);
      return {
        workerId,
        workerName: user?.fullName ?? workerId,
        role: user?.role ?? null,
        completedTasks: entry.tasks,
        totalIssuedWeight: roundWeight(entry.issued),
        totalLoss: roundWeight(entry.loss),
        averageLossPercentage: roundPercentage(entry.percentageSum / entry.tasks),
      };
    })
    .sort(
      (a, b) => b.averageLossPercentage - a.averageLossPercentage || a.workerName.localeCompare(b.workerName),
    );
}

/** Job counts per status and overall material loss */
export async function jobSummary(store: Store): Promise<JobSummary> {
  const jobs = await store.jobs.list();

  const byStatus: Record<JobStatus, number> = {
    created: 0,
    in_progress: 0,
    pending_assignment: 0,
    completed: 0,
    cancelled: 0,
  };
  let totalInitialWeight = 0;
  let totalLoss = 0;

  for (const job of jobs) {
    byStatus[job.status] += 1;
    totalInitialWeight += job.initialWeight;
    totalLoss += job.totalLoss;
  }

  return {
    totalJobs: jobs.length,
    byStatus,
    totalInitialWeight: roundWeight(totalInitialWeight),
    totalLoss: roundWeight(totalLoss),
    averageLossPercentage: percentageOf(totalLoss, totalInitialWeight),
  };
}

/** Material put into production and lost, per item category */
export async function materialConsumption(
  store: Store,
  range: ReportRangeQuery = {},
): Promise<MaterialConsumption[]> {
  const [jobs, transactions] = await Promise.all([
    store.jobs.list({ createdFrom: range.from, createdTo: range.to }),
    store.transactions.list(),
  ]);

  const issuedByJob = new Map<string, number>();
  for (const transaction of transactions) {
    if (transaction.status === 'cancelled') continue;
    issuedByJob.set(transaction.jobId, (issuedByJob.get(transaction.jobId) ?? 0) + transaction.issuedWeight);
  }

  const categories = new Map<string, { jobs: number; initial: number; issued: number; loss: number }>();
  for (const job of jobs) {
    const entry = categories.get(job.itemCategory) ?? { jobs: 0, initial: 0, issued: 0, loss: 0 };
    entry.jobs += 1;
    entry.initial += job.initialWeight;
    entry.issued += issuedByJob.get(job.id) ?? 0;
    entry.loss += job.totalLoss;
    categories.set(job.itemCategory, entry);
  }

  return [...categories.entries()]
    .map(([itemCategory, entry]) => ({
      itemCategory,
      totalJobs: entry.jobs,
      totalInitialWeight: roundWeight(entry.initial),
      totalIssuedWeight: roundWeight(entry.issued),
      totalLoss: roundWeight(entry.loss),
      lossPercentage: percentageOf(entry.loss, entry.initial),
    }))
    .sort((a, b) => a.itemCategory.localeCompare(b.itemCategory));
}
