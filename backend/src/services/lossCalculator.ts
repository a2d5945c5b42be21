import { STAGES, type ProductionStage, type TransactionRecord } from '../types/job.js';

/** Weights are tracked to the milligram: 3 decimals of a gram */
export function roundWeight(value: number): number {
  return Math.round((value + Number.EPSILON) * 1000) / 1000;
}

export function roundPercentage(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

export interface StageLoss {
  loss: number;
  lossPercentage: number;
}

/** Loss of a single stage; callers guarantee 0 < returned <= issued */
export function calculateLoss(issuedWeight: number, returnedWeight: number): StageLoss {
  const loss = roundWeight(issuedWeight - returnedWeight);
  return {
    loss,
    lossPercentage: roundPercentage((loss / issuedWeight) * 100),
  };
}

/** Cumulative loss of a job from its completed transactions */
export function calculateJobLoss(initialWeight: number, transactions: TransactionRecord[]): StageLoss {
  const totalLoss = roundWeight(
    transactions
      .filter((t) => t.status === 'completed')
      .reduce((sum, t) => sum + (t.loss ?? 0), 0),
  );
  return {
    loss: totalLoss,
    lossPercentage: roundPercentage((totalLoss / initialWeight) * 100),
  };
}

/** Latest completed transaction in stage order, or null before casting completes */
export function lastCompletedStage(transactions: TransactionRecord[]): TransactionRecord | null {
  let latest: TransactionRecord | null = null;
  for (const transaction of transactions) {
    if (transaction.status !== 'completed') continue;
    if (!latest || STAGES.indexOf(transaction.stage) >= STAGES.indexOf(latest.stage)) {
      latest = transaction;
    }
  }
  return latest;
}

/** Stage the job may be assigned to next; null once polishing has completed */
export function nextStage(transactions: TransactionRecord[]): ProductionStage | null {
  const latest = lastCompletedStage(transactions);
  if (!latest) {
    return STAGES[0];
  }
  return STAGES[STAGES.indexOf(latest.stage) + 1] ?? null;
}

export function isFinalStage(stage: ProductionStage): boolean {
  return stage === STAGES[STAGES.length - 1];
}
