import type { Outcome, RecentPerformance } from "../domain/models";

export interface ItemHistory {
  itemId: string;
  /** Epoch milliseconds of the latest attempt with a readable timestamp */
  lastAttemptAt?: number;
  lastCorrect?: boolean;
  correct: number;
  wrong: number;
}

/** Per-item attempt statistics, keyed by item id, for the given outcomes. */
export const buildItemHistory = (outcomes: readonly Outcome[]): Map<string, ItemHistory> => {
  const stats = new Map<string, ItemHistory>();

  outcomes.forEach(outcome => {
    const entry = stats.get(outcome.itemId) ?? {
      itemId: outcome.itemId,
      correct: 0,
      wrong: 0
    };

    const attemptedAt = Date.parse(outcome.timestamp);
    if (
      !Number.isNaN(attemptedAt) &&
      (entry.lastAttemptAt === undefined || attemptedAt >= entry.lastAttemptAt)
    ) {
      entry.lastAttemptAt = attemptedAt;
      entry.lastCorrect = outcome.correct;
    }

    if (outcome.correct) {
      entry.correct += 1;
    } else {
      entry.wrong += 1;
    }
    stats.set(outcome.itemId, entry);
  });

  return stats;
};

/** The item attempted last, by timestamp; undefined without dated attempts. */
export const mostRecentItemId = (history: ReadonlyMap<string, ItemHistory>): string | undefined => {
  let latestId: string | undefined;
  let latestAt = Number.NEGATIVE_INFINITY;
  history.forEach(entry => {
    if (entry.lastAttemptAt !== undefined && entry.lastAttemptAt > latestAt) {
      latestAt = entry.lastAttemptAt;
      latestId = entry.itemId;
    }
  });
  return latestId;
};

export const summarizeRecent = (
  outcomes: readonly Outcome[],
  window: number
): RecentPerformance => {
  const recent = window > 0 ? outcomes.slice(-window) : [];
  return {
    attempts: recent.length,
    correct: recent.filter(outcome => outcome.correct).length
  };
};
