import {
  EXPONENT_LIMIT,
  INFORMATION_PROBABILITY_CEILING,
  INFORMATION_PROBABILITY_FLOOR
} from "../config/constants";
import type { ItemParameters, ItemResponse } from "../domain/models";
import { clamp, logistic, safeLog } from "./helpers";

/**
 * Three-parameter logistic model:
 *
 *   P(θ) = c + (1 - c) / (1 + e^(-a(θ - b)))
 *
 * a = discrimination, b = difficulty, c = guessing floor.
 */
export const probabilityCorrect = (theta: number, item: ItemParameters): number => {
  const { discrimination: a, difficulty: b, guessing: c } = item;
  return clamp(c + (1 - c) * logistic(a * (theta - b)));
};

/**
 * Fisher information of an item at a given ability:
 *
 *   I(θ) = P'(θ)² / (P(θ)(1 - P(θ)))
 *
 * Zero where the response is near-certain either way.
 */
export const information = (theta: number, item: ItemParameters): number => {
  const { discrimination: a, difficulty: b, guessing: c } = item;
  const p = probabilityCorrect(theta, item);

  if (p <= INFORMATION_PROBABILITY_FLOOR || p >= INFORMATION_PROBABILITY_CEILING) {
    return 0;
  }

  const exponent = -a * (theta - b);
  if (Math.abs(exponent) > EXPONENT_LIMIT) {
    return 0;
  }

  const expTerm = Math.exp(exponent);
  const denominator = (1 + expTerm) ** 2;
  if (denominator === 0 || !Number.isFinite(denominator)) {
    return 0;
  }

  const derivative = (a * (1 - c) * expTerm) / denominator;
  return Math.max(0, (derivative * derivative) / (p * (1 - p)));
};

/** Product of response probabilities, assuming local independence. */
export const likelihood = (theta: number, answers: readonly ItemResponse[]): number =>
  answers.reduce((total, { parameters, correct }) => {
    const p = probabilityCorrect(theta, parameters);
    return total * (correct ? p : 1 - p);
  }, 1);

export const logLikelihood = (theta: number, answers: readonly ItemResponse[]): number =>
  answers.reduce((total, { parameters, correct }) => {
    const p = probabilityCorrect(theta, parameters);
    return total + (correct ? safeLog(p) : safeLog(1 - p));
  }, 0);

export interface RankedItem<T extends ItemParameters> {
  item: T;
  information: number;
}

/** Items ordered by information at theta, highest first; ties keep catalog order. */
export const rankByInformation = <T extends ItemParameters>(
  theta: number,
  items: readonly T[]
): RankedItem<T>[] =>
  items
    .map(item => ({ item, information: information(theta, item) }))
    .sort((a, b) => b.information - a.information);

export const mostInformative = <T extends ItemParameters>(
  theta: number,
  items: readonly T[]
): T | undefined => {
  let best: T | undefined;
  let bestInformation = -1;
  items.forEach(item => {
    const value = information(theta, item);
    if (value > bestInformation) {
      bestInformation = value;
      best = item;
    }
  });
  return best;
};
