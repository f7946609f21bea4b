import {
  DEFAULT_ENGINE_CONFIG,
  EXPONENT_LIMIT,
  MLE_MAX_ITERATIONS,
  MLE_TOLERANCE
} from "../config/constants";
import type { EngineConfig } from "../config/constants";
import type { ItemParameters, ItemResponse, Outcome } from "../domain/models";
import { createLogger } from "../util/logger";
import { clamp, linspace, normalPdf, safeLog } from "./helpers";
import { logLikelihood, probabilityCorrect } from "./itemResponseModel";

export type AbilityEstimatorOptions = Pick<
  EngineConfig,
  | "initialTheta"
  | "priorMean"
  | "priorStd"
  | "quadraturePoints"
  | "thetaMin"
  | "thetaMax"
  | "answerHistoryWindow"
  | "minAnswersForUpdate"
>;

interface Posterior {
  weights: number[];
  total: number;
}

const log = createLogger("ability-estimator");

/** Rebuilds the response a history entry describes; undefined when parameters are missing. */
export const outcomeToResponse = (outcome: Outcome): ItemResponse | undefined => {
  const { discrimination, difficulty, guessing } = outcome;
  if (
    typeof discrimination !== "number" ||
    typeof difficulty !== "number" ||
    typeof guessing !== "number"
  ) {
    return undefined;
  }
  return {
    parameters: { discrimination, difficulty, guessing },
    correct: outcome.correct
  };
};

export class AbilityEstimator {
  private readonly options: AbilityEstimatorOptions;
  private readonly grid: number[];
  private readonly logPrior: number[];

  constructor(options: Partial<AbilityEstimatorOptions> = {}) {
    this.options = { ...DEFAULT_ENGINE_CONFIG, ...options };
    const { thetaMin, thetaMax, quadraturePoints, priorMean, priorStd } = this.options;
    this.grid = linspace(thetaMin, thetaMax, quadraturePoints);
    this.logPrior = this.grid.map(theta => safeLog(normalPdf(theta, priorMean, priorStd)));
  }

  public get quadratureGrid(): readonly number[] {
    return this.grid;
  }

  /** Posterior mean of theta over the quadrature grid. */
  public estimateEAP(answers: readonly ItemResponse[], currentTheta?: number): number {
    const fallback = currentTheta ?? this.options.initialTheta;
    if (answers.length === 0) {
      return fallback;
    }

    const posterior = this.posterior(answers);
    if (!posterior) {
      log.debug("Degenerate posterior, keeping current ability", {
        answers: answers.length,
        theta: fallback
      });
      return fallback;
    }

    const weightedSum = this.grid.reduce(
      (sum, theta, index) => sum + theta * posterior.weights[index],
      0
    );
    return this.clampTheta(weightedSum / posterior.total);
  }

  /** Posterior standard deviation; the prior's when nothing has been observed. */
  public posteriorStandardError(answers: readonly ItemResponse[]): number {
    const posterior = answers.length > 0 ? this.posterior(answers) : undefined;
    if (!posterior) {
      return this.options.priorStd;
    }
    const mean =
      this.grid.reduce((sum, theta, index) => sum + theta * posterior.weights[index], 0) /
      posterior.total;
    const variance =
      this.grid.reduce(
        (sum, theta, index) => sum + posterior.weights[index] * (theta - mean) ** 2,
        0
      ) / posterior.total;
    return Math.sqrt(variance);
  }

  /** Newton-Raphson maximum likelihood estimate. */
  public estimateMLE(answers: readonly ItemResponse[], initialTheta?: number): number {
    let theta = initialTheta ?? this.options.initialTheta;
    if (answers.length === 0) {
      return theta;
    }

    for (let iteration = 0; iteration < MLE_MAX_ITERATIONS; iteration += 1) {
      let firstDerivative = 0;
      let secondDerivative = 0;

      answers.forEach(({ parameters, correct }) => {
        const { discrimination: a, difficulty: b, guessing: c } = parameters;
        if (Math.abs(a * (theta - b)) > EXPONENT_LIMIT) {
          return;
        }
        const p = probabilityCorrect(theta, parameters);
        const pStar = (p - c) / (1 - c);

        firstDerivative += correct ? a * (1 - pStar) : -a * pStar;
        secondDerivative -= a * a * pStar * (1 - pStar);
      });

      if (secondDerivative === 0) {
        break;
      }

      const step = -firstDerivative / secondDerivative;
      theta = this.clampTheta(theta + step);

      if (Math.abs(step) < MLE_TOLERANCE) {
        break;
      }
    }

    return theta;
  }

  /**
   * Re-estimates ability from the recent same-topic history plus one new
   * observation. Below `minAnswersForUpdate` observations the current value is
   * returned (clamped) so a single response cannot move the estimate.
   */
  public updateTheta(
    currentTheta: number,
    newItem: ItemParameters,
    newCorrect: boolean,
    recentHistory: readonly Outcome[] = []
  ): number {
    const { answerHistoryWindow, minAnswersForUpdate } = this.options;
    const window =
      answerHistoryWindow > 0 ? recentHistory.slice(-answerHistoryWindow) : [];

    const answers: ItemResponse[] = [];
    window.forEach(outcome => {
      const response = outcomeToResponse(outcome);
      if (response) {
        answers.push(response);
      }
    });
    answers.push({
      parameters: {
        discrimination: newItem.discrimination,
        difficulty: newItem.difficulty,
        guessing: newItem.guessing
      },
      correct: newCorrect
    });

    if (answers.length < minAnswersForUpdate) {
      return this.clampTheta(currentTheta);
    }
    return this.estimateEAP(answers, currentTheta);
  }

  public clampTheta(theta: number): number {
    return clamp(theta, this.options.thetaMin, this.options.thetaMax);
  }

  private posterior(answers: readonly ItemResponse[]): Posterior | undefined {
    const logWeights = this.grid.map(
      (theta, index) => this.logPrior[index] + logLikelihood(theta, answers)
    );
    const maxLogWeight = Math.max(...logWeights);
    if (!Number.isFinite(maxLogWeight)) {
      return undefined;
    }

    const weights = logWeights.map(value => Math.exp(value - maxLogWeight));
    const total = weights.reduce((sum, weight) => sum + weight, 0);
    if (total <= 0 || !Number.isFinite(total)) {
      return undefined;
    }
    return { weights, total };
  }
}
