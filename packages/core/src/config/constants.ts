export interface EngineConfig {
  initialTheta: number;
  masteryThreshold: number;
  priorMean: number;
  priorStd: number;
  quadraturePoints: number;
  thetaMin: number;
  thetaMax: number;
  answerHistoryWindow: number;
  minAnswersForUpdate: number;
  shortlistSize: number;
  recentExclusionWindow: number;
  wrongRecencyMultiplier: number;
  rankingCandidates: number;
  recentPerformanceWindow: number;
  rankingTimeoutMs: number;
  rankingRetries: number;
}

export type EngineConfigUpdate = Partial<EngineConfig>;

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  initialTheta: 0,
  masteryThreshold: 1.2,
  priorMean: 0,
  priorStd: 1,
  quadraturePoints: 41,
  thetaMin: -4,
  thetaMax: 4,
  answerHistoryWindow: 4,
  minAnswersForUpdate: 2,
  shortlistSize: 10,
  recentExclusionWindow: 5,
  wrongRecencyMultiplier: 2,
  rankingCandidates: 3,
  recentPerformanceWindow: 5,
  rankingTimeoutMs: 8000,
  rankingRetries: 1
});

export const EXPONENT_LIMIT = 500;
export const INFORMATION_PROBABILITY_FLOOR = 0.001;
export const INFORMATION_PROBABILITY_CEILING = 0.999;
export const LOG_EPSILON = 1e-10;

export const MLE_MAX_ITERATIONS = 20;
export const MLE_TOLERANCE = 0.001;

export const WRONG_COUNT_WEIGHT = 0.1;
export const DIFFICULTY_BAND_WIDTH = 0.5;

export const FIRST_ATTEMPT_EXPLANATION =
  "This is your first question in this topic. It's designed to assess your current understanding.";
export const CLOSEST_DIFFICULTY_EXPLANATION =
  "This question matches your current skill level and will help you progress in your learning journey.";
export const SINGLE_CANDIDATE_EXPLANATION = "This is the next question in your learning path.";
export const INFORMATION_FALLBACK_EXPLANATION =
  "You just attempted the only nearby question, so this is the most informative one for your current level.";
