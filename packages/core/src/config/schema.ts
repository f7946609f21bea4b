import { z } from "zod";
import { ConfigurationError } from "../errors";
import { DEFAULT_ENGINE_CONFIG } from "./constants";
import type { EngineConfig, EngineConfigUpdate } from "./constants";

const finite = () => z.number().finite();
const positiveInt = () => z.number().int().positive();

export const EngineConfigSchema = z
  .object({
    /** Ability assigned to every topic of a fresh profile */
    initialTheta: finite(),
    /** Ability at which an opened concept becomes mastered */
    masteryThreshold: finite(),
    priorMean: finite(),
    priorStd: finite().positive(),
    quadraturePoints: z.number().int().min(2),
    thetaMin: finite(),
    thetaMax: finite(),
    /** How many previous same-topic answers feed each update */
    answerHistoryWindow: z.number().int().nonnegative(),
    /** Observations required before the estimate may move */
    minAnswersForUpdate: positiveInt(),
    shortlistSize: positiveInt(),
    recentExclusionWindow: z.number().int().nonnegative(),
    wrongRecencyMultiplier: finite().positive(),
    rankingCandidates: positiveInt(),
    recentPerformanceWindow: positiveInt(),
    rankingTimeoutMs: positiveInt(),
    /** Retries after a failed ranking call; never more than one */
    rankingRetries: z.number().int().min(0).max(1)
  })
  .strict()
  .superRefine((config, ctx) => {
    if (config.thetaMin >= config.thetaMax) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["thetaMin"],
        message: "thetaMin must be lower than thetaMax"
      });
    }
  });

export const EngineConfigKeySchema = z.enum([
  "initialTheta",
  "masteryThreshold",
  "priorMean",
  "priorStd",
  "quadraturePoints",
  "thetaMin",
  "thetaMax",
  "answerHistoryWindow",
  "minAnswersForUpdate",
  "shortlistSize",
  "recentExclusionWindow",
  "wrongRecencyMultiplier",
  "rankingCandidates",
  "recentPerformanceWindow",
  "rankingTimeoutMs",
  "rankingRetries"
]);
export type EngineConfigKey = z.infer<typeof EngineConfigKeySchema>;

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`);

export const resolveEngineConfig = (
  updates: EngineConfigUpdate = {},
  base: Readonly<EngineConfig> = DEFAULT_ENGINE_CONFIG
): EngineConfig => {
  const result = EngineConfigSchema.safeParse({ ...base, ...updates });
  if (!result.success) {
    throw new ConfigurationError("Invalid engine configuration", formatIssues(result.error));
  }
  return result.data;
};

const ENV_KEYS: Record<string, EngineConfigKey> = {
  PRACTICE_INITIAL_THETA: "initialTheta",
  PRACTICE_MASTERY_THRESHOLD: "masteryThreshold",
  PRACTICE_PRIOR_MEAN: "priorMean",
  PRACTICE_PRIOR_STD: "priorStd",
  PRACTICE_QUADRATURE_POINTS: "quadraturePoints",
  PRACTICE_THETA_MIN: "thetaMin",
  PRACTICE_THETA_MAX: "thetaMax",
  PRACTICE_HISTORY_WINDOW: "answerHistoryWindow",
  PRACTICE_MIN_ANSWERS: "minAnswersForUpdate",
  PRACTICE_SHORTLIST_SIZE: "shortlistSize",
  PRACTICE_RECENT_WINDOW: "recentExclusionWindow",
  PRACTICE_RANKING_TIMEOUT_MS: "rankingTimeoutMs"
};

export const loadEngineConfigFromEnv = (
  env: Record<string, string | undefined> = process.env
): EngineConfig => {
  const updates: EngineConfigUpdate = {};
  const issues: string[] = [];

  Object.entries(ENV_KEYS).forEach(([variable, key]) => {
    const raw = env[variable]?.trim();
    if (!raw) {
      return;
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      issues.push(`${variable}: "${raw}" is not a number`);
      return;
    }
    updates[key] = value;
  });

  if (issues.length > 0) {
    throw new ConfigurationError("Invalid engine environment", issues);
  }
  return resolveEngineConfig(updates);
};
