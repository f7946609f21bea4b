export type {
  RankingCandidate,
  RankingProvider,
  RankingRequest,
  RankingResponse
} from "./types";
export { ClosestDifficultyRanker, closestDifficulty } from "./closestDifficultyRanker";
export {
  ChatCompletionRanker,
  abilityLevel,
  buildRankingPrompt,
  limitSentences,
  parseRankingReply
} from "./chatCompletionRanker";
export type { ChatCompletionRankerOptions } from "./chatCompletionRanker";
export {
  RankingSettingsSchema,
  createRankingProvider,
  loadRankingProviderFromEnv
} from "./factory";
export type { RankingProviderDependencies, RankingSettings } from "./factory";
export { resolveCandidate } from "./resolveCandidate";
