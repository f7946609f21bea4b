export * from "./domain/models";
export * from "./errors";
export {
  DEFAULT_ENGINE_CONFIG,
  FIRST_ATTEMPT_EXPLANATION,
  CLOSEST_DIFFICULTY_EXPLANATION,
  SINGLE_CANDIDATE_EXPLANATION,
  INFORMATION_FALLBACK_EXPLANATION
} from "./config/constants";
export type { EngineConfig, EngineConfigUpdate } from "./config/constants";
export {
  EngineConfigSchema,
  EngineConfigKeySchema,
  resolveEngineConfig,
  loadEngineConfigFromEnv
} from "./config/schema";
export type { EngineConfigKey } from "./config/schema";
export { createLogger, setLogLevel, getLogLevel, describeError } from "./util/logger";
export type { LogLevel, LogFields, Logger } from "./util/logger";
export { withTimeout } from "./util/timeout";
export {
  probabilityCorrect,
  information,
  likelihood,
  logLikelihood,
  rankByInformation,
  mostInformative
} from "./irt/itemResponseModel";
export type { RankedItem } from "./irt/itemResponseModel";
export { AbilityEstimator, outcomeToResponse } from "./irt/abilityEstimator";
export type { AbilityEstimatorOptions } from "./irt/abilityEstimator";
export { ConceptGraph, detectCycles } from "./domain/conceptGraph";
export type { StatusMap, MasteryTransition, ConceptGraphSnapshot } from "./domain/conceptGraph";
export { InMemoryCatalog } from "./domain/catalog";
export type { ItemCatalog } from "./domain/catalog";
export { createDefaultProfile, cloneProfile, DEFAULT_LEARNER_ID } from "./domain/profile";
export type { CreateProfileOptions } from "./domain/profile";
export { isPassing, toGradingDetails } from "./domain/grading";
export type { GradingProvider, GradingReport } from "./domain/grading";
export { LearnerState } from "./adaptive/learnerState";
export type {
  LearnerStateOptions,
  RecordAnswerOptions,
  AnswerRecorded
} from "./adaptive/learnerState";
export { SelectionPolicy, difficultyBand, revisitPriority } from "./adaptive/selectionPolicy";
export type {
  SelectionPolicyOptions,
  SelectionResult,
  SelectionStage,
  SelectionExplanation
} from "./adaptive/selectionPolicy";
export * from "./adaptive/ranking";
export { assessFeedback, assessmentLabel, DEFAULT_FEEDBACK_WEIGHTS } from "./analytics/feedback";
export type {
  FeedbackAssessment,
  FeedbackAssessmentLabel,
  FeedbackDiscrepancy,
  FeedbackWeights,
  ObjectiveMetrics,
  SubjectiveMetrics,
  CombinedAssessment
} from "./analytics/feedback";
export { topicProgress, overallProgress, topicReadiness } from "./analytics/progress";
export type { TopicProgress, OverallProgress, TopicReadiness } from "./analytics/progress";
export { AssessmentService } from "./services/assessmentService";
export type {
  AssessmentServiceOptions,
  SubmissionResult,
  ProgressReport
} from "./services/assessmentService";
