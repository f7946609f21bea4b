import type { GradingReport } from "../domain/grading";
import type { SubjectiveFeedback } from "../domain/models";

export type FeedbackAssessmentLabel = "excellent" | "good" | "fair" | "needs_improvement";
export type FeedbackDiscrepancy = "overestimating_difficulty" | "underestimating_difficulty";

export interface FeedbackWeights {
  objective: number;
  subjective: number;
}

export interface ObjectiveMetrics {
  success: boolean;
  passRate: number;
  allPassed: boolean;
  passedTests: number;
  totalTests: number;
  timeTakenSeconds: number;
  performanceScore: number;
  error?: string;
}

export interface SubjectiveMetrics {
  provided: boolean;
  difficultyRating?: number;
  confidenceLevel?: number;
  difficultyNormalized?: number;
  confidenceNormalized?: number;
  subjectiveScore: number;
  notes?: string;
}

export interface CombinedAssessment {
  combinedScore: number;
  assessment: FeedbackAssessmentLabel;
  discrepancy?: FeedbackDiscrepancy;
  objectiveWeightUsed: number;
  subjectiveWeightUsed: number;
}

export interface FeedbackAssessment {
  objective: ObjectiveMetrics;
  subjective: SubjectiveMetrics;
  combined: CombinedAssessment;
}

export const DEFAULT_FEEDBACK_WEIGHTS: Readonly<FeedbackWeights> = Object.freeze({
  objective: 0.7,
  subjective: 0.3
});

const NEUTRAL_SUBJECTIVE_SCORE = 0.5;
const NEUTRAL_RATING = 3;
const DISCREPANCY_GAP = 0.3;

// 1-5 rating onto 0-1
const normalizeRating = (rating: number): number => (rating - 1) / 4;

const toObjective = (report: GradingReport, timeTakenSeconds: number): ObjectiveMetrics => {
  if (!report.success) {
    return {
      success: false,
      passRate: 0,
      allPassed: false,
      passedTests: report.passedTests,
      totalTests: report.totalTests,
      timeTakenSeconds,
      performanceScore: 0,
      error: report.error ?? "Unknown error"
    };
  }
  return {
    success: true,
    passRate: report.passRate,
    allPassed: report.allPassed,
    passedTests: report.passedTests,
    totalTests: report.totalTests,
    timeTakenSeconds,
    performanceScore: report.passRate
  };
};

const toSubjective = (feedback?: SubjectiveFeedback): SubjectiveMetrics => {
  if (!feedback || (feedback.difficultyRating === undefined && feedback.confidenceLevel === undefined)) {
    return { provided: false, subjectiveScore: NEUTRAL_SUBJECTIVE_SCORE };
  }

  const difficultyRating = feedback.difficultyRating ?? NEUTRAL_RATING;
  const confidenceLevel = feedback.confidenceLevel ?? NEUTRAL_RATING;
  const difficultyNormalized = normalizeRating(difficultyRating);
  const confidenceNormalized = normalizeRating(confidenceLevel);

  return {
    provided: true,
    difficultyRating,
    confidenceLevel,
    difficultyNormalized,
    confidenceNormalized,
    subjectiveScore: confidenceNormalized * 0.7 + (1 - difficultyNormalized) * 0.3,
    ...(feedback.notes !== undefined ? { notes: feedback.notes } : {})
  };
};

export const assessmentLabel = (score: number): FeedbackAssessmentLabel => {
  if (score >= 0.8) {
    return "excellent";
  }
  if (score >= 0.6) {
    return "good";
  }
  return score >= 0.4 ? "fair" : "needs_improvement";
};

/**
 * Blends the grading result with the learner's own difficulty and confidence
 * ratings. Without ratings the objective score stands alone.
 */
export const assessFeedback = (
  report: GradingReport,
  timeTakenSeconds: number,
  feedback?: SubjectiveFeedback,
  weights: FeedbackWeights = DEFAULT_FEEDBACK_WEIGHTS
): FeedbackAssessment => {
  const objective = toObjective(report, timeTakenSeconds);
  const subjective = toSubjective(feedback);

  const objectiveScore = objective.performanceScore;
  const subjectiveScore = subjective.subjectiveScore;
  const combinedScore = subjective.provided
    ? objectiveScore * weights.objective + subjectiveScore * weights.subjective
    : objectiveScore;

  let discrepancy: FeedbackDiscrepancy | undefined;
  if (subjective.provided && Math.abs(objectiveScore - subjectiveScore) > DISCREPANCY_GAP) {
    discrepancy =
      objectiveScore > subjectiveScore ? "overestimating_difficulty" : "underestimating_difficulty";
  }

  return {
    objective,
    subjective,
    combined: {
      combinedScore,
      assessment: assessmentLabel(combinedScore),
      ...(discrepancy ? { discrepancy } : {}),
      objectiveWeightUsed: subjective.provided ? weights.objective : 1,
      subjectiveWeightUsed: subjective.provided ? weights.subjective : 0
    }
  };
};
