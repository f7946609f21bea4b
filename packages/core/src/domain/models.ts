export const CONCEPT_STATUSES = ["locked", "opened", "mastered"] as const;

export type ConceptStatus = (typeof CONCEPT_STATUSES)[number];

export interface ItemParameters {
  discrimination: number; // IRT discrimination (a parameter), > 0
  difficulty: number; // IRT difficulty (b parameter)
  guessing: number; // IRT guessing floor (c parameter), in [0, 1)
}

export interface TestCase {
  input: unknown;
  output: unknown;
  unordered?: boolean;
}

export interface Item extends ItemParameters {
  readonly id: string;
  readonly topic: string;
  readonly name: string;
  readonly description: string;
  readonly visibleTests: readonly TestCase[];
  readonly hiddenTests: readonly TestCase[];
  readonly initCode?: string;
}

export interface ItemResponse {
  parameters: ItemParameters;
  correct: boolean;
}

export interface TestCaseResult {
  input: unknown;
  expected: unknown;
  actual?: unknown;
  passed: boolean;
  error?: string;
}

export interface GradingDetails {
  passRate: number;
  passedTests: number;
  totalTests: number;
  tests?: TestCaseResult[];
  error?: string;
}

export interface SubjectiveFeedback {
  difficultyRating?: number; // 1 (easy) - 5 (hard)
  confidenceLevel?: number; // 1 (low) - 5 (high)
  notes?: string;
}

/**
 * One answered item. Parameters are copied from the catalog when the answer is
 * recorded so later catalog edits never change historical likelihoods. Older
 * records may lack them; estimation skips those.
 */
export interface Outcome {
  readonly itemId: string;
  readonly topic: string;
  readonly discrimination?: number;
  readonly difficulty?: number;
  readonly guessing?: number;
  readonly correct: boolean;
  readonly timestamp: string;
  readonly thetaBefore: number;
  readonly thetaAfter: number;
  readonly timeTakenSeconds?: number;
  readonly gradingDetails?: Readonly<GradingDetails>;
  readonly feedback?: Readonly<SubjectiveFeedback>;
}

export interface LearnerProfile {
  learnerId: string;
  abilities: Record<string, number>;
  conceptStatus: Record<string, ConceptStatus>;
  history: Outcome[];
}

export type PrerequisiteMap = Record<string, string[]>;

export interface RecentPerformance {
  attempts: number;
  correct: number;
}

export type DifficultyBand = "easy" | "medium" | "hard";
