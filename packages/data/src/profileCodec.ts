import { z } from "zod";
import { CONCEPT_STATUSES, ProfileFormatError } from "@practice/core";
import type { LearnerProfile, TestCaseResult } from "@practice/core";

const TestCaseResultSchema = z
  .object({
    input: z.unknown(),
    expected: z.unknown(),
    actual: z.unknown(),
    passed: z.boolean(),
    error: z.string().optional()
  })
  .transform(
    ({ input, expected, actual, passed, error }): TestCaseResult => ({
      input,
      expected,
      passed,
      ...(actual !== undefined ? { actual } : {}),
      ...(error !== undefined ? { error } : {})
    })
  );

const GradingDetailsSchema = z.object({
  passRate: z.number().min(0).max(1),
  passedTests: z.number().int().nonnegative(),
  totalTests: z.number().int().nonnegative(),
  tests: z.array(TestCaseResultSchema).optional(),
  error: z.string().optional()
});

const SubjectiveFeedbackSchema = z.object({
  difficultyRating: z.number().min(1).max(5).optional(),
  confidenceLevel: z.number().min(1).max(5).optional(),
  notes: z.string().optional()
});

const OutcomeSchema = z.object({
  itemId: z.string().min(1),
  topic: z.string().min(1),
  discrimination: z.number().finite().optional(),
  difficulty: z.number().finite().optional(),
  guessing: z.number().finite().optional(),
  correct: z.boolean(),
  timestamp: z.string().datetime({ offset: true }),
  thetaBefore: z.number().finite(),
  thetaAfter: z.number().finite(),
  timeTakenSeconds: z.number().nonnegative().optional(),
  gradingDetails: GradingDetailsSchema.optional(),
  feedback: SubjectiveFeedbackSchema.optional()
});

export const LearnerProfileSchema = z.object({
  learnerId: z.string().min(1),
  abilities: z.record(z.number().finite()),
  conceptStatus: z.record(z.enum(CONCEPT_STATUSES)),
  history: z.array(OutcomeSchema)
});

export const encodeProfile = (profile: LearnerProfile): string =>
  JSON.stringify(profile, null, 2);

export const decodeProfile = (text: string): LearnerProfile => {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    throw new ProfileFormatError("Learner profile is not valid JSON", { cause: error });
  }

  const parsed = LearnerProfileSchema.safeParse(payload);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ProfileFormatError(`Invalid learner profile: ${details}`, { cause: parsed.error });
  }
  return parsed.data;
};

