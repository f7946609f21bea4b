import type { GradingDetails, Item, TestCaseResult } from "./models";

/** What the grading harness reports for one submission. */
export interface GradingReport {
  success: boolean;
  passRate: number;
  allPassed: boolean;
  passedTests: number;
  totalTests: number;
  tests?: TestCaseResult[];
  error?: string;
}

export interface GradingProvider {
  grade(code: string, item: Item): Promise<GradingReport>;
}

export const isPassing = (report: GradingReport): boolean => report.success && report.allPassed;

export const toGradingDetails = (report: GradingReport): GradingDetails => ({
  passRate: report.passRate,
  passedTests: report.passedTests,
  totalTests: report.totalTests,
  ...(report.tests ? { tests: report.tests.map(test => ({ ...test })) } : {}),
  ...(report.error !== undefined ? { error: report.error } : {})
});
