import { describe, expect, it } from "vitest";
import type { ItemParameters, ItemResponse, Outcome } from "../domain/models";
import { AbilityEstimator } from "./abilityEstimator";

const parameters = (discrimination: number, difficulty: number, guessing = 0): ItemParameters => ({
  discrimination,
  difficulty,
  guessing
});

const responses = (item: ItemParameters, ...results: boolean[]): ItemResponse[] =>
  results.map(correct => ({ parameters: item, correct }));

const outcome = (item: Partial<ItemParameters>, correct: boolean): Outcome => ({
  itemId: "item",
  topic: "recursion",
  ...item,
  correct,
  timestamp: "2024-05-01T10:00:00.000Z",
  thetaBefore: 0,
  thetaAfter: 0
});

describe("AbilityEstimator", () => {
  const estimator = new AbilityEstimator();

  it("builds the quadrature grid from the configured bounds", () => {
    const grid = estimator.quadratureGrid;
    expect(grid).toHaveLength(41);
    expect(grid[0]).toBe(-4);
    expect(grid[40]).toBe(4);
  });

  describe("estimateEAP", () => {
    it("returns the current ability without answers", () => {
      expect(estimator.estimateEAP([], 0.7)).toBe(0.7);
      expect(estimator.estimateEAP([])).toBe(0);
    });

    it("moves up after correct answers and down after wrong ones", () => {
      const item = parameters(1, 0);
      expect(estimator.estimateEAP(responses(item, true, true))).toBeGreaterThan(0);
      expect(estimator.estimateEAP(responses(item, false, false))).toBeLessThan(0);
    });

    it("mirrors symmetric evidence around the prior mean", () => {
      const item = parameters(1, 0);
      const up = estimator.estimateEAP(responses(item, true));
      const down = estimator.estimateEAP(responses(item, false));
      expect(up).toBeCloseTo(-down, 6);
    });

    it("stays within the theta bounds for extreme evidence", () => {
      const hard = parameters(3, 10);
      const easy = parameters(3, -10);
      const high = estimator.estimateEAP(responses(hard, ...Array<boolean>(30).fill(true)));
      const low = estimator.estimateEAP(responses(easy, ...Array<boolean>(30).fill(false)));
      expect(high).toBeLessThanOrEqual(4);
      expect(high).toBeGreaterThanOrEqual(-4);
      expect(low).toBeGreaterThanOrEqual(-4);
      expect(low).toBeLessThanOrEqual(4);
    });
  });

  describe("posteriorStandardError", () => {
    it("is the prior spread without answers and shrinks with evidence", () => {
      expect(estimator.posteriorStandardError([])).toBe(1);
      const item = parameters(1.5, 0);
      expect(estimator.posteriorStandardError(responses(item, true, false, true, false))).toBeLessThan(1);
    });
  });

  describe("estimateMLE", () => {
    it("returns the starting point without answers", () => {
      expect(estimator.estimateMLE([], 1.5)).toBe(1.5);
    });

    it("converges on the balance point of mixed answers", () => {
      const answers: ItemResponse[] = [
        { parameters: parameters(1, -1), correct: true },
        { parameters: parameters(1, 1), correct: false }
      ];
      expect(estimator.estimateMLE(answers, 0.5)).toBeCloseTo(0, 2);
    });

    it("clamps a diverging estimate to the upper bound", () => {
      expect(estimator.estimateMLE(responses(parameters(1, 0), true, true, true))).toBe(4);
    });
  });

  describe("updateTheta", () => {
    it("keeps the current ability below the minimum answer count", () => {
      expect(estimator.updateTheta(0.3, parameters(1, 0), true, [])).toBe(0.3);
    });

    it("clamps the current ability when it does not update", () => {
      expect(estimator.updateTheta(9, parameters(1, 0), true, [])).toBe(4);
    });

    it("raises ability after two correct answers on an informative item", () => {
      const item = parameters(1.5, 0, 0.25);
      const history = [outcome(item, true)];
      expect(estimator.updateTheta(0, item, true, history)).toBeGreaterThan(0);
    });

    it("skips history entries without item parameters", () => {
      const history = [outcome({}, true)];
      expect(estimator.updateTheta(0.2, parameters(1, 0), true, history)).toBe(0.2);
    });

    it("only looks at the configured window of history", () => {
      const windowless = new AbilityEstimator({ answerHistoryWindow: 0 });
      const item = parameters(1, 0);
      const history = [outcome(item, true), outcome(item, true)];
      expect(windowless.updateTheta(0.1, item, true, history)).toBe(0.1);
    });

    it("matches the posterior mean of the window plus the new answer", () => {
      const item = parameters(1.2, 0.5);
      const history = [outcome(item, false), outcome(item, true), outcome(item, true)];
      const expected = estimator.estimateEAP(responses(item, false, true, true, false), 0);
      expect(estimator.updateTheta(0, item, false, history)).toBeCloseTo(expected, 10);
    });
  });
});
