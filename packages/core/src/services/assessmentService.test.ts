import { describe, expect, it, vi } from "vitest";
import { FIRST_ATTEMPT_EXPLANATION } from "../config/constants";
import { InMemoryCatalog } from "../domain/catalog";
import { ConceptGraph } from "../domain/conceptGraph";
import type { GradingProvider, GradingReport } from "../domain/grading";
import type { Item } from "../domain/models";
import { ConfigurationError, UnknownItemError } from "../errors";
import { AssessmentService } from "./assessmentService";

const makeItem = (id: string, topic: string, difficulty: number): Item => ({
  id,
  topic,
  name: id,
  description: "",
  discrimination: 1,
  difficulty,
  guessing: 0,
  visibleTests: [{ input: [3], output: 6 }],
  hiddenTests: []
});

const items = [makeItem("a-1", "A", 0), makeItem("a-2", "A", 0.8), makeItem("b-1", "B", 0)];
const graph = new ConceptGraph({ A: [], B: ["A"] }, ["A", "B"]);

const allPassed: GradingReport = {
  success: true,
  passRate: 1,
  allPassed: true,
  passedTests: 2,
  totalTests: 2,
  tests: [
    { input: [3], expected: 6, actual: 6, passed: true },
    { input: [0], expected: 0, actual: 0, passed: true }
  ]
};

const createService = (options: Partial<ConstructorParameters<typeof AssessmentService>[0]> = {}) =>
  new AssessmentService({
    catalog: new InMemoryCatalog(items),
    graph,
    now: () => new Date("2024-05-01T10:00:00.000Z"),
    ...options
  });

describe("AssessmentService", () => {
  it("starts a fresh learner on the root concept", async () => {
    const service = createService();
    const next = await service.nextItem();
    expect(next).toMatchObject({
      kind: "item",
      topic: "A",
      stage: "first-attempt",
      explanation: FIRST_ATTEMPT_EXPLANATION
    });
    expect(next.kind === "item" && next.item.id).toBe("a-1");
    expect(service.profile().conceptStatus).toEqual({ A: "opened", B: "locked" });
  });

  it("rejects unknown items", () => {
    const service = createService();
    expect(() => service.recordAnswer("missing", true)).toThrow(UnknownItemError);
    expect(() => service.explain("missing")).toThrow('Unknown item "missing"');
  });

  it("masters a concept and opens its dependent", () => {
    const service = createService({ config: { masteryThreshold: 0 } });
    const recorded = service.recordAnswer("a-1", true);

    expect(recorded).toMatchObject({ mastered: true, unlocked: ["B"] });
    expect(service.progress().overall).toMatchObject({
      mastered: 1,
      inProgress: 1,
      locked: 0,
      currentFocus: "B"
    });
    expect(service.readiness("B")).toMatchObject({ status: "opened", prerequisitesMet: true });
  });

  it("requires a grading provider to submit code", async () => {
    const service = createService();
    await expect(service.submit("a-1", "return 1")).rejects.toThrow(ConfigurationError);
  });

  it("grades a submission, records it and scores the attempt", async () => {
    const grade = vi.fn<GradingProvider["grade"]>(async () => allPassed);
    const service = createService({ grading: { grade } });

    const result = await service.submit("a-1", "const double = n => n * 2;", {
      timeTakenSeconds: 30
    });

    expect(grade).toHaveBeenCalledWith("const double = n => n * 2;", items[0]);
    expect(result.outcome).toMatchObject({
      itemId: "a-1",
      correct: true,
      timeTakenSeconds: 30,
      gradingDetails: { passRate: 1, passedTests: 2, totalTests: 2 }
    });
    expect(result.report).toBe(allPassed);
    expect(result.assessment.combined).toEqual({
      combinedScore: 1,
      assessment: "excellent",
      objectiveWeightUsed: 1,
      subjectiveWeightUsed: 0
    });
  });

  it("counts a partial pass as a wrong answer", async () => {
    const partial: GradingReport = { ...allPassed, passRate: 0.5, allPassed: false, passedTests: 1 };
    const service = createService({ grading: { grade: async () => partial } });

    const result = await service.submit("a-2", "return 0", {
      feedback: { difficultyRating: 4, confidenceLevel: 2 }
    });
    expect(result.outcome.correct).toBe(false);
    expect(result.outcome.feedback).toEqual({ difficultyRating: 4, confidenceLevel: 2 });
    expect(result.assessment.subjective.provided).toBe(true);
  });

  it("attaches feedback after the fact", () => {
    const service = createService();
    service.recordAnswer("a-1", false);
    const updated = service.attachFeedback(0, { difficultyRating: 5, notes: "Stuck on base case" });

    expect(updated).toMatchObject({
      itemId: "a-1",
      correct: false,
      feedback: { difficultyRating: 5, notes: "Stuck on base case" }
    });
    expect(service.profile().history[0].feedback).toEqual({
      difficultyRating: 5,
      notes: "Stuck on base case"
    });
  });

  it("continues from a saved profile", async () => {
    const first = createService({ config: { masteryThreshold: 0 } });
    first.recordAnswer("a-1", true);

    const resumed = createService({ profile: first.profile() });
    expect(resumed.learner.statusOf("A")).toBe("mastered");
    const next = await resumed.nextItem();
    expect(next).toMatchObject({ kind: "item", topic: "B" });
  });

  it("hands out copies of the profile", () => {
    const service = createService();
    const snapshot = service.profile();
    snapshot.abilities.A = 3;
    expect(service.learner.abilityOf("A")).toBe(0);
  });

  it("recommends and explains items for a topic", () => {
    const service = createService();
    expect(service.recommend("A", 1).map(entry => entry.item.id)).toEqual(["a-1"]);
    expect(service.explain("a-2")).toMatchObject({ itemId: "a-2", band: "hard", difficulty: 0.8 });
  });
});
