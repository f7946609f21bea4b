import { describe, expect, it } from "vitest";
import { ProfileFormatError } from "@practice/core";
import type { LearnerProfile } from "@practice/core";
import { decodeProfile, encodeProfile } from "./profileCodec";

const profile: LearnerProfile = {
  learnerId: "learner-7",
  abilities: { recursion: 0.42, graphs: 0 },
  conceptStatus: { recursion: "opened", graphs: "locked" },
  history: [
    {
      itemId: "rb-1",
      topic: "recursion",
      discrimination: 1.2,
      difficulty: 0.3,
      guessing: 0.25,
      correct: false,
      timestamp: "2024-05-01T10:00:00.000Z",
      thetaBefore: 0,
      thetaAfter: 0,
      timeTakenSeconds: 95,
      gradingDetails: {
        passRate: 0.5,
        passedTests: 1,
        totalTests: 2,
        tests: [
          { input: [2], expected: 4, actual: 4, passed: true },
          { input: [3], expected: 6, passed: false, error: "Timed out" }
        ]
      },
      feedback: { difficultyRating: 4 }
    }
  ]
};

describe("profile codec", () => {
  it("decodes what it encodes", () => {
    expect(decodeProfile(encodeProfile(profile))).toEqual(profile);
  });

  it("rejects text that is not JSON", () => {
    expect(() => decodeProfile("{")).toThrow(
      new ProfileFormatError("Learner profile is not valid JSON")
    );
  });

  it("names the offending field", () => {
    const broken = JSON.stringify({
      ...profile,
      history: [{ ...profile.history[0], timestamp: "yesterday" }]
    });
    expect(() => decodeProfile(broken)).toThrow(
      "Invalid learner profile: history.0.timestamp: Invalid datetime"
    );
  });

  it("rejects unknown concept statuses", () => {
    const broken = JSON.stringify({ ...profile, conceptStatus: { recursion: "done" } });
    expect(() => decodeProfile(broken)).toThrow(/^Invalid learner profile: conceptStatus\.recursion: /);
  });
});
