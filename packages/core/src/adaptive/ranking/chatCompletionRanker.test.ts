import { describe, expect, it, vi } from "vitest";
import { RankingError } from "../../errors";
import {
  ChatCompletionRanker,
  abilityLevel,
  buildRankingPrompt,
  limitSentences,
  parseRankingReply
} from "./chatCompletionRanker";
import type { RankingRequest } from "./types";

const request: RankingRequest = {
  ability: -1.5,
  topic: "recursion-basics",
  recentPerformance: { attempts: 3, correct: 2 },
  candidates: [
    { id: "rb-countdown", name: "Countdown", difficulty: -2.5, description: "Count down from n." },
    { id: "rb-power", name: "Fast Power", difficulty: -1.2, description: "x".repeat(200) }
  ]
};

const completion = (content: string, status = 200) =>
  new Response(JSON.stringify({ choices: [{ message: { content } }] }), {
    status,
    headers: { "Content-Type": "application/json" }
  });

describe("abilityLevel", () => {
  it("buckets ability into three levels", () => {
    expect(abilityLevel(-1.01)).toBe("beginner");
    expect(abilityLevel(-1)).toBe("intermediate");
    expect(abilityLevel(0.99)).toBe("intermediate");
    expect(abilityLevel(1)).toBe("advanced");
  });
});

describe("buildRankingPrompt", () => {
  const prompt = buildRankingPrompt(request);

  it("describes the learner", () => {
    expect(prompt).toContain("- Current ability (theta): -1.50 (beginner level)\n");
    expect(prompt).toContain("- Topic: recursion-basics\n");
    expect(prompt).toContain("- Recent success rate: 67% (2/3 correct)\n");
  });

  it("lists candidates with their relative difficulty", () => {
    expect(prompt).toContain(
      "1. **rb-countdown** Countdown (Difficulty: -2.50, easier than current level)\n   Description: Count down from n.\n"
    );
    expect(prompt).toContain(
      `2. **rb-power** Fast Power (Difficulty: -1.20, well-matched to current level)\n   Description: ${"x".repeat(150)}...\n`
    );
  });

  it("omits the success rate without recent attempts", () => {
    const fresh = buildRankingPrompt({ ...request, recentPerformance: { attempts: 0, correct: 0 } });
    expect(fresh).not.toContain("Recent success rate");
  });
});

describe("limitSentences", () => {
  it("keeps at most three sentences", () => {
    expect(limitSentences("One. Two. Three. Four.")).toBe("One. Two. Three.");
    expect(limitSentences("  Short one.  ")).toBe("Short one.");
  });
});

describe("parseRankingReply", () => {
  it("reads JSON inside a code fence", () => {
    expect(
      parseRankingReply('```json\n{"selected_item": "rb-power", "explanation": "Good fit."}\n```')
    ).toEqual({ selectedId: "rb-power", explanation: "Good fit." });
  });

  it("rejects text that is not JSON", () => {
    expect(() => parseRankingReply("Pick the second one")).toThrow("Ranking reply is not valid JSON");
  });

  it("rejects JSON without a selected item", () => {
    expect(() => parseRankingReply('{"explanation": "none"}')).toThrow(RankingError);
  });
});

describe("ChatCompletionRanker", () => {
  it("posts the prompt and returns the parsed selection", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      completion('{"selected_item": "rb-power", "explanation": "One. Two. Three. Four."}')
    );
    const ranker = new ChatCompletionRanker({
      baseUrl: "https://llm.test/v1/",
      apiKey: "test-secret",
      model: "test-model",
      fetch: fetchMock
    });

    await expect(ranker.rank(request)).resolves.toEqual({
      selectedId: "rb-power",
      explanation: "One. Two. Three."
    });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://llm.test/v1/chat/completions");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret"
    });

    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toMatchObject({ model: "test-model", temperature: 0, max_tokens: 500 });
  });

  it("passes the abort signal through", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      completion('{"selected_item": "rb-power", "explanation": "Fine."}')
    );
    const ranker = new ChatCompletionRanker({
      baseUrl: "https://llm.test/v1",
      apiKey: "test-secret",
      model: "test-model",
      fetch: fetchMock
    });
    const controller = new AbortController();

    await ranker.rank(request, controller.signal);
    expect(fetchMock.mock.calls[0][1]?.signal).toBe(controller.signal);
  });

  it("rejects error statuses", async () => {
    const ranker = new ChatCompletionRanker({
      baseUrl: "https://llm.test/v1",
      apiKey: "test-secret",
      model: "test-model",
      fetch: async () => new Response("unavailable", { status: 503 })
    });

    await expect(ranker.rank(request)).rejects.toThrow("Ranking service responded with 503");
  });

  it("rejects payloads without choices", async () => {
    const ranker = new ChatCompletionRanker({
      baseUrl: "https://llm.test/v1",
      apiKey: "test-secret",
      model: "test-model",
      fetch: async () => new Response(JSON.stringify({ choices: [] }), { status: 200 })
    });

    await expect(ranker.rank(request)).rejects.toThrow(
      "Ranking service returned an unexpected payload"
    );
  });
});
