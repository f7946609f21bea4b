import { z } from "zod";
import { DIFFICULTY_BAND_WIDTH } from "../../config/constants";
import { RankingError } from "../../errors";
import type { RankingCandidate, RankingProvider, RankingRequest, RankingResponse } from "./types";

export interface ChatCompletionRankerOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
  fetch?: typeof fetch;
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string()
        })
      })
    )
    .min(1)
});

const RankingReplySchema = z.object({
  selected_item: z.string(),
  explanation: z.string().default("")
});

const SYSTEM_PROMPT = `You are an adaptive learning system selecting the best practice item for a learner.
Your goal is to maximise learning while keeping the challenge appropriate.

Respond ONLY with valid JSON.
Keep the explanation to three short sentences.
Focus on why this item now and what the learner will practise.`;

const DESCRIPTION_PREVIEW_LENGTH = 150;
const MAX_EXPLANATION_SENTENCES = 3;

export const abilityLevel = (ability: number): "beginner" | "intermediate" | "advanced" => {
  if (ability < -1) {
    return "beginner";
  }
  return ability < 1 ? "intermediate" : "advanced";
};

const relativeDifficulty = (difficulty: number, ability: number): string => {
  const delta = difficulty - ability;
  if (delta < -DIFFICULTY_BAND_WIDTH) {
    return "easier than current level";
  }
  if (delta > DIFFICULTY_BAND_WIDTH) {
    return "harder than current level";
  }
  return "well-matched to current level";
};

const preview = (text: string): string =>
  text.length > DESCRIPTION_PREVIEW_LENGTH
    ? `${text.slice(0, DESCRIPTION_PREVIEW_LENGTH)}...`
    : text;

const describeCandidate = (candidate: RankingCandidate, index: number, ability: number): string =>
  `${index + 1}. **${candidate.id}** ${candidate.name} (Difficulty: ${candidate.difficulty.toFixed(
    2
  )}, ${relativeDifficulty(candidate.difficulty, ability)})\n   Description: ${preview(
    candidate.description
  )}`;

export const buildRankingPrompt = ({
  ability,
  topic,
  recentPerformance,
  candidates
}: RankingRequest): string => {
  const lines = [
    "Learner profile:",
    `- Current ability (theta): ${ability.toFixed(2)} (${abilityLevel(ability)} level)`,
    `- Topic: ${topic}`
  ];
  if (recentPerformance.attempts > 0) {
    const rate = (recentPerformance.correct / recentPerformance.attempts) * 100;
    lines.push(
      `- Recent success rate: ${rate.toFixed(0)}% (${recentPerformance.correct}/${recentPerformance.attempts} correct)`
    );
  }

  return [
    ...lines,
    "",
    "Candidate items:",
    ...candidates.map((candidate, index) => describeCandidate(candidate, index, ability)),
    "",
    "Select the BEST item for this learner right now. Consider:",
    "1. Difficulty match (not too easy, not too hard)",
    "2. Learning progression and skill building",
    "3. Engagement and motivation",
    "",
    "Respond with JSON in this exact format:",
    '{"selected_item": "item_id", "explanation": "Three short sentences."}'
  ].join("\n");
};

const stripCodeFence = (text: string): string =>
  text
    .trim()
    .replace(/^```(?:json)?/i, "")
    .replace(/```$/, "")
    .trim();

export const limitSentences = (text: string, max = MAX_EXPLANATION_SENTENCES): string => {
  const parts = text.split(".");
  if (parts.length <= max) {
    return text.trim();
  }
  return `${parts
    .slice(0, max)
    .map(part => part.trim())
    .join(". ")}.`;
};

export const parseRankingReply = (content: string): RankingResponse => {
  let payload: unknown;
  try {
    payload = JSON.parse(stripCodeFence(content));
  } catch (error) {
    throw new RankingError("Ranking reply is not valid JSON", { cause: error });
  }

  const reply = RankingReplySchema.safeParse(payload);
  if (!reply.success) {
    throw new RankingError(`Ranking reply has an unexpected shape: ${reply.error.message}`);
  }
  return {
    selectedId: reply.data.selected_item,
    explanation: limitSentences(reply.data.explanation)
  };
};

/** Ranks candidates through an OpenAI-compatible chat completions endpoint. */
export class ChatCompletionRanker implements RankingProvider {
  public readonly id = "chat";
  public readonly title = "Chat completion ranking";

  private readonly options: Required<Omit<ChatCompletionRankerOptions, "fetch">>;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ChatCompletionRankerOptions) {
    this.options = {
      baseUrl: options.baseUrl.replace(/\/+$/, ""),
      apiKey: options.apiKey,
      model: options.model,
      temperature: options.temperature ?? 0,
      maxTokens: options.maxTokens ?? 500
    };
    this.fetchImpl = options.fetch ?? fetch;
  }

  public async rank(request: RankingRequest, signal?: AbortSignal): Promise<RankingResponse> {
    const response = await this.fetchImpl(`${this.options.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.options.apiKey}`
      },
      body: JSON.stringify({
        model: this.options.model,
        temperature: this.options.temperature,
        max_tokens: this.options.maxTokens,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: buildRankingPrompt(request) }
        ]
      }),
      signal
    });

    if (!response.ok) {
      throw new RankingError(`Ranking service responded with ${response.status}`);
    }

    const completion = ChatCompletionSchema.safeParse(await response.json());
    if (!completion.success) {
      throw new RankingError("Ranking service returned an unexpected payload");
    }
    return parseRankingReply(completion.data.choices[0].message.content);
  }
}
