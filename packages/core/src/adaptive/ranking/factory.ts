import { z } from "zod";
import { ConfigurationError } from "../../errors";
import { ChatCompletionRanker } from "./chatCompletionRanker";
import { ClosestDifficultyRanker } from "./closestDifficultyRanker";
import type { RankingProvider } from "./types";

export const RankingSettingsSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("closest") }),
  z.object({
    kind: z.literal("chat"),
    baseUrl: z.string().url(),
    apiKey: z.string().min(1),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2).optional(),
    maxTokens: z.number().int().positive().optional()
  })
]);

export type RankingSettings = z.infer<typeof RankingSettingsSchema>;

export interface RankingProviderDependencies {
  fetch?: typeof fetch;
}

export const createRankingProvider = (
  settings: RankingSettings,
  dependencies: RankingProviderDependencies = {}
): RankingProvider => {
  const parsed = RankingSettingsSchema.safeParse(settings);
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid ranking settings",
      parsed.error.issues.map(issue => `${issue.path.join(".") || "settings"}: ${issue.message}`)
    );
  }

  const resolved = parsed.data;
  switch (resolved.kind) {
    case "closest":
      return new ClosestDifficultyRanker();
    case "chat":
      return new ChatCompletionRanker({ ...resolved, fetch: dependencies.fetch });
  }
};

/**
 * Reads PRACTICE_RANKING_PROVIDER ("closest" by default or "chat") and, for
 * chat, PRACTICE_RANKING_BASE_URL, PRACTICE_RANKING_API_KEY and
 * PRACTICE_RANKING_MODEL.
 */
export const loadRankingProviderFromEnv = (
  env: Record<string, string | undefined> = process.env,
  dependencies: RankingProviderDependencies = {}
): RankingProvider => {
  const kind = env.PRACTICE_RANKING_PROVIDER ?? "closest";
  if (kind === "closest") {
    return createRankingProvider({ kind }, dependencies);
  }
  if (kind !== "chat") {
    throw new ConfigurationError("Invalid ranking settings", [
      `PRACTICE_RANKING_PROVIDER: unknown provider "${kind}"`
    ]);
  }
  return createRankingProvider(
    {
      kind,
      baseUrl: env.PRACTICE_RANKING_BASE_URL ?? "",
      apiKey: env.PRACTICE_RANKING_API_KEY ?? "",
      model: env.PRACTICE_RANKING_MODEL ?? ""
    },
    dependencies
  );
};
