import {
  CLOSEST_DIFFICULTY_EXPLANATION,
  DEFAULT_ENGINE_CONFIG,
  DIFFICULTY_BAND_WIDTH,
  FIRST_ATTEMPT_EXPLANATION,
  INFORMATION_FALLBACK_EXPLANATION,
  SINGLE_CANDIDATE_EXPLANATION,
  WRONG_COUNT_WEIGHT
} from "../config/constants";
import type { EngineConfig } from "../config/constants";
import type { ItemCatalog } from "../domain/catalog";
import type { DifficultyBand, Item } from "../domain/models";
import { round } from "../irt/helpers";
import {
  information,
  mostInformative,
  probabilityCorrect,
  rankByInformation
} from "../irt/itemResponseModel";
import type { RankedItem } from "../irt/itemResponseModel";
import { createLogger, describeError } from "../util/logger";
import { withTimeout } from "../util/timeout";
import { buildItemHistory, mostRecentItemId } from "./history";
import type { ItemHistory } from "./history";
import type { LearnerState } from "./learnerState";
import { ClosestDifficultyRanker, closestDifficulty } from "./ranking/closestDifficultyRanker";
import { resolveCandidate } from "./ranking/resolveCandidate";
import type { RankingCandidate, RankingProvider, RankingRequest } from "./ranking/types";

export type SelectionStage =
  | "first-attempt"
  | "single-candidate"
  | "ranked"
  | "fallback"
  | "information";

export type SelectionResult =
  | {
      kind: "item";
      item: Item;
      topic: string;
      explanation: string;
      stage: SelectionStage;
    }
  | {
      kind: "empty";
      topic?: string;
      reason: string;
    };

export interface SelectionExplanation {
  itemId: string;
  topic: string;
  ability: number;
  difficulty: number;
  band: DifficultyBand;
  probabilityCorrect: number;
  information: number;
  difficultyMatch: number;
  reason: string;
}

export interface SelectionPolicyOptions {
  catalog: ItemCatalog;
  ranking?: RankingProvider;
  config?: EngineConfig;
  now?: () => Date;
}

interface PrioritisedItem {
  item: Item;
  priority: number;
}

type ItemPick = Omit<Extract<SelectionResult, { kind: "item" }>, "kind" | "topic">;

const log = createLogger("selection-policy");

export const difficultyBand = (difficulty: number, ability: number): DifficultyBand => {
  const delta = difficulty - ability;
  if (delta < -DIFFICULTY_BAND_WIDTH) {
    return "easy";
  }
  return delta > DIFFICULTY_BAND_WIDTH ? "hard" : "medium";
};

const describeSelection = (band: DifficultyBand, probability: number, info: number): string => {
  let informativeness = "moderately informative";
  if (info > 1) {
    informativeness = "very informative";
  } else if (info > 0.5) {
    informativeness = "informative";
  }

  let chance = "is challenging";
  if (probability > 0.8) {
    chance = "offers a high chance of success";
  } else if (probability > 0.5) {
    chance = "offers a good chance of success";
  }

  return `This ${band} question is ${informativeness} for your current level and ${chance}. It will help us better understand your abilities.`;
};

/**
 * Age of the last attempt in seconds, weighted up for items answered wrongly.
 * Items never attempted rank first.
 */
export const revisitPriority = (
  entry: ItemHistory | undefined,
  nowMs: number,
  wrongRecencyMultiplier: number
): number => {
  if (!entry || entry.lastAttemptAt === undefined) {
    return Number.POSITIVE_INFINITY;
  }
  const ageSeconds = Math.max(0, (nowMs - entry.lastAttemptAt) / 1000);
  const recency = entry.lastCorrect === false ? wrongRecencyMultiplier : 1;
  return ageSeconds * recency * (1 + WRONG_COUNT_WEIGHT * entry.wrong);
};

// Highest priority first; equal priorities by name, descending.
const byPriority = (a: PrioritisedItem, b: PrioritisedItem): number => {
  if (a.priority !== b.priority) {
    return b.priority > a.priority ? 1 : -1;
  }
  if (a.item.name === b.item.name) {
    return 0;
  }
  return b.item.name > a.item.name ? 1 : -1;
};

const toCandidate = (item: Item): RankingCandidate => ({
  id: item.id,
  name: item.name,
  difficulty: item.difficulty,
  description: item.description
});

/**
 * Picks the next item in three stages: topic from the concept graph, an
 * information shortlist at the learner's ability, then a history-aware choice
 * delegated to the ranking provider.
 */
export class SelectionPolicy {
  public readonly id = "max-information";
  public readonly title = "Maximum information with history-aware ranking";

  private readonly catalog: ItemCatalog;
  private readonly ranking: RankingProvider;
  private readonly config: EngineConfig;
  private readonly now: () => Date;

  constructor(options: SelectionPolicyOptions) {
    this.catalog = options.catalog;
    this.ranking = options.ranking ?? new ClosestDifficultyRanker();
    this.config = options.config ?? { ...DEFAULT_ENGINE_CONFIG };
    this.now = options.now ?? (() => new Date());
  }

  /** Topic to practise: the graph's next concept, or the first mastered one for review. */
  public selectTopic(state: LearnerState): string | undefined {
    return state.currentFocusTopic() ?? state.masteredTopics()[0];
  }

  public shortlist(state: LearnerState, topic: string): RankedItem<Item>[] {
    return rankByInformation(state.abilityOf(topic), this.catalog.byTopic(topic)).slice(
      0,
      Math.max(0, this.config.shortlistSize)
    );
  }

  public async selectNext(state: LearnerState): Promise<SelectionResult> {
    const topic = this.selectTopic(state);
    if (!topic) {
      return { kind: "empty", reason: "No concept is available to practise" };
    }

    const items = this.catalog.byTopic(topic);
    if (!items.length) {
      log.warn("Topic has no items", { topic });
      return { kind: "empty", topic, reason: `No items are available for ${topic}` };
    }

    const selection = await this.pick(state, topic, items);
    log.debug("Item selected", {
      learner: state.learnerId,
      topic,
      item: selection.item.id,
      stage: selection.stage
    });
    return { kind: "item", topic, ...selection };
  }

  /** Top-n items by information, skipping recently attempted ones while enough remain. */
  public recommend(state: LearnerState, topic: string, n = 5): RankedItem<Item>[] {
    const ranked = rankByInformation(state.abilityOf(topic), this.catalog.byTopic(topic));
    const recent = new Set(state.recentItemIds(topic, this.config.recentExclusionWindow));
    const fresh = ranked.filter(({ item }) => !recent.has(item.id));
    return (fresh.length < n ? ranked : fresh).slice(0, Math.max(0, n));
  }

  public itemsByDifficulty(state: LearnerState, topic: string, band: DifficultyBand): Item[] {
    const ability = state.abilityOf(topic);
    return this.catalog
      .byTopic(topic)
      .filter(item => difficultyBand(item.difficulty, ability) === band);
  }

  public explainSelection(state: LearnerState, item: Item): SelectionExplanation {
    const ability = state.abilityOf(item.topic);
    const probability = probabilityCorrect(ability, item);
    const info = information(ability, item);
    const band = difficultyBand(item.difficulty, ability);

    return {
      itemId: item.id,
      topic: item.topic,
      ability: round(ability),
      difficulty: round(item.difficulty),
      band,
      probabilityCorrect: round(probability),
      information: round(info),
      difficultyMatch: round(Math.abs(item.difficulty - ability)),
      reason: describeSelection(band, probability, info)
    };
  }

  public shouldAdvance(state: LearnerState, topic: string): boolean {
    return state.abilityOf(topic) >= this.config.masteryThreshold;
  }

  private async pick(state: LearnerState, topic: string, items: readonly Item[]): Promise<ItemPick> {
    const ability = state.abilityOf(topic);
    const topicHistory = state.topicHistory(topic);
    const shortlist = this.shortlist(state, topic).map(({ item }) => item);

    if (!topicHistory.length) {
      return {
        item: shortlist[0] ?? items[0],
        explanation: FIRST_ATTEMPT_EXPLANATION,
        stage: "first-attempt"
      };
    }

    const itemHistory = buildItemHistory(topicHistory);
    const previousId = mostRecentItemId(itemHistory);
    const remaining = shortlist.filter(item => item.id !== previousId);

    if (!remaining.length) {
      return {
        item: mostInformative(ability, items) ?? items[0],
        explanation: INFORMATION_FALLBACK_EXPLANATION,
        stage: "information"
      };
    }

    const nowMs = this.now().getTime();
    const candidates = remaining
      .map(item => ({
        item,
        priority: revisitPriority(
          itemHistory.get(item.id),
          nowMs,
          this.config.wrongRecencyMultiplier
        )
      }))
      .sort(byPriority)
      .slice(0, Math.max(1, this.config.rankingCandidates))
      .map(({ item }) => item);

    if (candidates.length === 1) {
      return {
        item: candidates[0],
        explanation: SINGLE_CANDIDATE_EXPLANATION,
        stage: "single-candidate"
      };
    }

    return this.rankCandidates(
      {
        ability,
        topic,
        recentPerformance: state.recentPerformance(topic),
        candidates: candidates.map(toCandidate)
      },
      candidates
    );
  }

  private async rankCandidates(request: RankingRequest, candidates: Item[]): Promise<ItemPick> {
    const attempts = 1 + Math.min(1, Math.max(0, this.config.rankingRetries));

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      try {
        const response = await withTimeout(
          signal => this.ranking.rank(request, signal),
          this.config.rankingTimeoutMs,
          `Ranking provider "${this.ranking.id}"`
        );
        const item = resolveCandidate(response.selectedId, candidates);
        if (item) {
          return {
            item,
            explanation: response.explanation || CLOSEST_DIFFICULTY_EXPLANATION,
            stage: "ranked"
          };
        }
      } catch (error) {
        log.warn("Ranking provider failed", {
          provider: this.ranking.id,
          topic: request.topic,
          attempt,
          error: describeError(error)
        });
      }
    }

    return {
      item: closestDifficulty(candidates, request.ability) ?? candidates[0],
      explanation: CLOSEST_DIFFICULTY_EXPLANATION,
      stage: "fallback"
    };
  }
}
