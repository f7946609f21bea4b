import { DEFAULT_ENGINE_CONFIG } from "../config/constants";
import type { EngineConfig } from "../config/constants";
import type { ConceptGraph } from "../domain/conceptGraph";
import type {
  ConceptStatus,
  GradingDetails,
  Item,
  LearnerProfile,
  Outcome,
  RecentPerformance,
  SubjectiveFeedback
} from "../domain/models";
import { cloneProfile } from "../domain/profile";
import { AbilityEstimator } from "../irt/abilityEstimator";
import { createLogger } from "../util/logger";
import { summarizeRecent } from "./history";

export interface LearnerStateOptions {
  config?: EngineConfig;
  estimator?: AbilityEstimator;
  now?: () => Date;
}

export interface RecordAnswerOptions {
  timeTakenSeconds?: number;
  feedback?: SubjectiveFeedback;
}

export interface AnswerRecorded {
  outcome: Outcome;
  mastered: boolean;
  unlocked: string[];
}

const log = createLogger("learner-state");

const freezeDetails = (details: GradingDetails): Readonly<GradingDetails> =>
  Object.freeze({
    ...details,
    ...(details.tests ? { tests: details.tests.map(test => Object.freeze({ ...test })) } : {})
  });

/**
 * One learner's abilities, concept statuses and answer history.
 *
 * Single writer: callers serialise access to a given profile.
 */
export class LearnerState {
  private readonly profile: LearnerProfile;
  private readonly graph: ConceptGraph;
  private readonly config: EngineConfig;
  private readonly estimator: AbilityEstimator;
  private readonly now: () => Date;

  constructor(profile: LearnerProfile, graph: ConceptGraph, options: LearnerStateOptions = {}) {
    this.profile = cloneProfile(profile);
    this.graph = graph;
    this.config = options.config ?? { ...DEFAULT_ENGINE_CONFIG };
    this.estimator = options.estimator ?? new AbilityEstimator(this.config);
    this.now = options.now ?? (() => new Date());
    this.openUnlockable();
  }

  public get learnerId(): string {
    return this.profile.learnerId;
  }

  public get conceptGraph(): ConceptGraph {
    return this.graph;
  }

  public get engineConfig(): EngineConfig {
    return this.config;
  }

  public get history(): readonly Outcome[] {
    return this.profile.history;
  }

  public get statusMap(): Readonly<Record<string, ConceptStatus>> {
    return this.profile.conceptStatus;
  }

  public abilityOf(topic: string): number {
    return this.profile.abilities[topic] ?? this.config.initialTheta;
  }

  public statusOf(concept: string): ConceptStatus {
    return this.graph.statusOf(concept, this.profile.conceptStatus);
  }

  public topicHistory(topic: string): Outcome[] {
    return this.profile.history.filter(outcome => outcome.topic === topic);
  }

  public masteredTopics(): string[] {
    return this.graph.conceptsWithStatus("mastered", this.profile.conceptStatus);
  }

  public openedTopics(): string[] {
    return this.graph.conceptsWithStatus("opened", this.profile.conceptStatus);
  }

  public lockedTopics(): string[] {
    return this.graph.conceptsWithStatus("locked", this.profile.conceptStatus);
  }

  public currentFocusTopic(): string | undefined {
    return this.graph.nextConceptToLearn(this.profile.conceptStatus);
  }

  public recentPerformance(
    topic: string,
    window = this.config.recentPerformanceWindow
  ): RecentPerformance {
    return summarizeRecent(this.topicHistory(topic), window);
  }

  /** Distinct item ids attempted in a topic, most recent first. */
  public recentItemIds(topic: string, limit: number): string[] {
    const ids: string[] = [];
    for (let index = this.profile.history.length - 1; index >= 0; index -= 1) {
      if (ids.length >= limit) {
        break;
      }
      const outcome = this.profile.history[index];
      if (outcome.topic === topic && !ids.includes(outcome.itemId)) {
        ids.push(outcome.itemId);
      }
    }
    return ids;
  }

  public attemptCount(itemId: string): number {
    return this.profile.history.filter(outcome => outcome.itemId === itemId).length;
  }

  /**
   * Updates the topic ability from this answer, appends the outcome, then
   * evaluates mastery against the post-update ability.
   */
  public recordAnswer(
    item: Item,
    correct: boolean,
    gradingDetails?: GradingDetails,
    options: RecordAnswerOptions = {}
  ): AnswerRecorded {
    const { topic } = item;
    const thetaBefore = this.abilityOf(topic);
    const thetaAfter = this.estimator.updateTheta(
      thetaBefore,
      item,
      correct,
      this.topicHistory(topic)
    );
    this.profile.abilities[topic] = thetaAfter;

    const outcome: Outcome = Object.freeze({
      itemId: item.id,
      topic,
      discrimination: item.discrimination,
      difficulty: item.difficulty,
      guessing: item.guessing,
      correct,
      timestamp: this.now().toISOString(),
      thetaBefore,
      thetaAfter,
      ...(options.timeTakenSeconds !== undefined
        ? { timeTakenSeconds: options.timeTakenSeconds }
        : {}),
      ...(gradingDetails ? { gradingDetails: freezeDetails(gradingDetails) } : {}),
      ...(options.feedback ? { feedback: Object.freeze({ ...options.feedback }) } : {})
    });
    this.profile.history.push(outcome);

    log.debug("Ability updated", {
      learner: this.profile.learnerId,
      topic,
      item: item.id,
      correct,
      thetaBefore,
      thetaAfter
    });

    const { mastered, unlocked } = this.evaluateMastery(topic, thetaAfter);
    return { outcome, mastered, unlocked };
  }

  /** Attaches subjective feedback to a recorded outcome without touching its measurement fields. */
  public attachFeedback(index: number, feedback: SubjectiveFeedback): Outcome {
    const existing = this.profile.history[index];
    if (!existing) {
      throw new RangeError(`No outcome at history index ${index}`);
    }
    const updated: Outcome = Object.freeze({
      ...existing,
      feedback: Object.freeze({ ...feedback })
    });
    this.profile.history[index] = updated;
    return updated;
  }

  /**
   * Administrative reset: ability back to the initial value and status
   * recomputed from prerequisites. Not part of the answer flow.
   */
  public resetTopic(topic: string): void {
    this.profile.abilities[topic] = this.config.initialTheta;
    this.profile.conceptStatus = {
      ...this.profile.conceptStatus,
      [topic]: this.graph.canUnlock(topic, this.profile.conceptStatus) ? "opened" : "locked"
    };
  }

  public snapshot(): LearnerProfile {
    return cloneProfile(this.profile);
  }

  /**
   * Opens every locked concept whose prerequisites are all mastered. Stored
   * profiles may predate a concept, which then reads as locked.
   */
  private openUnlockable(): void {
    const ready = this.graph.unlockableConcepts(this.profile.conceptStatus);
    ready.forEach(concept => {
      this.profile.conceptStatus = this.graph.open(concept, this.profile.conceptStatus);
    });
    if (ready.length) {
      log.info("Concepts opened", { learner: this.profile.learnerId, concepts: ready });
    }
  }

  private evaluateMastery(
    topic: string,
    thetaAfter: number
  ): Pick<AnswerRecorded, "mastered" | "unlocked"> {
    this.openUnlockable();
    if (this.statusOf(topic) !== "opened" || thetaAfter < this.config.masteryThreshold) {
      return { mastered: false, unlocked: [] };
    }

    const transition = this.graph.master(topic, this.profile.conceptStatus);
    this.profile.conceptStatus = transition.status;
    log.info("Concept mastered", {
      learner: this.profile.learnerId,
      topic,
      theta: thetaAfter,
      unlocked: transition.unlocked
    });
    return { mastered: transition.mastered, unlocked: transition.unlocked };
  }
}
