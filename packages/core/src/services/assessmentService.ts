import { LearnerState } from "../adaptive/learnerState";
import type { AnswerRecorded, RecordAnswerOptions } from "../adaptive/learnerState";
import { SelectionPolicy } from "../adaptive/selectionPolicy";
import type { SelectionExplanation, SelectionResult } from "../adaptive/selectionPolicy";
import type { RankingProvider } from "../adaptive/ranking/types";
import { assessFeedback } from "../analytics/feedback";
import type { FeedbackAssessment } from "../analytics/feedback";
import { overallProgress, topicProgress, topicReadiness } from "../analytics/progress";
import type { OverallProgress, TopicProgress, TopicReadiness } from "../analytics/progress";
import { resolveEngineConfig } from "../config/schema";
import type { EngineConfig, EngineConfigUpdate } from "../config/constants";
import type { ItemCatalog } from "../domain/catalog";
import type { ConceptGraph } from "../domain/conceptGraph";
import { isPassing, toGradingDetails } from "../domain/grading";
import type { GradingProvider, GradingReport } from "../domain/grading";
import type { GradingDetails, Item, LearnerProfile, Outcome, SubjectiveFeedback } from "../domain/models";
import { createDefaultProfile } from "../domain/profile";
import { ConfigurationError, UnknownItemError } from "../errors";
import { AbilityEstimator } from "../irt/abilityEstimator";
import type { RankedItem } from "../irt/itemResponseModel";
import { createLogger } from "../util/logger";

export interface AssessmentServiceOptions {
  catalog: ItemCatalog;
  graph: ConceptGraph;
  profile?: LearnerProfile;
  ranking?: RankingProvider;
  grading?: GradingProvider;
  config?: EngineConfigUpdate;
  now?: () => Date;
}

export interface SubmissionResult extends AnswerRecorded {
  report: GradingReport;
  assessment: FeedbackAssessment;
}

export interface ProgressReport {
  overall: OverallProgress;
  topics: TopicProgress[];
}

const log = createLogger("assessment-service");

/** One learner's session over a shared catalog and concept graph. */
export class AssessmentService {
  private readonly catalog: ItemCatalog;
  private readonly graph: ConceptGraph;
  private readonly config: EngineConfig;
  private readonly grading?: GradingProvider;
  private readonly state: LearnerState;
  private readonly policy: SelectionPolicy;

  constructor(options: AssessmentServiceOptions) {
    this.catalog = options.catalog;
    this.graph = options.graph;
    this.config = resolveEngineConfig(options.config);
    this.grading = options.grading;

    const now = options.now ?? (() => new Date());
    const profile =
      options.profile ??
      createDefaultProfile(this.graph, { initialTheta: this.config.initialTheta });
    this.state = new LearnerState(profile, this.graph, {
      config: this.config,
      estimator: new AbilityEstimator(this.config),
      now
    });
    this.policy = new SelectionPolicy({
      catalog: this.catalog,
      ranking: options.ranking,
      config: this.config,
      now
    });
  }

  public get learner(): LearnerState {
    return this.state;
  }

  public get selectionPolicy(): SelectionPolicy {
    return this.policy;
  }

  public nextItem(): Promise<SelectionResult> {
    return this.policy.selectNext(this.state);
  }

  public recordAnswer(
    itemId: string,
    correct: boolean,
    details?: GradingDetails,
    options?: RecordAnswerOptions
  ): AnswerRecorded {
    return this.state.recordAnswer(this.requireItem(itemId), correct, details, options);
  }

  /** Grades the code, records the aggregate pass/fail and scores the attempt. */
  public async submit(
    itemId: string,
    code: string,
    options: RecordAnswerOptions = {}
  ): Promise<SubmissionResult> {
    const item = this.requireItem(itemId);
    if (!this.grading) {
      throw new ConfigurationError("No grading provider is configured");
    }

    const report = await this.grading.grade(code, item);
    const passed = isPassing(report);
    log.info("Submission graded", {
      learner: this.state.learnerId,
      item: item.id,
      passed,
      passRate: report.passRate
    });

    const recorded = this.state.recordAnswer(item, passed, toGradingDetails(report), options);
    return {
      ...recorded,
      report,
      assessment: assessFeedback(report, options.timeTakenSeconds ?? 0, options.feedback)
    };
  }

  public attachFeedback(index: number, feedback: SubjectiveFeedback): Outcome {
    return this.state.attachFeedback(index, feedback);
  }

  public progress(): ProgressReport {
    return {
      overall: overallProgress(this.state),
      topics: this.graph.allConcepts.map(topic => topicProgress(this.state, topic))
    };
  }

  public readiness(topic: string): TopicReadiness {
    return topicReadiness(this.state, topic);
  }

  public recommend(topic: string, n?: number): RankedItem<Item>[] {
    return this.policy.recommend(this.state, topic, n);
  }

  public explain(itemId: string): SelectionExplanation {
    return this.policy.explainSelection(this.state, this.requireItem(itemId));
  }

  public profile(): LearnerProfile {
    return this.state.snapshot();
  }

  private requireItem(itemId: string): Item {
    const item = this.catalog.get(itemId);
    if (!item) {
      throw new UnknownItemError(itemId);
    }
    return item;
  }
}
