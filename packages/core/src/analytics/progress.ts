import type { LearnerState } from "../adaptive/learnerState";
import type { ConceptStatus } from "../domain/models";
import { clamp, round } from "../irt/helpers";

export interface TopicProgress {
  topic: string;
  theta: number;
  status: ConceptStatus;
  progressPercent: number;
  attempts: number;
  masteryThreshold: number;
}

export interface OverallProgress {
  totalTopics: number;
  mastered: number;
  inProgress: number;
  locked: number;
  overallProgressPercent: number;
  totalAttempts: number;
  currentFocus?: string;
}

export interface TopicReadiness {
  topic: string;
  status: ConceptStatus;
  theta: number;
  readinessScore: number;
  prerequisitesMet: boolean;
  prerequisites: string[];
  canStart: boolean;
}

export const topicProgress = (state: LearnerState, topic: string): TopicProgress => {
  const { initialTheta, masteryThreshold } = state.engineConfig;
  const theta = state.abilityOf(topic);
  const status = state.statusOf(topic);

  let progressPercent = 0;
  if (status === "mastered") {
    progressPercent = 100;
  } else if (status === "opened") {
    const span = masteryThreshold - initialTheta;
    progressPercent = span > 0 ? clamp(((theta - initialTheta) / span) * 100, 0, 100) : 0;
  }

  return {
    topic,
    theta,
    status,
    progressPercent,
    attempts: state.topicHistory(topic).length,
    masteryThreshold
  };
};

export const overallProgress = (state: LearnerState): OverallProgress => {
  const totalTopics = state.conceptGraph.allConcepts.length;
  const mastered = state.masteredTopics().length;
  const currentFocus = state.currentFocusTopic();

  return {
    totalTopics,
    mastered,
    inProgress: state.openedTopics().length,
    locked: state.lockedTopics().length,
    overallProgressPercent: totalTopics ? (mastered / totalTopics) * 100 : 0,
    totalAttempts: state.history.length,
    ...(currentFocus !== undefined ? { currentFocus } : {})
  };
};

export const topicReadiness = (state: LearnerState, topic: string): TopicReadiness => {
  const status = state.statusOf(topic);
  const theta = state.abilityOf(topic);
  const prerequisites = [...state.conceptGraph.prerequisitesOf(topic)];

  let readiness = 0;
  if (status === "mastered") {
    readiness = 100;
  } else if (status === "opened") {
    readiness = 50 + Math.min(50, (theta / state.engineConfig.masteryThreshold) * 50);
  }

  return {
    topic,
    status,
    theta: round(theta),
    readinessScore: round(readiness, 1),
    prerequisitesMet: prerequisites.every(prerequisite => state.statusOf(prerequisite) === "mastered"),
    prerequisites,
    canStart: status !== "locked"
  };
};
