import { DEFAULT_ENGINE_CONFIG } from "../config/constants";
import type { ConceptGraph } from "./conceptGraph";
import type { LearnerProfile } from "./models";

export const DEFAULT_LEARNER_ID = "default-learner";

export interface CreateProfileOptions {
  learnerId?: string;
  initialTheta?: number;
}

/** Fully initialised profile for a learner who has not answered anything yet. */
export const createDefaultProfile = (
  graph: ConceptGraph,
  options: CreateProfileOptions = {}
): LearnerProfile => {
  const initialTheta = options.initialTheta ?? DEFAULT_ENGINE_CONFIG.initialTheta;
  const abilities: Record<string, number> = {};
  graph.allConcepts.forEach(concept => {
    abilities[concept] = initialTheta;
  });

  return {
    learnerId: options.learnerId ?? DEFAULT_LEARNER_ID,
    abilities,
    conceptStatus: graph.initialStatus(),
    history: []
  };
};

export const cloneProfile = (profile: LearnerProfile): LearnerProfile => ({
  learnerId: profile.learnerId,
  abilities: { ...profile.abilities },
  conceptStatus: { ...profile.conceptStatus },
  history: [...profile.history]
});
