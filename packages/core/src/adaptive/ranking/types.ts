import type { RecentPerformance } from "../../domain/models";

export interface RankingCandidate {
  id: string;
  name: string;
  difficulty: number;
  description: string;
}

export interface RankingRequest {
  ability: number;
  topic: string;
  recentPerformance: RecentPerformance;
  candidates: RankingCandidate[];
}

export interface RankingResponse {
  selectedId: string;
  explanation: string;
}

/**
 * Chooses one of a handful of shortlisted items. Implementations may be
 * remote; callers bound them with a timeout and fall back locally on failure.
 */
export interface RankingProvider {
  readonly id: string;
  readonly title: string;
  rank(request: RankingRequest, signal?: AbortSignal): Promise<RankingResponse>;
}
