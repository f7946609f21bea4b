import { CLOSEST_DIFFICULTY_EXPLANATION } from "../../config/constants";
import { RankingError } from "../../errors";
import type { RankingCandidate, RankingProvider, RankingRequest, RankingResponse } from "./types";

export const closestDifficulty = <T extends Pick<RankingCandidate, "difficulty">>(
  candidates: readonly T[],
  ability: number
): T | undefined =>
  candidates.reduce<T | undefined>((best, candidate) => {
    if (!best) {
      return candidate;
    }
    return Math.abs(candidate.difficulty - ability) < Math.abs(best.difficulty - ability)
      ? candidate
      : best;
  }, undefined);

export class ClosestDifficultyRanker implements RankingProvider {
  public readonly id = "closest";
  public readonly title = "Closest difficulty";

  public async rank({ candidates, ability }: RankingRequest): Promise<RankingResponse> {
    const best = closestDifficulty(candidates, ability);
    if (!best) {
      throw new RankingError("No candidates to rank");
    }
    return { selectedId: best.id, explanation: CLOSEST_DIFFICULTY_EXPLANATION };
  }
}
