import type { RankingCandidate } from "./types";

/**
 * Maps a collaborator's answer back onto a candidate: exact id, exact name,
 * then a case-insensitive substring match between the answer and a name in
 * either direction; otherwise the first candidate.
 */
export const resolveCandidate = <T extends Pick<RankingCandidate, "id" | "name">>(
  selected: string,
  candidates: readonly T[]
): T | undefined => {
  const exact =
    candidates.find(candidate => candidate.id === selected) ??
    candidates.find(candidate => candidate.name === selected);
  if (exact) {
    return exact;
  }

  const needle = selected.trim().toLowerCase();
  if (needle) {
    const partial = candidates.find(candidate => {
      const name = candidate.name.toLowerCase();
      return name !== "" && (name.includes(needle) || needle.includes(name));
    });
    if (partial) {
      return partial;
    }
  }

  return candidates[0];
};
