import { CyclicPrerequisiteError } from "../errors";
import type { ConceptStatus, PrerequisiteMap } from "./models";

export type StatusMap = Readonly<Record<string, ConceptStatus>>;

export interface MasteryTransition {
  status: Record<string, ConceptStatus>;
  mastered: boolean;
  unlocked: string[];
}

export interface ConceptGraphSnapshot {
  concepts: string[];
  prerequisites: Record<string, string[]>;
  dependents: Record<string, string[]>;
  levels: Record<string, number>;
}

const collectConcepts = (
  prerequisites: PrerequisiteMap,
  order: readonly string[]
): string[] => {
  const seen = new Set<string>();
  const concepts: string[] = [];
  const add = (concept: string) => {
    if (!seen.has(concept)) {
      seen.add(concept);
      concepts.push(concept);
    }
  };

  order.forEach(add);
  Object.keys(prerequisites).forEach(add);
  Object.values(prerequisites).forEach(list => list.forEach(add));
  return concepts;
};

/** Every cycle reachable through prerequisite edges, each as a closed path. */
export const detectCycles = (
  concepts: readonly string[],
  prerequisites: ReadonlyMap<string, readonly string[]>
): string[][] => {
  const visited = new Set<string>();
  const stack = new Set<string>();
  const cycles: string[][] = [];

  const dfs = (node: string, path: string[]) => {
    if (stack.has(node)) {
      cycles.push(path.slice(path.indexOf(node)));
      return;
    }
    if (visited.has(node)) {
      return;
    }

    visited.add(node);
    stack.add(node);
    prerequisites.get(node)?.forEach(next => {
      dfs(next, [...path, next]);
    });
    stack.delete(node);
  };

  concepts.forEach(concept => {
    if (!visited.has(concept)) {
      dfs(concept, [concept]);
    }
  });

  return cycles;
};

/**
 * Static prerequisite DAG plus the locked -> opened -> mastered lifecycle.
 *
 * Status maps are treated as values: transitions return a new map and never
 * move a concept backward or skip `opened`.
 */
export class ConceptGraph {
  private readonly concepts: string[];
  private readonly prerequisites = new Map<string, string[]>();
  private readonly dependents = new Map<string, string[]>();
  private readonly levels = new Map<string, number>();

  constructor(prerequisites: PrerequisiteMap, order: readonly string[] = []) {
    this.concepts = collectConcepts(prerequisites, order);

    this.concepts.forEach(concept => {
      this.prerequisites.set(concept, [...new Set(prerequisites[concept] ?? [])]);
      this.dependents.set(concept, []);
    });
    this.concepts.forEach(concept => {
      this.prerequisites.get(concept)?.forEach(prereq => {
        this.dependents.get(prereq)?.push(concept);
      });
    });

    const cycles = detectCycles(this.concepts, this.prerequisites);
    if (cycles.length > 0) {
      throw new CyclicPrerequisiteError(cycles[0]);
    }
  }

  /** Concepts in canonical order. */
  public get allConcepts(): readonly string[] {
    return this.concepts;
  }

  public has(concept: string): boolean {
    return this.prerequisites.has(concept);
  }

  public prerequisitesOf(concept: string): readonly string[] {
    return this.prerequisites.get(concept) ?? [];
  }

  public allPrerequisitesOf(concept: string): Set<string> {
    const all = new Set<string>();
    const pending = [concept];
    while (pending.length) {
      const current = pending.pop();
      if (current === undefined) {
        break;
      }
      this.prerequisitesOf(current).forEach(prereq => {
        if (!all.has(prereq)) {
          all.add(prereq);
          pending.push(prereq);
        }
      });
    }
    return all;
  }

  public dependentsOf(concept: string): readonly string[] {
    return this.dependents.get(concept) ?? [];
  }

  public statusOf(concept: string, status: StatusMap): ConceptStatus {
    return status[concept] ?? "locked";
  }

  /** True when every direct prerequisite is mastered. */
  public canUnlock(concept: string, status: StatusMap): boolean {
    return this.prerequisitesOf(concept).every(prereq => status[prereq] === "mastered");
  }

  public shouldUnlock(concept: string, status: StatusMap): boolean {
    return this.statusOf(concept, status) === "locked" && this.canUnlock(concept, status);
  }

  public unlockableConcepts(status: StatusMap): string[] {
    return this.concepts.filter(concept => this.shouldUnlock(concept, status));
  }

  public availableConcepts(status: StatusMap): string[] {
    return this.concepts.filter(concept => {
      const current = this.statusOf(concept, status);
      return current === "opened" || current === "mastered";
    });
  }

  public conceptsWithStatus(target: ConceptStatus, status: StatusMap): string[] {
    return this.concepts.filter(concept => this.statusOf(concept, status) === target);
  }

  /** First opened concept, else first unlockable one, else undefined. */
  public nextConceptToLearn(status: StatusMap): string | undefined {
    return (
      this.concepts.find(concept => status[concept] === "opened") ??
      this.unlockableConcepts(status)[0]
    );
  }

  /** Longest path from a concept without prerequisites; display only. */
  public conceptLevel(concept: string): number {
    const cached = this.levels.get(concept);
    if (cached !== undefined) {
      return cached;
    }
    const prereqs = this.prerequisitesOf(concept);
    const level =
      prereqs.length === 0
        ? 0
        : Math.max(...prereqs.map(prereq => this.conceptLevel(prereq))) + 1;
    this.levels.set(concept, level);
    return level;
  }

  /** Status map for a fresh learner: roots opened, everything else locked. */
  public initialStatus(): Record<string, ConceptStatus> {
    const status: Record<string, ConceptStatus> = {};
    this.concepts.forEach(concept => {
      status[concept] = this.prerequisitesOf(concept).length === 0 ? "opened" : "locked";
    });
    return status;
  }

  public open(concept: string, status: StatusMap): Record<string, ConceptStatus> {
    if (!this.shouldUnlock(concept, status)) {
      return { ...status };
    }
    return { ...status, [concept]: "opened" };
  }

  /**
   * opened -> mastered, then opens each direct dependent whose prerequisites
   * are now all mastered. Deeper dependents wait for their own mastery.
   */
  public master(concept: string, status: StatusMap): MasteryTransition {
    if (this.statusOf(concept, status) !== "opened") {
      return { status: { ...status }, mastered: false, unlocked: [] };
    }

    const next: Record<string, ConceptStatus> = { ...status, [concept]: "mastered" };
    const unlocked: string[] = [];
    this.dependentsOf(concept).forEach(dependent => {
      if (this.shouldUnlock(dependent, next)) {
        next[dependent] = "opened";
        unlocked.push(dependent);
      }
    });

    return { status: next, mastered: true, unlocked };
  }

  public toSnapshot(): ConceptGraphSnapshot {
    const prerequisites: Record<string, string[]> = {};
    const dependents: Record<string, string[]> = {};
    const levels: Record<string, number> = {};
    this.concepts.forEach(concept => {
      prerequisites[concept] = [...this.prerequisitesOf(concept)];
      dependents[concept] = [...this.dependentsOf(concept)];
      levels[concept] = this.conceptLevel(concept);
    });
    return { concepts: [...this.concepts], prerequisites, dependents, levels };
  }
}
