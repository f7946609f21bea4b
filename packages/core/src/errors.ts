export type EngineErrorCode =
  | "configuration"
  | "cyclic-prerequisites"
  | "unknown-item"
  | "ranking"
  | "timeout"
  | "catalog-format"
  | "profile-format";

export class EngineError extends Error {
  public readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EngineError";
    this.code = code;
  }
}

export class ConfigurationError extends EngineError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("configuration", issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export class CyclicPrerequisiteError extends EngineError {
  public readonly cycle: string[];

  constructor(cycle: string[]) {
    super("cyclic-prerequisites", `Prerequisite graph contains a cycle: ${cycle.join(" -> ")}`);
    this.name = "CyclicPrerequisiteError";
    this.cycle = cycle;
  }
}

export class UnknownItemError extends EngineError {
  public readonly itemId: string;

  constructor(itemId: string) {
    super("unknown-item", `Unknown item "${itemId}"`);
    this.name = "UnknownItemError";
    this.itemId = itemId;
  }
}

export class RankingError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ranking", message, options);
    this.name = "RankingError";
  }
}

export class TimeoutError extends EngineError {
  public readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super("timeout", `${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class CatalogFormatError extends EngineError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("catalog-format", issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.name = "CatalogFormatError";
    this.issues = issues;
  }
}

export class ProfileFormatError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("profile-format", message, options);
    this.name = "ProfileFormatError";
  }
}
