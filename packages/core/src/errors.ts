/**
 * Error taxonomy for the readiness engine. Every error here is a local,
 * synchronous validation failure; none of them is worth retrying.
 */

export class ReadinessError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ReadinessError";
    Error.captureStackTrace(this, new.target);
  }
}

export class DuplicateSkillError extends ReadinessError {
  constructor(public readonly skillId: string) {
    super(`Skill "${skillId}" is already registered`, "DUPLICATE_SKILL", {
      skillId
    });
    this.name = "DuplicateSkillError";
  }
}

export class UnknownSkillError extends ReadinessError {
  constructor(public readonly skillId: string, context?: Record<string, unknown>) {
    super(`Unknown skill "${skillId}"`, "UNKNOWN_SKILL", { skillId, ...context });
    this.name = "UnknownSkillError";
  }
}

export class CycleError extends ReadinessError {
  /**
   * @param path skills involved in the cycle, in traversal order where known
   */
  constructor(message: string, public readonly path: string[]) {
    super(message, "CYCLE_DETECTED", { path });
    this.name = "CycleError";
  }
}

export class InvalidWeightError extends ReadinessError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "INVALID_WEIGHT", context);
    this.name = "InvalidWeightError";
  }
}

export class UnknownRoleError extends ReadinessError {
  constructor(public readonly roleTitle: string) {
    super(`Role "${roleTitle}" not found`, "UNKNOWN_ROLE", { roleTitle });
    this.name = "UnknownRoleError";
  }
}

export class UnknownProfileError extends ReadinessError {
  constructor(public readonly candidateId: string) {
    super(`Profile "${candidateId}" not found`, "UNKNOWN_PROFILE", {
      candidateId
    });
    this.name = "UnknownProfileError";
  }
}

export class ConfigError extends ReadinessError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, "INVALID_CONFIG", { issues });
    this.name = "ConfigError";
  }
}

export class CatalogFormatError extends ReadinessError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "INVALID_CATALOG", context);
    this.name = "CatalogFormatError";
  }
}

export const isReadinessError = (error: unknown): error is ReadinessError =>
  error instanceof ReadinessError;
