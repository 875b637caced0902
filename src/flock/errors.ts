/**
 * Error classes surfaced by the engine.
 *
 * Configuration problems are reported before any frame runs; invariant
 * violations only escape when strict invariants are enabled.
 */

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export class InvariantViolationError extends Error {
  readonly agentId: number;

  constructor(agentId: number, message: string) {
    super(`Agent ${agentId}: ${message}`);
    this.name = "InvariantViolationError";
    this.agentId = agentId;
  }
}

export class SimulationStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SimulationStateError";
  }
}
