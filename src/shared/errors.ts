// ── Error taxonomy ───────────────────────────────────────────

export type GameErrorCode = "invalid_configuration" | "unsolvable_layout" | "contract_violation";

export abstract class GameError extends Error {
  abstract readonly code: GameErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Hazard/item counts or dimensions that cannot produce a run. */
export class InvalidConfigurationError extends GameError {
  readonly code = "invalid_configuration";

  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
  }
}

/** Every generation attempt left the exit walled off. */
export class UnsolvableLayoutError extends GameError {
  readonly code = "unsolvable_layout";

  constructor(readonly attempts: number) {
    super(`Unable to create a solvable layout after ${attempts} attempts`);
  }
}

/**
 * A broken driver loop: stepping a finished run, or passing something that
 * is not a direction. Never raised for bad player input.
 */
export class ContractViolationError extends GameError {
  readonly code = "contract_violation";
}
