/**
 * @fileoverview Error classes for ballot engine operations
 *
 * Every precondition failure in the engine surfaces as one of these classes. All of them
 * extend {@link BallotEngineError}, carry the operation that rejected the call and a stable
 * {@link BallotErrorCode} a client can branch on.
 */

/**
 * Stable identifiers for each kind of engine failure.
 */
export enum BallotErrorCode {
  InvalidConfiguration = 'InvalidConfiguration',
  Unauthorized = 'Unauthorized',
  NotAuthorized = 'NotAuthorized',
  AlreadyVoted = 'AlreadyVoted',
  InvalidCandidate = 'InvalidCandidate',
}

/**
 * Abstract base class for all ballot engine errors.
 */
export abstract class BallotEngineError extends Error {
  abstract readonly code: BallotErrorCode;

  /**
   * @param message - The error message describing what went wrong
   * @param operation - The engine operation that rejected the call
   */
  constructor(
    message: string,
    public readonly operation: string
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

// ─── CONSTRUCTION ERRORS ───────────────────────────────────────────────────

/**
 * Thrown when the election is constructed (or restored) from invalid arguments.
 */
export class InvalidConfigurationError extends BallotEngineError {
  readonly code = BallotErrorCode.InvalidConfiguration;
}

// ─── ACCESS ERRORS ─────────────────────────────────────────────────────────

/**
 * Thrown when an owner-only operation is called by another account.
 */
export class UnauthorizedError extends BallotEngineError {
  readonly code = BallotErrorCode.Unauthorized;

  constructor(
    public readonly caller: string,
    operation: string
  ) {
    super(`Account ${caller} is not the election owner`, operation);
  }
}

/**
 * Thrown when an account that was never authorized attempts to vote.
 */
export class NotAuthorizedError extends BallotEngineError {
  readonly code = BallotErrorCode.NotAuthorized;

  constructor(
    public readonly voter: string,
    operation: string = 'vote'
  ) {
    super(`Account ${voter} is not authorized to vote`, operation);
  }
}

// ─── VOTING ERRORS ─────────────────────────────────────────────────────────

/**
 * Thrown when an account attempts a second vote.
 */
export class AlreadyVotedError extends BallotEngineError {
  readonly code = BallotErrorCode.AlreadyVoted;

  constructor(
    public readonly voter: string,
    operation: string = 'vote'
  ) {
    super(`Account ${voter} has already voted`, operation);
  }
}

/**
 * Thrown when a vote names a candidate index outside the candidate list.
 */
export class InvalidCandidateError extends BallotEngineError {
  readonly code = BallotErrorCode.InvalidCandidate;

  constructor(
    public readonly candidateIndex: number,
    public readonly candidateCount: number,
    operation: string = 'vote'
  ) {
    super(
      `Candidate index ${candidateIndex} is out of range (expected 0 to ${candidateCount - 1})`,
      operation
    );
  }
}

/**
 * Type guard for errors raised by the ballot engine.
 */
export function isBallotEngineError(error: unknown): error is BallotEngineError {
  return error instanceof BallotEngineError;
}
