/**
 * @fileoverview Types shared by the ballot engine, its roster and its listeners
 */

/**
 * Opaque, externally authenticated identity of a caller.
 */
export type AccountId = string;

/**
 * A candidate and its running tally. Candidates are identified by their index.
 */
export interface Candidate {
  name: string;
  voteCount: number;
}

/**
 * Voting status of a single account.
 */
export interface VoterRecord {
  authorized: boolean;
  hasVoted: boolean;
  /** Unset until the account casts its vote */
  chosenCandidateIndex?: number;
}

/**
 * One line of a tally, emitted per candidate in index order.
 */
export interface CandidateResult {
  index: number;
  name: string;
  voteCount: number;
}

/**
 * Durable state of an election. JSON-safe, so the embedding host can persist it in
 * whatever store it uses.
 */
export interface BallotState {
  owner: AccountId;
  name: string;
  candidates: Candidate[];
  totalVotes: number;
  /** Only accounts that were authorized or have voted */
  voters: Record<AccountId, VoterRecord>;
}

// ─── LISTENER CALLBACKS ────────────────────────────────────────────────────

/**
 * Generic callback type for engine events.
 * @template T - Tuple type representing the event arguments
 */
export type EntityCallback<T extends unknown[]> = (...args: T) => void;

/**
 * Callback for when an account is authorized for the first time.
 * @param voter - The authorized account
 */
export type VoterAuthorizedCallback = EntityCallback<[AccountId]>;

/**
 * Callback for when a vote is recorded.
 * @param voter - The account that voted
 * @param candidateIndex - Index of the chosen candidate
 */
export type VoteCastCallback = EntityCallback<[AccountId, number]>;

/**
 * Callback for each candidate line of a tally.
 * @param result - Candidate name and current vote count
 */
export type CandidateResultCallback = EntityCallback<[CandidateResult]>;

/**
 * Callback for errors thrown by another listener.
 * @param event - Name of the event whose listener failed
 * @param error - The thrown value
 */
export type ListenerErrorCallback = EntityCallback<[string, unknown]>;
