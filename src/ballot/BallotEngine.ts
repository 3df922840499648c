import { isValidAccount, normalizeAccount } from './accounts';
import {
  AlreadyVotedError,
  InvalidCandidateError,
  InvalidConfigurationError,
  NotAuthorizedError,
  UnauthorizedError,
} from './errors';
import {
  AccountId,
  BallotState,
  Candidate,
  CandidateResult,
  CandidateResultCallback,
  EntityCallback,
  ListenerErrorCallback,
  VoteCastCallback,
  VoterAuthorizedCallback,
  VoterRecord,
} from './types';
import { VoterRoster } from './VoterRoster';

/**
 * Single-owner ballot state machine.
 *
 * The owner authorizes accounts, each authorized account casts exactly one vote, and
 * anyone can read the running tally. Every operation validates all of its preconditions
 * before touching state, so a rejected call leaves the election exactly as it was.
 *
 * @example
 * ```typescript
 * const engine = new BallotEngine(owner, 'Best Language', ['Rust', 'Go']);
 * engine.authorize(owner, alice);
 * engine.vote(alice, 1);
 * engine.getCandidates(); // [{ name: 'Rust', voteCount: 0 }, { name: 'Go', voteCount: 1 }]
 * ```
 */
export class BallotEngine {
  private readonly _owner: AccountId;
  private readonly _name: string;
  private readonly _candidates: Candidate[];
  private _totalVotes: number = 0;
  private _voters: VoterRoster = new VoterRoster();

  private voterAuthorizedListeners: VoterAuthorizedCallback[] = [];
  private voteCastListeners: VoteCastCallback[] = [];
  private candidateResultListeners: CandidateResultCallback[] = [];
  private listenerErrorListeners: ListenerErrorCallback[] = [];

  /**
   * Create an election
   * @param owner - The constructing account, the only one allowed to authorize and tally
   * @param name - Election name
   * @param candidateNames - Candidate names in ballot order
   * @throws InvalidConfigurationError if the owner is empty, the list is empty or a name is empty
   */
  constructor(owner: AccountId, name: string, candidateNames: string[]) {
    if (!isValidAccount(owner)) {
      throw new InvalidConfigurationError('Owner must be a non-empty account identifier', 'construct');
    }
    if (typeof name !== 'string') {
      throw new InvalidConfigurationError('Election name must be text', 'construct');
    }
    if (!Array.isArray(candidateNames) || candidateNames.length === 0) {
      throw new InvalidConfigurationError('At least one candidate is required', 'construct');
    }
    candidateNames.forEach((candidate, index) => {
      if (typeof candidate !== 'string' || candidate.trim().length === 0) {
        throw new InvalidConfigurationError(
          `Candidate name at index ${index} must be non-empty text`,
          'construct'
        );
      }
    });

    this._owner = normalizeAccount(owner);
    this._name = name;
    this._candidates = candidateNames.map(candidate => ({ name: candidate, voteCount: 0 }));
  }

  // ─── ADMINISTRATION ────────────────────────────────────────────────

  /**
   * Grant an account the right to vote. Granting twice is a no-op.
   * @param caller - Account making the call, must be the owner
   * @param target - Account to authorize
   * @throws UnauthorizedError if the caller is not the owner
   */
  authorize(caller: AccountId, target: AccountId): void {
    this.requireOwner(caller, 'authorize');
    if (!isValidAccount(target)) {
      throw new InvalidConfigurationError('Target must be a non-empty account identifier', 'authorize');
    }

    const granted = this._voters.authorize(target);
    if (granted) {
      const voter = normalizeAccount(target);
      this.notify('VoterAuthorized', this.voterAuthorizedListeners, voter);
    }
  }

  // ─── VOTING ────────────────────────────────────────────────────────

  /**
   * Cast the caller's single vote.
   *
   * Checks run in a fixed order and the first failure is reported: already voted,
   * then not authorized, then candidate out of range.
   *
   * @param caller - Voting account
   * @param candidateIndex - Index into {@link getCandidates}
   * @throws AlreadyVotedError | NotAuthorizedError | InvalidCandidateError
   */
  vote(caller: AccountId, candidateIndex: number): void {
    const record = this._voters.get(caller);
    if (record.hasVoted) {
      throw new AlreadyVotedError(normalizeAccount(caller));
    }
    if (!record.authorized) {
      throw new NotAuthorizedError(normalizeAccount(caller));
    }
    if (!this.isValidCandidateIndex(candidateIndex)) {
      throw new InvalidCandidateError(candidateIndex, this._candidates.length);
    }

    this._voters.markVoted(caller, candidateIndex);
    this._candidates[candidateIndex].voteCount += 1;
    this._totalVotes += 1;

    const voter = normalizeAccount(caller);
    this.notify('VoteCast', this.voteCastListeners, voter, candidateIndex);
  }

  // ─── RESULTS ───────────────────────────────────────────────────────

  /**
   * Read out every candidate's count in index order, notifying result listeners once
   * per candidate. Does not close the election: votes are still accepted afterwards.
   * @param caller - Account making the call, must be the owner
   * @throws UnauthorizedError if the caller is not the owner
   */
  tally(caller: AccountId): CandidateResult[] {
    this.requireOwner(caller, 'tally');

    const results = this._candidates.map((candidate, index) => ({
      index,
      name: candidate.name,
      voteCount: candidate.voteCount,
    }));
    for (const result of results) {
      this.notify('CandidateResult', this.candidateResultListeners, { ...result });
    }
    return results;
  }

  /**
   * Alias of {@link tally}. Kept under the name hosts commonly wire to an "end" button;
   * it reads results and does not stop voting.
   */
  endElection(caller: AccountId): CandidateResult[] {
    return this.tally(caller);
  }

  // ─── READS ─────────────────────────────────────────────────────────

  getCandidates(): Candidate[] {
    return this._candidates.map(candidate => ({ ...candidate }));
  }

  getCandidateCount(): number {
    return this._candidates.length;
  }

  getElectionName(): string {
    return this._name;
  }

  getTotalVotes(): number {
    return this._totalVotes;
  }

  getOwner(): AccountId {
    return this._owner;
  }

  /**
   * Voting status of an account (the default record if it was never authorized)
   */
  getVoter(account: AccountId): VoterRecord {
    return this._voters.get(account);
  }

  // ─── EVENTS ────────────────────────────────────────────────────────

  onVoterAuthorized(cb: VoterAuthorizedCallback): void {
    this.voterAuthorizedListeners.push(cb);
  }

  onVoteCast(cb: VoteCastCallback): void {
    this.voteCastListeners.push(cb);
  }

  onCandidateResult(cb: CandidateResultCallback): void {
    this.candidateResultListeners.push(cb);
  }

  /**
   * Receive errors thrown by other listeners. Without one, they are logged to the console.
   */
  onListenerError(cb: ListenerErrorCallback): void {
    this.listenerErrorListeners.push(cb);
  }

  removeAllListeners(): void {
    this.voterAuthorizedListeners = [];
    this.voteCastListeners = [];
    this.candidateResultListeners = [];
    this.listenerErrorListeners = [];
  }

  /**
   * Runs listeners for a committed call. A failing listener never fails the call itself.
   */
  private notify<Args extends unknown[]>(
    event: string,
    listeners: EntityCallback<Args>[],
    ...args: Args
  ): void {
    for (const cb of listeners) {
      try {
        cb(...args);
      } catch (error) {
        this.reportListenerError(event, error);
      }
    }
  }

  private reportListenerError(event: string, error: unknown): void {
    if (this.listenerErrorListeners.length === 0) {
      console.error(`Error in ${event} listener:`, error);
      return;
    }
    for (const cb of this.listenerErrorListeners) {
      try {
        cb(event, error);
      } catch (nested) {
        console.error(`Error in listener error handler for ${event}:`, nested);
      }
    }
  }

  // ─── PERSISTENCE ───────────────────────────────────────────────────

  /**
   * Snapshot of the durable state
   */
  toState(): BallotState {
    return {
      owner: this._owner,
      name: this._name,
      candidates: this.getCandidates(),
      totalVotes: this._totalVotes,
      voters: this._voters.toJSON(),
    };
  }

  /**
   * Restore an election from a snapshot produced by {@link toState}.
   * @throws InvalidConfigurationError if the snapshot is not a consistent election
   */
  static fromState(state: BallotState): BallotEngine {
    const engine = new BallotEngine(
      state.owner,
      state.name,
      state.candidates.map(candidate => candidate.name)
    );

    const fail = (message: string): never => {
      throw new InvalidConfigurationError(message, 'restore');
    };

    const counts = state.candidates.map(candidate => candidate.voteCount);
    if (counts.some(count => !Number.isInteger(count) || count < 0)) {
      fail('Candidate vote counts must be non-negative integers');
    }

    if (typeof state.voters !== 'object' || state.voters === null || Array.isArray(state.voters)) {
      fail('Voter records must be an object keyed by account');
    }

    const chosen = new Array<number>(counts.length).fill(0);
    for (const [account, record] of Object.entries(state.voters)) {
      if (typeof record !== 'object' || record === null) {
        fail(`Voter ${account} has no record`);
      }
      if (typeof record.authorized !== 'boolean' || typeof record.hasVoted !== 'boolean') {
        fail(`Voter ${account} must have boolean authorized and hasVoted flags`);
      }
      if (!record.authorized && !record.hasVoted) {
        fail(`Voter ${account} is stored with the default record`);
      }
      if (!record.hasVoted) {
        if (record.chosenCandidateIndex !== undefined) {
          fail(`Voter ${account} has a chosen candidate but has not voted`);
        }
        continue;
      }
      if (!record.authorized) {
        fail(`Voter ${account} voted without authorization`);
      }
      const index = record.chosenCandidateIndex;
      if (index === undefined || !engine.isValidCandidateIndex(index)) {
        fail(`Voter ${account} has an invalid chosen candidate`);
      } else {
        chosen[index] += 1;
      }
    }

    const roster = VoterRoster.fromJSON(state.voters);
    if (roster.size !== Object.keys(state.voters).length) {
      fail('Voter records contain the same account more than once');
    }

    const sum = counts.reduce((a, b) => a + b, 0);
    if (
      state.totalVotes !== sum ||
      state.totalVotes !== roster.votedCount ||
      counts.some((count, index) => count !== chosen[index])
    ) {
      fail('Vote totals do not match the voter records');
    }

    counts.forEach((count, index) => {
      engine._candidates[index].voteCount = count;
    });
    engine._totalVotes = state.totalVotes;
    engine._voters = roster;
    return engine;
  }

  // ─── GUARDS ────────────────────────────────────────────────────────

  private requireOwner(caller: AccountId, operation: string): void {
    if (!isValidAccount(caller) || normalizeAccount(caller) !== this._owner) {
      throw new UnauthorizedError(caller, operation);
    }
  }

  private isValidCandidateIndex(candidateIndex: number): boolean {
    return (
      Number.isInteger(candidateIndex) &&
      candidateIndex >= 0 &&
      candidateIndex < this._candidates.length
    );
  }
}
