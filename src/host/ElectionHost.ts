import { Signer } from 'ethers';
import {
  BallotEngine,
  BallotState,
  Candidate,
  CandidateResult,
  InvalidConfigurationError,
  isBallotEngineError,
  sameAccount,
} from '../ballot';
import {
  HostAlreadyDeployedError,
  HostNotDeployedError,
  OwnerMismatchError,
} from './errors';
import { CallScope, recoverCaller, signCall, SignedCall } from './signatures';

/**
 * Configuration interface for the ElectionHost
 */
export interface ElectionHostConfig {
  /** Ethers.js Signer of the election owner (Wallet, MetaMask, or any other provider) */
  signer: Signer;
  /** Election name */
  name: string;
  /** Candidate names in ballot order */
  candidates: string[];
  /** Log every call to the console (optional, defaults to false) */
  verbose?: boolean;
  /** Previously persisted state to resume instead of creating a new election (optional) */
  state?: BallotState;
}

/**
 * Outcome of a call executed through the host
 */
export interface HostCallResult {
  /** Account recovered from the call signature */
  caller: string;
  action: SignedCall['action'];
  /** Candidate results, only for tally calls */
  results?: CandidateResult[];
}

/**
 * Host driver for a {@link BallotEngine}.
 *
 * Deploys the engine with the signer's address as owner and authenticates every call by
 * recovering the signer of the call message, so callers never pass their own identity.
 */
export class ElectionHost {
  private signer: Signer;
  private config: ElectionHostConfig;
  private verbose: boolean;
  private engine?: BallotEngine;

  constructor(config: ElectionHostConfig) {
    if (!config.signer) {
      throw new Error('A signer is required to host an election');
    }
    this.signer = config.signer;
    this.config = config;
    this.verbose = config.verbose ?? false;
  }

  /**
   * Create the election (or restore it from `config.state`) owned by the host signer.
   * @throws HostAlreadyDeployedError | OwnerMismatchError | InvalidConfigurationError
   */
  async deploy(): Promise<BallotEngine> {
    if (this.engine) {
      throw new HostAlreadyDeployedError();
    }
    const owner = await this.signer.getAddress();

    let engine: BallotEngine;
    if (this.config.state) {
      engine = BallotEngine.fromState(this.config.state);
      if (!sameAccount(engine.getOwner(), owner)) {
        throw new OwnerMismatchError(owner, engine.getOwner());
      }
      this.requireMatchingConfig(engine);
      this.log(`Restored election "${engine.getElectionName()}" with ${engine.getTotalVotes()} votes`);
    } else {
      engine = new BallotEngine(owner, this.config.name, this.config.candidates);
      this.log(`Deployed election "${engine.getElectionName()}" with ${engine.getCandidateCount()} candidates`);
    }

    if (this.verbose) {
      engine.onCandidateResult(result => {
        console.log(`[ElectionHost] ${result.index}: ${result.name} -> ${result.voteCount}`);
      });
    }

    this.engine = engine;
    return engine;
  }

  isDeployed(): boolean {
    return this.engine !== undefined;
  }

  /**
   * Execute a signed call against the engine as the account that signed it.
   * Engine errors are rethrown unchanged.
   */
  async execute(call: SignedCall): Promise<HostCallResult> {
    const engine = this.requireEngine(call.action);
    const caller = recoverCaller(this.scopeOf(engine), call);

    try {
      switch (call.action) {
        case 'authorize':
          engine.authorize(caller, call.target);
          this.log(`${caller} authorized ${call.target}`);
          return { caller, action: call.action };
        case 'vote':
          engine.vote(caller, call.candidateIndex);
          this.log(`${caller} voted (total ${engine.getTotalVotes()})`);
          return { caller, action: call.action };
        case 'tally':
          return { caller, action: call.action, results: engine.tally(caller) };
      }
    } catch (error) {
      if (this.verbose && isBallotEngineError(error)) {
        console.warn(`[ElectionHost] ${call.action} rejected for ${caller}: ${error.code}`);
      }
      throw error;
    }
  }

  // ─── OWNER SHORTCUTS ───────────────────────────────────────────────

  /**
   * Authorize an account, signed by the host signer
   */
  async authorize(target: string): Promise<void> {
    const engine = this.requireEngine('authorize');
    await this.execute(await signCall(this.signer, this.scopeOf(engine), { action: 'authorize', target }));
  }

  /**
   * Tally the election, signed by the host signer
   */
  async tally(): Promise<CandidateResult[]> {
    const engine = this.requireEngine('tally');
    const { results } = await this.execute(
      await signCall(this.signer, this.scopeOf(engine), { action: 'tally' })
    );
    return results ?? [];
  }

  /**
   * Cast a vote signed by the given voter
   */
  async vote(voter: Signer, candidateIndex: number): Promise<void> {
    const engine = this.requireEngine('vote');
    await this.execute(await signCall(voter, this.scopeOf(engine), { action: 'vote', candidateIndex }));
  }

  // ─── READS ─────────────────────────────────────────────────────────

  getEngine(): BallotEngine {
    return this.requireEngine('getEngine');
  }

  getCandidates(): Candidate[] {
    return this.requireEngine('getCandidates').getCandidates();
  }

  getTotalVotes(): number {
    return this.requireEngine('getTotalVotes').getTotalVotes();
  }

  getElectionName(): string {
    return this.requireEngine('getElectionName').getElectionName();
  }

  getOwner(): string {
    return this.requireEngine('getOwner').getOwner();
  }

  /**
   * Current durable state, for the embedding application to persist
   */
  getState(): BallotState {
    return this.requireEngine('getState').toState();
  }

  /**
   * Election the host's calls are signed for
   */
  getCallScope(): CallScope {
    return this.scopeOf(this.requireEngine('getCallScope'));
  }

  private scopeOf(engine: BallotEngine): CallScope {
    return { electionName: engine.getElectionName(), owner: engine.getOwner() };
  }

  private requireMatchingConfig(engine: BallotEngine): void {
    const restored = engine.getCandidates().map(candidate => candidate.name);
    const configured = this.config.candidates;
    if (engine.getElectionName() !== this.config.name) {
      throw new InvalidConfigurationError(
        `Restored election "${engine.getElectionName()}" does not match configured name "${this.config.name}"`,
        'deploy'
      );
    }
    if (
      restored.length !== configured.length ||
      restored.some((name, index) => name !== configured[index])
    ) {
      throw new InvalidConfigurationError(
        `Restored candidates [${restored.join(', ')}] do not match configured candidates [${configured.join(', ')}]`,
        'deploy'
      );
    }
  }

  private requireEngine(operation: string): BallotEngine {
    if (!this.engine) {
      throw new HostNotDeployedError(operation);
    }
    return this.engine;
  }

  private log(message: string): void {
    if (this.verbose) {
      console.log(`[ElectionHost] ${message}`);
    }
  }
}
