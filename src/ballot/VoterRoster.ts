import { normalizeAccount } from './accounts';
import { AccountId, VoterRecord } from './types';

/**
 * Mapping from account to voting status. Accounts that were never touched behave as an
 * unauthorized, unvoted record; only authorized or voted accounts are stored.
 */
export class VoterRoster {
  private _records: Map<AccountId, VoterRecord> = new Map();

  /**
   * Get the record for an account, or the default record if it has none
   * @param account - Account identifier
   */
  get(account: AccountId): VoterRecord {
    const record = this._records.get(normalizeAccount(account));
    return record ? { ...record } : VoterRoster.defaultRecord();
  }

  /**
   * Mark an account as authorized
   * @returns true if the account was not authorized before
   */
  authorize(account: AccountId): boolean {
    const key = normalizeAccount(account);
    const record = this._records.get(key);
    if (record?.authorized) {
      return false;
    }
    this._records.set(key, { ...(record ?? VoterRoster.defaultRecord()), authorized: true });
    return true;
  }

  /**
   * Record the vote of an account. Callers check eligibility first.
   */
  markVoted(account: AccountId, candidateIndex: number): void {
    const key = normalizeAccount(account);
    const record = this._records.get(key) ?? VoterRoster.defaultRecord();
    this._records.set(key, { ...record, hasVoted: true, chosenCandidateIndex: candidateIndex });
  }

  /**
   * Number of accounts that have voted
   */
  get votedCount(): number {
    let count = 0;
    for (const record of this._records.values()) {
      if (record.hasVoted) count++;
    }
    return count;
  }

  /**
   * Number of stored (authorized or voted) accounts
   */
  get size(): number {
    return this._records.size;
  }

  /**
   * Get stored records as a plain object (for persistence)
   */
  toJSON(): Record<AccountId, VoterRecord> {
    const out: Record<AccountId, VoterRecord> = {};
    for (const [account, record] of this._records) {
      // defineProperty keeps ids such as "__proto__" as own keys
      Object.defineProperty(out, account, {
        value: { ...record },
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return out;
  }

  /**
   * Rebuild a roster from stored records. Records are copied as given; the engine
   * validates them against the candidate list.
   */
  static fromJSON(records: Record<AccountId, VoterRecord>): VoterRoster {
    const roster = new VoterRoster();
    for (const [account, record] of Object.entries(records)) {
      roster._records.set(normalizeAccount(account), { ...record });
    }
    return roster;
  }

  static defaultRecord(): VoterRecord {
    return { authorized: false, hasVoted: false };
  }
}
