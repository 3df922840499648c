import { config } from 'dotenv';
import { HDNodeWallet, Wallet } from 'ethers';
import chalk from 'chalk';

config();

// ────────────────────────────────────────────────────────────
//   CONFIG / CONSTANTS
// ────────────────────────────────────────────────────────────

// Owner key - use from env or generate random one
export const PRIVATE_KEY = process.env.PRIVATE_KEY || Wallet.createRandom().privateKey;
export const ELECTION_NAME = process.env.ELECTION_NAME || 'Best Language';
export const CANDIDATES = (process.env.CANDIDATES || 'Rust,Go,TypeScript')
  .split(',')
  .map(c => c.trim())
  .filter(Boolean);

const parsedVoters = parseInt(process.env.NUM_VOTERS || '', 10);
export const NUM_VOTERS = isNaN(parsedVoters) || parsedVoters < 1 ? 5 : parsedVoters;

export const VERBOSE = process.env.VERBOSE === 'true';

// ────────────────────────────────────────────────────────────
//   LOGGING HELPERS
// ────────────────────────────────────────────────────────────
export const info = (msg: string) => console.log(chalk.cyan('ℹ'), msg);
export const success = (msg: string) => console.log(chalk.green('✔'), msg);
export const failure = (msg: string) => console.log(chalk.red('✖'), msg);
export const step = (n: number, msg: string) =>
  console.log(chalk.yellow.bold(`\n[Step ${n}]`), chalk.white(msg));

// ────────────────────────────────────────────────────────────
//   VOTERS GENERATOR
// ────────────────────────────────────────────────────────────
export type TestVoter = {
  wallet: HDNodeWallet;
  choice: number;
};

/**
 * Random voters, each picking a candidate in round-robin order
 */
export function generateTestVoters(count: number, candidateCount: number): TestVoter[] {
  return Array.from({ length: count }, (_, i) => ({
    wallet: Wallet.createRandom(),
    choice: i % candidateCount,
  }));
}
