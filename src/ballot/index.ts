export * from './types';
export * from './errors';
export * from './accounts';
export { VoterRoster } from './VoterRoster';
export { BallotEngine } from './BallotEngine';
