/**
 * @module ballot-engine-sdk
 *
 * Single-owner ballot engine and a host driver that authenticates callers with ethers signatures.
 *
 * @example
 * ```typescript
 * import { Wallet } from 'ethers';
 * import { ElectionHost } from 'ballot-engine-sdk';
 *
 * const host = new ElectionHost({ signer: owner, name: 'Best Language', candidates: ['Rust', 'Go'] });
 * await host.deploy();
 * await host.authorize(alice.address);
 * await host.vote(alice, 1);
 * console.log(await host.tally());
 * ```
 */
export * from './ballot';
export * from './host';
