import { Signer, verifyMessage } from 'ethers';
import { normalizeAccount } from '../ballot';
import { InvalidSignatureError } from './errors';

/**
 * An engine call before it is signed.
 */
export type UnsignedCall =
  | { action: 'authorize'; target: string }
  | { action: 'vote'; candidateIndex: number }
  | { action: 'tally' };

/**
 * An engine call together with the caller's signature over {@link createCallMessage}.
 */
export type SignedCall = UnsignedCall & { signature: string };

/**
 * The election a call is signed for.
 */
export interface CallScope {
  electionName: string;
  /** Owner account of the election */
  owner: string;
}

/**
 * Creates the message a caller signs for a call.
 * @param scope - Election the call targets
 * @param call - The call to describe
 * @returns The message string to be signed
 */
export function createCallMessage(scope: CallScope, call: UnsignedCall): string {
  const election = `the election "${scope.electionName}" owned by ${normalizeAccount(scope.owner)}`;
  switch (call.action) {
    case 'authorize':
      return `I am authorizing ${normalizeAccount(call.target)} to vote in ${election}`;
    case 'vote':
      return `I am casting my vote for candidate ${call.candidateIndex} in ${election}`;
    case 'tally':
      return `I am requesting the tally of ${election}`;
  }
}

/**
 * Signs a call with the provided signer.
 * @param signer - The signer (Wallet or Signer) to sign with
 * @param scope - Election the call targets
 * @param call - The call to sign
 */
export async function signCall<C extends UnsignedCall>(
  signer: Signer,
  scope: CallScope,
  call: C
): Promise<C & { signature: string }> {
  const signature = await signer.signMessage(createCallMessage(scope, call));
  return { ...call, signature };
}

/**
 * Recovers the account that signed a call.
 * @throws InvalidSignatureError if the signature cannot be decoded
 */
export function recoverCaller(scope: CallScope, call: SignedCall): string {
  try {
    return verifyMessage(createCallMessage(scope, call), call.signature);
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new InvalidSignatureError(`Could not recover ${call.action} caller: ${reason}`, call.action);
  }
}
