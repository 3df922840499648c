/**
 * @fileoverview Errors raised by the election host, as opposed to the engine it drives
 */

/**
 * Abstract base class for host errors, carrying the operation that failed.
 */
export abstract class ElectionHostError extends Error {
  constructor(
    message: string,
    public readonly operation: string
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Thrown when a call arrives before {@link ElectionHost.deploy} has run.
 */
export class HostNotDeployedError extends ElectionHostError {
  constructor(operation: string) {
    super('Election has not been deployed yet. Call deploy() first.', operation);
  }
}

/**
 * Thrown when {@link ElectionHost.deploy} runs a second time.
 */
export class HostAlreadyDeployedError extends ElectionHostError {
  constructor() {
    super('Election is already deployed', 'deploy');
  }
}

/**
 * Thrown when a restored election belongs to a different owner than the host's signer.
 */
export class OwnerMismatchError extends ElectionHostError {
  constructor(expected: string, actual: string) {
    super(`Restored election is owned by ${actual}, but the host signer is ${expected}`, 'deploy');
  }
}

/**
 * Thrown when a call signature is malformed.
 */
export class InvalidSignatureError extends ElectionHostError {}
