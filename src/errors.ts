/**
 * Error taxonomy for the relay core
 *
 * None of these are fatal to the node. MalformedEvent and PeerSendFailed are
 * logged and counted; DecryptFailed is returned, never thrown. A duplicate
 * event is a normal outcome of flood routing and has no error type.
 */

export type RelayErrorCode =
  | 'MALFORMED_EVENT'
  | 'DECRYPT_FAILED'
  | 'PEER_SEND_FAILED'
  | 'CONFIG_INVALID';

export abstract class RelayError extends Error {
  abstract readonly code: RelayErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Frame could not be parsed into a well-formed event
 */
export class MalformedEventError extends RelayError {
  readonly code = 'MALFORMED_EVENT';

  constructor(readonly reason: string, options?: { cause?: unknown }) {
    super(`Malformed event: ${reason}`, options);
  }
}

/**
 * Wrong key, truncated ciphertext or tampered bytes
 */
export class DecryptFailedError extends RelayError {
  readonly code = 'DECRYPT_FAILED';

  constructor(readonly reason: string, options?: { cause?: unknown }) {
    super(`Decryption failed: ${reason}`, options);
  }
}

export class PeerSendFailedError extends RelayError {
  readonly code = 'PEER_SEND_FAILED';

  constructor(readonly peerId: string, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Send to peer ${peerId} failed${detail}`, options);
  }
}

export class ConfigError extends RelayError {
  readonly code = 'CONFIG_INVALID';

  constructor(readonly variable: string, message: string) {
    super(`${variable}: ${message}`);
  }
}
