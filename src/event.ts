/**
 * Event construction, id derivation and the wire codec
 *
 * Wire form is one UTF-8 JSON object per frame:
 *   {"v":1,"id":"…","kind":"…","target":"…","timestamp":0,"nonce":"…","payload":"…"}
 * with byte fields hex-encoded. decodeEvent() is the ingestion gate: anything
 * it rejects never reaches the relay state machine.
 */

import { Crypto, NONCE_LENGTH } from './crypto.js';
import { MalformedEventError } from './errors.js';
import { EVENT_KINDS } from './relay-types.js';
import type { EventKind, RelayEvent } from './relay-types.js';

export const WIRE_VERSION = 1;
export const DEFAULT_MAX_PAYLOAD_BYTES = 64 * 1024;
export const MAX_CHANNEL_NAME_LENGTH = 64;

const CHANNEL_NAME_PATTERN = /^[^\s,\x00-\x1f\x7f]+$/u;
const PUBLIC_KEY_PATTERN = /^[0-9a-f]{64}$/;

export interface EventIdFields {
  readonly kind: EventKind;
  readonly target: string;
  readonly timestamp: number;
  readonly nonce: string;
  readonly payload: Uint8Array;
}

export interface EventDraft {
  readonly kind: EventKind;
  readonly target: string;
  readonly payload: Uint8Array;
  /** Defaults to Date.now() */
  readonly timestamp?: number;
  /** Defaults to 24 fresh random bytes */
  readonly nonce?: Uint8Array;
}

export interface DecodeOptions {
  readonly maxPayloadBytes?: number;
}

export function isEventKind(value: unknown): value is EventKind {
  return EVENT_KINDS.some(kind => kind === value);
}

export function isValidChannelName(name: unknown): name is string {
  return typeof name === 'string'
    && name.length > 0
    && name.length <= MAX_CHANNEL_NAME_LENGTH
    && CHANNEL_NAME_PATTERN.test(name);
}

/**
 * Lowercase hex X25519 public key
 */
export function isValidPublicKeyHex(value: unknown): value is string {
  return typeof value === 'string' && PUBLIC_KEY_PATTERN.test(value);
}

export function buildEventIdPayload(fields: EventIdFields): Record<string, unknown> {
  return {
    kind: fields.kind,
    target: fields.target,
    timestamp: fields.timestamp,
    nonce: fields.nonce.toLowerCase(),
    payload: Crypto.toHex(fields.payload)
  };
}

/**
 * Content-derived id. `originPeer` is transport state and never hashed.
 */
export function computeEventId(fields: EventIdFields): string {
  return Crypto.hashObject(buildEventIdPayload(fields));
}

function targetProblem(kind: EventKind, target: unknown): string | null {
  if (kind === 'private-message') {
    return isValidPublicKeyHex(target) ? null : 'private-message target must be a 64-char lowercase hex public key';
  }
  return isValidChannelName(target) ? null : `${kind} target is not a valid channel name`;
}

function freezeEvent(kind: EventKind, fields: Omit<RelayEvent, 'kind'>): RelayEvent {
  return Object.freeze({ kind, ...fields });
}

/**
 * Build a new event, deriving its id
 *
 * @throws MalformedEventError when the target does not suit the kind
 */
export function createEvent(draft: EventDraft): RelayEvent {
  const problem = targetProblem(draft.kind, draft.target);
  if (problem) {
    throw new MalformedEventError(problem);
  }

  const nonceBytes = draft.nonce ?? Crypto.randomBytes(NONCE_LENGTH);
  if (nonceBytes.length !== NONCE_LENGTH) {
    throw new MalformedEventError(`nonce must be ${NONCE_LENGTH} bytes`);
  }

  const timestamp = draft.timestamp ?? Date.now();
  const nonce = Crypto.toHex(nonceBytes);
  const payload = new Uint8Array(draft.payload);
  const id = computeEventId({ kind: draft.kind, target: draft.target, timestamp, nonce, payload });

  return freezeEvent(draft.kind, { id, target: draft.target, timestamp, nonce, payload });
}

export function encodeEvent(event: RelayEvent): Uint8Array {
  const wire = {
    v: WIRE_VERSION,
    id: event.id,
    kind: event.kind,
    target: event.target,
    timestamp: event.timestamp,
    nonce: event.nonce,
    payload: Crypto.toHex(event.payload)
  };
  return new TextEncoder().encode(JSON.stringify(wire));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse and validate a wire frame
 *
 * @throws MalformedEventError for anything that is not a well-formed event
 *   whose id matches its content
 */
export function decodeEvent(frame: Uint8Array, options: DecodeOptions = {}): RelayEvent {
  const maxPayloadBytes = options.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES;

  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(frame);
  } catch (error) {
    throw new MalformedEventError('frame is not valid UTF-8', { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new MalformedEventError('frame is not valid JSON', { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new MalformedEventError('frame is not a JSON object');
  }

  const { v, id, kind, target, timestamp, nonce, payload } = parsed;

  if (v !== WIRE_VERSION) {
    throw new MalformedEventError(`unsupported wire version ${String(v)}`);
  }
  if (!isEventKind(kind)) {
    throw new MalformedEventError(`unknown kind ${String(kind)}`);
  }
  const problem = targetProblem(kind, target);
  if (problem || typeof target !== 'string') {
    throw new MalformedEventError(problem ?? 'missing target');
  }
  if (typeof timestamp !== 'number' || !Number.isSafeInteger(timestamp) || timestamp < 0) {
    throw new MalformedEventError('timestamp must be a non-negative integer');
  }
  if (!Crypto.isHex(nonce, NONCE_LENGTH)) {
    throw new MalformedEventError(`nonce must be ${NONCE_LENGTH} bytes of hex`);
  }
  if (!Crypto.isHex(payload)) {
    throw new MalformedEventError('payload must be hex');
  }
  if (payload.length / 2 > maxPayloadBytes) {
    throw new MalformedEventError(`payload exceeds ${maxPayloadBytes} bytes`);
  }
  if (!Crypto.isHex(id, 32)) {
    throw new MalformedEventError('id must be 32 bytes of hex');
  }

  const payloadBytes = Crypto.fromHex(payload);
  const normalizedNonce = nonce.toLowerCase();
  const expectedId = computeEventId({ kind, target, timestamp, nonce: normalizedNonce, payload: payloadBytes });
  if (expectedId !== id.toLowerCase()) {
    throw new MalformedEventError(`id ${id.slice(0, 8)} does not match content`);
  }

  return freezeEvent(kind, {
    id: expectedId,
    target,
    timestamp,
    nonce: normalizedNonce,
    payload: payloadBytes
  });
}

export function encodeText(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function decodeText(bytes: Uint8Array): string {
  return new TextDecoder().decode(bytes);
}
