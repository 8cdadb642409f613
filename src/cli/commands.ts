/**
 * Console commands for the daemon's stdin
 *
 *   /join <channel> [passphrase]
 *   /part <channel>
 *   /say <channel> <text>
 *   /msg <public-key> <text>
 *   /stats
 */

import { Crypto } from '../crypto.js';
import type { RelayEngine } from '../relay/relay-engine.js';
import { decodeText } from '../event.js';
import type { LocalDelivery, RelayOutcome } from '../relay-types.js';

export type ConsoleCommand =
  | { readonly type: 'join'; readonly channel: string; readonly passphrase?: string }
  | { readonly type: 'part'; readonly channel: string }
  | { readonly type: 'say'; readonly channel: string; readonly text: string }
  | { readonly type: 'msg'; readonly recipient: string; readonly text: string }
  | { readonly type: 'stats' };

export type ParseResult =
  | { readonly ok: true; readonly command: ConsoleCommand }
  | { readonly ok: false; readonly error: string };

/**
 * Split off the first `count` whitespace-separated words; the rest is kept verbatim
 */
function splitWords(input: string, count: number): { words: string[]; rest: string } {
  const words: string[] = [];
  let rest = input.trimStart();
  while (words.length < count && rest.length > 0) {
    const match = /^(\S+)\s*/.exec(rest);
    if (!match) {
      break;
    }
    words.push(match[1]);
    rest = rest.slice(match[0].length);
  }
  return { words, rest };
}

export function parseCommand(line: string): ParseResult {
  const { words: [name], rest } = splitWords(line.trim(), 1);

  switch (name) {
    case '/join': {
      const { words: [channel], rest: passphrase } = splitWords(rest, 1);
      if (!channel) {
        return { ok: false, error: 'usage: /join <channel> [passphrase]' };
      }
      return passphrase
        ? { ok: true, command: { type: 'join', channel, passphrase } }
        : { ok: true, command: { type: 'join', channel } };
    }
    case '/part': {
      const { words: [channel] } = splitWords(rest, 1);
      if (!channel) {
        return { ok: false, error: 'usage: /part <channel>' };
      }
      return { ok: true, command: { type: 'part', channel } };
    }
    case '/say': {
      const { words: [channel], rest: text } = splitWords(rest, 1);
      if (!channel || !text) {
        return { ok: false, error: 'usage: /say <channel> <text>' };
      }
      return { ok: true, command: { type: 'say', channel, text } };
    }
    case '/msg': {
      const { words: [recipient], rest: text } = splitWords(rest, 1);
      if (!recipient || !text) {
        return { ok: false, error: 'usage: /msg <public-key> <text>' };
      }
      return { ok: true, command: { type: 'msg', recipient: recipient.toLowerCase(), text } };
    }
    case '/stats':
      return { ok: true, command: { type: 'stats' } };
    default:
      return { ok: false, error: `unknown command: ${name ?? ''}` };
  }
}

function describe(outcome: RelayOutcome | null): string {
  if (!outcome) {
    return 'not joined';
  }
  return outcome.status === 'relayed'
    ? `sent ${outcome.eventId.slice(0, 8)} to ${outcome.forwardedTo} peer(s)`
    : outcome.status;
}

/**
 * Run a parsed command against the engine and return a line for the console
 */
export async function runCommand(engine: RelayEngine, command: ConsoleCommand): Promise<string> {
  switch (command.type) {
    case 'join': {
      const key = command.passphrase === undefined
        ? undefined
        : Crypto.deriveChannelKey(command.passphrase, command.channel);
      return describe(await engine.joinChannel(command.channel, key));
    }
    case 'part':
      return describe(await engine.partChannel(command.channel));
    case 'say':
      return describe(await engine.sendChannelMessage(command.channel, command.text));
    case 'msg':
      return describe(await engine.sendPrivateMessage(command.recipient, command.text));
    case 'stats':
      return JSON.stringify(engine.getStats());
  }
}

/**
 * One console line per delivery
 */
export function formatDelivery(delivery: LocalDelivery): string {
  const text = decodeText(delivery.plaintext);
  // Timestamps are sender-supplied and may lie outside the Date range
  const date = new Date(delivery.timestamp);
  const time = Number.isNaN(date.getTime()) ? String(delivery.timestamp) : date.toISOString();
  switch (delivery.kind) {
    case 'channel-message':
      return `${time} [${delivery.target}] ${text}`;
    case 'private-message':
      return `${time} [private] ${text}`;
    case 'join':
      return `${time} [${delivery.target}] * ${text || 'someone'} joined`;
    case 'part':
      return `${time} [${delivery.target}] * ${text || 'someone'} left`;
  }
}
