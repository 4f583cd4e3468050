import { InvalidPayloadError } from '../errors/index.js';

const SEPARATOR = ': ';

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: false });

export interface Tweet {
  username: string;
  message: string;
}

/** Encodes `"<username>: <message>"` as UTF-8. */
export function encodeTweet(username: string, message: string): Uint8Array {
  const user = username.trim();
  const text = message.trim();
  if (!user) throw new InvalidPayloadError('Username must not be empty');
  if (!text) throw new InvalidPayloadError('Message must not be empty');
  return encoder.encode(`${user}${SEPARATOR}${text}`);
}

/**
 * Splits a received payload on the first `": "`.
 * Invalid UTF-8 is replaced rather than rejected; a payload with no
 * separator is all message.
 */
export function decodeTweet(payload: Uint8Array): Tweet {
  const text = decoder.decode(payload);
  const at = text.indexOf(SEPARATOR);
  if (at === -1) return { username: '', message: text };
  return { username: text.slice(0, at), message: text.slice(at + SEPARATOR.length) };
}
