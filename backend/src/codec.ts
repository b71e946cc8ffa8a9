/**
 * Wire Codec
 * KEY:VALUE lines terminated by a blank line, UTF-8 encoded
 */

import { MessageFields } from './types';
import { FormatError, PayloadTooLarge } from './errors';
import { HARD_PAYLOAD_LIMIT, SOFT_PAYLOAD_LIMIT } from './config';

const KEY_PATTERN = /^[A-Z0-9_]+$/;
const TERMINATOR = '\n\n';

// Values never contain a raw line break on the wire.
function escapeValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/\r/g, '\\r');
}

function unescapeValue(value: string): string {
  return value.replace(/\\(.)/g, (match, ch: string) => {
    switch (ch) {
      case 'n': return '\n';
      case 'r': return '\r';
      case '\\': return '\\';
      default: return match;
    }
  });
}

function checkSize(size: number): void {
  if (size > HARD_PAYLOAD_LIMIT) {
    throw new PayloadTooLarge(size, HARD_PAYLOAD_LIMIT);
  }
  if (size > SOFT_PAYLOAD_LIMIT) {
    console.warn(`[Codec] Large payload: ${size} bytes (soft limit ${SOFT_PAYLOAD_LIMIT})`);
  }
}

/**
 * Encode a field map. Throws PayloadTooLarge above the datagram ceiling.
 */
export function encodeMessage(fields: MessageFields): Buffer {
  const lines: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (!KEY_PATTERN.test(key)) {
      throw new FormatError(`Invalid key: ${JSON.stringify(key)}`);
    }
    lines.push(`${key}:${escapeValue(value)}`);
  }

  const data = Buffer.from(lines.join('\n') + TERMINATOR, 'utf-8');
  checkSize(data.length);
  return data;
}

/**
 * Decode a datagram. Unknown keys are kept; lines without a colon are skipped.
 */
export function decodeMessage(data: Buffer): MessageFields {
  checkSize(data.length);

  const text = data.toString('utf-8');
  if (!text.endsWith(TERMINATOR)) {
    throw new FormatError('Missing blank-line terminator');
  }

  const fields: MessageFields = {};
  for (const line of text.slice(0, -TERMINATOR.length).split('\n')) {
    const colon = line.indexOf(':');
    if (colon <= 0) continue;
    fields[line.slice(0, colon)] = unescapeValue(line.slice(colon + 1));
  }

  if (!fields.TYPE) {
    throw new FormatError('Missing TYPE');
  }
  return fields;
}
