/**
 * Field resolution shared by both parsers
 *
 * @module main/email/parsers/fieldResolvers
 */

import { decodeHeader } from '../decoding/HeaderDecoder';
import type { PublicAttachment } from './EmailParser';
import type { AttachmentMeta } from '../AttachmentExtractor';

export const NO_SUBJECT = 'No Subject';
export const UNKNOWN_SENDER = 'Unknown Sender';

export function resolveSubject(raw: string | undefined): string {
  return decodeHeader(raw || NO_SUBJECT);
}

/**
 * First non-empty candidate, decoded; the placeholder when none is set
 */
export function resolveSender(candidates: ReadonlyArray<string | undefined>): string {
  const raw = candidates.find((candidate) => candidate && candidate.trim());
  return decodeHeader(raw ?? UNKNOWN_SENDER);
}

/**
 * Split an address list on a delimiter outside quoted strings and angle brackets
 *
 * Entries are trimmed, decoded and empty ones dropped.
 *
 * @example
 * ```typescript
 * splitRecipients('"Doe, Jane" <jane@example.com>, bob@example.com', ',')
 * // ['"Doe, Jane" <jane@example.com>', 'bob@example.com']
 * ```
 */
export function splitRecipients(value: string | undefined, delimiter: ',' | ';'): string[] {
  if (!value) {
    return [];
  }

  const entries: string[] = [];
  let current = '';
  let quoted = false;
  let angleDepth = 0;

  for (let i = 0; i < value.length; i++) {
    const char = value[i];

    if (quoted && char === '\\' && i + 1 < value.length) {
      current += char + value[i + 1];
      i++;
      continue;
    }

    if (char === '"') {
      quoted = !quoted;
    } else if (!quoted && char === '<') {
      angleDepth++;
    } else if (!quoted && char === '>' && angleDepth > 0) {
      angleDepth--;
    } else if (!quoted && angleDepth === 0 && char === delimiter) {
      entries.push(current);
      current = '';
      continue;
    }

    current += char;
  }
  entries.push(current);

  return entries.map((entry) => decodeHeader(entry)).filter((entry) => entry.length > 0);
}

/**
 * Case-insensitive lookup in a header record
 */
export function headerValue(headers: Readonly<Record<string, string>>, name: string): string | undefined {
  const key = name.toLowerCase();
  const match = Object.keys(headers).find((candidate) => candidate.toLowerCase() === key);
  return match === undefined ? undefined : headers[match];
}

export function toPublicAttachments(attachments: AttachmentMeta[]): PublicAttachment[] {
  return attachments.map(({ filename, size, contentType }) => ({ filename, size, contentType }));
}
