/**
 * HeaderDecoder - RFC 2047 encoded-word decoding
 *
 * Turns header values such as `=?UTF-8?B?Y2Fmw6k=?=` into plain text.
 * Adjacent encoded words in the same charset are joined at the byte level
 * before decoding, so a multi-byte character split across two words
 * survives.
 *
 * @module main/email/decoding/HeaderDecoder
 */

import { decodeCharset, HEADER_CHAIN, normalizeCharset } from './charsets';
import { decodeQuotedPrintable } from './quotedPrintable';

const ENCODED_WORD = /=\?([^?\s]+)\?([BbQq])\?([^?\s]*)\?=/g;

type HeaderSegment =
  | { kind: 'text'; value: string }
  | { kind: 'encoded'; charset: string; bytes: Buffer };

function encodedWordBytes(encoding: string, text: string): Buffer {
  if (encoding.toUpperCase() === 'B') {
    return Buffer.from(text, 'base64');
  }
  // Q encoding: underscore is always a space
  return decodeQuotedPrintable(Buffer.from(text.replace(/_/g, ' '), 'latin1'));
}

function segmentHeader(raw: string): HeaderSegment[] {
  const segments: HeaderSegment[] = [];
  let cursor = 0;

  for (const match of raw.matchAll(ENCODED_WORD)) {
    const start = match.index ?? cursor;
    const between = raw.slice(cursor, start);
    const previous = segments[segments.length - 1];

    // Whitespace between two encoded words is not part of the text
    const skipGap = previous?.kind === 'encoded' && between.trim() === '';
    if (between && !skipGap) {
      segments.push({ kind: 'text', value: between });
    }

    const charset = normalizeCharset(match[1]) ?? 'us-ascii';
    const bytes = encodedWordBytes(match[2], match[3]);
    const last = segments[segments.length - 1];

    if (last?.kind === 'encoded' && last.charset === charset) {
      last.bytes = Buffer.concat([last.bytes, bytes]);
    } else {
      segments.push({ kind: 'encoded', charset, bytes });
    }

    cursor = start + match[0].length;
  }

  if (cursor < raw.length) {
    segments.push({ kind: 'text', value: raw.slice(cursor) });
  }

  return segments;
}

/**
 * Decode an RFC 2047 header value into plain text
 *
 * Plain ASCII passes through unchanged apart from trimming. Missing values
 * decode to an empty string and undecodable bytes never raise.
 *
 * @param raw - Header value as found in the message (may be absent)
 * @returns Decoded, trimmed text
 *
 * @example
 * ```typescript
 * decodeHeader('=?UTF-8?B?Y2Fmw6k=?=') // 'café'
 * decodeHeader('=?iso-8859-1?Q?R=E9sum=E9?=') // 'Résumé'
 * ```
 */
export function decodeHeader(raw: string | null | undefined): string {
  if (!raw) {
    return '';
  }

  return segmentHeader(raw)
    .map((segment) =>
      segment.kind === 'text'
        ? segment.value
        : decodeCharset(segment.bytes, segment.charset, HEADER_CHAIN, 'header')
    )
    .join('')
    .trim();
}

export default decodeHeader;
