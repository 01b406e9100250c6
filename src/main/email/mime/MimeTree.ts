/**
 * MIME message tree
 *
 * Parses RFC-822 bytes into a tree of parts. Bodies stay as raw bytes
 * (still transfer-encoded) so that text and attachments are decoded by the
 * modules that own those rules.
 *
 * @module main/email/mime/MimeTree
 */

import { logger } from '@/config/logger';
import { decodeWithChain, CONTENT_CHAIN } from '../decoding/charsets';
import { decodeTransferEncoding } from '../decoding/quotedPrintable';
import { HeaderList, parseParameterizedValue } from './headers';

const CR = 0x0d;
const LF = 0x0a;
const DASH = 0x2d;
const SPACE = 0x20;
const TAB = 0x09;

/** Nesting deeper than this is treated as an opaque leaf */
const MAX_DEPTH = 32;

const EMPTY = Buffer.alloc(0);

export interface MimePart {
  headers: HeaderList;
  /** Raw header block bytes */
  headerBytes: Buffer;
  /** Declared media type, lowercased; undefined when there is no Content-Type */
  contentType?: string;
  contentTypeParams: Record<string, string>;
  /** Lowercased disposition, e.g. `attachment` or `inline` */
  disposition?: string;
  dispositionParams: Record<string, string>;
  /** Lowercased Content-Transfer-Encoding, `7bit` when absent */
  transferEncoding: string;
  charset?: string;
  /** Raw payload bytes, still transfer-encoded */
  body: Buffer;
  children: MimePart[];
}

/**
 * Split bytes at the first empty line into header block and body
 */
export function splitHeaderAndBody(bytes: Buffer): { header: Buffer; body: Buffer } {
  if (bytes[0] === LF) {
    return { header: EMPTY, body: bytes.subarray(1) };
  }
  if (bytes[0] === CR && bytes[1] === LF) {
    return { header: EMPTY, body: bytes.subarray(2) };
  }

  let index = bytes.indexOf(LF);
  while (index !== -1) {
    const next = index + 1;
    if (bytes[next] === LF) {
      return { header: bytes.subarray(0, next), body: bytes.subarray(next + 1) };
    }
    if (bytes[next] === CR && bytes[next + 1] === LF) {
      return { header: bytes.subarray(0, next), body: bytes.subarray(next + 2) };
    }
    index = bytes.indexOf(LF, next);
  }

  return { header: bytes, body: EMPTY };
}

function isLineEnd(bytes: Buffer, index: number): boolean {
  const byte = bytes[index];
  return byte === undefined || byte === CR || byte === LF || byte === SPACE || byte === TAB;
}

/**
 * Position where a part ends: the line break before a delimiter belongs to it
 */
function trimDelimiterLineBreak(bytes: Buffer, start: number, delimiterIndex: number): number {
  let end = delimiterIndex;
  if (end > start && bytes[end - 1] === LF) end--;
  if (end > start && bytes[end - 1] === CR) end--;
  return end;
}

/**
 * Split a multipart body at its boundary delimiters
 *
 * Delimiters only count at the start of a line. The preamble and epilogue
 * are dropped; a missing close delimiter keeps the last part.
 */
export function splitMultipart(body: Buffer, boundary: string): Buffer[] {
  const delimiter = Buffer.from(`--${boundary}`, 'latin1');
  const parts: Buffer[] = [];
  let partStart = -1;
  let searchFrom = 0;

  while (searchFrom < body.length) {
    const index = body.indexOf(delimiter, searchFrom);
    if (index === -1) break;

    const afterDelimiter = index + delimiter.length;
    searchFrom = afterDelimiter;

    if (index > 0 && body[index - 1] !== LF) continue;

    const isClose = body[afterDelimiter] === DASH && body[afterDelimiter + 1] === DASH;
    if (!isLineEnd(body, isClose ? afterDelimiter + 2 : afterDelimiter)) continue;

    if (partStart !== -1) {
      parts.push(body.subarray(partStart, trimDelimiterLineBreak(body, partStart, index)));
    }

    if (isClose) {
      return parts;
    }

    const lineEnd = body.indexOf(LF, afterDelimiter);
    if (lineEnd === -1) {
      return parts;
    }
    partStart = lineEnd + 1;
    searchFrom = partStart;
  }

  if (partStart !== -1 && partStart < body.length) {
    parts.push(body.subarray(partStart));
  }

  return parts;
}

function decodeHeaderBlock(header: Buffer): HeaderList {
  // Raw 8-bit header bytes: UTF-8 when valid, latin-1 otherwise
  return HeaderList.parse(decodeWithChain(header, CONTENT_CHAIN).text);
}

/**
 * Parse one entity (message or body part) and its descendants
 */
export function parseMimeEntity(bytes: Buffer, depth = 0): MimePart {
  const { header, body } = splitHeaderAndBody(bytes);
  const headers = decodeHeaderBlock(header);

  const contentType = parseParameterizedValue(headers.get('Content-Type'));
  const disposition = parseParameterizedValue(headers.get('Content-Disposition'));
  const transferEncoding = (headers.get('Content-Transfer-Encoding') ?? '7bit').trim().toLowerCase();

  const part: MimePart = {
    headers,
    headerBytes: header,
    contentType: contentType.value || undefined,
    contentTypeParams: contentType.params,
    disposition: disposition.value || undefined,
    dispositionParams: disposition.params,
    transferEncoding,
    charset: contentType.params.charset,
    body,
    children: [],
  };

  if (depth >= MAX_DEPTH) {
    logger.debug('MimeTree', 'Maximum nesting depth reached, keeping part as leaf', { depth });
    return part;
  }

  const boundary = contentType.params.boundary;
  if (part.contentType?.startsWith('multipart/') && boundary) {
    part.children = splitMultipart(body, boundary).map((child) => parseMimeEntity(child, depth + 1));
  } else if (part.contentType === 'message/rfc822') {
    const inner = decodeTransferEncoding(body, transferEncoding);
    if (inner.length > 0) {
      part.children = [parseMimeEntity(inner, depth + 1)];
    }
  }

  return part;
}

/**
 * Parse RFC-822 message bytes into a MIME tree
 */
export function parseMimeMessage(bytes: Buffer): MimePart {
  return parseMimeEntity(bytes);
}

/**
 * Whether the part holds sub-parts
 */
export function isMultipart(part: MimePart): boolean {
  return part.children.length > 0;
}

/**
 * Visit every part depth-first in document order, the root included
 */
export function* walkParts(root: MimePart): Generator<MimePart> {
  yield root;
  for (const child of root.children) {
    yield* walkParts(child);
  }
}

/**
 * Media type of a part; RFC 2045 defaults a missing Content-Type to text/plain
 */
export function mediaType(part: MimePart): string {
  return part.contentType ?? 'text/plain';
}

/**
 * Leaf parts carry payloads; containers only carry children
 */
export function isLeaf(part: MimePart): boolean {
  return part.children.length === 0 && !part.contentType?.startsWith('multipart/');
}
