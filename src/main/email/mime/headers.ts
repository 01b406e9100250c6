/**
 * MIME header block parsing
 *
 * - Folded headers (RFC 5322)
 * - Structured parameters with quoting and RFC 2231 continuations
 *
 * Values are kept raw here; RFC 2047 decoding happens in HeaderDecoder.
 *
 * @module main/email/mime/headers
 */

import { decodeCharset, HEADER_CHAIN } from '../decoding/charsets';

export interface HeaderField {
  /** Name as written in the message */
  name: string;
  /** Unfolded raw value */
  value: string;
}

/** Printable ASCII except colon (RFC 5322 field-name) */
const FIELD_NAME = /^[!-9;-~]+$/;

/**
 * Unfold header lines: a line break followed by whitespace continues the field
 */
export function unfoldHeaders(headerBlock: string): string {
  return headerBlock.replace(/\r?\n(?=[ \t])/g, '');
}

/**
 * Parse a header block into ordered fields
 *
 * Lines that are not well-formed `name: value` fields are skipped.
 */
export function parseHeaderFields(headerBlock: string): HeaderField[] {
  const fields: HeaderField[] = [];

  for (const line of unfoldHeaders(headerBlock).split(/\r?\n/)) {
    const colonIndex = line.indexOf(':');
    if (colonIndex <= 0) continue;

    const name = line.substring(0, colonIndex).trimEnd();
    if (!FIELD_NAME.test(name)) continue;

    fields.push({ name, value: line.substring(colonIndex + 1).trim() });
  }

  return fields;
}

/**
 * Assign as an own property, so names like `__proto__` stay plain keys
 */
function setOwn(record: Record<string, string>, key: string, value: string): void {
  Object.defineProperty(record, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Case-insensitive, order-preserving view over header fields
 */
export class HeaderList {
  constructor(readonly fields: readonly HeaderField[]) {}

  static parse(headerBlock: string): HeaderList {
    return new HeaderList(parseHeaderFields(headerBlock));
  }

  get size(): number {
    return this.fields.length;
  }

  /**
   * First value of a header
   */
  get(name: string): string | undefined {
    const key = name.toLowerCase();
    return this.fields.find((field) => field.name.toLowerCase() === key)?.value;
  }

  getAll(name: string): string[] {
    const key = name.toLowerCase();
    return this.fields.filter((field) => field.name.toLowerCase() === key).map((field) => field.value);
  }

  /**
   * Name to value record; the last occurrence of a repeated name wins
   */
  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const field of this.fields) {
      setOwn(record, field.name, field.value);
    }
    return record;
  }
}

export interface ParameterizedValue {
  /** Lowercased leading value, e.g. `text/html` or `attachment` */
  value: string;
  /** Parameters keyed by lowercased name */
  params: Record<string, string>;
}

/**
 * Split on semicolons that are outside quoted strings
 */
function splitParameters(input: string): string[] {
  const parts: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < input.length; i++) {
    const char = input[i];
    if (quoted && char === '\\' && i + 1 < input.length) {
      current += char + input[i + 1];
      i++;
      continue;
    }
    if (char === '"') {
      quoted = !quoted;
    } else if (char === ';' && !quoted) {
      parts.push(current);
      current = '';
      continue;
    }
    current += char;
  }
  parts.push(current);

  return parts.map((part) => part.trim()).filter((part) => part.length > 0);
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\(.)/g, '$1');
  }
  return value;
}

function percentDecode(value: string): Buffer {
  const bytes: number[] = [];
  for (let i = 0; i < value.length; i++) {
    const hex = value.slice(i + 1, i + 3);
    if (value[i] === '%' && /^[0-9A-Fa-f]{2}$/.test(hex)) {
      bytes.push(parseInt(hex, 16));
      i += 2;
    } else {
      bytes.push(value.charCodeAt(i) & 0xff);
    }
  }
  return Buffer.from(bytes);
}

interface ExtendedSection {
  index: number;
  value: string;
  encoded: boolean;
}

/** `name`, `name*`, `name*0`, `name*0*` */
const PARAMETER_KEY = /^(.+?)(?:\*(\d+))?(\*)?$/;

/**
 * Join RFC 2231 sections of one parameter and decode them
 */
function joinExtendedSections(sections: ExtendedSection[]): string {
  const ordered = [...sections].sort((a, b) => a.index - b.index);
  let charset: string | undefined;
  const chunks: Buffer[] = [];

  ordered.forEach((section, position) => {
    let value = section.value;
    if (section.encoded && position === 0) {
      // charset'language'value
      const firstQuote = value.indexOf("'");
      const secondQuote = firstQuote === -1 ? -1 : value.indexOf("'", firstQuote + 1);
      if (secondQuote !== -1) {
        charset = value.slice(0, firstQuote) || undefined;
        value = value.slice(secondQuote + 1);
      }
    }
    chunks.push(section.encoded ? percentDecode(value) : Buffer.from(value, 'latin1'));
  });

  return decodeCharset(Buffer.concat(chunks), charset, HEADER_CHAIN, 'parameter');
}

/**
 * Parse a structured header such as Content-Type or Content-Disposition
 *
 * @example
 * ```typescript
 * parseParameterizedValue('text/plain; charset="utf-8"')
 * // { value: 'text/plain', params: { charset: 'utf-8' } }
 * ```
 */
export function parseParameterizedValue(headerValue: string | undefined): ParameterizedValue {
  if (!headerValue) {
    return { value: '', params: {} };
  }

  const [first = '', ...rest] = splitParameters(headerValue);
  const params: Record<string, string> = {};
  const extended = new Map<string, ExtendedSection[]>();

  for (const parameter of rest) {
    const eqIndex = parameter.indexOf('=');
    if (eqIndex <= 0) continue;

    const key = parameter.substring(0, eqIndex).trim().toLowerCase();
    const rawValue = parameter.substring(eqIndex + 1).trim();
    const match = PARAMETER_KEY.exec(key);
    if (!match) continue;

    const [, base, section, star] = match;
    if (section === undefined && star === undefined) {
      setOwn(params, base, unquote(rawValue));
      continue;
    }

    const sections = extended.get(base) ?? [];
    sections.push({
      index: section === undefined ? 0 : Number(section),
      value: unquote(rawValue),
      encoded: star !== undefined,
    });
    extended.set(base, sections);
  }

  // Extended parameters take precedence over plain ones of the same name
  for (const [base, sections] of extended) {
    setOwn(params, base, joinExtendedSections(sections));
  }

  return { value: first.toLowerCase(), params };
}
