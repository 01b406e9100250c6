/**
 * Charset strategy chains
 *
 * Text is decoded by trying strategies in order. Every chain ends with a
 * terminal strategy that cannot fail, so decoding always yields a string.
 *
 * @module main/email/decoding/charsets
 */

import { isUtf8 } from 'buffer';
import * as iconv from 'iconv-lite';
import { logger } from '@/config/logger';
import type { DecodeDegradation } from '../errors';

/**
 * One way of turning bytes into text
 */
export interface DecodeStrategy {
  readonly name: string;
  /** Returns undefined when the bytes are not valid in this charset */
  decode(bytes: Buffer): string | undefined;
}

export interface TerminalDecodeStrategy {
  readonly name: string;
  decode(bytes: Buffer): string;
}

export interface DecodeChain {
  readonly strategies: readonly DecodeStrategy[];
  readonly terminal: TerminalDecodeStrategy;
}

export interface DecodeOutcome {
  text: string;
  charset: string;
  /** True when a strategy other than the first one produced the text */
  degraded: boolean;
}

export const strictUtf8: DecodeStrategy = {
  name: 'utf-8',
  decode: (bytes) => (isUtf8(bytes) ? bytes.toString('utf8') : undefined),
};

export const latin1: DecodeStrategy = {
  name: 'iso-8859-1',
  decode: (bytes) => bytes.toString('latin1'),
};

export const windows1252: DecodeStrategy = {
  name: 'windows-1252',
  decode: (bytes) => iconv.decode(bytes, 'windows-1252'),
};

export const lossyUtf8: TerminalDecodeStrategy = {
  name: 'utf-8 (lossy)',
  decode: (bytes) => bytes.toString('utf8'),
};

/** Fallbacks for header words: windows-1252 stands in for mislabeled latin-1 */
export const HEADER_CHAIN: DecodeChain = {
  strategies: [strictUtf8, latin1, windows1252],
  terminal: lossyUtf8,
};

export const CONTENT_CHAIN: DecodeChain = {
  strategies: [strictUtf8, latin1],
  terminal: lossyUtf8,
};

const UTF8_LABELS = new Set(['utf-8', 'utf8', 'us-ascii', 'ascii']);

/**
 * Normalize a charset label as found in headers
 *
 * Strips quotes and an RFC 2231 language suffix (`utf-8*en`).
 */
export function normalizeCharset(label: string | undefined): string | undefined {
  if (!label) {
    return undefined;
  }
  const charset = label.trim().replace(/^["']|["']$/g, '').split('*')[0].trim().toLowerCase();
  return charset || undefined;
}

/**
 * Strategy for a declared charset, or undefined when it is unknown
 *
 * UTF-8 and ASCII labels decode strictly so that mislabeled 8-bit text
 * falls through to the rest of the chain.
 */
export function declaredStrategy(label: string | undefined): DecodeStrategy | undefined {
  const charset = normalizeCharset(label);
  if (!charset) {
    return undefined;
  }
  if (UTF8_LABELS.has(charset)) {
    return strictUtf8;
  }
  if (!iconv.encodingExists(charset)) {
    logger.debug('Charsets', 'Unknown charset label, using fallbacks', { charset });
    return undefined;
  }
  return {
    name: charset,
    decode: (bytes) => iconv.decode(bytes, charset),
  };
}

/**
 * Put the declared charset in front of a fallback chain
 */
export function withDeclaredCharset(chain: DecodeChain, label: string | undefined): DecodeChain {
  const declared = declaredStrategy(label);
  if (!declared) {
    return chain;
  }
  return {
    strategies: [declared, ...chain.strategies.filter((strategy) => strategy !== declared)],
    terminal: chain.terminal,
  };
}

/**
 * Decode bytes with the first strategy that accepts them
 */
export function decodeWithChain(bytes: Buffer, chain: DecodeChain): DecodeOutcome {
  for (const [index, strategy] of chain.strategies.entries()) {
    const text = strategy.decode(bytes);
    if (text !== undefined) {
      return { text, charset: strategy.name, degraded: index > 0 };
    }
  }
  return {
    text: chain.terminal.decode(bytes),
    charset: chain.terminal.name,
    degraded: chain.strategies.length > 0,
  };
}

/**
 * Decode bytes with a declared charset and log when a fallback was needed
 */
export function decodeCharset(
  bytes: Buffer,
  declared: string | undefined,
  chain: DecodeChain,
  stage: DecodeDegradation['stage']
): string {
  const outcome = decodeWithChain(bytes, withDeclaredCharset(chain, declared));

  if (outcome.degraded) {
    const degradation: DecodeDegradation = {
      stage,
      declaredCharset: normalizeCharset(declared),
      usedCharset: outcome.charset,
    };
    logger.debug('Charsets', 'Decoded with fallback charset', { ...degradation });
  }

  return outcome.text;
}
