/**
 * ContentDecoder - body payload decoding
 *
 * Transfer decoding, charset decoding with fallbacks, then a cleanup pass
 * for quoted-printable fragments that some mailers leave behind in
 * already-decoded text.
 *
 * @module main/email/decoding/ContentDecoder
 */

import { CONTENT_CHAIN, decodeCharset } from './charsets';
import { decodeTransferEncoding } from './quotedPrintable';

/**
 * Remove leftover quoted-printable artifacts from decoded text
 *
 * Applied in order: soft line breaks, `=3D`, `=20`, `=0D=0A`.
 */
export function cleanEncodedArtifacts(content: string): string {
  return content
    .replace(/=\r?\n/g, '')
    .replace(/=3D/g, '=')
    .replace(/=20/g, ' ')
    .replace(/=0D=0A/g, '\n');
}

/**
 * Decode a body payload into text
 *
 * Line endings are normalized to `\n`. Never throws: bytes no charset
 * accepts are decoded lossily.
 *
 * @param payload - Raw part payload, still transfer-encoded
 * @param transferEncoding - Content-Transfer-Encoding of the part
 * @param charset - Declared charset parameter, if any
 *
 * @example
 * ```typescript
 * decodeContent(Buffer.from('caf=C3=A9'), 'quoted-printable') // 'café'
 * ```
 */
export function decodeContent(
  payload: Buffer,
  transferEncoding: string | undefined,
  charset?: string
): string {
  const bytes = decodeTransferEncoding(payload, transferEncoding);
  const text = decodeCharset(bytes, charset, CONTENT_CHAIN, 'content');
  return cleanEncodedArtifacts(text.replace(/\r\n/g, '\n'));
}

export default decodeContent;
