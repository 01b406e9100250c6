/**
 * Quoted-printable and base64 transfer decoding (RFC 2045 Section 6)
 *
 * Works on bytes: `=XX` escapes become the raw byte and charset decoding
 * happens afterwards.
 *
 * @module main/email/decoding/quotedPrintable
 */

const EQUALS = 0x3d;
const CR = 0x0d;
const LF = 0x0a;
const SPACE = 0x20;
const TAB = 0x09;

function hexValue(byte: number | undefined): number {
  if (byte === undefined) return -1;
  if (byte >= 0x30 && byte <= 0x39) return byte - 0x30;
  if (byte >= 0x41 && byte <= 0x46) return byte - 0x41 + 10;
  if (byte >= 0x61 && byte <= 0x66) return byte - 0x61 + 10;
  return -1;
}

/**
 * Length of a soft line break starting right after an `=`, or 0
 *
 * Trailing transport padding (spaces, tabs) before the line end is allowed.
 */
function softBreakLength(input: Buffer, start: number): number {
  let index = start;
  while (input[index] === SPACE || input[index] === TAB) {
    index++;
  }
  if (input[index] === CR && input[index + 1] === LF) {
    return index + 2 - start;
  }
  if (input[index] === LF) {
    return index + 1 - start;
  }
  return 0;
}

/**
 * Decode quoted-printable bytes
 *
 * Soft line breaks are removed and malformed escapes are kept literally.
 *
 * @example
 * ```typescript
 * decodeQuotedPrintable(Buffer.from('caf=C3=A9')).toString('utf8') // 'café'
 * ```
 */
export function decodeQuotedPrintable(input: Buffer): Buffer {
  const output = Buffer.alloc(input.length);
  let length = 0;
  let index = 0;

  while (index < input.length) {
    const byte = input[index];

    if (byte !== EQUALS) {
      output[length++] = byte;
      index++;
      continue;
    }

    const high = hexValue(input[index + 1]);
    const low = hexValue(input[index + 2]);
    if (high >= 0 && low >= 0) {
      output[length++] = high * 16 + low;
      index += 3;
      continue;
    }

    const softBreak = softBreakLength(input, index + 1);
    if (softBreak > 0) {
      index += 1 + softBreak;
      continue;
    }

    output[length++] = byte;
    index++;
  }

  return output.subarray(0, length);
}

/**
 * Undo a Content-Transfer-Encoding
 *
 * Identity encodings (7bit, 8bit, binary) and unknown labels return the
 * payload unchanged.
 */
export function decodeTransferEncoding(payload: Buffer, transferEncoding: string | undefined): Buffer {
  switch (transferEncoding?.trim().toLowerCase()) {
    case 'quoted-printable':
      return decodeQuotedPrintable(payload);
    case 'base64':
      // Node skips whitespace and characters outside the alphabet
      return Buffer.from(payload.toString('latin1'), 'base64');
    default:
      return payload;
  }
}
