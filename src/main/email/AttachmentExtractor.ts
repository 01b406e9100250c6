/**
 * AttachmentExtractor - attachment metadata and content
 *
 * Lists attachments of either source format and pulls the bytes of one of
 * them by exact filename.
 *
 * @module main/email/AttachmentExtractor
 */

import * as mime from 'mime-types';
import { decodeHeader } from './decoding/HeaderDecoder';
import { decodeTransferEncoding } from './decoding/quotedPrintable';
import { walkParts, type MimePart } from './mime/MimeTree';
import type { OutlookAttachment, OutlookMessage } from './outlook/OutlookMessage';

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

export interface AttachmentMeta {
  filename: string | null;
  /** Decoded size in bytes; 0 when the bytes are unavailable */
  size: number;
  contentType: string;
  contentId?: string;
}

/**
 * An opened message of either format
 */
export type AttachmentSource =
  | { format: 'outlook'; message: OutlookMessage }
  | { format: 'rfc822'; root: MimePart };

/**
 * Declared type, else a guess from the filename, else application/octet-stream
 */
export function resolveContentType(declared: string | undefined, filename: string | null | undefined): string {
  const type = declared?.trim();
  if (type) {
    return type;
  }
  if (filename) {
    const guessed = mime.lookup(filename);
    if (guessed) {
      return guessed;
    }
  }
  return DEFAULT_CONTENT_TYPE;
}

export function outlookFilename(attachment: OutlookAttachment): string | null {
  return attachment.longFilename || attachment.shortFilename || null;
}

/**
 * Filename of a MIME part: disposition `filename`, then Content-Type `name`
 */
export function partFilename(part: MimePart): string | null {
  const raw = part.dispositionParams.filename ?? part.contentTypeParams.name;
  return decodeHeader(raw) || null;
}

export function isAttachmentPart(part: MimePart): boolean {
  return part.disposition === 'attachment';
}

export function partPayload(part: MimePart): Buffer {
  return decodeTransferEncoding(part.body, part.transferEncoding);
}

function outlookMeta(attachment: OutlookAttachment): AttachmentMeta {
  const filename = outlookFilename(attachment);
  return {
    filename,
    size: attachment.data?.length ?? 0,
    contentType: resolveContentType(attachment.mimetype, filename),
    contentId: attachment.contentId,
  };
}

function mimeMeta(part: MimePart): AttachmentMeta {
  const filename = partFilename(part);
  return {
    filename,
    size: partPayload(part).length,
    contentType: resolveContentType(part.contentType, filename),
    contentId: part.headers.get('Content-ID'),
  };
}

/**
 * Parts with an attachment disposition, in document order
 */
export function attachmentParts(root: MimePart): MimePart[] {
  return [...walkParts(root)].filter(isAttachmentPart);
}

/**
 * Metadata of every attachment, in container or document order
 */
export function listAttachments(source: AttachmentSource): AttachmentMeta[] {
  if (source.format === 'outlook') {
    return source.message.attachments.map(outlookMeta);
  }
  return attachmentParts(source.root).map(mimeMeta);
}

export function countAttachments(source: AttachmentSource): number {
  if (source.format === 'outlook') {
    return source.message.attachments.length;
  }
  return attachmentParts(source.root).length;
}

/**
 * Bytes of the first attachment whose filename equals `name` exactly
 *
 * @returns Decoded bytes, or undefined when no attachment has that name
 */
export function findAttachment(source: AttachmentSource, name: string): Buffer | undefined {
  if (source.format === 'outlook') {
    const match = source.message.attachments.find((attachment) => outlookFilename(attachment) === name);
    return match?.data;
  }

  const part = attachmentParts(source.root).find((candidate) => partFilename(candidate) === name);
  return part ? partPayload(part) : undefined;
}
