/**
 * EmailParser Interface
 *
 * Records produced by the engine and the contract each source-format
 * parser implements. Parsers never throw: every operation reports a
 * ParseResult so the dispatcher can fall back to the next format.
 *
 * @module main/email/parsers/EmailParser
 */

import type { EmailParseError, ParseResult } from '../errors';
import type { AttachmentMeta } from '../AttachmentExtractor';

/**
 * Email file contents plus the name it was read under
 */
export interface EmailSource {
  /** Basename of the source file */
  filename: string;
  bytes: Buffer;
}

/**
 * Attachment metadata as exposed on the detail record
 */
export type PublicAttachment = Omit<AttachmentMeta, 'contentId'>;

/**
 * Canonical, format-agnostic email record
 *
 * At least one of `body` / `htmlBody` is set whenever the source carries
 * any textual content.
 */
export interface CanonicalEmail {
  filename: string;

  /** Decoded subject, `No Subject` when absent */
  subject: string;

  /** Decoded sender, `Unknown Sender` when absent */
  sender: string;

  recipients: string[];
  cc: string[];
  bcc: string[];
  date?: Date;

  /** Plain text body */
  body?: string;

  /** HTML body with `cid:` references inlined as data URIs */
  htmlBody?: string;

  attachments: PublicAttachment[];

  /** Header name → raw unfolded value (last occurrence wins) */
  headers: Record<string, string>;

  messageId?: string;

  /** Size of the source file in bytes */
  size: number;
}

/**
 * Lightweight record computed without decoding bodies or attachment payloads
 */
export interface EmailSummary {
  filename: string;
  subject: string;
  sender: string;
  recipients: string[];
  date?: Date;
  size: number;
  hasAttachments: boolean;
  attachmentCount: number;
}

export type SourceFormat = 'outlook' | 'rfc822';

/**
 * SourceParser interface
 *
 * One implementation per source format: MsgParser for Outlook containers,
 * EmlParser for RFC-822 text.
 */
export interface SourceParser<E extends EmailParseError = EmailParseError> {
  readonly format: SourceFormat;

  /**
   * Full canonical record
   */
  parseDetail(source: EmailSource): ParseResult<CanonicalEmail, E>;

  /**
   * Summary record; skips body decoding and attachment payloads
   */
  parseSummary(source: EmailSource): ParseResult<EmailSummary, E>;

  /**
   * Bytes of the attachment named exactly `name`
   *
   * A successful parse without a matching attachment yields `undefined`.
   */
  extractAttachment(source: EmailSource, name: string): ParseResult<Buffer | undefined, E>;
}
