/**
 * Outlook message model
 *
 * The fields the engine reads from an opened Outlook .msg container. The
 * production implementation wraps @kenjiuno/msgreader (see
 * MsgReaderMessage); tests provide their own objects.
 *
 * @module main/email/outlook/OutlookMessage
 */

export interface OutlookAttachment {
  readonly longFilename?: string;
  readonly shortFilename?: string;
  /** Attachment bytes; undefined when the container holds none */
  readonly data?: Buffer;
  readonly mimetype?: string;
  readonly contentId?: string;
}

export interface OutlookMessage {
  readonly subject?: string;
  /** Display form of the sender, e.g. `Jane Doe <jane@example.com>` */
  readonly sender?: string;
  readonly senderEmail?: string;
  /** Semicolon-separated recipient lists */
  readonly to?: string;
  readonly cc?: string;
  readonly bcc?: string;
  readonly body?: string;
  /** HTML body candidates, first non-blank wins */
  readonly htmlBody?: string;
  readonly bodyHTML?: string;
  readonly bodyHtml?: string;
  readonly date?: Date | string;
  readonly messageId?: string;
  /** Transport headers stored in the container, last occurrence wins */
  readonly header: Readonly<Record<string, string>>;
  readonly attachments: readonly OutlookAttachment[];
}

/**
 * Opens container bytes; throws when they are not an Outlook message
 */
export type OutlookMessageOpener = (bytes: Buffer) => OutlookMessage;
