/**
 * EmlParser - RFC-822 text format parser
 *
 * Builds a MIME tree from the raw bytes and reads headers, bodies,
 * inline images and attachments from it. Rejects input that has no
 * recognizable header block.
 *
 * @module main/email/parsers/EmlParser
 */

import { logger } from '@/config/logger';
import { parseEmailDate } from '@shared/utils/dateUtils';
import { fail, ok, TextParseError, type ParseResult } from '../errors';
import { countAttachments, findAttachment, listAttachments } from '../AttachmentExtractor';
import { extractBodies } from '../BodyExtractor';
import { buildContentIdMap, inlineReferences, mimeContentIdSources } from '../ContentIdResolver';
import { parseMimeMessage, type MimePart } from '../mime/MimeTree';
import type { CanonicalEmail, EmailSource, EmailSummary, SourceParser } from './EmailParser';
import { resolveSender, resolveSubject, splitRecipients, toPublicAttachments } from './fieldResolvers';

/**
 * EmlParser implements SourceParser for RFC-822 messages
 */
export class EmlParser implements SourceParser<TextParseError> {
  readonly format = 'rfc822' as const;

  parseDetail(source: EmailSource): ParseResult<CanonicalEmail, TextParseError> {
    return this.attempt(source, (root) => this.buildDetail(root, source));
  }

  parseSummary(source: EmailSource): ParseResult<EmailSummary, TextParseError> {
    return this.attempt(source, (root) => {
      const attachmentCount = countAttachments({ format: 'rfc822', root });
      return {
        filename: source.filename,
        subject: resolveSubject(root.headers.get('Subject')),
        sender: resolveSender([root.headers.get('From')]),
        recipients: splitRecipients(root.headers.get('To'), ','),
        date: parseEmailDate(root.headers.get('Date')),
        size: source.bytes.length,
        hasAttachments: attachmentCount > 0,
        attachmentCount,
      };
    });
  }

  extractAttachment(source: EmailSource, name: string): ParseResult<Buffer | undefined, TextParseError> {
    return this.attempt(source, (root) => findAttachment({ format: 'rfc822', root }, name));
  }

  /**
   * Parse the message and run an extraction on its tree
   */
  private attempt<T>(source: EmailSource, extract: (root: MimePart) => T): ParseResult<T, TextParseError> {
    const parsed = this.parseMessage(source);
    if (!parsed.ok) {
      logger.debug('EmlParser', 'Not readable as an RFC-822 message', {
        filename: source.filename,
        error: parsed.error.message,
      });
      return parsed;
    }

    try {
      return ok(extract(parsed.value));
    } catch (error) {
      logger.error('EmlParser', 'Extraction failed', error, { filename: source.filename });
      return fail(
        new TextParseError(`EmlParser failed for ${source.filename}`, { cause: error })
      );
    }
  }

  /**
   * Validate and parse the raw bytes
   *
   * Fails on empty input, on binary data in the header block and on a
   * header block without a single well-formed field.
   */
  private parseMessage(source: EmailSource): ParseResult<MimePart, TextParseError> {
    if (source.bytes.length === 0) {
      return fail(new TextParseError(`${source.filename} is empty`));
    }

    const root = parseMimeMessage(source.bytes);

    if (root.headerBytes.includes(0)) {
      return fail(new TextParseError(`${source.filename} has binary data in its header block`));
    }
    if (root.headers.size === 0) {
      return fail(new TextParseError(`${source.filename} has no header fields`));
    }

    return ok(root);
  }

  private buildDetail(root: MimePart, source: EmailSource): CanonicalEmail {
    const { headers } = root;
    const { plainBody, htmlBody } = extractBodies(root);

    const contentIds = buildContentIdMap(mimeContentIdSources(root));
    const inlinedHtml = htmlBody && contentIds.size > 0 ? inlineReferences(htmlBody, contentIds) : htmlBody;
    const attachments = listAttachments({ format: 'rfc822', root });

    logger.debug('EmlParser', `Parsed RFC-822 message: ${source.filename}`, {
      attachments: attachments.length,
      inlineImages: contentIds.size,
    });

    return {
      filename: source.filename,
      subject: resolveSubject(headers.get('Subject')),
      sender: resolveSender([headers.get('From')]),
      recipients: splitRecipients(headers.get('To'), ','),
      cc: splitRecipients(headers.get('Cc'), ','),
      bcc: splitRecipients(headers.get('Bcc'), ','),
      date: parseEmailDate(headers.get('Date')),
      body: plainBody || undefined,
      htmlBody: inlinedHtml || undefined,
      attachments: toPublicAttachments(attachments),
      headers: headers.toRecord(),
      messageId: headers.get('Message-ID')?.trim() || undefined,
      size: source.bytes.length,
    };
  }
}

export default EmlParser;
