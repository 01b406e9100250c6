/**
 * MsgParser - Outlook .msg format parser
 *
 * Reads the structured-container format through an OutlookMessage. Any
 * exception from opening the container or reading one of its fields
 * becomes a ContainerParseError result, which sends the dispatcher to the
 * RFC-822 path.
 *
 * @module main/email/parsers/MsgParser
 */

import { logger } from '@/config/logger';
import { toEmailDate } from '@shared/utils/dateUtils';
import { ContainerParseError, fail, ok, type ParseResult } from '../errors';
import { countAttachments, findAttachment, listAttachments } from '../AttachmentExtractor';
import { extractOutlookBodies } from '../BodyExtractor';
import { buildContentIdMap, inlineReferences, outlookContentIdSources } from '../ContentIdResolver';
import { openOutlookMessage } from '../outlook/MsgReaderMessage';
import type { OutlookMessage, OutlookMessageOpener } from '../outlook/OutlookMessage';
import type { CanonicalEmail, EmailSource, EmailSummary, SourceParser } from './EmailParser';
import {
  headerValue,
  resolveSender,
  resolveSubject,
  splitRecipients,
  toPublicAttachments,
} from './fieldResolvers';

/**
 * MsgParser implements SourceParser for Outlook .msg containers
 */
export class MsgParser implements SourceParser<ContainerParseError> {
  readonly format = 'outlook' as const;

  /**
   * @param openMessage - Opens container bytes (tests inject fakes)
   */
  constructor(private readonly openMessage: OutlookMessageOpener = openOutlookMessage) {}

  parseDetail(source: EmailSource): ParseResult<CanonicalEmail, ContainerParseError> {
    return this.attempt(source, (message) => this.buildDetail(message, source));
  }

  parseSummary(source: EmailSource): ParseResult<EmailSummary, ContainerParseError> {
    return this.attempt(source, (message) => {
      const attachmentCount = countAttachments({ format: 'outlook', message });
      return {
        filename: source.filename,
        subject: resolveSubject(message.subject),
        sender: this.extractSender(message),
        recipients: splitRecipients(message.to, ';'),
        date: toEmailDate(message.date),
        size: source.bytes.length,
        hasAttachments: attachmentCount > 0,
        attachmentCount,
      };
    });
  }

  extractAttachment(source: EmailSource, name: string): ParseResult<Buffer | undefined, ContainerParseError> {
    return this.attempt(source, (message) => findAttachment({ format: 'outlook', message }, name));
  }

  /**
   * Open the container and run an extraction, converting any throw into a result
   */
  private attempt<T>(
    source: EmailSource,
    extract: (message: OutlookMessage) => T
  ): ParseResult<T, ContainerParseError> {
    try {
      logger.debug('MsgParser', `Opening Outlook container: ${source.filename}`);
      return ok(extract(this.openMessage(source.bytes)));
    } catch (error) {
      const failure =
        error instanceof ContainerParseError
          ? error
          : new ContainerParseError(
              `MsgParser failed for ${source.filename}: ${error instanceof Error ? error.message : String(error)}`,
              { cause: error }
            );

      logger.debug('MsgParser', 'Not readable as an Outlook container', {
        filename: source.filename,
        error: failure.message,
      });

      return fail(failure);
    }
  }

  private buildDetail(message: OutlookMessage, source: EmailSource): CanonicalEmail {
    const container = { format: 'outlook', message } as const;
    const attachments = listAttachments(container);
    const { plainBody, htmlBody } = extractOutlookBodies(message);

    const contentIds = buildContentIdMap(outlookContentIdSources(message));
    const inlinedHtml = htmlBody && contentIds.size > 0 ? inlineReferences(htmlBody, contentIds) : htmlBody;

    logger.debug('MsgParser', `Parsed Outlook message: ${source.filename}`, {
      attachments: attachments.length,
      inlineImages: contentIds.size,
    });

    return {
      filename: source.filename,
      subject: resolveSubject(message.subject),
      sender: this.extractSender(message),
      recipients: splitRecipients(message.to, ';'),
      cc: splitRecipients(message.cc, ';'),
      bcc: splitRecipients(message.bcc, ';'),
      date: toEmailDate(message.date),
      body: plainBody || undefined,
      htmlBody: inlinedHtml || undefined,
      attachments: toPublicAttachments(attachments),
      headers: { ...message.header },
      messageId: message.messageId?.trim() || undefined,
      size: source.bytes.length,
    };
  }

  /**
   * Sender: display sender, then sender address, then the From transport header
   */
  private extractSender(message: OutlookMessage): string {
    return resolveSender([message.sender, message.senderEmail, headerValue(message.header, 'From')]);
  }
}

export default MsgParser;
