/**
 * ParserFactory - format dispatch with fallback
 *
 * Content decides the format, not the file extension: every source is
 * tried as an Outlook container first and as RFC-822 text second. Results
 * never mix fields from both attempts.
 *
 * @module main/email/parsers/ParserFactory
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { logger } from '@/config/logger';
import {
  fail,
  ParseFailure,
  type ContainerParseError,
  type ParseResult,
  type TextParseError,
} from '../errors';
import type { OutlookMessageOpener } from '../outlook/OutlookMessage';
import type { CanonicalEmail, EmailSource, EmailSummary, SourceParser } from './EmailParser';
import { EmlParser } from './EmlParser';
import { MsgParser } from './MsgParser';

export interface ParserFactoryOptions {
  /** Replaces the msgreader-backed container opener */
  openOutlookMessage?: OutlookMessageOpener;
}

/**
 * Read a whole email file into memory
 *
 * @throws Error if the file cannot be read
 */
export async function readEmailSource(filePath: string): Promise<EmailSource> {
  const bytes = await fs.readFile(filePath);
  return { filename: path.basename(filePath), bytes };
}

/**
 * ParserFactory runs the container parser, then the text parser
 */
export class ParserFactory {
  private readonly containerParser: SourceParser<ContainerParseError>;
  private readonly textParser: SourceParser<TextParseError>;

  constructor(options: ParserFactoryOptions = {}) {
    this.containerParser = new MsgParser(options.openOutlookMessage);
    this.textParser = new EmlParser();
  }

  /**
   * Full canonical record of an email source
   */
  parseDetail(source: EmailSource): ParseResult<CanonicalEmail, ParseFailure> {
    return this.dispatch(
      source,
      () => this.containerParser.parseDetail(source),
      () => this.textParser.parseDetail(source)
    );
  }

  /**
   * Summary record of an email source
   */
  parseSummary(source: EmailSource): ParseResult<EmailSummary, ParseFailure> {
    return this.dispatch(
      source,
      () => this.containerParser.parseSummary(source),
      () => this.textParser.parseSummary(source)
    );
  }

  /**
   * Bytes of the attachment named exactly `name`
   *
   * `{ ok: true, value: undefined }` means the email parsed but has no such
   * attachment.
   */
  extractAttachment(source: EmailSource, name: string): ParseResult<Buffer | undefined, ParseFailure> {
    return this.dispatch(
      source,
      () => this.containerParser.extractAttachment(source, name),
      () => this.textParser.extractAttachment(source, name)
    );
  }

  /**
   * Parse an email file into its canonical record
   *
   * @returns The record, or undefined when the file is unreadable or unparsable
   */
  async parseDetailFile(filePath: string): Promise<CanonicalEmail | undefined> {
    const source = await this.load(filePath);
    return source ? this.unwrap(this.parseDetail(source)) : undefined;
  }

  /**
   * Summarize an email file
   *
   * @returns The summary, or undefined when the file is unreadable or unparsable
   */
  async parseSummaryFile(filePath: string): Promise<EmailSummary | undefined> {
    const source = await this.load(filePath);
    return source ? this.unwrap(this.parseSummary(source)) : undefined;
  }

  /**
   * Read one attachment of an email file
   *
   * @returns The attachment bytes, or undefined when the file cannot be
   * parsed or has no attachment with that exact name
   */
  async extractAttachmentFile(filePath: string, name: string): Promise<Buffer | undefined> {
    const source = await this.load(filePath);
    return source ? this.unwrap(this.extractAttachment(source, name)) : undefined;
  }

  /**
   * Run the container attempt, then the text attempt only if it failed
   */
  private dispatch<T>(
    source: EmailSource,
    tryContainer: () => ParseResult<T, ContainerParseError>,
    tryText: () => ParseResult<T, TextParseError>
  ): ParseResult<T, ParseFailure> {
    const container = tryContainer();
    if (container.ok) {
      return container;
    }

    logger.debug('ParserFactory', `Falling back to RFC-822 parsing: ${source.filename}`);

    const text = tryText();
    if (text.ok) {
      return text;
    }

    const failure = new ParseFailure(source.filename, container.error, text.error);

    logger.warn('ParserFactory', 'Unable to parse email in any supported format', {
      filename: source.filename,
      containerError: container.error.message,
      textError: text.error.message,
    });

    return fail(failure);
  }

  private async load(filePath: string): Promise<EmailSource | undefined> {
    try {
      return await readEmailSource(filePath);
    } catch (error) {
      logger.error('ParserFactory', 'Failed to read email file', error, { filePath });
      return undefined;
    }
  }

  private unwrap<T>(result: ParseResult<T, ParseFailure>): T | undefined {
    return result.ok ? result.value : undefined;
  }
}

/**
 * Shared factory using the msgreader-backed container opener
 */
export const parserFactory = new ParserFactory();

export default ParserFactory;
