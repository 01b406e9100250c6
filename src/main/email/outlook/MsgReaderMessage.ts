/**
 * OutlookMessage backed by @kenjiuno/msgreader
 *
 * msgreader exposes raw MAPI properties; this adapter maps them onto the
 * display fields the parsers read (sender formatting, recipient lists,
 * transport headers, lazily loaded attachment bytes).
 *
 * @module main/email/outlook/MsgReaderMessage
 */

import MsgReader from '@kenjiuno/msgreader';
import { logger } from '@/config/logger';
import { ContainerParseError } from '../errors';
import { CONTENT_CHAIN, decodeCharset } from '../decoding/charsets';
import { HeaderList } from '../mime/headers';
import type { OutlookAttachment, OutlookMessage } from './OutlookMessage';

/**
 * Subset of msgreader's FieldsData the engine reads
 */
export interface MsgFields {
  error?: string;
  subject?: string;
  senderName?: string;
  senderEmail?: string;
  senderSmtpAddress?: string;
  body?: string;
  bodyHtml?: string;
  html?: Uint8Array;
  internetCodepage?: number;
  headers?: string;
  clientSubmitTime?: string;
  messageDeliveryTime?: string;
  recipients?: MsgFields[];
  attachments?: MsgFields[];
  name?: string;
  email?: string;
  smtpAddress?: string;
  recipType?: string;
  fileName?: string;
  fileNameShort?: string;
  attachMimeTag?: string;
  pidContentId?: string;
}

/**
 * The part of a msgreader instance the adapter calls
 */
export interface MsgFieldsReader {
  getFileData(): MsgFields;
  getAttachment(index: number): { content: Uint8Array };
}

type ReaderConstructor = typeof MsgReader;

// The CommonJS default export arrives wrapped when loaded through Node's ESM loader
function resolveReaderConstructor(imported: ReaderConstructor | { default: ReaderConstructor }): ReaderConstructor {
  return typeof imported === 'function' ? imported : imported.default;
}

const Reader = resolveReaderConstructor(MsgReader);

function formatAddress(name: string | undefined, email: string | undefined): string | undefined {
  if (name && email && name !== email) {
    return `${name} <${email}>`;
  }
  return name || email || undefined;
}

/**
 * iconv-lite label for a Windows code page (PidTagInternetCodepage)
 */
export function codepageCharset(codepage: number | undefined): string | undefined {
  if (codepage === undefined || !Number.isInteger(codepage) || codepage <= 0) {
    return undefined;
  }
  if (codepage === 65001) {
    return 'utf-8';
  }
  if (codepage === 20127) {
    return 'us-ascii';
  }
  if (codepage >= 1250 && codepage <= 1258) {
    return `windows-${codepage}`;
  }
  return `cp${codepage}`;
}

class MsgReaderAttachment implements OutlookAttachment {
  private loaded = false;
  private bytes?: Buffer;

  constructor(
    private readonly reader: MsgFieldsReader,
    private readonly fields: MsgFields,
    private readonly index: number
  ) {}

  get longFilename(): string | undefined {
    return this.fields.fileName || undefined;
  }

  get shortFilename(): string | undefined {
    return this.fields.fileNameShort || undefined;
  }

  get mimetype(): string | undefined {
    return this.fields.attachMimeTag || undefined;
  }

  get contentId(): string | undefined {
    return this.fields.pidContentId || undefined;
  }

  /**
   * Loaded on first access; embedded messages and broken streams have no bytes
   */
  get data(): Buffer | undefined {
    if (!this.loaded) {
      this.loaded = true;
      try {
        this.bytes = Buffer.from(this.reader.getAttachment(this.index).content);
      } catch (error) {
        logger.debug('MsgReaderMessage', 'Attachment content unavailable', {
          index: this.index,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return this.bytes;
  }
}

export class MsgReaderMessage implements OutlookMessage {
  private readonly fields: MsgFields;
  private readonly transportHeaders: HeaderList;
  readonly attachments: readonly OutlookAttachment[];

  constructor(reader: MsgFieldsReader) {
    const fields: MsgFields = reader.getFileData();
    if (fields.error) {
      throw new ContainerParseError(`Not an Outlook message: ${fields.error}`);
    }

    this.fields = fields;
    this.transportHeaders = HeaderList.parse(fields.headers ?? '');
    this.attachments = (fields.attachments ?? []).map(
      (attachment, index) => new MsgReaderAttachment(reader, attachment, index)
    );
  }

  get subject(): string | undefined {
    return this.fields.subject;
  }

  get sender(): string | undefined {
    return formatAddress(this.fields.senderName, this.senderEmail);
  }

  get senderEmail(): string | undefined {
    return this.fields.senderSmtpAddress || this.fields.senderEmail || undefined;
  }

  get to(): string | undefined {
    return this.recipientList('to');
  }

  get cc(): string | undefined {
    return this.recipientList('cc');
  }

  get bcc(): string | undefined {
    return this.recipientList('bcc');
  }

  get body(): string | undefined {
    return this.fields.body;
  }

  /**
   * HTML body property, or the binary HTML stream when only that is stored
   */
  get htmlBody(): string | undefined {
    if (this.fields.bodyHtml) {
      return this.fields.bodyHtml;
    }
    if (this.fields.html && this.fields.html.length > 0) {
      return decodeCharset(
        Buffer.from(this.fields.html),
        codepageCharset(this.fields.internetCodepage),
        CONTENT_CHAIN,
        'content'
      );
    }
    return undefined;
  }

  get date(): string | undefined {
    return (
      this.transportHeaders.get('Date') ||
      this.fields.clientSubmitTime ||
      this.fields.messageDeliveryTime ||
      undefined
    );
  }

  get messageId(): string | undefined {
    return this.transportHeaders.get('Message-ID')?.trim() || undefined;
  }

  get header(): Readonly<Record<string, string>> {
    return this.transportHeaders.toRecord();
  }

  private recipientList(type: 'to' | 'cc' | 'bcc'): string | undefined {
    const entries = (this.fields.recipients ?? [])
      .filter((recipient) => recipient.recipType === type)
      .map((recipient) => formatAddress(recipient.name, recipient.smtpAddress || recipient.email))
      .filter((entry): entry is string => entry !== undefined);

    return entries.length > 0 ? entries.join('; ') : undefined;
  }
}

/**
 * Open Outlook .msg bytes
 *
 * @throws Error when the bytes are not a compound file holding a message
 */
export function openOutlookMessage(bytes: Buffer): OutlookMessage {
  const arrayBuffer = new ArrayBuffer(bytes.length);
  new Uint8Array(arrayBuffer).set(bytes);
  return new MsgReaderMessage(new Reader(arrayBuffer));
}
