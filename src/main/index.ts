/**
 * Library entry point
 *
 * Dispatcher, component functions and record types of the email
 * normalization engine.
 */

export {
  ParserFactory,
  parserFactory,
  readEmailSource,
  type ParserFactoryOptions,
} from './email/parsers/ParserFactory';
export { MsgParser } from './email/parsers/MsgParser';
export { EmlParser } from './email/parsers/EmlParser';
export type {
  CanonicalEmail,
  EmailSource,
  EmailSummary,
  PublicAttachment,
  SourceFormat,
  SourceParser,
} from './email/parsers/EmailParser';
export { NO_SUBJECT, UNKNOWN_SENDER } from './email/parsers/fieldResolvers';

export { decodeHeader } from './email/decoding/HeaderDecoder';
export { decodeContent, cleanEncodedArtifacts } from './email/decoding/ContentDecoder';
export { extractBodies, extractOutlookBodies, cleanHtml, type ExtractedBodies } from './email/BodyExtractor';
export {
  buildContentIdMap,
  inlineReferences,
  type ContentIdMap,
  type ContentIdSource,
} from './email/ContentIdResolver';
export {
  listAttachments,
  findAttachment,
  type AttachmentMeta,
  type AttachmentSource,
} from './email/AttachmentExtractor';
export { parseMimeMessage, type MimePart } from './email/mime/MimeTree';
export { openOutlookMessage } from './email/outlook/MsgReaderMessage';
export type {
  OutlookAttachment,
  OutlookMessage,
  OutlookMessageOpener,
} from './email/outlook/OutlookMessage';

export {
  EmailParseError,
  ContainerParseError,
  TextParseError,
  ParseFailure,
  type ParseResult,
  type DecodeDegradation,
} from './email/errors';
export { ConfigurationError } from './config/ConfigManager';
