/**
 * ContentIdResolver - inline `cid:` references
 *
 * Builds a map from Content-ID to a base64 data URI and rewrites `cid:`
 * references in HTML so the markup renders without the original message.
 *
 * @module main/email/ContentIdResolver
 */

import { logger } from '@/config/logger';
import { partPayload, resolveContentType, partFilename, outlookFilename } from './AttachmentExtractor';
import { isLeaf, walkParts, type MimePart } from './mime/MimeTree';
import type { OutlookMessage } from './outlook/OutlookMessage';

/** Content-ID (without angle brackets) → data URI */
export type ContentIdMap = Map<string, string>;

export interface ContentIdSource {
  contentId?: string;
  contentType: string;
  payload?: Buffer;
}

const CID_ATTRIBUTE = /(?<![\w-])(src|href)\s*=\s*["']cid:([^"']+)["']/gi;
const CID_CSS_URL = /url\(["']cid:([^"']+)["']\)/gi;

/**
 * Trim whitespace and surrounding angle brackets: `<logo@x>` → `logo@x`
 */
export function normalizeContentId(contentId: string): string {
  return contentId.trim().replace(/^[<>]+|[<>]+$/g, '');
}

export function toDataUri(contentType: string, payload: Buffer): string {
  return `data:${contentType};base64,${payload.toString('base64')}`;
}

/**
 * Map every source that has both a Content-ID and bytes
 *
 * A later source with the same id replaces an earlier one.
 */
export function buildContentIdMap(sources: Iterable<ContentIdSource>): ContentIdMap {
  const map: ContentIdMap = new Map();

  for (const source of sources) {
    if (!source.contentId || !source.payload || source.payload.length === 0) {
      continue;
    }
    const id = normalizeContentId(source.contentId);
    if (id) {
      map.set(id, toDataUri(source.contentType, source.payload));
    }
  }

  return map;
}

/**
 * Content-ID sources of a MIME tree: every leaf part carrying a Content-ID
 */
export function mimeContentIdSources(root: MimePart): ContentIdSource[] {
  return [...walkParts(root)]
    .filter((part) => isLeaf(part) && part.headers.get('Content-ID'))
    .map((part) => ({
      contentId: part.headers.get('Content-ID'),
      contentType: resolveContentType(part.contentType, partFilename(part)),
      payload: partPayload(part),
    }));
}

/**
 * Content-ID sources of an Outlook message: its attachments
 */
export function outlookContentIdSources(message: OutlookMessage): ContentIdSource[] {
  return message.attachments
    .filter((attachment) => attachment.contentId)
    .map((attachment) => ({
      contentId: attachment.contentId,
      contentType: resolveContentType(attachment.mimetype, outlookFilename(attachment)),
      payload: attachment.data,
    }));
}

/**
 * Replace `cid:` references with data URIs
 *
 * Rewrites `src="cid:X"`, `href="cid:X"` (any quote style and case) and
 * CSS `url('cid:X')`. References missing from the map stay untouched.
 *
 * @example
 * ```typescript
 * inlineReferences('<img src="cid:logo123">', new Map([['logo123', 'data:image/png;base64,AAA=']]))
 * // '<img src="data:image/png;base64,AAA=">'
 * ```
 */
export function inlineReferences(html: string, map: ContentIdMap): string {
  if (!html || map.size === 0) {
    return html;
  }

  let replaced = 0;

  const withAttributes = html.replace(CID_ATTRIBUTE, (match: string, attribute: string, contentId: string) => {
    const dataUri = map.get(normalizeContentId(contentId));
    if (!dataUri) {
      return match;
    }
    replaced++;
    return `${attribute}="${dataUri}"`;
  });

  const result = withAttributes.replace(CID_CSS_URL, (match: string, contentId: string) => {
    const dataUri = map.get(normalizeContentId(contentId));
    if (!dataUri) {
      return match;
    }
    replaced++;
    return `url('${dataUri}')`;
  });

  logger.debug('ContentIdResolver', 'Inlined cid references', { replaced, available: map.size });

  return result;
}
