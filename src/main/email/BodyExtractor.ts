/**
 * BodyExtractor - plain text and HTML bodies
 *
 * Multipart messages: the first non-empty text/plain and the first
 * non-empty text/html part in depth-first order win. Single-part messages
 * go by declared type, with a markup heuristic for anything else. Plain
 * text that is really markup gets promoted to the HTML body.
 *
 * @module main/email/BodyExtractor
 */

import { logger } from '@/config/logger';
import { cleanEncodedArtifacts, decodeContent } from './decoding/ContentDecoder';
import { decodeQuotedPrintable } from './decoding/quotedPrintable';
import { isMultipart, mediaType, walkParts, type MimePart } from './mime/MimeTree';
import type { OutlookMessage } from './outlook/OutlookMessage';

export interface ExtractedBodies {
  plainBody: string;
  htmlBody: string;
}

const QP_MARKERS = ['=20', '=3D', '=0D', '=0A'];
const SOFT_HYPHEN_ENTITY = /&shy;/g;

/**
 * Markup heuristic: starts with `<` once trimmed, or contains `<html`
 */
export function looksLikeHtml(content: string): boolean {
  return content.trim().startsWith('<') || content.toLowerCase().includes('<html');
}

/**
 * Clean HTML content
 *
 * Decodes stray quoted-printable left in the markup, strips soft-hyphen
 * entities, then runs the encoded-artifact cleanup.
 */
export function cleanHtml(html: string): string {
  if (!html) {
    return '';
  }

  let content = html;
  if (content.includes('=') && QP_MARKERS.some((marker) => content.includes(marker))) {
    content = decodeQuotedPrintable(Buffer.from(content, 'utf8')).toString('utf8');
  }

  return cleanEncodedArtifacts(content.replace(SOFT_HYPHEN_ENTITY, ''));
}

function decodePart(part: MimePart): string {
  if (part.body.length === 0) {
    return '';
  }
  return decodeContent(part.body, part.transferEncoding, part.charset);
}

function promote(bodies: ExtractedBodies): ExtractedBodies {
  if (!bodies.htmlBody && bodies.plainBody && looksLikeHtml(bodies.plainBody)) {
    logger.debug('BodyExtractor', 'Promoting markup found in plain body to HTML body');
    return { plainBody: bodies.plainBody, htmlBody: cleanHtml(bodies.plainBody) };
  }
  return bodies;
}

/**
 * Extract plain and HTML bodies from a MIME tree
 *
 * @returns Both bodies; an absent body is an empty string
 */
export function extractBodies(message: MimePart): ExtractedBodies {
  let plainBody = '';
  let htmlBody = '';

  if (isMultipart(message)) {
    for (const part of walkParts(message)) {
      const type = mediaType(part);
      if (type === 'text/plain' && !plainBody) {
        plainBody = decodePart(part);
      } else if (type === 'text/html' && !htmlBody) {
        htmlBody = cleanHtml(decodePart(part));
      }
      if (plainBody && htmlBody) break;
    }
  } else {
    const content = decodePart(message);
    const type = mediaType(message);

    if (type === 'text/plain') {
      plainBody = content;
    } else if (type === 'text/html') {
      htmlBody = cleanHtml(content);
    } else if (looksLikeHtml(content)) {
      htmlBody = cleanHtml(content);
    } else {
      plainBody = content;
    }
  }

  return promote({ plainBody, htmlBody });
}

/**
 * Extract bodies from an Outlook message
 *
 * The plain body is taken as stored; the HTML body gets the same cleanup
 * and promotion as RFC-822 messages.
 */
export function extractOutlookBodies(message: OutlookMessage): ExtractedBodies {
  const storedHtml = [message.htmlBody, message.bodyHTML, message.bodyHtml].find(
    (candidate): candidate is string => typeof candidate === 'string' && candidate.trim().length > 0
  );

  return promote({
    plainBody: message.body ?? '',
    htmlBody: storedHtml ? cleanHtml(storedHtml) : '',
  });
}
