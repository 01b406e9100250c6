/**
 * BodyExtractor unit tests
 */

import { describe, it, expect } from 'vitest';
import { cleanHtml, extractBodies, extractOutlookBodies, looksLikeHtml } from '@/email/BodyExtractor';
import { parseMimeMessage } from '@/email/mime/MimeTree';
import type { OutlookMessage } from '@/email/outlook/OutlookMessage';

function message(lines: string[]) {
  return parseMimeMessage(Buffer.from(lines.join('\r\n')));
}

function outlookMessage(fields: Partial<OutlookMessage>): OutlookMessage {
  return { header: {}, attachments: [], ...fields };
}

describe('looksLikeHtml', () => {
  it('should detect markup', () => {
    expect(looksLikeHtml('  <div>Hi</div>')).toBe(true);
    expect(looksLikeHtml('Preface <HTML><body></body></HTML>')).toBe(true);
  });

  it('should not flag plain text', () => {
    expect(looksLikeHtml('a < b is true')).toBe(false);
  });
});

describe('cleanHtml', () => {
  it('should decode stray quoted-printable', () => {
    expect(cleanHtml('<p style=3D"color:red">Hi=20there</p>')).toBe('<p style="color:red">Hi there</p>');
  });

  it('should leave markup without escape markers alone', () => {
    expect(cleanHtml('<a href="https://example.com/?a=1">link</a>')).toBe(
      '<a href="https://example.com/?a=1">link</a>'
    );
  });

  it('should strip soft hyphen entities', () => {
    expect(cleanHtml('<p>co&shy;operate</p>')).toBe('<p>cooperate</p>');
  });

  it('should return an empty string for empty input', () => {
    expect(cleanHtml('')).toBe('');
  });
});

describe('extractBodies', () => {
  it('should read a single text/plain part as the plain body', () => {
    const bodies = extractBodies(message(['Content-Type: text/plain; charset=utf-8', '', 'Hello there']));
    expect(bodies).toEqual({ plainBody: 'Hello there', htmlBody: '' });
  });

  it('should read a single text/html part as the HTML body', () => {
    const bodies = extractBodies(message(['Content-Type: text/html', '', '<p>Hi</p>']));
    expect(bodies).toEqual({ plainBody: '', htmlBody: '<p>Hi</p>' });
  });

  it('should extract both alternatives without promotion', () => {
    const bodies = extractBodies(
      message([
        'Content-Type: multipart/alternative; boundary=alt',
        '',
        '--alt',
        'Content-Type: text/plain',
        '',
        'Plain version',
        '--alt',
        'Content-Type: text/html',
        'Content-Transfer-Encoding: quoted-printable',
        '',
        '<p>caf=C3=A9</p>',
        '--alt--',
      ])
    );

    expect(bodies).toEqual({ plainBody: 'Plain version', htmlBody: '<p>café</p>' });
  });

  it('should keep the first non-empty part of each type', () => {
    const bodies = extractBodies(
      message([
        'Content-Type: multipart/mixed; boundary=mix',
        '',
        '--mix',
        'Content-Type: text/plain',
        '',
        '',
        '--mix',
        'Content-Type: text/plain',
        '',
        'first',
        '--mix',
        'Content-Type: text/plain',
        '',
        'second',
        '--mix--',
      ])
    );

    expect(bodies).toEqual({ plainBody: 'first', htmlBody: '' });
  });

  it('should find bodies in nested multiparts', () => {
    const bodies = extractBodies(
      message([
        'Content-Type: multipart/mixed; boundary=outer',
        '',
        '--outer',
        'Content-Type: multipart/alternative; boundary=inner',
        '',
        '--inner',
        'Content-Type: text/html',
        '',
        '<b>Nested</b>',
        '--inner--',
        '--outer',
        'Content-Type: application/pdf',
        'Content-Disposition: attachment; filename=a.pdf',
        '',
        'data',
        '--outer--',
      ])
    );

    expect(bodies).toEqual({ plainBody: '', htmlBody: '<b>Nested</b>' });
  });

  it('should promote markup found in the plain body', () => {
    const bodies = extractBodies(message(['Content-Type: text/plain', '', '<html><body>Hi</body></html>']));
    expect(bodies).toEqual({
      plainBody: '<html><body>Hi</body></html>',
      htmlBody: '<html><body>Hi</body></html>',
    });
  });

  it('should use the markup heuristic for other single-part types', () => {
    expect(extractBodies(message(['Content-Type: application/xhtml+xml', '', '<p>x</p>']))).toEqual({
      plainBody: '',
      htmlBody: '<p>x</p>',
    });
    expect(extractBodies(message(['Content-Type: application/octet-stream', '', 'raw text']))).toEqual({
      plainBody: 'raw text',
      htmlBody: '',
    });
  });
});

describe('extractOutlookBodies', () => {
  it('should take the first non-blank HTML candidate', () => {
    const bodies = extractOutlookBodies(outlookMessage({ body: 'Plain', htmlBody: '  ', bodyHTML: '<b>B</b>' }));
    expect(bodies).toEqual({ plainBody: 'Plain', htmlBody: '<b>B</b>' });
  });

  it('should keep the stored plain body as is', () => {
    const bodies = extractOutlookBodies(outlookMessage({ body: 'Line one\r\nLine two' }));
    expect(bodies).toEqual({ plainBody: 'Line one\r\nLine two', htmlBody: '' });
  });

  it('should promote a plain body that is markup', () => {
    const bodies = extractOutlookBodies(outlookMessage({ body: '<html>x</html>' }));
    expect(bodies).toEqual({ plainBody: '<html>x</html>', htmlBody: '<html>x</html>' });
  });

  it('should return empty bodies for an empty message', () => {
    expect(extractOutlookBodies(outlookMessage({}))).toEqual({ plainBody: '', htmlBody: '' });
  });
});
