/**
 * MIME parsing unit tests
 *
 * Header blocks, structured parameters (RFC 2231) and multipart trees.
 */

import { describe, it, expect } from 'vitest';
import {
  HeaderList,
  parseHeaderFields,
  parseParameterizedValue,
  unfoldHeaders,
} from '@/email/mime/headers';
import {
  isLeaf,
  isMultipart,
  mediaType,
  parseMimeMessage,
  splitHeaderAndBody,
  splitMultipart,
  walkParts,
} from '@/email/mime/MimeTree';

function crlf(lines: string[]): Buffer {
  return Buffer.from(lines.join('\r\n'));
}

describe('header fields', () => {
  it('should unfold continuation lines', () => {
    expect(unfoldHeaders('Subject: Hello\r\n World\r\nTo: a@example.com')).toBe(
      'Subject: Hello World\r\nTo: a@example.com'
    );
  });

  it('should skip lines that are not fields', () => {
    const fields = parseHeaderFields('Subject: Hi\nnot a header\n: empty name\nBad Name: x\nX-Test:  1 ');

    expect(fields).toEqual([
      { name: 'Subject', value: 'Hi' },
      { name: 'X-Test', value: '1' },
    ]);
  });

  it('should look up names case-insensitively', () => {
    const headers = HeaderList.parse('Received: first\nreceived: second\nSubject: Hi');

    expect(headers.size).toBe(3);
    expect(headers.get('RECEIVED')).toBe('first');
    expect(headers.getAll('Received')).toEqual(['first', 'second']);
    expect(headers.get('Missing')).toBeUndefined();
  });

  it('should keep the last value of a repeated name in records', () => {
    const headers = HeaderList.parse('X-Tag: one\nX-Tag: two');
    expect(headers.toRecord()).toEqual({ 'X-Tag': 'two' });
  });

  it('should keep a field named __proto__ as a plain key', () => {
    const record = HeaderList.parse('From: a@example.com\n__proto__: x\nSubject: Hi').toRecord();

    expect(Object.keys(record)).toEqual(['From', '__proto__', 'Subject']);
    expect(Object.getOwnPropertyDescriptor(record, '__proto__')?.value).toBe('x');
    expect(Object.getPrototypeOf(record)).toBe(Object.prototype);
  });
});

describe('parseParameterizedValue', () => {
  it('should parse a quoted parameter', () => {
    expect(parseParameterizedValue('text/plain; charset="utf-8"')).toEqual({
      value: 'text/plain',
      params: { charset: 'utf-8' },
    });
  });

  it('should lowercase the value and parameter names only', () => {
    expect(parseParameterizedValue('Text/HTML; Charset=ISO-8859-1')).toEqual({
      value: 'text/html',
      params: { charset: 'ISO-8859-1' },
    });
  });

  it('should keep semicolons and escapes inside quotes', () => {
    expect(parseParameterizedValue('attachment; filename="a;b.txt"').params.filename).toBe('a;b.txt');
    expect(parseParameterizedValue('attachment; filename="say \\"hi\\".txt"').params.filename).toBe(
      'say "hi".txt'
    );
  });

  it('should decode RFC 2231 extended values', () => {
    const parsed = parseParameterizedValue("attachment; filename*=UTF-8''r%C3%A9sum%C3%A9.pdf");
    expect(parsed.params.filename).toBe('résumé.pdf');
  });

  it('should join RFC 2231 continuations in order', () => {
    expect(parseParameterizedValue('attachment; filename*1="name.txt"; filename*0="long"').params.filename).toBe(
      'longname.txt'
    );
  });

  it('should join encoded continuations at the byte level', () => {
    const parsed = parseParameterizedValue("attachment; filename*0*=UTF-8''caf%C3; filename*1*=%A9.txt");
    expect(parsed.params.filename).toBe('café.txt');
  });

  it('should prefer extended parameters over plain ones', () => {
    const parsed = parseParameterizedValue("attachment; filename=\"fallback.txt\"; filename*=UTF-8''real.txt");
    expect(parsed.params.filename).toBe('real.txt');
  });

  it('should return an empty value for missing headers', () => {
    expect(parseParameterizedValue(undefined)).toEqual({ value: '', params: {} });
  });

  it('should keep a parameter named __proto__ as a plain key', () => {
    const { params } = parseParameterizedValue('text/plain; __proto__=x; charset=utf-8');
    expect(Object.keys(params)).toEqual(['__proto__', 'charset']);
  });
});

describe('splitHeaderAndBody', () => {
  it('should split at the first empty line with either line ending', () => {
    const crlfSplit = splitHeaderAndBody(Buffer.from('A: 1\r\nB: 2\r\n\r\nbody\r\n'));
    expect(crlfSplit.header.toString()).toBe('A: 1\r\nB: 2\r\n');
    expect(crlfSplit.body.toString()).toBe('body\r\n');

    const lfSplit = splitHeaderAndBody(Buffer.from('A: 1\n\nbody'));
    expect(lfSplit.header.toString()).toBe('A: 1\n');
    expect(lfSplit.body.toString()).toBe('body');
  });

  it('should treat a leading empty line as an empty header block', () => {
    const split = splitHeaderAndBody(Buffer.from('\r\nbody only'));
    expect(split.header.length).toBe(0);
    expect(split.body.toString()).toBe('body only');
  });

  it('should treat input without an empty line as headers only', () => {
    const split = splitHeaderAndBody(Buffer.from('A: 1\nB: 2'));
    expect(split.header.toString()).toBe('A: 1\nB: 2');
    expect(split.body.length).toBe(0);
  });
});

describe('splitMultipart', () => {
  it('should drop the preamble and epilogue', () => {
    const body = crlf(['preamble', '--b1', '', 'one', '--b1', '', 'two', '--b1--', 'epilogue']);
    expect(splitMultipart(body, 'b1').map((part) => part.toString())).toEqual(['\r\none', '\r\ntwo']);
  });

  it('should only accept delimiters at the start of a line', () => {
    const body = crlf(['--b1', '', 'see --b1 inline', '--b1X', 'still one', '--b1--']);
    expect(splitMultipart(body, 'b1').map((part) => part.toString())).toEqual([
      '\r\nsee --b1 inline\r\n--b1X\r\nstill one',
    ]);
  });

  it('should keep the last part when the close delimiter is missing', () => {
    const body = Buffer.from('--b1\n\nfirst\n--b1\n\nsecond\n');
    expect(splitMultipart(body, 'b1').map((part) => part.toString())).toEqual(['\nfirst', '\nsecond\n']);
  });
});

describe('parseMimeMessage', () => {
  const message = crlf([
    'From: sender@example.com',
    'Subject: Test',
    'Content-Type: multipart/mixed; boundary="outer"',
    '',
    'This is a multi-part message.',
    '--outer',
    'Content-Type: text/plain; charset=utf-8',
    '',
    'Hello',
    '--outer',
    'Content-Type: application/pdf; name="r.pdf"',
    'Content-Disposition: attachment; filename="r.pdf"',
    'Content-Transfer-Encoding: BASE64',
    '',
    'JVBERi0=',
    '--outer--',
    '',
  ]);

  it('should build a tree of parts', () => {
    const root = parseMimeMessage(message);

    expect(root.headers.get('subject')).toBe('Test');
    expect(root.contentType).toBe('multipart/mixed');
    expect(root.contentTypeParams.boundary).toBe('outer');
    expect(isMultipart(root)).toBe(true);
    expect(root.children).toHaveLength(2);
  });

  it('should record part metadata', () => {
    const [text, pdf] = parseMimeMessage(message).children;

    expect(text.contentType).toBe('text/plain');
    expect(text.charset).toBe('utf-8');
    expect(text.transferEncoding).toBe('7bit');
    expect(text.body.toString()).toBe('Hello');

    expect(pdf.disposition).toBe('attachment');
    expect(pdf.dispositionParams.filename).toBe('r.pdf');
    expect(pdf.contentTypeParams.name).toBe('r.pdf');
    expect(pdf.transferEncoding).toBe('base64');
    expect(pdf.body.toString()).toBe('JVBERi0=');
  });

  it('should walk parts depth-first with the root first', () => {
    const types = [...walkParts(parseMimeMessage(message))].map(mediaType);
    expect(types).toEqual(['multipart/mixed', 'text/plain', 'application/pdf']);
  });

  it('should parse an attached message as a child', () => {
    const root = parseMimeMessage(
      crlf(['Content-Type: message/rfc822', '', 'Subject: Inner', 'Content-Type: text/html', '', '<p>Hi</p>'])
    );

    expect(root.children).toHaveLength(1);
    expect(root.children[0].headers.get('Subject')).toBe('Inner');
    expect(root.children[0].body.toString()).toBe('<p>Hi</p>');
  });

  it('should default a missing Content-Type to text/plain', () => {
    const root = parseMimeMessage(Buffer.from('Subject: Plain\n\nJust text'));

    expect(root.contentType).toBeUndefined();
    expect(mediaType(root)).toBe('text/plain');
    expect(isLeaf(root)).toBe(true);
  });

  it('should treat a multipart without parts as a container', () => {
    const root = parseMimeMessage(Buffer.from('Content-Type: multipart/mixed; boundary=x\n\nno parts here'));

    expect(root.children).toHaveLength(0);
    expect(isLeaf(root)).toBe(false);
  });

  it('should read 8-bit header bytes as latin-1 when they are not UTF-8', () => {
    const root = parseMimeMessage(Buffer.from([...Buffer.from('Subject: caf'), 0xe9, 0x0a, 0x0a]));
    expect(root.headers.get('Subject')).toBe('café');
  });
});
