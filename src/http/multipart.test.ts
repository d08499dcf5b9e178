import { describe, it, expect } from 'vitest';
import { multipartBoundary, parseMultipartBody } from './multipart.js';

const BOUNDARY = 'XyZ123';

function body(...parts: Buffer[]): Buffer {
  return Buffer.concat([...parts, Buffer.from(`--${BOUNDARY}--\r\n`)]);
}

function fieldPart(name: string, value: string): Buffer {
  return Buffer.from(
    `--${BOUNDARY}\r\nContent-Disposition: form-data; name="${name}"\r\n\r\n${value}\r\n`,
  );
}

function filePart(filename: string, type: string, data: Buffer): Buffer {
  return Buffer.concat([
    Buffer.from(
      `--${BOUNDARY}\r\nContent-Disposition: form-data; name="file"; filename="${filename}"\r\nContent-Type: ${type}\r\n\r\n`,
    ),
    data,
    Buffer.from('\r\n'),
  ]);
}

describe('multipartBoundary', () => {
  it('reads plain and quoted boundaries', () => {
    expect(multipartBoundary('multipart/form-data; boundary=abc')).toBe('abc');
    expect(multipartBoundary('multipart/form-data; boundary="a b"')).toBe('a b');
  });

  it('rejects other content types', () => {
    expect(multipartBoundary('application/json')).toBeNull();
    expect(multipartBoundary(undefined)).toBeNull();
  });
});

describe('parseMultipartBody', () => {
  it('separates fields from the file part', () => {
    const parsed = parseMultipartBody(
      body(fieldPart('note', 'hello'), filePart('cat.png', 'image/png', Buffer.from('PNGDATA'))),
      BOUNDARY,
    );
    expect(parsed.fields).toEqual({ note: 'hello' });
    expect(parsed.file?.filename).toBe('cat.png');
    expect(parsed.file?.contentType).toBe('image/png');
    expect(parsed.file?.data.toString()).toBe('PNGDATA');
  });

  it('keeps binary content byte for byte', () => {
    const bytes = Buffer.from([0x00, 0xff, 0x0d, 0x0a, 0x80, 0x7f]);
    const parsed = parseMultipartBody(body(filePart('b.bin', 'application/pdf', bytes)), BOUNDARY);
    expect(parsed.file?.data.equals(bytes)).toBe(true);
  });

  it('defaults the content type of a file part', () => {
    const part = Buffer.from(
      `--${BOUNDARY}\r\nContent-Disposition: form-data; name="file"; filename="x"\r\n\r\nabc\r\n`,
    );
    expect(parseMultipartBody(body(part), BOUNDARY).file?.contentType).toBe(
      'application/octet-stream',
    );
  });

  it('returns no file when none was sent', () => {
    expect(parseMultipartBody(body(fieldPart('a', '1')), BOUNDARY).file).toBeUndefined();
  });
});
