import type { IncomingMessage } from 'node:http';

export interface MultipartFile {
  filename: string;
  contentType: string;
  data: Buffer;
}

export interface ParsedMultipart {
  fields: Record<string, string>;
  file?: MultipartFile;
}

export class BodyTooLargeError extends Error {
  constructor(readonly limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = 'BodyTooLargeError';
  }
}

/** The boundary of a `multipart/form-data` Content-Type header, if any. */
export function multipartBoundary(contentType: string | undefined): string | null {
  if (!contentType?.toLowerCase().startsWith('multipart/form-data')) return null;
  const match = /boundary=(?:"([^"]+)"|([^;]+))/i.exec(contentType);
  return match?.[1] ?? match?.[2]?.trim() ?? null;
}

/** Buffer a request body, rejecting once it grows past `maxBytes`. */
export function readBody(req: IncomingMessage, maxBytes: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > maxBytes) {
        req.destroy();
        reject(new BodyTooLargeError(maxBytes));
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => resolve(Buffer.concat(chunks)));
    req.on('error', reject);
  });
}

/**
 * Split a multipart/form-data body into text fields and the first file part.
 * Parts are located on the raw bytes so binary file content is preserved.
 */
export function parseMultipartBody(body: Buffer, boundary: string): ParsedMultipart {
  const delimiter = Buffer.from(`--${boundary}`);
  const fields: Record<string, string> = {};
  let file: MultipartFile | undefined;

  let pos = body.indexOf(delimiter);
  while (pos !== -1) {
    const start = pos + delimiter.length;
    // "--" right after a delimiter closes the body
    if (body.subarray(start, start + 2).toString('latin1') === '--') break;
    const next = body.indexOf(delimiter, start);
    if (next === -1) break;

    // Each part sits between "\r\n" after the delimiter and "\r\n" before the next one.
    const part = body.subarray(start + 2, next - 2);
    const headerEnd = part.indexOf('\r\n\r\n');
    if (headerEnd !== -1) {
      const headers = part.subarray(0, headerEnd).toString('utf8');
      const content = part.subarray(headerEnd + 4);

      const name = /name="([^"]*)"/i.exec(headers)?.[1];
      const filename = /filename="([^"]*)"/i.exec(headers)?.[1];
      const contentType = /Content-Type:\s*([^\r\n]+)/i.exec(headers)?.[1]?.trim();

      if (filename !== undefined) {
        file ??= {
          filename,
          contentType: contentType ?? 'application/octet-stream',
          data: content,
        };
      } else if (name !== undefined) {
        fields[name] = content.toString('utf8');
      }
    }
    pos = next;
  }

  return { fields, file };
}

export async function parseMultipart(
  req: IncomingMessage,
  boundary: string,
  maxBytes: number,
): Promise<ParsedMultipart> {
  return parseMultipartBody(await readBody(req, maxBytes), boundary);
}
