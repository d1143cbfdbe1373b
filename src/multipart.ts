const CRLF = Buffer.from('\r\n', 'latin1');
const HEADER_TERMINATOR = Buffer.from('\r\n\r\n', 'latin1');
const FILENAME_RE = /filename="([^"]*)"/i;

export interface MultipartFile {
  filename: string;
  content: Buffer;
}

export function parseBoundary(contentType: string | undefined): string | null {
  if (!contentType) {
    return null;
  }
  const [mediaType, ...params] = contentType.split(';');
  if (!mediaType || !mediaType.trim().toLowerCase().startsWith('multipart/')) {
    return null;
  }
  for (const param of params) {
    const eq = param.indexOf('=');
    if (eq < 0) {
      continue;
    }
    const key = param.slice(0, eq).trim().toLowerCase();
    if (key !== 'boundary') {
      continue;
    }
    const value = param
      .slice(eq + 1)
      .trim()
      .replace(/^"(.*)"$/, '$1');
    return value || null;
  }
  return null;
}

function indexOfBytes(haystack: Buffer, needle: Buffer, from = 0): number {
  if (needle.length === 0) {
    return -1;
  }
  return haystack.indexOf(needle, from);
}

function toBaseFilename(raw: string): string | null {
  const segments = raw.split(/[\\/]/);
  const base = (segments[segments.length - 1] ?? '').trim();
  if (!base || base === '.' || base === '..' || base.includes('\0')) {
    return null;
  }
  return base;
}

/**
 * Extracts the first file part from a `multipart/form-data` body.
 * Returns null when the boundary, the part headers, a filename or the
 * closing delimiter cannot be found.
 */
export function parseMultipartFile(contentType: string | undefined, body: Buffer): MultipartFile | null {
  const boundary = parseBoundary(contentType);
  if (!boundary) {
    return null;
  }
  const delimiter = Buffer.from(`--${boundary}`, 'latin1');
  const closeDelimiter = Buffer.from(`--${boundary}--`, 'latin1');

  const start = indexOfBytes(body, delimiter);
  if (start < 0) {
    return null;
  }
  const headerStart = start + delimiter.length;
  const headerEnd = indexOfBytes(body, HEADER_TERMINATOR, headerStart);
  if (headerEnd < 0) {
    return null;
  }
  const contentStart = headerEnd + HEADER_TERMINATOR.length;

  const headerText = body.subarray(headerStart, headerEnd).toString('utf8');
  const match = FILENAME_RE.exec(headerText);
  const filename = match ? toBaseFilename(match[1] ?? '') : null;
  if (!filename) {
    return null;
  }

  const end = indexOfBytes(body, closeDelimiter, contentStart);
  if (end < 0) {
    return null;
  }

  // The CRLF in front of a delimiter belongs to the delimiter, not the content.
  let contentEnd = end;
  if (contentEnd - contentStart >= CRLF.length && body.subarray(contentEnd - CRLF.length, contentEnd).equals(CRLF)) {
    contentEnd -= CRLF.length;
  }

  return {
    filename,
    content: Buffer.from(body.subarray(contentStart, contentEnd))
  };
}
