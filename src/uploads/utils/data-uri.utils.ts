import { isBase64 } from 'class-validator';

const DATA_URI_SCHEME = 'data:';
const BASE64_PARAMETER = 'base64';

/**
 * Structural view of a `data:<mime>;<parameters>,<payload>` string
 */
export interface ParsedDataUri {
  mimeType: string;
  /**
   * Text between the first `;` and the next `,`, or everything after the
   * `;` when no comma follows
   */
  parameters: string;
  /**
   * Text after that comma, null when there is none
   */
  payload: string | null;
}

/**
 * Split a data URI on its first `:`, first `;` and the following `,`.
 * Returns null when the scheme is missing, no `;` follows the MIME type,
 * or the MIME type is empty.
 */
export function parseDataUri(dataUri: string): ParsedDataUri | null {
  if (!dataUri.startsWith(DATA_URI_SCHEME)) {
    return null;
  }

  const rest = dataUri.slice(DATA_URI_SCHEME.length);
  const semicolonIndex = rest.indexOf(';');
  if (semicolonIndex <= 0) {
    return null;
  }

  const mimeType = rest.slice(0, semicolonIndex);
  const afterMime = rest.slice(semicolonIndex + 1);
  const commaIndex = afterMime.indexOf(',');

  if (commaIndex === -1) {
    return { mimeType, parameters: afterMime, payload: null };
  }

  return {
    mimeType,
    parameters: afterMime.slice(0, commaIndex),
    payload: afterMime.slice(commaIndex + 1),
  };
}

/**
 * Parse a data URI of the exact form `data:<mime>;base64,<payload>`
 */
export function parseBase64DataUri(
  dataUri: string,
): (ParsedDataUri & { payload: string }) | null {
  const parsed = parseDataUri(dataUri);
  if (!parsed || parsed.parameters !== BASE64_PARAMETER) {
    return null;
  }

  const { payload } = parsed;
  return payload === null ? null : { ...parsed, payload };
}

/**
 * Decoded byte length of a standard, padded base64 payload.
 * Empty or invalid payloads yield null.
 */
export function decodedBase64Size(payload: string): number | null {
  if (payload.length === 0 || !isBase64(payload)) {
    return null;
  }

  return Buffer.from(payload, 'base64').length;
}
