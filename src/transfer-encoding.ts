/**
 * Standard transfer codings, as registered with IANA.
 * https://www.iana.org/assignments/http-parameters/http-parameters.xhtml#transfer-coding
 * @public
 */

export const STD_TRANSFER_ENCODINGS = ['chunked', 'compress', 'deflate', 'gzip'] as const;

export type StdTransferEncoding = typeof STD_TRANSFER_ENCODINGS[number];

/**
 * A single coding from a Transfer-Encoding header.
 *
 * An `other` coding keeps `[start, end)`, the offsets of its name in the
 * header it was parsed from, and is only meaningful against that same
 * string. `name` is a copy of that span, kept for convenience.
 * @public
 */

export type TransferEncoding =
  | {type: 'std', encoding: StdTransferEncoding}
  | {type: 'other', name: string, start: number, end: number};

export function isOws(code: number) {
  return code === 0x20 /*   */ || code === 0x09; /* \t */
}

// rfc7230 section 4.2.1 and 4.2.3
const ALIASES: ReadonlyArray<[string, StdTransferEncoding]> = [
  ['x-gzip', 'gzip'],
  ['x-compress', 'compress'],
];

/**
 * Compare `value[start, end)` against a lowercase ASCII name,
 * folding only A-Z.
 *
 * @private
 */

export function equalsIgnoreAsciiCase(value: string, start: number, end: number, name: string) {
  if (end - start !== name.length) return false;

  for (let i = 0; i < name.length; i++) {
    let code = value.charCodeAt(start + i);
    if (code >= 0x41 && code <= 0x5a) code |= 0x20; /* A-Z */
    if (code !== name.charCodeAt(i)) return false;
  }

  return true;
}

function matchStd(value: string, start: number, end: number): StdTransferEncoding | undefined {
  for (const name of STD_TRANSFER_ENCODINGS) {
    if (equalsIgnoreAsciiCase(value, start, end, name)) return name;
  }

  for (const [alias, name] of ALIASES) {
    if (equalsIgnoreAsciiCase(value, start, end, alias)) return name;
  }

  return undefined;
}

/**
 * Lowercase A-Z only, leaving every other character as it is.
 *
 * @private
 */

export function toAsciiLowerCase(value: string) {
  return value.replace(/[A-Z]/g, function (c) {
    return String.fromCharCode(c.charCodeAt(0) | 0x20);
  });
}

/**
 * Parse a standard transfer coding name. Names are case-insensitive
 * (rfc7230 section 4).
 *
 * @public
 */

export function parseStdTransferEncoding(token: string) {
  return matchStd(token, 0, token.length);
}

/**
 * Classify an already trimmed span of `value`.
 *
 * @public
 */

export function classifyTransferEncoding(value: string, start = 0, end = value.length): TransferEncoding {
  const encoding = matchStd(value, start, end);
  if (encoding) return {type: 'std', encoding};

  return {type: 'other', name: value.slice(start, end), start, end};
}

/**
 * Classify a single coding, ignoring surrounding spaces and tabs.
 *
 * An empty or blank token is an `other` coding with an empty name.
 * @public
 */

export function parseTransferEncodingToken(token: string) {
  let start = 0;
  let end = token.length;

  while (start < end && isOws(token.charCodeAt(start))) start++;
  while (end > start && isOws(token.charCodeAt(end - 1))) end--;

  return classifyTransferEncoding(token, start, end);
}

export function transferEncodingName(encoding: TransferEncoding) {
  return encoding.type === 'std' ? encoding.encoding : encoding.name;
}
