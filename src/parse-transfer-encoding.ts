import {classifyTransferEncoding, isOws, type TransferEncoding} from './transfer-encoding';

/**
 * Lazily walks a Transfer-Encoding header value, one coding per `next()`.
 *
 * The parser is single-pass: once it reports `done` it stays done, and a new
 * parser has to be created to read the header again.
 * @public
 */

export class TransferEncodingParser implements IterableIterator<TransferEncoding> {
  private pos = 0;

  constructor(private readonly header: string) {}

  next(): IteratorResult<TransferEncoding, undefined> {
    const str = this.header;
    const len = str.length;

    while (this.pos < len) {
      let start = this.pos;
      let end = str.indexOf(',', start);
      if (end === -1) end = len;

      this.pos = end + 1;

      while (start < end && isOws(str.charCodeAt(start))) start++;
      while (end > start && isOws(str.charCodeAt(end - 1))) end--;

      // empty list element, e.g. ", ," or a trailing comma
      if (start === end) continue;

      return {done: false, value: classifyTransferEncoding(str, start, end)};
    }

    return {done: true, value: undefined};
  }

  [Symbol.iterator]() {
    return this;
  }
}

/**
 * Create a lazy iterator over the codings of a Transfer-Encoding header,
 * in the order they appear.
 *
 * @param header the header value, with repeated fields joined by ", "
 * @public
 */

export function transferEncodings(header: string) {
  return new TransferEncodingParser(header);
}

/**
 * Parse a Transfer-Encoding header into an array, in header order.
 *
 * @public
 */

export default function parseTransferEncoding(header: string) {
  return Array.from(transferEncodings(header));
}

/**
 * Codings in the order they must be removed: the last one applied,
 * which is the last one listed, comes first.
 *
 * @public
 */

export function decodingOrder(header: string) {
  return parseTransferEncoding(header).reverse();
}
