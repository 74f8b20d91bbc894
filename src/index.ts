'use strict';

import type {Context, Next} from 'koa';
import type {Logger} from 'pino';
import defaultLogger from './logger';
import parseTransferEncoding from './parse-transfer-encoding';
import {
  equalsIgnoreAsciiCase,
  toAsciiLowerCase,
  type TransferEncoding,
  transferEncodingName,
} from './transfer-encoding';

export {
  TransferEncodingParser,
  decodingOrder,
  default as parseTransferEncoding,
  transferEncodings,
} from './parse-transfer-encoding';
export type {StdTransferEncoding, TransferEncoding} from './transfer-encoding';
export {
  STD_TRANSFER_ENCODINGS,
  classifyTransferEncoding,
  parseStdTransferEncoding,
  parseTransferEncodingToken,
  transferEncodingName,
} from './transfer-encoding';

export interface TransferEncodingOptions {
  /**
   * Coding names the application can decode, compared case-insensitively.
   * Defaults to `['chunked']`, which Node's HTTP server already decodes.
   */
  supported?: readonly string[];
  logger?: Logger;
}

function isSupported(encoding: TransferEncoding, supported: readonly string[]) {
  const name = transferEncodingName(encoding);

  return supported.some(function (s) {
    return equalsIgnoreAsciiCase(name, 0, name.length, s);
  });
}

/**
 * Koa middleware exposing the request's transfer codings on
 * `ctx.state.transferEncodings`, in header order.
 *
 * A server receiving a coding it does not understand SHOULD respond 501
 * rfc7230 section 3.3.1, paragraph 5
 */

export default function transferEncoding(options: TransferEncodingOptions = {}) {
  const supported = (options.supported ?? ['chunked']).map(toAsciiLowerCase);
  const logger = options.logger ?? defaultLogger;

  return async function (ctx: Context, next: Next) {
    const header = ctx.get('transfer-encoding');
    const encodings = header ? parseTransferEncoding(header) : [];

    ctx.state.transferEncodings = encodings;

    for (const encoding of encodings) {
      if (!isSupported(encoding, supported)) {
        const name = transferEncodingName(encoding);
        logger.debug({method: ctx.method, url: ctx.url, encoding: name}, 'unsupported transfer coding');
        ctx.throw(501, `Unsupported transfer coding: ${name}`);
      }
    }

    await next();
  };
}
