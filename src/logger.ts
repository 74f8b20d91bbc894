import pino from 'pino';

const logger = pino({
  name: 'koa-transfer-encoding',
  level: process.env.TRANSFER_ENCODING_LOG_LEVEL || 'silent',
});

export default logger;
