import pino from 'pino';

export const log = pino({
  level: process.env.LOG_LEVEL && process.env.LOG_LEVEL.trim() !== '' ? process.env.LOG_LEVEL.trim() : 'info',
  base: { service: 'voice-cache-service' },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
});
