import pino from 'pino';
import config from 'config';
import metrics from './metrics/index.js';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'booking-recorder';

function extractMessage(args: unknown[]): string | undefined {
  for (const value of args) {
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
    if (value && typeof value === 'object' && 'msg' in value && typeof value.msg === 'string') {
      return value.msg;
    }
  }
  return undefined;
}

/** The slice of the pino API components depend on. */
export type ComponentLogger = Pick<pino.Logger, 'debug' | 'info' | 'warn' | 'error'>;

const logger = pino({
  name,
  level,
  hooks: {
    logMethod(inputArgs, method, logLevel) {
      const resolvedLevel =
        typeof logLevel === 'number' ? pino.levels.labels[logLevel] ?? String(logLevel) : logLevel;
      metrics.incrementLogLevel(resolvedLevel, { message: extractMessage(inputArgs) });
      return method.apply(this, inputArgs);
    }
  }
});

metrics.recordLogLevelChange(logger.level);

metrics.onReset(() => {
  metrics.recordLogLevelChange(logger.level);
});

export default logger;
