import { pino } from 'pino';
import { config } from '../config.js';

// Create transport options based on environment
const transport = config.isDevelopment
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        translateTime: 'HH:MM:ss',
      },
    }
  : undefined;

// Create the base logger
export const logger = pino({
  level: config.logLevel,
  transport,
  base: {
    env: config.nodeEnv,
  },
  // Redact sensitive fields
  redact: {
    paths: ['password', 'token', 'secret', '*.password', '*.token', '*.secret'],
    remove: true,
  },
});

// Create child loggers for different components
export const generatorLogger = logger.child({ component: 'generator' });
export const transformLogger = logger.child({ component: 'transforms' });
export const blueprintLogger = logger.child({ component: 'blueprints' });
export const presetLogger = logger.child({ component: 'presets' });
export const runtimeLogger = logger.child({ component: 'runtime' });

export default logger;
