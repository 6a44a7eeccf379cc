import Joi from 'joi';
import { ConfigurationError } from './errors';
import { TrackerConfig } from './types/config';
import { DEFAULT_DELIVERY, DEFAULT_ENDPOINT } from './client/tracking-client';

const configSchema = Joi.object<TrackerConfig>({
  writeKey: Joi.string().trim().required().messages({
    'any.required': 'TRACKER_WRITE_KEY is not set',
    'string.empty': 'TRACKER_WRITE_KEY is not set'
  }),
  endpoint: Joi.string().uri({ scheme: ['http', 'https'] }).default(DEFAULT_ENDPOINT),
  debug: Joi.boolean().truthy('1', 'yes', 'on').falsy('0', 'no', 'off').default(false),
  logLevel: Joi.string().valid('debug', 'info', 'warn', 'error', 'silent').default('info'),
  batchSize: Joi.number().integer().min(1).default(DEFAULT_DELIVERY.batchSize),
  flushInterval: Joi.number().integer().min(0).default(DEFAULT_DELIVERY.flushInterval),
  flushAt: Joi.number().integer().min(0).default(DEFAULT_DELIVERY.flushAt),
  maxQueueSize: Joi.number().integer().min(1).default(DEFAULT_DELIVERY.maxQueueSize),
  maxAttempts: Joi.number().integer().min(1).default(DEFAULT_DELIVERY.maxAttempts),
  retryDelay: Joi.number().integer().min(0).default(DEFAULT_DELIVERY.retryDelay),
  timeout: Joi.number().integer().min(1).default(DEFAULT_DELIVERY.timeout)
});

const ENV_KEYS: Record<keyof TrackerConfig, string> = {
  writeKey: 'TRACKER_WRITE_KEY',
  endpoint: 'TRACKER_ENDPOINT',
  debug: 'TRACKER_DEBUG',
  logLevel: 'TRACKER_LOG_LEVEL',
  batchSize: 'TRACKER_BATCH_SIZE',
  flushInterval: 'TRACKER_FLUSH_INTERVAL',
  flushAt: 'TRACKER_FLUSH_AT',
  maxQueueSize: 'TRACKER_MAX_QUEUE_SIZE',
  maxAttempts: 'TRACKER_MAX_ATTEMPTS',
  retryDelay: 'TRACKER_RETRY_DELAY',
  timeout: 'TRACKER_TIMEOUT'
};

/**
 * Builds the tracker configuration from environment variables. Unset and
 * empty variables fall back to defaults; overrides win over the environment.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<TrackerConfig> = {}
): TrackerConfig {
  const raw: Record<string, unknown> = {};
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }

  const { error, value } = configSchema.validate({ ...raw, ...overrides }, { abortEarly: false });
  if (error) {
    throw new ConfigurationError(error.details.map(detail => detail.message).join('; '));
  }

  return value;
}
