import * as Joi from 'joi';

const flag = () => Joi.string().valid('true', 'false', '1', '0');

export const validationSchema = Joi.object({
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  PORT: Joi.number().port().default(3000),
  REDIS_HOST: Joi.string().default('localhost'),
  REDIS_PORT: Joi.number().port().default(6379),
  REDIS_PASSWORD: Joi.string().allow('').optional(),
  CACHE_ENABLED: flag().default('true'),
  CACHE_NAMESPACE: Joi.string()
    .pattern(/^[a-z0-9_-]+$/i)
    .default('feed_cache')
    .messages({
      'string.pattern.base': 'CACHE_NAMESPACE may only contain letters, digits, "_" and "-"',
    }),
  CACHE_DURATION: Joi.number().integer().min(1).default(3600),
  CACHE_SWEEP_ENABLED: flag().default('true'),
  CACHE_SWEEP_CRON: Joi.string().default('0 0 * * * *'),
  CACHE_WARM_SITE_URL: Joi.string()
    .uri({ scheme: ['http', 'https'] })
    .allow('')
    .optional(),
  CACHE_WARM_CONTENT_TYPES: Joi.string().allow('').optional(),
  CACHE_WARM_TIMEOUT_MS: Joi.number().integer().min(100).default(10000),
  CACHE_WARM_USER_AGENT: Joi.string().default('Feed Cache Warmer'),
  CACHE_WARM_ON_BOOT: flag().default('false'),
});
