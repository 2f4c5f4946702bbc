import Joi from 'joi';
import { ChainConfig } from '../types';
import { ConfigValidationResult } from './types';

export const SUPPORTED_RUNTIMES = [
  'nodejs18.x',
  'nodejs20.x',
  'nodejs22.x',
  'python3.10',
  'python3.11',
  'python3.12'
];

const bucketNameSchema = Joi.string()
  .pattern(/^[a-z0-9][a-z0-9.-]*[a-z0-9]$/)
  .min(3)
  .max(63)
  .messages({
    'string.pattern.base': 'Bucket names must use lowercase letters, digits, dots and hyphens, and start and end with a letter or digit',
    'string.min': 'Bucket names must be at least 3 characters long',
    'string.max': 'Bucket names must be no more than 63 characters long'
  });

const stackNameSchema = Joi.string()
  .pattern(/^[a-zA-Z][a-zA-Z0-9-]*$/)
  .max(128)
  .messages({
    'string.pattern.base': 'Stack names must start with a letter and contain only alphanumeric characters and hyphens',
    'string.max': 'Stack names must be no more than 128 characters long'
  });

const pollSettingsSchema = (maxAttempts: number) => Joi.object({
  delay_seconds: Joi.number()
    .integer()
    .min(1)
    .max(300)
    .default(5)
    .messages({
      'number.min': 'Poll delay must be at least 1 second',
      'number.max': 'Poll delay must be no more than 300 seconds'
    }),
  max_attempts: Joi.number()
    .integer()
    .min(1)
    .max(720)
    .default(maxAttempts)
    .messages({
      'number.min': 'Poll attempts must be at least 1',
      'number.max': 'Poll attempts must be no more than 720'
    })
}).default();

const projectSchema = Joi.object({
  name: Joi.string()
    .pattern(/^[a-z0-9][a-z0-9-]*$/)
    .max(40)
    .default('stack-chain')
    .messages({
      'string.pattern.base': 'Project name must contain only lowercase letters, digits and hyphens',
      'string.max': 'Project name must be no more than 40 characters long'
    }),
  environment: Joi.string()
    .pattern(/^[a-z0-9-]+$/)
    .max(20)
    .optional()
    .messages({
      'string.pattern.base': 'Environment must contain only lowercase letters, digits and hyphens'
    })
}).default();

const awsSchema = Joi.object({
  region: Joi.string()
    .pattern(/^[a-z0-9-]+$/)
    .default('us-east-1')
    .messages({
      'string.pattern.base': 'AWS region must be a valid region identifier'
    }),
  profile: Joi.string()
    .optional()
    .messages({
      'string.base': 'AWS profile must be a string'
    })
}).default();

const bucketsSchema = Joi.object({
  bootstrap: bucketNameSchema.optional(),
  artifacts: bucketNameSchema
    .invalid(Joi.ref('bootstrap'))
    .optional()
    .messages({
      'any.invalid': 'The artifact bucket must differ from the bootstrap bucket'
    })
}).default();

const stacksSchema = Joi.object({
  bootstrap: stackNameSchema.optional(),
  build: stackNameSchema
    .invalid(Joi.ref('bootstrap'))
    .optional()
    .messages({ 'any.invalid': 'Stack names must be distinct' }),
  deploy: stackNameSchema
    .invalid(Joi.ref('bootstrap'), Joi.ref('build'))
    .optional()
    .messages({ 'any.invalid': 'Stack names must be distinct' })
}).default();

const artifactsSchema = Joi.object({
  bucket_template: Joi.string().optional(),
  function_template: Joi.string().optional(),
  function_code: Joi.string().default('./function.zip')
}).default();

const functionSchema = Joi.object({
  handler: Joi.string()
    .pattern(/^[a-zA-Z0-9_./-]+\.[a-zA-Z0-9_]+$/)
    .default('index.handler')
    .messages({
      'string.pattern.base': 'Handler must be in format "file.function" (e.g., "index.handler")'
    }),
  runtime: Joi.string()
    .valid(...SUPPORTED_RUNTIMES)
    .default('nodejs20.x')
    .messages({
      'any.only': 'Runtime must be a supported Lambda runtime'
    })
}).default();

const chainConfigSchema = Joi.object<ChainConfig>({
  project: projectSchema,
  aws: awsSchema,
  buckets: bucketsSchema,
  stacks: stacksSchema,
  artifacts: artifactsSchema,
  function: functionSchema,
  polling: Joi.object({
    storage: pollSettingsSchema(12),
    deploy: pollSettingsSchema(24)
  }).default(),
  tags: Joi.object()
    .pattern(Joi.string(), Joi.string())
    .optional()
    .messages({
      'object.pattern.match': 'Tags must be key-value pairs of strings'
    })
}).unknown(false);

/**
 * Validates a configuration object against the schema
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { error } = chainConfigSchema.validate(config ?? {}, {
    abortEarly: false,
    allowUnknown: false,
    stripUnknown: false
  });

  if (error) {
    return {
      valid: false,
      errors: error.details.map(detail => detail.message)
    };
  }

  return {
    valid: true,
    errors: []
  };
}

/**
 * Validates a configuration and returns it with every default applied
 * @throws Error listing every validation message
 */
export function validateAndNormalizeConfig(config: unknown): ChainConfig {
  const { error, value } = chainConfigSchema.validate(config ?? {}, {
    abortEarly: false,
    allowUnknown: false,
    stripUnknown: false
  });

  if (error) {
    const errors = error.details.map(detail => detail.message);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return value;
}
