import Joi from 'joi';
import { ValidationError } from '../errors';
import { STEP_NAMES } from '../steps/types';
import { BuilderConfig } from '../types';
import { ConfigValidationResult } from './types';
import { isValidLabelKey, isValidLabelValue, isValidServerName } from './naming';

// Joi schema for provider label maps
const labelsSchema = Joi.object()
  .pattern(
    Joi.string(),
    Joi.string()
      .allow('')
      .custom((value: string, helpers) => (isValidLabelValue(value) ? value : helpers.error('any.invalid')))
      .messages({
        'any.invalid': 'Label values must be empty or at most 63 characters of alphanumerics, ".", "_" or "-", starting and ending alphanumeric'
      })
  )
  .custom((labels: Record<string, string>, helpers) => {
    const invalid = Object.keys(labels).find(key => !isValidLabelKey(key));
    return invalid === undefined
      ? labels
      : helpers.message({
        custom: `Label key "${invalid}" must be at most 63 characters of alphanumerics, ".", "_", "-" or "/", starting and ending alphanumeric`
      });
  });

// Longest delay a Node timer can hold
export const MAX_DELAY_MS = 2_147_483_647;

const delaySchema = Joi.number().integer().min(1).max(MAX_DELAY_MS);

const resourceIdsSchema = Joi.array().items(Joi.number().integer().positive());

// Joi schema for ImageFilterConfig
const imageFilterSchema = Joi.object({
  with_selector: Joi.array()
    .items(Joi.string().min(1))
    .min(1)
    .required()
    .messages({
      'array.min': 'image_filter.with_selector is required when specifying filter',
      'any.required': 'image_filter.with_selector is required when specifying filter'
    }),
  most_recent: Joi.boolean().default(false)
});

// Joi schema for CommunicatorConfig
const communicatorSchema = Joi.object({
  type: Joi.string()
    .valid('ssh', 'winrm', 'none')
    .default('ssh')
    .messages({
      'any.only': 'Communicator type must be one of: ssh, winrm, none'
    }),
  username: Joi.string().min(1),
  port: Joi.number().integer().min(1).max(65535),
  timeout: delaySchema,
  retry_interval: delaySchema,
  ssh_private_key_file: Joi.string().min(1),
  ssh_private_key: Joi.string().min(1),
  password: Joi.string().when('type', {
    is: 'winrm',
    then: Joi.required(),
    otherwise: Joi.optional()
  }).messages({
    'any.required': 'communicator.password is required for winrm'
  }),
  winrm_use_ssl: Joi.boolean()
});

// Main BuilderConfig schema
const builderConfigSchema = Joi.object<BuilderConfig>({
  token: Joi.string()
    .required()
    .messages({
      'any.required': 'token is missing, make sure to configure your Hetzner Cloud token',
      'string.empty': 'token is missing, make sure to configure your Hetzner Cloud token'
    }),
  endpoint: Joi.string().uri({ scheme: ['http', 'https'] }),

  poll_interval: delaySchema.default(500),
  action_timeout: delaySchema.default(600000),
  build_timeout: delaySchema,

  server_name: Joi.string()
    .custom((name: string, helpers) => (isValidServerName(name) ? name : helpers.error('any.invalid')))
    .messages({
      'any.invalid': 'server_name must be a valid hostname'
    }),
  location: Joi.string().required().messages({
    'any.required': 'location is required',
    'string.empty': 'location is required'
  }),
  server_type: Joi.string().required().messages({
    'any.required': 'server type is required',
    'string.empty': 'server type is required'
  }),
  server_labels: labelsSchema,
  upgrade_server_type: Joi.string().min(1),
  image: Joi.string().min(1),
  image_filter: imageFilterSchema,

  snapshot_name: Joi.string().min(1),
  snapshot_labels: labelsSchema,
  user_data: Joi.string().allow(''),
  user_data_file: Joi.string().min(1),
  ssh_keys: Joi.array().items(Joi.string().min(1)),
  ssh_keys_labels: labelsSchema,

  networks: resourceIdsSchema,
  firewalls: resourceIdsSchema,
  volumes: resourceIdsSchema,
  public_ipv4: Joi.number().integer().positive(),
  public_ipv4_disabled: Joi.boolean().default(false),
  public_ipv6: Joi.number().integer().positive(),
  public_ipv6_disabled: Joi.boolean().default(false),

  rescue: Joi.string()
    .valid('linux64', 'linux32', 'freebsd64')
    .messages({
      'any.only': 'rescue must be one of: linux64, linux32, freebsd64'
    }),
  rescue_poll_budget: Joi.string()
    .valid('fresh', 'remaining')
    .default('fresh')
    .messages({
      'any.only': 'rescue_poll_budget must be one of: fresh, remaining'
    }),

  keep_server: Joi.boolean().default(false),
  skip_snapshot: Joi.boolean().default(false),
  force: Joi.boolean().default(false),
  halt_after: Joi.string()
    .valid(...STEP_NAMES)
    .messages({
      'any.only': `halt_after must be one of: ${STEP_NAMES.join(', ')}`
    }),

  communicator: communicatorSchema
})
  .xor('image', 'image_filter')
  .oxor('user_data', 'user_data_file')
  .messages({
    'object.missing': 'image or image_filter is required',
    'object.xor': 'only one of image or image_filter can be specified',
    'object.oxor': 'only one of user_data or user_data_file can be specified'
  })
  .unknown(false);

function runSchema(config: unknown): Joi.ValidationResult<BuilderConfig> {
  return builderConfigSchema.validate(config, {
    abortEarly: false,
    allowUnknown: false,
    stripUnknown: false
  });
}

/**
 * Validates a builder configuration object against the schema
 * @param config - The configuration object to validate
 * @returns ConfigValidationResult with validation status and any errors
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { error } = runSchema(config);

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
 * Validates a builder configuration and applies schema defaults
 * @throws ValidationError listing every problem found
 */
export function validateAndNormalizeConfig(config: unknown): BuilderConfig {
  const { error, value } = runSchema(config);

  if (error) {
    throw new ValidationError(error.details.map(detail => detail.message));
  }

  return value;
}

/**
 * Gets the Joi schema for builder configuration (useful for testing)
 */
export function getConfigSchema(): Joi.ObjectSchema<BuilderConfig> {
  return builderConfigSchema;
}
