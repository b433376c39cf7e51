import config from 'config';
import { ConfigError } from '../errors.js';
import { parseTimeZone } from '../bookings/normalizer.js';

export type AppConfig = {
  name: string;
  nodeId: string;
};

export type LoggingConfig = {
  level: string;
};

export type DatabaseConfig = {
  path: string;
};

export type CompletedBookingPolicy = 'mark' | 'delete';

export type BookingsConfig = {
  baseUrl: string;
  apiKey: string;
  table: string;
  userId?: string;
  pollIntervalMs: number;
  lookAheadMs: number;
  lookBehindMs: number;
  requestTimeoutMs: number;
  completedPolicy: CompletedBookingPolicy;
};

export type BackoffConfig = {
  baseDelayMs: number;
  maxDelayMs: number;
};

export type CameraConfig = {
  id: string;
  device: string;
  width: number;
  height: number;
  framesPerSecond: number;
  outputDir: string;
  inputFormat?: string;
  codec?: string;
};

export type CameraRuntimeConfig = {
  tickIntervalMs: number;
  operationTimeoutMs: number;
  /** Time ffmpeg gets to exit after SIGINT before it is killed. */
  stopTimeoutMs: number;
  maxRecordingMs: number;
  ffmpegPath?: string;
  backoff: BackoffConfig;
};

export type S3Config = {
  bucket: string;
  region: string;
  endpoint?: string;
  prefix: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  forcePathStyle: boolean;
  publicUrlBase?: string;
};

export type UploadConfig = {
  concurrency: number;
  maxAttempts: number;
  queueCapacity: number;
  timeoutMs: number;
  pollIntervalMs: number;
  deleteAfterUpload: boolean;
  videoTable: string;
  backoff: BackoffConfig;
  s3: S3Config;
};

export type StatusConfig = {
  intervalMs: number;
  baseUrl: string;
  apiKey: string;
  table: string;
  timeoutMs: number;
};

export type EventsConfig = {
  maxStored: number;
};

export type RecorderConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  database: DatabaseConfig;
  timezone: string;
  bookings: BookingsConfig;
  cameras: CameraConfig[];
  camera: CameraRuntimeConfig;
  upload: UploadConfig;
  status: StatusConfig;
  events: EventsConfig;
};

type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type FrozenRecorderConfig = DeepReadonly<RecorderConfig>;
export type FrozenCameraConfig = FrozenRecorderConfig['cameras'][number];

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
  minLength?: number;
  integer?: boolean;
};

const positiveInteger: JsonSchema = { type: 'number', minimum: 1, integer: true };
const durationMs: JsonSchema = { type: 'number', minimum: 1, integer: true };
const nonEmptyString: JsonSchema = { type: 'string', minLength: 1 };

const backoffSchema: JsonSchema = {
  type: 'object',
  required: ['baseDelayMs', 'maxDelayMs'],
  additionalProperties: false,
  properties: {
    baseDelayMs: durationMs,
    maxDelayMs: durationMs
  }
};

const recorderConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'database', 'timezone', 'bookings', 'cameras', 'camera', 'upload', 'status'],
  additionalProperties: false,
  properties: {
    app: {
      type: 'object',
      required: ['name', 'nodeId'],
      additionalProperties: false,
      properties: {
        name: nonEmptyString,
        nodeId: nonEmptyString
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: {
          type: 'string',
          enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']
        }
      }
    },
    database: {
      type: 'object',
      required: ['path'],
      additionalProperties: false,
      properties: {
        path: nonEmptyString
      }
    },
    timezone: nonEmptyString,
    bookings: {
      type: 'object',
      required: ['baseUrl', 'pollIntervalMs', 'lookAheadMs', 'requestTimeoutMs'],
      additionalProperties: false,
      properties: {
        baseUrl: nonEmptyString,
        apiKey: { type: 'string' },
        table: nonEmptyString,
        userId: { type: 'string' },
        pollIntervalMs: durationMs,
        lookAheadMs: { type: 'number', minimum: 0, integer: true },
        lookBehindMs: { type: 'number', minimum: 0, integer: true },
        requestTimeoutMs: durationMs,
        completedPolicy: { type: 'string', enum: ['mark', 'delete'] }
      }
    },
    cameras: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'device', 'width', 'height', 'framesPerSecond', 'outputDir'],
        additionalProperties: false,
        properties: {
          id: nonEmptyString,
          device: nonEmptyString,
          width: positiveInteger,
          height: positiveInteger,
          framesPerSecond: { type: 'number', minimum: 1, maximum: 120 },
          outputDir: nonEmptyString,
          inputFormat: nonEmptyString,
          codec: nonEmptyString
        }
      }
    },
    camera: {
      type: 'object',
      required: ['tickIntervalMs', 'operationTimeoutMs', 'maxRecordingMs', 'backoff'],
      additionalProperties: false,
      properties: {
        tickIntervalMs: durationMs,
        operationTimeoutMs: durationMs,
        stopTimeoutMs: durationMs,
        maxRecordingMs: durationMs,
        ffmpegPath: nonEmptyString,
        backoff: backoffSchema
      }
    },
    upload: {
      type: 'object',
      required: ['concurrency', 'maxAttempts', 'timeoutMs', 'deleteAfterUpload', 'backoff', 's3'],
      additionalProperties: false,
      properties: {
        concurrency: { type: 'number', minimum: 1, maximum: 16, integer: true },
        maxAttempts: positiveInteger,
        queueCapacity: positiveInteger,
        timeoutMs: durationMs,
        pollIntervalMs: durationMs,
        deleteAfterUpload: { type: 'boolean' },
        videoTable: nonEmptyString,
        backoff: backoffSchema,
        s3: {
          type: 'object',
          required: ['bucket', 'region'],
          additionalProperties: false,
          properties: {
            bucket: nonEmptyString,
            region: nonEmptyString,
            endpoint: { type: 'string' },
            prefix: { type: 'string' },
            accessKeyId: { type: 'string' },
            secretAccessKey: { type: 'string' },
            forcePathStyle: { type: 'boolean' },
            publicUrlBase: { type: 'string' }
          }
        }
      }
    },
    status: {
      type: 'object',
      required: ['intervalMs', 'baseUrl', 'timeoutMs'],
      additionalProperties: false,
      properties: {
        intervalMs: durationMs,
        baseUrl: nonEmptyString,
        apiKey: { type: 'string' },
        table: nonEmptyString,
        timeoutMs: durationMs
      }
    },
    events: {
      type: 'object',
      additionalProperties: false,
      properties: {
        maxStored: positiveInteger
      }
    }
  }
};

function describeType(value: unknown): JsonType | 'null' | 'undefined' {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  const type = typeof value;
  if (type === 'number' || type === 'string' || type === 'boolean' || type === 'object') {
    return type;
  }
  return 'undefined';
}

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const errors: string[] = [];
  const allowedTypes = Array.isArray(schema.type) ? schema.type : [schema.type];
  const actual = describeType(value);
  const type = allowedTypes.find(candidate => candidate === actual);

  if (!type) {
    errors.push(`${pathLabel} must be of type ${allowedTypes.join(' or ')}`);
    return errors;
  }

  if (type === 'object') {
    if (!value || typeof value !== 'object' || Array.isArray(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }
    const obj = value as Record<string, unknown>;
    const required = schema.required ?? [];

    for (const key of required) {
      if (!(key in obj)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    if (schema.additionalProperties === false) {
      for (const key of Object.keys(obj)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (schema.additionalProperties && typeof schema.additionalProperties === 'object') {
      for (const key of Object.keys(obj)) {
        if (definedProperties.has(key)) {
          continue;
        }
        errors.push(
          ...validateAgainstSchema(schema.additionalProperties, obj[key], `${pathLabel}.${key}`)
        );
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in obj)) {
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, obj[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const itemSchema = schema.items;
    if (itemSchema) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(itemSchema, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (schema.integer && !Number.isInteger(value)) {
      errors.push(`${pathLabel} must be an integer`);
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (typeof schema.minLength === 'number' && value.trim().length < schema.minLength) {
      errors.push(`${pathLabel} must be a non-empty string`);
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'boolean' && typeof value !== 'boolean') {
    errors.push(`${pathLabel} must be a boolean`);
  }

  return errors;
}

function validateLogicalConfig(config: RecorderConfig) {
  const messages: string[] = [];

  if (config.cameras.length === 0) {
    messages.push('config.cameras must define at least one camera');
  }

  const cameraIds = new Map<string, number>();
  const devices = new Map<string, string>();
  config.cameras.forEach((camera, index) => {
    const label = camera.id || `#${index}`;
    const existing = cameraIds.get(camera.id);
    if (existing !== undefined) {
      messages.push(`config.cameras[${label}] duplicates camera id "${camera.id}" already used by config.cameras[${existing}]`);
    } else {
      cameraIds.set(camera.id, index);
    }

    const owner = devices.get(camera.device);
    if (owner) {
      messages.push(`config.cameras[${label}] reuses device "${camera.device}" already assigned to camera "${owner}"`);
    } else {
      devices.set(camera.device, camera.id);
    }
  });

  try {
    parseTimeZone(config.timezone);
  } catch (error) {
    messages.push(`config.timezone ${error instanceof Error ? error.message : String(error)}`);
  }

  for (const [label, backoff] of [
    ['config.camera.backoff', config.camera.backoff],
    ['config.upload.backoff', config.upload.backoff]
  ] as const) {
    if (backoff.maxDelayMs < backoff.baseDelayMs) {
      messages.push(`${label}.maxDelayMs must be greater than or equal to baseDelayMs`);
    }
  }

  if (messages.length > 0) {
    throw new ConfigError(messages.join('; '));
  }
}

function applyDefaults(config: RecorderConfig): RecorderConfig {
  return {
    ...config,
    bookings: {
      ...config.bookings,
      apiKey: config.bookings.apiKey ?? '',
      table: config.bookings.table ?? 'bookings',
      lookBehindMs: config.bookings.lookBehindMs ?? 24 * 60 * 60 * 1000,
      completedPolicy: config.bookings.completedPolicy ?? 'mark'
    },
    camera: {
      ...config.camera,
      stopTimeoutMs: config.camera.stopTimeoutMs ?? 5000
    },
    upload: {
      ...config.upload,
      videoTable: config.upload.videoTable ?? 'videos',
      queueCapacity: config.upload.queueCapacity ?? 100,
      pollIntervalMs: config.upload.pollIntervalMs ?? 1000,
      s3: {
        ...config.upload.s3,
        prefix: config.upload.s3.prefix ?? '',
        forcePathStyle: config.upload.s3.forcePathStyle ?? false
      }
    },
    status: {
      ...config.status,
      apiKey: config.status.apiKey ?? '',
      table: config.status.table ?? 'system_status'
    },
    events: {
      maxStored: config.events?.maxStored ?? 5000
    }
  };
}

function deepFreeze<T>(value: T): DeepReadonly<T> {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value as DeepReadonly<T>;
}

export function validateConfig(config: unknown): asserts config is RecorderConfig {
  const errors = validateAgainstSchema(recorderConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new ConfigError(errors.join('; '));
  }
  validateLogicalConfig(config as RecorderConfig);
}

/** Validates, fills defaults and freezes a raw configuration object. */
export function buildRecorderConfig(raw: unknown): FrozenRecorderConfig {
  const copy: unknown = JSON.parse(JSON.stringify(raw ?? null));
  validateConfig(copy);
  return deepFreeze(applyDefaults(copy));
}

/**
 * Reads the layered `config` package sources (default, NODE_ENV overlay, environment
 * variable mappings) once.
 */
export function loadRecorderConfig(): FrozenRecorderConfig {
  return buildRecorderConfig(config.util.toObject(config));
}

export { recorderConfigSchema };
