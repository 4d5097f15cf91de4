/**
 * Metadata configuration schema and validation.
 *
 * @module config/schema
 */

import { createRequire } from 'node:module';
import type { AccessMode } from '../reflection/access.js';
import { LOG_LEVELS, type LogLevel } from '../utils/logger.js';
import { BUILTIN_CONSTRAINT_NAMESPACE } from '../builder/accessor-cache.js';

const require = createRequire(import.meta.url);

export interface MetadataConfig {
  /** Qualified-name prefixes whose accessor snapshots may be cached */
  builtinNamespaces: string[];
  cacheBuiltins: boolean;
  accessMode: AccessMode;
  logLevel: LogLevel;
}

export const DEFAULT_METADATA_CONFIG: Readonly<MetadataConfig> = Object.freeze({
  builtinNamespaces: [BUILTIN_CONSTRAINT_NAMESPACE],
  cacheBuiltins: true,
  accessMode: 'unrestricted',
  logLevel: 'info',
});

export const METADATA_CONFIG_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  additionalProperties: false,
  properties: {
    builtinNamespaces: {
      type: 'array',
      items: { type: 'string', minLength: 1 },
    },
    cacheBuiltins: { type: 'boolean' },
    accessMode: { enum: ['unrestricted', 'restricted'] },
    logLevel: { enum: [...LOG_LEVELS] },
  },
} as const;

export interface ConfigValidationError {
  path: string;
  message: string;
  keyword: string;
}

export class ConfigSchemaError extends Error {
  readonly errors: ConfigValidationError[];

  constructor(errors: ConfigValidationError[]) {
    const summary = errors
      .map((e) => `  - ${e.path}: ${e.message}`)
      .join('\n');
    super(`Invalid metadata config:\n${summary}`);
    this.name = 'ConfigSchemaError';
    this.errors = errors;
  }
}

/** Subset of Ajv's error object that the config messages read. */
interface SchemaIssue {
  instancePath: string;
  keyword: string;
  message?: string;
}

interface CompiledSchema {
  (document: unknown): boolean;
  errors?: SchemaIssue[] | null;
}

type Ajv2020Class = new (options: { allErrors: boolean; strict: boolean }) => {
  compile(schema: object): CompiledSchema;
};

let compiledConfigSchema: CompiledSchema | undefined;

function validateConfigDocument(document: unknown): ConfigValidationError[] {
  if (compiledConfigSchema === undefined) {
    const { Ajv2020 } = require('ajv/dist/2020') as { Ajv2020: Ajv2020Class };
    compiledConfigSchema = new Ajv2020({ allErrors: true, strict: true }).compile(
      METADATA_CONFIG_SCHEMA
    );
  }
  if (compiledConfigSchema(document)) return [];
  const issues = compiledConfigSchema.errors ?? [];
  return issues.map(({ instancePath, keyword, message }) => ({
    path: instancePath === '' ? '/' : instancePath,
    message: message ?? `does not satisfy '${keyword}'`,
    keyword,
  }));
}

/**
 * Validate a raw config document and merge it over the defaults.
 *
 * @throws ConfigSchemaError when the document does not match the schema
 */
export function parseMetadataConfig(data: unknown): MetadataConfig {
  if (data === null || data === undefined) {
    return { ...DEFAULT_METADATA_CONFIG, builtinNamespaces: [...DEFAULT_METADATA_CONFIG.builtinNamespaces] };
  }
  const errors = validateConfigDocument(data);
  if (errors.length > 0 || !isPartialConfig(data)) {
    throw new ConfigSchemaError(errors);
  }
  return {
    builtinNamespaces: data.builtinNamespaces ?? [...DEFAULT_METADATA_CONFIG.builtinNamespaces],
    cacheBuiltins: data.cacheBuiltins ?? DEFAULT_METADATA_CONFIG.cacheBuiltins,
    accessMode: data.accessMode ?? DEFAULT_METADATA_CONFIG.accessMode,
    logLevel: data.logLevel ?? DEFAULT_METADATA_CONFIG.logLevel,
  };
}

// Narrows a document that already passed the schema.
function isPartialConfig(data: unknown): data is Partial<MetadataConfig> {
  return typeof data === 'object' && data !== null && !Array.isArray(data);
}
