/**
 * Load metadata configuration files.
 *
 * @module config/loader
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { AccessorCache } from '../builder/accessor-cache.js';
import type { ConstraintBuilderOptions } from '../builder/constraint-builder.js';
import { createAccessScope, type AccessScope } from '../reflection/access.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { parseMetadataConfig, type MetadataConfig } from './schema.js';

const CONFIG_CANDIDATES = [
  'constraint-metadata.yaml',
  'constraint-metadata.yml',
  'constraint-metadata.json',
];

/**
 * Find a metadata config file in `dir`.
 */
export function findMetadataConfig(dir: string = process.cwd()): string | null {
  for (const name of CONFIG_CANDIDATES) {
    const path = join(dir, name);
    if (existsSync(path)) {
      return path;
    }
  }
  return null;
}

/**
 * Load and validate a metadata config file (YAML or JSON).
 *
 * @throws ConfigSchemaError when the file does not match the schema
 */
export function loadMetadataConfig(path: string): MetadataConfig {
  const content = readFileSync(path, 'utf-8');
  const data: unknown = path.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  return parseMetadataConfig(data);
}

export interface MetadataContext extends ConstraintBuilderOptions {
  logger: Logger;
  cache: AccessorCache;
  access: AccessScope;
}

/**
 * Wire a logger, accessor cache and access scope from config. The
 * result can be passed directly as builder options.
 */
export function createMetadataContext(config: MetadataConfig): MetadataContext {
  const logger = createLogger(config.logLevel);
  const cache = new AccessorCache({
    namespaces: config.builtinNamespaces,
    enabled: config.cacheBuiltins,
    logger,
  });
  logger.debug('Metadata context created', {
    namespaces: config.builtinNamespaces,
    cacheBuiltins: config.cacheBuiltins,
    accessMode: config.accessMode,
  });
  return { logger, cache, access: createAccessScope(config.accessMode) };
}
