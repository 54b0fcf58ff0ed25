import fs from 'node:fs';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import type { KindMatchingMode } from '../types.js';
import {
  buildEventFilters,
  type EventFilterDependencies,
  type EventFilterOptions
} from '../filters/builder.js';
import type { FilterChain } from '../filters/chain.js';
import { parseAroundTime } from '../filters/timeWindow.js';
import { parseKindRule } from '../kinds/rules.js';
import { parseDuration } from '../utils/duration.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type FilterDefaultsConfig = {
  kindMatching: KindMatchingMode;
  aroundDuration: string | number;
};

export type FilterProfile = EventFilterOptions;

export type EventFiltersConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  filters: FilterDefaultsConfig;
  profiles?: Record<string, FilterProfile>;
};

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
};

const stringListSchema: JsonSchema = {
  type: 'array',
  items: { type: 'string' }
};

const kindMatchingSchema: JsonSchema = {
  type: 'string',
  enum: ['strict', 'legacy']
};

const filterProfileSchema: JsonSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    warningsOnly: { type: 'boolean' },
    namespaces: stringListSchema,
    names: stringListSchema,
    uids: stringListSchema,
    reasons: stringListSchema,
    components: stringListSchema,
    kinds: stringListSchema,
    kindMatching: kindMatchingSchema,
    around: { type: 'string' },
    aroundDuration: { type: ['string', 'number'], minimum: 0 }
  }
};

const eventFiltersConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'filters'],
  additionalProperties: true,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: { type: 'string' }
      }
    },
    filters: {
      type: 'object',
      required: ['kindMatching', 'aroundDuration'],
      additionalProperties: false,
      properties: {
        kindMatching: kindMatchingSchema,
        aroundDuration: { type: ['string', 'number'], minimum: 0 }
      }
    },
    profiles: {
      type: 'object',
      additionalProperties: filterProfileSchema
    }
  }
};

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    if (schema.additionalProperties === false) {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (schema.additionalProperties && typeof schema.additionalProperties === 'object') {
      for (const key of Object.keys(value)) {
        if (definedProperties.has(key)) {
          continue;
        }
        errors.push(
          ...validateAgainstSchema(schema.additionalProperties, value[key], `${pathLabel}.${key}`)
        );
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in value)) {
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const items = schema.items;
    if (items) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(items, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (typeof value !== 'boolean') {
    errors.push(`${pathLabel} must be a boolean`);
  }
  return errors;
}

function validateDuration(value: string | number | undefined, pathLabel: string, messages: string[]) {
  if (typeof value === 'undefined') {
    return;
  }
  try {
    if (parseDuration(value) < 0) {
      messages.push(`${pathLabel} must not be negative`);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    messages.push(`${pathLabel}: ${message}`);
  }
}

function validateLogicalConfig(config: EventFiltersConfig) {
  const messages: string[] = [];

  validateDuration(config.filters.aroundDuration, 'config.filters.aroundDuration', messages);

  for (const [name, profile] of Object.entries(config.profiles ?? {})) {
    const label = `config.profiles.${name}`;
    if (!name.trim()) {
      messages.push('config.profiles must not include empty profile names');
    }

    (profile.kinds ?? []).forEach((text, index) => {
      try {
        parseKindRule(text);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        messages.push(`${label}.kinds[${index}] ${message}`);
      }
    });

    if (typeof profile.around === 'string') {
      try {
        parseAroundTime(profile.around);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        messages.push(`${label}.around ${message}`);
      }
    }

    validateDuration(profile.aroundDuration, `${label}.aroundDuration`, messages);
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

export function validateConfig(config: unknown): asserts config is EventFiltersConfig {
  const errors = validateAgainstSchema(eventFiltersConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
  // the schema pass above has established the shape
  validateLogicalConfig(config as EventFiltersConfig);
}

export function parseConfig(contents: string): EventFiltersConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): EventFiltersConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

export type ConfigReloadEvent = {
  previous: EventFiltersConfig;
  next: EventFiltersConfig;
};

export class ConfigManager extends EventEmitter {
  private currentConfig: EventFiltersConfig;
  private readonly filePath: string;

  constructor(filePath = path.resolve(process.cwd(), 'config/default.json')) {
    super();
    this.filePath = path.resolve(filePath);
    this.currentConfig = loadConfigFromFile(this.filePath);
  }

  getConfig(): EventFiltersConfig {
    return this.currentConfig;
  }

  getPath(): string {
    return this.filePath;
  }

  reload(): EventFiltersConfig {
    const next = loadConfigFromFile(this.filePath);
    const previous = this.currentConfig;
    this.currentConfig = next;
    this.emit('reload', { previous, next } satisfies ConfigReloadEvent);
    return next;
  }

  listProfiles(): string[] {
    return Object.keys(this.currentConfig.profiles ?? {}).sort();
  }

  /**
   * Profile options with the configured filter defaults filled in; explicit
   * profile values win.
   */
  getProfile(name: string): FilterProfile {
    const profile = this.currentConfig.profiles?.[name];
    if (!profile) {
      const available = this.listProfiles().join(', ') || 'none';
      throw new Error(`Unknown filter profile "${name}" (available: ${available})`);
    }
    const defaults = this.currentConfig.filters;
    return {
      kindMatching: defaults.kindMatching,
      aroundDuration: defaults.aroundDuration,
      ...profile
    };
  }

  buildProfileFilters(
    name: string,
    overrides: EventFilterOptions = {},
    dependencies: EventFilterDependencies = {}
  ): FilterChain {
    return buildEventFilters({ ...this.getProfile(name), ...overrides }, dependencies);
  }
}

let defaultManager: ConfigManager | null = null;

export function getDefaultConfigManager(): ConfigManager {
  if (!defaultManager) {
    defaultManager = new ConfigManager();
  }
  return defaultManager;
}

export { eventFiltersConfigSchema };
