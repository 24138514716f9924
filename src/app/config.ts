import { existsSync, readFileSync, statSync } from 'fs';
import { load } from 'js-yaml';
import { z } from 'zod';
import merge from 'lodash/merge.js';
import bytes from 'bytes';
import { resolveProjectPath } from './paths.js';

// ============================================
// Schemas (validation only, defaults live in config.defaults.yaml)
// ============================================

const logConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
  target: z.enum(['stdout', 'file']),
  filePath: z.string(),
});

const itemAttributeSchema = z.enum(['underline', 'inverse', 'bold', 'dim', 'none']);

const viewerConfigSchema = z.object({
  title: z.string(),
  indent: z.number().int().min(0).max(16),
  color: z.boolean(),
  maxNotices: z.number().int().positive(),
  activeItem: itemAttributeSchema,
  inactiveItem: itemAttributeSchema,
});

// Validates size strings using the bytes library
const byteSizeSchema = z.union([
  z.string().refine((val) => bytes.parse(val) !== null, 'Invalid size format (e.g., "512kb", "16mb")'),
  z.number().positive(),
]);

const ingestConfigSchema = z.object({
  maxPendingSize: byteSizeSchema,
});

const flattenConfigSchema = z.object({
  workers: z.number().int().min(0).max(64),
  parallelThreshold: z.number().int().positive(),
});

export const keyActionSchema = z.enum([
  'up',
  'down',
  'pageUp',
  'pageDown',
  'first',
  'last',
  'toggle',
  'collapse',
  'expand',
  'reset',
  'searchNext',
]);

const bindingSchema = z.string().regex(/^(?:[CMS]-)*[^\s]+$/, 'Binding must look like "j", "C-f" or "S-g"');

const keymapConfigSchema = z.record(keyActionSchema, z.array(bindingSchema));

const configSchema = z.object({
  log: logConfigSchema,
  viewer: viewerConfigSchema,
  ingest: ingestConfigSchema,
  flatten: flattenConfigSchema,
  keymap: keymapConfigSchema,
});

export type Config = z.infer<typeof configSchema>;
export type LogConfig = z.infer<typeof logConfigSchema>;
export type ViewerConfig = z.infer<typeof viewerConfigSchema>;
export type FlattenConfig = z.infer<typeof flattenConfigSchema>;
export type KeyAction = z.infer<typeof keyActionSchema>;
export type KeymapConfig = z.infer<typeof keymapConfigSchema>;
export type ItemAttribute = z.infer<typeof itemAttributeSchema>;

// ============================================
// Config files
// ============================================

/**
 * Exit with a fatal error message.
 * Used for config errors that occur before the logger is initialized.
 */
export function fatalExit(message: string): never {
  console.error(`FATAL: ${message}`);
  process.exit(1);
}

export interface ConfigFileStatus {
  exists: boolean;
  isDirectory: boolean;
  isEmpty: boolean;
  path: string;
  error: string | null;
}

/**
 * Check config file status at a given path without parsing it.
 * Returns an error message if the path is a directory.
 */
export function checkConfigFileAt(path: string): ConfigFileStatus {
  if (!existsSync(path)) {
    return { exists: false, isDirectory: false, isEmpty: false, path, error: null };
  }

  if (statSync(path).isDirectory()) {
    return {
      exists: true,
      isDirectory: true,
      isEmpty: false,
      path,
      error: `${path} is a directory, not a file.`,
    };
  }

  const raw = readFileSync(path, 'utf8');
  return { exists: true, isDirectory: false, isEmpty: raw.trim() === '', path, error: null };
}

function loadYamlObject(path: string): Record<string, unknown> {
  const status = checkConfigFileAt(path);
  if (status.error) throw new Error(status.error);
  if (!status.exists || status.isEmpty) return {};

  const parsed: unknown = load(readFileSync(path, 'utf8'));
  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`${path} must contain a YAML mapping`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Merge defaults with a user config and validate the result.
 * Exposed separately from initConfig() so tests can check overrides.
 */
export function parseConfig(defaults: Record<string, unknown>, user: Record<string, unknown>): Config {
  const merged: Record<string, unknown> = merge({}, defaults, user);
  // Keymap entries replace the default binding list instead of merging index by index
  const userKeymap = user.keymap;
  if (userKeymap && typeof userKeymap === 'object') {
    merged.keymap = { ...(typeof defaults.keymap === 'object' ? defaults.keymap : {}), ...userKeymap };
  }

  try {
    return configSchema.parse(merged);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const details = error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
      throw new Error(`Invalid configuration:\n${details}`);
    }
    throw error;
  }
}

// ============================================
// State
// ============================================

let config: Config | null = null;

/**
 * Load config.defaults.yaml, overlay the user config (config.yaml in the
 * project root, or an explicit path) and validate.
 */
export function initConfig(userConfigPath?: string): Config {
  const defaults = loadYamlObject(resolveProjectPath('config.defaults.yaml'));
  const user = loadYamlObject(resolveProjectPath(userConfigPath ?? 'config.yaml'));
  config = parseConfig(defaults, user);
  return config;
}

/** Apply runtime overrides (e.g. CLI flags) on top of the loaded config. */
export function overrideConfig(overrides: Partial<{ [K in keyof Config]: Partial<Config[K]> }>): Config {
  config = configSchema.parse(merge({}, getConfig(), overrides));
  return config;
}

export function getConfig(): Config {
  if (!config) throw new Error('Config not initialized. Call initConfig() first.');
  return config;
}

// ============================================
// Getters
// ============================================

export const getLogConfig = () => getConfig().log;
export const getViewerConfig = () => getConfig().viewer;
export const getFlattenConfig = () => getConfig().flatten;
export const getKeymapConfig = () => getConfig().keymap;

/** Maximum pending value size, in characters. */
export function getMaxPendingChars(): number {
  const size = getConfig().ingest.maxPendingSize;
  return typeof size === 'number' ? size : (bytes.parse(size) ?? 0);
}
