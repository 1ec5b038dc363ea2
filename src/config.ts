import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod/v4';
import { ConfigError } from './errors.js';
import type { TranspileOptions } from './context.js';

export const CONFIG_FILE = 'py2ino.config.json';

const ConfigSchema = z.strictObject({
  autoLoop: z.boolean().optional(),
  inferConstruction: z.boolean().optional(),
  constructibleTypes: z.array(z.string()).optional(),
  /** Class description JSON whose class names join the constructible registry */
  classes: z.string().optional(),
  builtinModule: z.string().min(1).optional(),
  headerExtension: z.string().optional(),
  comments: z.boolean().optional()
});

export type ProjectConfig = z.infer<typeof ConfigSchema>;

/**
 * Load `py2ino.config.json` from `projectPath`. A missing file yields an
 * empty config; `classes` is resolved against the config's directory.
 */
export function loadConfig(projectPath = process.cwd()): ProjectConfig {
  const configPath = path.join(projectPath, CONFIG_FILE);
  if (!fs.existsSync(configPath)) {
    return {};
  }

  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(configPath, `Cannot parse config: ${message}`);
  }

  const parsed = ConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.map(String).join('.') || '$'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(configPath, `Invalid config: ${issues}`);
  }

  const config = parsed.data;
  if (config.classes !== undefined) {
    config.classes = path.resolve(projectPath, config.classes);
  }
  return config;
}

/** Config values with CLI flags layered on top; constructible types from both are kept */
export function mergeOptions(config: ProjectConfig, overrides: Partial<TranspileOptions>): Partial<TranspileOptions> {
  return {
    autoLoop: overrides.autoLoop ?? config.autoLoop,
    inferConstruction: overrides.inferConstruction ?? config.inferConstruction,
    constructibleTypes: [...(config.constructibleTypes ?? []), ...(overrides.constructibleTypes ?? [])],
    builtinModule: overrides.builtinModule ?? config.builtinModule,
    headerExtension: overrides.headerExtension ?? config.headerExtension,
    comments: overrides.comments ?? config.comments
  };
}
