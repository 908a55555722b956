/**
 * Configuration loading - defaults < config file < command line overrides
 */

import { readFile } from 'fs/promises';

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { ConfigError } from '../errors.js';
import { DEFAULT_CONFIG, EXTRA_RULE_IDS } from '../types.js';
import type { CheckConfig } from '../types.js';

/** A Ruff rule code (`E501`) or prefix (`E`, `D2`) */
const ruleSelector = z.string().regex(/^[A-Z]+[0-9]*$/, 'expected a rule code such as E501');

/**
 * Keys accepted in a config file. Unknown keys are rejected.
 */
export const configFileSchema = z
  .object({
    max_line_length: z.number().int().positive(),
    skip_missing_docstrings: z.boolean(),
    skip_private: z.boolean(),
    rules: z.array(z.enum(EXTRA_RULE_IDS)),
    enable_style_check: z.boolean(),
    style_check_timeout_ms: z.number().int().positive(),
    style_line_length: z.number().int().positive(),
    style_select: z.array(ruleSelector),
    style_ignore: z.array(ruleSelector),
    fix: z.boolean(),
    include: z.array(z.string().min(1)).min(1),
    exclude: z.array(z.string().min(1)),
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

const checkConfigSchema = z.object({
  maxLineLength: z.number().int().positive(),
  skipMissingDocstrings: z.boolean(),
  skipPrivate: z.boolean(),
  rules: z.array(z.enum(EXTRA_RULE_IDS)),
  enableStyleCheck: z.boolean(),
  styleCheckTimeoutMs: z.number().int().positive(),
  styleLineLength: z.number().int().positive(),
  styleSelect: z.array(ruleSelector),
  styleIgnore: z.array(ruleSelector),
  fix: z.boolean(),
  include: z.array(z.string().min(1)).min(1),
  exclude: z.array(z.string().min(1)),
});

export interface ResolveConfigOptions {
  /** Path to a YAML or JSON config file */
  configPath?: string;
  /** Values from command line flags */
  overrides?: Partial<CheckConfig>;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Parse config file text and map it onto `CheckConfig` keys.
 */
export function parseConfigFile(text: string, source: string): Partial<CheckConfig> {
  let data: unknown;
  try {
    data = parseYaml(text);
  } catch (error) {
    throw new ConfigError(
      `invalid YAML: ${error instanceof Error ? error.message : String(error)}`,
      source
    );
  }

  // An empty file means "use the defaults"
  if (data === null || data === undefined) {
    return {};
  }

  const result = configFileSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error), source);
  }

  const file = result.data;
  const config: Partial<CheckConfig> = {};
  if (file.max_line_length !== undefined) config.maxLineLength = file.max_line_length;
  if (file.skip_missing_docstrings !== undefined) config.skipMissingDocstrings = file.skip_missing_docstrings;
  if (file.skip_private !== undefined) config.skipPrivate = file.skip_private;
  if (file.rules !== undefined) config.rules = file.rules;
  if (file.enable_style_check !== undefined) config.enableStyleCheck = file.enable_style_check;
  if (file.style_check_timeout_ms !== undefined) config.styleCheckTimeoutMs = file.style_check_timeout_ms;
  if (file.style_line_length !== undefined) config.styleLineLength = file.style_line_length;
  if (file.style_select !== undefined) config.styleSelect = file.style_select;
  if (file.style_ignore !== undefined) config.styleIgnore = file.style_ignore;
  if (file.fix !== undefined) config.fix = file.fix;
  if (file.include !== undefined) config.include = file.include;
  if (file.exclude !== undefined) config.exclude = file.exclude;
  return config;
}

/**
 * Merge layers and validate the result. The returned config is frozen.
 */
export function mergeConfig(...layers: Partial<CheckConfig>[]): Readonly<CheckConfig> {
  const merged: CheckConfig = { ...DEFAULT_CONFIG };
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }

  const result = checkConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }

  if (result.data.fix && !result.data.enableStyleCheck) {
    throw new ConfigError('fix requires the style check to be enabled');
  }

  return Object.freeze(result.data);
}

/**
 * Build the run configuration from defaults, an optional config file and
 * command line overrides.
 */
export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<Readonly<CheckConfig>> {
  let fileConfig: Partial<CheckConfig> = {};

  if (options.configPath) {
    let text: string;
    try {
      text = await readFile(options.configPath, 'utf-8');
    } catch (error) {
      throw new ConfigError(
        `cannot read config file: ${error instanceof Error ? error.message : String(error)}`,
        options.configPath
      );
    }
    fileConfig = parseConfigFile(text, options.configPath);
  }

  return mergeConfig(fileConfig, options.overrides ?? {});
}
