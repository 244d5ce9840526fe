// ABOUTME: Loads optional .polydev.yaml settings from the project root
// ABOUTME: Validates with zod and layers environment overrides on top of the file

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';

export const CONFIG_FILE_NAMES = ['.polydev.yaml', '.polydev.yml'];

export const DEFAULT_TIMEOUT_SECONDS = 600;

const ToolListSchema = z.array(z.string().min(1));

export const PolydevConfigSchema = z
  .object({
    timeoutSeconds: z.number().int().positive().default(DEFAULT_TIMEOUT_SECONDS),
    parallel: z.boolean().default(false),
    preferences: z
      .object({
        rust: ToolListSchema.optional(),
        python: ToolListSchema.optional(),
        node: ToolListSchema.optional(),
      })
      .strict()
      .default({}),
  })
  .strict();

export type PolydevConfig = z.infer<typeof PolydevConfigSchema>;

export interface LoadedConfig {
  config: PolydevConfig;
  /** Absolute path of the file that was read, if any. */
  source?: string;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

async function readConfigFile(rootPath: string): Promise<{ path: string; content: string } | null> {
  for (const name of CONFIG_FILE_NAMES) {
    const path = join(rootPath, name);
    try {
      return { path, content: await readFile(path, 'utf-8') };
    } catch {
      // Not present under this name
    }
  }
  return null;
}

/** Apply POLYDEV_* environment variables on top of file settings. */
export function applyEnvOverrides(config: PolydevConfig, env: NodeJS.ProcessEnv): PolydevConfig {
  const result = { ...config };

  const timeout = env.POLYDEV_TIMEOUT_SECONDS;
  if (timeout !== undefined && timeout !== '') {
    const seconds = Number(timeout);
    if (!Number.isInteger(seconds) || seconds <= 0) {
      throw new ConfigError(`POLYDEV_TIMEOUT_SECONDS must be a positive integer, got "${timeout}"`);
    }
    result.timeoutSeconds = seconds;
  }

  if (env.POLYDEV_PARALLEL !== undefined && env.POLYDEV_PARALLEL !== '') {
    result.parallel = env.POLYDEV_PARALLEL === '1' || env.POLYDEV_PARALLEL === 'true';
  }

  return result;
}

export function parseConfig(content: string, filePath?: string): PolydevConfig {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new ConfigError(`invalid YAML: ${errorMessage(err)}`, { cause: err, filePath });
  }

  // An empty file parses to null
  const parsed = PolydevConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(`invalid configuration: ${formatIssues(parsed.error)}`, {
      cause: parsed.error,
      filePath,
    });
  }
  return parsed.data;
}

export async function loadConfig(
  rootPath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<LoadedConfig> {
  const file = await readConfigFile(rootPath);
  const config = file ? parseConfig(file.content, file.path) : PolydevConfigSchema.parse({});
  return { config: applyEnvOverrides(config, env), source: file?.path };
}
