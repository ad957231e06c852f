import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, join, resolve } from 'path';
import type { z } from 'zod/v4';
import { Config, defaultConfig } from './schema.js';

export const STATE_DIR = '.skillgrade';

export interface ProjectPaths {
  root: string;
  configPath: string;
  scoresDir: string;
  rubricsDir: string;
}

export function resolvePaths(root: string = process.cwd()): ProjectPaths {
  const base = resolve(root);
  return {
    root: base,
    configPath: join(base, STATE_DIR, 'config.json'),
    scoresDir: join(base, STATE_DIR, 'scores'),
    rubricsDir: join(base, 'rubrics'),
  };
}

export interface LoadedConfig {
  config: Config;
  warnings: string[];
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.map(String).join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Read the config file. A missing file yields the defaults; a file that is
 * not valid JSON or fails validation yields the defaults plus a warning.
 */
export async function loadConfig(path: string): Promise<LoadedConfig> {
  if (!existsSync(path)) {
    return { config: defaultConfig(), warnings: [] };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return { config: defaultConfig(), warnings: [`Config ${path} could not be read (${reason}); using defaults`] };
  }

  const result = Config.safeParse(raw);
  if (!result.success) {
    return {
      config: defaultConfig(),
      warnings: [`Config ${path} is invalid (${formatIssues(result.error)}); using defaults`],
    };
  }

  return { config: result.data, warnings: [] };
}

/** Whole-file rewrite; the value is validated before anything is written. */
export async function saveConfig(path: string, config: Config): Promise<void> {
  const validated = Config.parse(config);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(validated, null, 2) + '\n', 'utf-8');
}
