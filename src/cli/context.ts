import { resolve } from 'path';
import { resolvePaths, type ProjectPaths } from '../config/loader.js';
import { isSkillgradeError } from '../errors/index.js';
import { formatError } from './theme.js';

export interface ProjectOptions {
  cwd?: string;
  rubricsDir?: string;
}

export function projectPaths(options: ProjectOptions): ProjectPaths {
  const paths = resolvePaths(options.cwd);
  return options.rubricsDir ? { ...paths, rubricsDir: resolve(paths.root, options.rubricsDir) } : paths;
}

export function errorMessage(error: unknown): string {
  if (isSkillgradeError(error)) return `${error.kind}: ${error.message}`;
  return error instanceof Error ? error.message : String(error);
}

export function exitWithError(error: unknown, suggestions: string[]): never {
  console.error(formatError(errorMessage(error), suggestions));
  process.exit(1);
}
