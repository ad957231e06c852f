import { existsSync, readFileSync, readdirSync, statSync } from 'fs';
import { basename, join } from 'path';
import yaml from 'js-yaml';
import { InvalidRubricError, RubricNotFoundError } from '../errors/index.js';
import { isBonusSignal, isRedFlagSignal } from '../evidence/signals.js';
import {
  DIMENSIONS,
  isDimensionName,
  type BandDescriptions,
  type Rubric,
  type RubricDimension,
  type RubricTrigger,
  type WeightOverrides,
} from './types.js';

const WEIGHT_TOLERANCE = 0.01;
const RUBRIC_EXTENSIONS = ['.yaml', '.yml'] as const;

interface CacheEntry {
  mtimeMs: number;
  rubric: Rubric;
}

const rubricCache = new Map<string, CacheEntry>();

export interface LoadedRubric {
  rubric: Rubric;
  warnings: string[];
}

export interface RubricListing {
  id: string;
  path: string;
  rubric?: Rubric;
  error?: string;
}

/** `<dir>/<name>.yaml` or `<dir>/<name>.yml`, whichever exists first. */
export function findRubricFile(name: string, rubricsDir: string): string | null {
  for (const ext of RUBRIC_EXTENSIONS) {
    const candidate = join(rubricsDir, `${name}${ext}`);
    if (existsSync(candidate)) return candidate;
  }
  return null;
}

export function isRubricPath(path: string): boolean {
  return RUBRIC_EXTENSIONS.some(ext => path.endsWith(ext)) && existsSync(path);
}

/**
 * Load a rubric file, apply weight overrides and validate the result. The
 * parsed file is cached until its modification time changes.
 */
export function loadRubric(path: string, overrides: WeightOverrides = {}): LoadedRubric {
  const base = readRubricFile(path);
  const warnings: string[] = [];
  const dimensions = applyWeightOverrides(base.dimensions, overrides, warnings);

  validateWeights(dimensions, path);

  if (dimensions === base.dimensions) {
    return { rubric: base, warnings };
  }
  return { rubric: deepFreeze({ ...base, dimensions }), warnings };
}

function readRubricFile(path: string): Rubric {
  if (!existsSync(path)) {
    throw new RubricNotFoundError(basename(path), path);
  }

  const { mtimeMs } = statSync(path);
  const cached = rubricCache.get(path);
  if (cached && cached.mtimeMs === mtimeMs) {
    return cached.rubric;
  }

  let content: unknown;
  try {
    content = yaml.load(readFileSync(path, 'utf-8'));
  } catch (e) {
    throw new InvalidRubricError(path, e instanceof Error ? e.message : String(e));
  }

  const rubric = deepFreeze(parseRubric(content, path));
  rubricCache.set(path, { mtimeMs, rubric });
  return rubric;
}

export function listRubrics(rubricsDir: string): RubricListing[] {
  if (!existsSync(rubricsDir)) {
    return [];
  }

  return readdirSync(rubricsDir)
    .filter(f => RUBRIC_EXTENSIONS.some(ext => f.endsWith(ext)))
    .filter(f => f !== 'benchmarks.yaml')
    .sort()
    .map(file => {
      const path = join(rubricsDir, file);
      const id = file.replace(/\.(yaml|yml)$/, '');
      try {
        return { id, path, rubric: loadRubric(path).rubric };
      } catch (e) {
        return { id, path, error: e instanceof Error ? e.message : String(e) };
      }
    });
}

export function clearRubricCache(): void {
  rubricCache.clear();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBands(value: unknown): value is BandDescriptions {
  return Array.isArray(value) && value.length === 5 && value.every(band => typeof band === 'string');
}

/** Structural validation; weight sums are checked after overrides in loadRubric. */
export function parseRubric(content: unknown, source: string): Rubric {
  const fail = (reason: string): never => {
    throw new InvalidRubricError(source, reason);
  };

  if (!isRecord(content)) {
    return fail('rubric must be an object');
  }
  if (typeof content.name !== 'string') {
    return fail('rubric must have a name (string)');
  }
  if (typeof content.description !== 'string') {
    return fail('rubric must have a description (string)');
  }

  const dimensionList: unknown = content.dimensions;
  if (!Array.isArray(dimensionList)) {
    return fail('rubric must have a dimensions list');
  }
  const dimensions = dimensionList.map((d: unknown, i: number) => parseDimension(d, i, fail));

  for (const name of DIMENSIONS) {
    const count = dimensions.filter(d => d.name === name).length;
    if (count !== 1) {
      fail(count === 0 ? `missing dimension "${name}"` : `dimension "${name}" appears ${count} times`);
    }
  }

  return {
    name: content.name,
    description: content.description,
    dimensions: DIMENSIONS.map(name => dimensions.find(d => d.name === name) ?? fail(`missing dimension "${name}"`)),
    redFlags: parseTriggers(content.redFlags, 'red flag', isRedFlagSignal, fail),
    bonuses: parseTriggers(content.bonuses, 'bonus', isBonusSignal, fail),
  };
}

function parseDimension(value: unknown, index: number, fail: (reason: string) => never): RubricDimension {
  if (!isRecord(value)) {
    return fail(`dimension #${index + 1} must be an object`);
  }

  const { name, weight, description, bands } = value;
  if (typeof name !== 'string' || !isDimensionName(name)) {
    return fail(`unknown dimension "${String(name)}"`);
  }
  if (typeof weight !== 'number' || weight < 0 || weight > 1) {
    return fail(`dimension "${name}" must have a weight between 0 and 1`);
  }
  if (typeof description !== 'string') {
    return fail(`dimension "${name}" must have a description`);
  }
  if (!isBands(bands)) {
    return fail(`dimension "${name}" must have exactly 5 band descriptions`);
  }

  return { name, weight, description, bands };
}

function parseTriggers(
  value: unknown,
  kind: string,
  isKnownSignal: (signal: string) => boolean,
  fail: (reason: string) => never,
): RubricTrigger[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    return fail(`${kind} list must be an array`);
  }

  const items: unknown[] = value;
  return items.map((item) => {
    if (!isRecord(item) || typeof item.id !== 'string' || typeof item.signal !== 'string') {
      return fail(`each ${kind} needs an id and a signal`);
    }
    if (!isKnownSignal(item.signal)) {
      return fail(`${kind} "${item.id}" uses unknown signal "${item.signal}"`);
    }
    return {
      id: item.id,
      description: typeof item.description === 'string' ? item.description : item.id,
      signal: item.signal,
    };
  });
}

function applyWeightOverrides(
  dimensions: readonly RubricDimension[],
  overrides: WeightOverrides,
  warnings: string[],
): readonly RubricDimension[] {
  const entries = Object.entries(overrides);
  if (entries.length === 0) return dimensions;

  const weights = new Map<string, number>();
  for (const [name, weight] of entries) {
    if (isDimensionName(name)) {
      weights.set(name, weight);
    } else {
      warnings.push(`Ignoring weight override for unknown dimension "${name}"`);
    }
  }

  return dimensions.map(d => ({ ...d, weight: weights.get(d.name) ?? d.weight }));
}

function validateWeights(dimensions: readonly RubricDimension[], source: string): void {
  for (const d of dimensions) {
    if (d.weight < 0 || d.weight > 1) {
      throw new InvalidRubricError(source, `dimension "${d.name}" weight ${d.weight} is outside [0, 1]`);
    }
  }

  const total = dimensions.reduce((sum, d) => sum + d.weight, 0);
  if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
    throw new InvalidRubricError(source, `weights sum to ${Math.round(total * 1000) / 1000}, expected 1.0`);
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
