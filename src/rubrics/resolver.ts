import { fileURLToPath } from 'url';
import { RubricNotFoundError } from '../errors/index.js';
import { findRubricFile, isRubricPath, loadRubric } from './rubric-loader.js';
import type { ResolvedRubric, RubricMatch, WeightOverrides } from './types.js';

/** Rubrics shipped with the package, used when a project has no default of its own. */
export const BUNDLED_RUBRICS_DIR = fileURLToPath(new URL('../../rubrics', import.meta.url));

const SAFE_NAME = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;
const BENCHMARKS_ID = 'benchmarks';

export interface ResolveOptions {
  rubricsDir: string;
  override?: string;
  defaultRubric?: string;
  weights?: WeightOverrides;
}

interface MatchRule {
  matchedBy: RubricMatch;
  locate: (subject: string, options: ResolveOptions) => string | null;
}

function findByName(name: string, rubricsDir: string): string | null {
  return SAFE_NAME.test(name) && name !== BENCHMARKS_ID ? findRubricFile(name, rubricsDir) : null;
}

/** `frontend-design-v3` → `frontend-design`, `frontend` */
export function categoryPrefixes(subject: string): string[] {
  const parts = subject.split('-');
  const prefixes: string[] = [];
  for (let i = parts.length - 1; i >= 1; i--) {
    prefixes.push(parts.slice(0, i).join('-'));
  }
  return prefixes;
}

/** Tried in order; the first rule that locates a file wins. */
export const MATCH_RULES: readonly MatchRule[] = [
  {
    matchedBy: 'override',
    locate: (_subject, { override, rubricsDir }) => {
      if (override === undefined) return null;
      const path = isRubricPath(override) ? override : findByName(override, rubricsDir);
      if (!path) {
        throw new RubricNotFoundError(override, rubricsDir);
      }
      return path;
    },
  },
  {
    matchedBy: 'exact',
    locate: (subject, { rubricsDir }) => findByName(subject, rubricsDir),
  },
  {
    matchedBy: 'prefix',
    locate: (subject, { rubricsDir }) => {
      for (const prefix of categoryPrefixes(subject)) {
        const path = findByName(prefix, rubricsDir);
        if (path) return path;
      }
      return null;
    },
  },
  {
    matchedBy: 'default',
    locate: (_subject, { rubricsDir, defaultRubric = 'default' }) => {
      const path = findByName(defaultRubric, rubricsDir) ?? findRubricFile('default', BUNDLED_RUBRICS_DIR);
      if (!path) {
        throw new RubricNotFoundError(defaultRubric, `${rubricsDir}, ${BUNDLED_RUBRICS_DIR}`);
      }
      return path;
    },
  },
];

export function resolveRubric(subject: string, options: ResolveOptions): ResolvedRubric {
  for (const rule of MATCH_RULES) {
    const source = rule.locate(subject, options);
    if (!source) continue;

    const { rubric, warnings } = loadRubric(source, options.weights);
    if (rule.matchedBy === 'default') {
      warnings.unshift(`No rubric matched "${subject}"; using default rubric ${source}`);
    }
    return { rubric, matchedBy: rule.matchedBy, source, warnings };
  }

  // The default rule either locates a file or throws.
  throw new RubricNotFoundError(subject, options.rubricsDir);
}
