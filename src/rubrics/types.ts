export const DIMENSIONS = [
  'correctness',
  'completeness',
  'adherence',
  'actionability',
  'efficiency',
  'safety',
  'consistency',
] as const;

export type DimensionName = (typeof DIMENSIONS)[number];

/** Band descriptions ordered 9–10, 7–8, 5–6, 3–4, 1–2. */
export type BandDescriptions = readonly [string, string, string, string, string];

export interface RubricDimension {
  name: DimensionName;
  weight: number;
  description: string;
  bands: BandDescriptions;
}

export interface RubricTrigger {
  id: string;
  description: string;
  signal: string;
}

export interface Rubric {
  name: string;
  description: string;
  dimensions: readonly RubricDimension[];
  redFlags: readonly RubricTrigger[];
  bonuses: readonly RubricTrigger[];
}

export type RubricMatch = 'override' | 'exact' | 'prefix' | 'default';

export interface ResolvedRubric {
  rubric: Rubric;
  matchedBy: RubricMatch;
  source: string;
  warnings: string[];
}

export type WeightOverrides = Readonly<Record<string, number>>;

export function isDimensionName(value: string): value is DimensionName {
  return DIMENSIONS.some((dimension) => dimension === value);
}
