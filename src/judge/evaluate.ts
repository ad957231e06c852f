import { loadConfig, type LoadedConfig, type ProjectPaths } from '../config/loader.js';
import { extractEvidence } from '../evidence/extractors.js';
import { decide } from '../gate/decision.js';
import type { EvaluationMode } from '../gate/types.js';
import { detectAnomalies, loadHistory } from '../history/history.js';
import { SCHEMA_VERSION, type Scorecard } from '../history/scorecard-schema.js';
import { ScorecardStore } from '../history/scorecard-store.js';
import { resolveRubric } from '../rubrics/resolver.js';
import { computeComposite, criticalIssues, detectTriggers } from '../scoring/composite.js';
import { scoreDimensions } from '../scoring/dimension-scorer.js';
import { mapGrade } from '../scoring/grade.js';
import { buildOneLiner, buildRecommendations, buildSummary } from '../scoring/recommendations.js';
import { loadTranscript } from '../transcript/loader.js';

export interface EvaluateOptions {
  subject: string;
  transcriptPath: string;
  mode: EvaluationMode;
  paths: ProjectPaths;
  /** Config snapshot and its load warnings; read from `paths.configPath` when omitted. */
  config?: LoadedConfig;
  /** Explicit rubric name or path. */
  rubric?: string;
  store?: ScorecardStore;
  /** Skip writing the scorecard. */
  dryRun?: boolean;
  now?: () => Date;
}

export interface EvaluationResult {
  scorecard: Scorecard;
  /** Where the scorecard was written, or null on a dry run. */
  path: string | null;
}

/**
 * Evaluate one transcript end to end. Fatal errors propagate before anything
 * is written; non-fatal problems end up in `scorecard.warnings`.
 */
export async function evaluate(options: EvaluateOptions): Promise<EvaluationResult> {
  const { subject, transcriptPath, mode, paths } = options;
  const now = options.now ?? (() => new Date());
  const warnings: string[] = [];

  const loaded = options.config ?? (await loadConfig(paths.configPath));
  const config = loaded.config;
  warnings.push(...loaded.warnings);

  const resolved = resolveRubric(subject, {
    rubricsDir: paths.rubricsDir,
    override: options.rubric,
    defaultRubric: config.scoring.default_rubric,
    weights: config.scoring.dimensions,
  });
  warnings.push(...resolved.warnings);

  const transcript = loadTranscript(transcriptPath);
  const evidence = extractEvidence(transcript, resolved.rubric);

  const store = options.store ?? new ScorecardStore(paths.scoresDir);
  const history = await loadHistory(store, subject);
  warnings.push(...history.warnings);
  const baseline = history.stats.windowSize > 0 ? history.stats : null;

  const dimensions = scoreDimensions(evidence, resolved.rubric, baseline);
  const composite = computeComposite(dimensions, detectTriggers(resolved.rubric, evidence));
  const grade = mapGrade(composite.final);
  const critical = criticalIssues(dimensions);
  const anomalies = baseline ? detectAnomalies(dimensions, baseline) : [];

  const decision = decide(
    { mode, subject, composite: composite.final, grade: grade.grade, criticalIssues: critical },
    config,
  );

  const scorecard: Scorecard = {
    schemaVersion: SCHEMA_VERSION,
    subject,
    createdAt: now().toISOString(),
    mode,
    rubric: { name: resolved.rubric.name, source: resolved.source, matchedBy: resolved.matchedBy },
    transcript: { path: transcript.source, events: transcript.events.length },
    dimensions,
    rawComposite: composite.raw,
    redFlags: composite.redFlags,
    bonuses: composite.bonuses,
    adjustmentNotes: composite.notes,
    finalComposite: composite.final,
    grade: grade.grade,
    gradeLabel: grade.label,
    criticalIssues: critical,
    recommendations: buildRecommendations(dimensions),
    summary: buildSummary(dimensions, composite, grade),
    oneLiner: buildOneLiner(dimensions, critical),
    history: { windowSize: history.stats.windowSize, anomalous: anomalies.length > 0, anomalies },
    decision,
    warnings,
  };

  const path = options.dryRun ? null : await store.save(scorecard);
  return { scorecard, path };
}
