import { box, icons, progressBar, scoreColor, style } from '../cli/theme.js';
import type { Scorecard } from '../history/scorecard-schema.js';
import { displayName } from '../scoring/recommendations.js';

export interface ViewOptions {
  json: boolean;
  showEvidence: boolean;
}

const DEFAULT_VIEW_OPTIONS: ViewOptions = {
  json: false,
  showEvidence: false,
};

const WIDTH = 60;

function sectionHeader(title: string): string {
  return `${style.dim(box.horizontal.repeat(3))} ${style.bold(title)} ${style.dim(box.horizontal.repeat(Math.max(0, 35 - title.length)))}`;
}

function kv(key: string, value: string): string {
  return `   ${style.dim(key + ':')} ${value}`;
}

function formatDecision(scorecard: Scorecard): string {
  const { outcome, reason } = scorecard.decision;
  if (outcome === 'pass') {
    return style.success(`${icons.success} Pass`) + style.muted(` (${scorecard.mode})`);
  }
  const why = reason?.trigger === 'critical'
    ? `critical issues in ${reason.criticalIssues.join(', ')}`
    : `below threshold ${(reason?.threshold ?? 0).toFixed(1)}`;
  return style.error(`${icons.error} Block`) + style.muted(` (${why})`);
}

export function formatScorecard(scorecard: Scorecard, options: Partial<ViewOptions> = {}): string {
  const opts = { ...DEFAULT_VIEW_OPTIONS, ...options };

  if (opts.json) {
    return JSON.stringify(scorecard, null, 2);
  }

  const lines: string[] = [];
  const paint = scoreColor(scorecard.finalComposite);

  lines.push('');
  lines.push(style.primary(box.dHorizontal.repeat(WIDTH)));
  lines.push(`  ${icons.trace} ${style.bold(scorecard.subject)} ${style.muted(new Date(scorecard.createdAt).toLocaleString())}`);
  lines.push(style.primary(box.dHorizontal.repeat(WIDTH)));
  lines.push('');

  lines.push(kv('Score', paint(`${scorecard.finalComposite.toFixed(2)}/10`)));
  lines.push(kv('Grade', `${paint(scorecard.grade)} ${style.muted(scorecard.gradeLabel)}`));
  lines.push(kv('Raw', style.number(scorecard.rawComposite.toFixed(1))));
  lines.push(kv('Rubric', `${scorecard.rubric.name} ${style.muted(`(${scorecard.rubric.matchedBy})`)}`));
  lines.push(kv('Decision', formatDecision(scorecard)));
  lines.push('');
  lines.push(`   ${scorecard.summary}`);
  lines.push('');

  lines.push(sectionHeader('Dimensions'));
  for (const d of scorecard.dimensions) {
    const weight = style.muted(`${Math.round(d.weight * 100)}%`.padStart(4));
    lines.push(`   ${displayName(d.name).padEnd(14)} ${progressBar(d.score, 10, 20)} ${scoreColor(d.score)(d.score.toFixed(1).padStart(4))} ${weight}`);
    lines.push(`      ${style.dim(d.justification)}`);
    if (opts.showEvidence) {
      for (const snippet of d.evidence) {
        lines.push(`      ${style.muted(`L${snippet.line}`)} ${style.dim(`[${snippet.signal}]`)} ${snippet.excerpt}`);
      }
    }
  }
  lines.push('');

  if (scorecard.redFlags.length > 0) {
    lines.push(sectionHeader(`${icons.flag} Red Flags`));
    for (const flag of scorecard.redFlags) {
      const amount = flag.applied ? style.error(`-${flag.amount.toFixed(2)}`) : style.muted('not applied');
      lines.push(`   ${style.bold(flag.id)} ${amount}`);
      lines.push(`      ${style.dim(flag.evidence)}`);
    }
    lines.push('');
  }

  if (scorecard.bonuses.length > 0) {
    lines.push(sectionHeader(`${icons.star} Bonuses`));
    for (const bonus of scorecard.bonuses) {
      const amount = bonus.applied ? style.success(`+${bonus.amount.toFixed(2)}`) : style.muted('not applied');
      lines.push(`   ${style.bold(bonus.id)} ${amount}`);
    }
    lines.push('');
  }

  for (const note of scorecard.adjustmentNotes) {
    lines.push(`   ${style.warning(icons.warning)} ${note}`);
  }

  if (scorecard.criticalIssues.length > 0) {
    lines.push(sectionHeader('Critical Issues'));
    for (const name of scorecard.criticalIssues) {
      lines.push(`   ${style.error(icons.error)} ${name}`);
    }
    lines.push('');
  }

  lines.push(sectionHeader(`${icons.bulb} Recommendations`));
  for (const recommendation of scorecard.recommendations) {
    lines.push(`   ${style.dim(icons.arrowRight)} ${recommendation}`);
  }
  lines.push('');

  if (scorecard.history.anomalous) {
    const names = scorecard.history.anomalies.map(a => a.dimension).join(', ');
    lines.push(`   ${style.warning(icons.warning)} Unusual compared to history: ${names}`);
    lines.push('');
  }

  if (scorecard.warnings.length > 0) {
    lines.push(sectionHeader('Warnings'));
    for (const warning of scorecard.warnings) {
      lines.push(`   ${style.warning(icons.warning)} ${warning}`);
    }
    lines.push('');
  }

  lines.push(style.primary(box.dHorizontal.repeat(WIDTH)));
  lines.push('');

  return lines.join('\n');
}
