import { z } from 'zod/v4';
import { formatIssues, loadConfig, type ProjectPaths } from '../config/loader.js';
import { SubjectUndetectedError } from '../errors/index.js';
import { shouldAutoJudge } from '../gate/decision.js';
import type { Scorecard } from '../history/scorecard-schema.js';
import type { ScorecardStore } from '../history/scorecard-store.js';
import { detectSubjectFromFile } from '../transcript/subject-detector.js';
import { evaluate } from './evaluate.js';

export const HOOK_EVENTS = ['stop', 'subagent-stop'] as const;
export type HookEvent = (typeof HOOK_EVENTS)[number];

const HOOK_EVENT_NAMES: Readonly<Record<HookEvent, string>> = {
  stop: 'Stop',
  'subagent-stop': 'SubagentStop',
};

export const StopPayload = z.object({
  transcript_path: z.string().min(1),
});

export const SubagentStopPayload = z.object({
  agent_type: z.string().min(1),
  agent_transcript_path: z.string().min(1),
});

/** Exit code 2 tells the host to block; 0 lets it continue. */
export interface HookResult {
  exitCode: 0 | 2;
  stdout?: string;
  stderr?: string;
}

export interface HookOptions {
  paths: ProjectPaths;
  store?: ScorecardStore;
  now?: () => Date;
}

export function isHookEvent(value: string): value is HookEvent {
  return HOOK_EVENTS.some(event => event === value);
}

function target(event: HookEvent, payload: unknown): { subject: string; transcriptPath: string } {
  if (event === 'subagent-stop') {
    const { agent_type, agent_transcript_path } = SubagentStopPayload.parse(payload);
    return { subject: agent_type, transcriptPath: agent_transcript_path };
  }
  const { transcript_path } = StopPayload.parse(payload);
  const subject = detectSubjectFromFile(transcript_path);
  if (!subject) {
    throw new SubjectUndetectedError(transcript_path);
  }
  return { subject, transcriptPath: transcript_path };
}

export function formatBlockMessage(scorecard: Scorecard): string {
  const reason = scorecard.decision.reason;
  const head = `skillgrade: blocked ${scorecard.subject} at ${scorecard.finalComposite.toFixed(2)}/10 (${scorecard.grade})`;
  const lines = [
    reason?.trigger === 'critical'
      ? `${head}; critical issues in ${reason.criticalIssues.join(', ')}`
      : `${head}; threshold is ${(reason?.threshold ?? 0).toFixed(1)}`,
  ];

  for (const name of scorecard.criticalIssues) {
    const dimension = scorecard.dimensions.find(d => d.name === name);
    if (dimension) {
      lines.push(`  - ${name} ${dimension.score.toFixed(1)}: ${dimension.justification}`);
    }
  }
  for (const flag of scorecard.redFlags.filter(f => f.applied)) {
    lines.push(`  - red flag ${flag.id}: ${flag.evidence}`);
  }
  for (const recommendation of scorecard.recommendations) {
    lines.push(`  * ${recommendation}`);
  }
  return lines.join('\n');
}

export function formatPassContext(event: HookEvent, scorecard: Scorecard): string {
  return JSON.stringify({
    hookSpecificOutput: {
      hookEventName: HOOK_EVENT_NAMES[event],
      additionalContext:
        `skillgrade: ${scorecard.subject} → ${scorecard.finalComposite.toFixed(2)}/10 (${scorecard.grade}). ${scorecard.oneLiner}`,
    },
  });
}

async function handle(event: HookEvent, input: unknown, options: HookOptions): Promise<HookResult> {
  const payload: unknown = typeof input === 'string' ? JSON.parse(input) : input;
  const { subject, transcriptPath } = target(event, payload);

  const loaded = await loadConfig(options.paths.configPath);
  if (shouldAutoJudge(loaded.config, subject).verdict === 'skip') {
    return { exitCode: 0 };
  }

  const { scorecard } = await evaluate({
    subject,
    transcriptPath,
    mode: 'auto',
    paths: options.paths,
    config: loaded,
    store: options.store,
    now: options.now,
  });

  if (scorecard.decision.outcome === 'block') {
    return { exitCode: 2, stderr: formatBlockMessage(scorecard) };
  }
  return { exitCode: 0, stdout: formatPassContext(event, scorecard) };
}

/**
 * Lifecycle hook entry point. Accepts the raw stdin text or a parsed payload.
 * An undetected subject exits 0 quietly; any other failure exits 0 with a
 * one-line note so the host session continues.
 */
export async function runHook(event: HookEvent, input: unknown, options: HookOptions): Promise<HookResult> {
  try {
    return await handle(event, input, options);
  } catch (e) {
    if (e instanceof SubjectUndetectedError) {
      return { exitCode: 0 };
    }
    const message = e instanceof z.ZodError
      ? `invalid ${event} payload: ${formatIssues(e)}`
      : e instanceof Error ? e.message.split('\n')[0] : String(e);
    return { exitCode: 0, stderr: `skillgrade: evaluation skipped (${message})` };
  }
}
