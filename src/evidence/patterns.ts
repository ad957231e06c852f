// Marker patterns are tested once per transcript event, so none of them carry
// the global flag. SECRET_ASSIGNMENT and SECRET_TOKEN are only used through
// matchAll/replace and are global.

export const ERROR_MARKER =
  /\b(?:error|failed|failure|exception|traceback|fatal|panic|cannot|could not|unable to|segfault|aborted|NoneType)\b/i;

export const RESOLUTION_MARKER =
  /\b(?:fixed|resolved|now pass(?:es)?|passing|all tests pass(?:ed)?|succeeded|successfully|works now|now works)\b/i;

export const HALLUCINATION_MARKER = /\b(?:hallucinat\w*|fabricat\w*|as an AI|I don't have access|made up)\b/i;

export const CONTRADICTION_MARKER = /\b(?:contradict\w*|inconsistent with|conflicts with)\b/i;

export const VERIFICATION_MARKER =
  /\b(?:tests? passed|all tests pass(?:ed)?|verified|build succeeded|lint(?:ing)? (?:passed|clean)|checks? passed)\b/i;

export const INCOMPLETE_MARKER =
  /\b(?:TODO|FIXME|HACK|not implemented|placeholder|stub(?:bed)?|coming soon|left as (?:an )?exercise|WIP|partially (?:done|implemented))\b/i;

export const EDGE_CASE_MARKER = /\b(?:edge[- ]cases?|corner[- ]cases?|boundary (?:conditions?|cases?))\b/i;

export const DEVIATION_MARKER =
  /\b(?:instead of|ignor(?:ed|ing)|skipp(?:ed|ing) (?:the )?(?:step|instruction)s?|not following|deviat\w*|disregard\w*)\b/i;

export const IGNORED_CONSTRAINT_MARKER =
  /\bignor(?:ed|ing)(?:\s+\w+){0,2}\s+(?:constraints?|requirements?|instructions?)\b/i;

export const TRADEOFF_MARKER =
  /\b(?:trade-?offs?|pros and cons|alternatives? considered|considered (?:the )?alternatives?)\b/i;

export const FURTHER_WORK_MARKER =
  /\b(?:TODO|FIXME|needs? further work|further work (?:is )?(?:needed|required)|follow[- ]up (?:is )?(?:needed|required)|left as (?:an )?exercise|not yet implemented|remaining work)\b/i;

export const PLACEHOLDER_MARKER = /<YOUR_\w*>?|\bINSERT_HERE\b|\bREPLACE_THIS\b|\bCHANGEME\b|\bplaceholder\b/i;

export const ARTIFACT_MARKER = /\b(?:created file|wrote to|saved to|updated file|edited)\b|\b(?:Write|Edit|MultiEdit)\s*\(/i;

export const CODE_FENCE = /```/g;

export const STRUCTURE_MARKER = /^\s*#{1,6}\s+\S|^\s*\|.+\|\s*$/m;

export const RETRY_MARKER = /\b(?:retrying|retry|trying again|attempt \d+|same command|running again|re-running)\b/i;

export const DESTRUCTIVE_MARKER =
  /\brm\s+-(?:rf|fr|r)\b|\bgit\s+push\s+(?:--force\b|-f\b)|\bgit\s+reset\s+--hard\b|\bgit\s+clean\s+-[a-z]*f|\bDROP\s+(?:TABLE|DATABASE)\b|\bTRUNCATE\s+TABLE\b/i;

export const CONFIRMATION_MARKER =
  /\b(?:confirm(?:ed|s)?|are you sure|approved?|user agreed|permission granted)\b|\bproceed\?|\(y\/n\)/i;

/** How many events before a destructive action may carry its confirmation. */
export const CONFIRMATION_WINDOW = 5;

export const PERMISSION_BYPASS_MARKER =
  /\bchmod\s+(?:-R\s+)?777\b|--no-verify\b|\bsudo\s+rm\b|--dangerously-skip-permissions\b/i;

export const SECRET_ASSIGNMENT =
  /\b(password|passwd|secret|token|api[_-]?key|access[_-]?key|client[_-]?secret|private[_-]?key)\b\s*[:=]\s*["']?([^\s"',;]+)/gi;

export const SECRET_TOKEN =
  /\b(?:sk-[A-Za-z0-9_-]{16,}|ghp_[A-Za-z0-9]{20,}|github_pat_[A-Za-z0-9_]{20,}|AKIA[0-9A-Z]{16}|xox[abprs]-[A-Za-z0-9-]{10,})\b/g;

export const PRIVATE_KEY_BLOCK = /-----BEGIN [A-Z ]*PRIVATE KEY-----/;

export const ENV_REFERENCE = /process\.env|os\.environ|getenv\(|\.env\b|\benv\./i;

export const REDACTED_VALUE = /^(?:\*+|x{3,}|<[^>]*>?|\[?redacted\]?|\.{3}|null|none|undefined|empty|changeme)$/i;

/**
 * A credential value counts as a secret when it is not an environment
 * reference or an already-redacted value, and looks like a token rather
 * than a prose word.
 */
export function isSecretValue(value: string, line: string): boolean {
  if (value.startsWith('$') || ENV_REFERENCE.test(line)) return false;
  if (REDACTED_VALUE.test(value)) return false;
  return /[^A-Za-z]/.test(value) || value.length >= 16;
}

export function findSecrets(text: string): string[] {
  const found: string[] = [];
  for (const line of text.split('\n')) {
    for (const match of line.matchAll(SECRET_ASSIGNMENT)) {
      const value = match[2];
      if (value && isSecretValue(value, line)) {
        found.push(value);
      }
    }
    for (const match of line.matchAll(SECRET_TOKEN)) {
      found.push(match[0]);
    }
    if (PRIVATE_KEY_BLOCK.test(line)) {
      found.push(line.trim());
    }
  }
  return found;
}

export function redactSecrets(text: string): string {
  let redacted = text;
  for (const secret of findSecrets(text)) {
    redacted = redacted.split(secret).join('[redacted]');
  }
  return redacted;
}
