/**
 * skillgrade CLI theme
 * Shared colors, icons and formatters for terminal output.
 */

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',

  brightBlack: '\x1b[90m',
  brightBlue: '\x1b[94m',
  brightMagenta: '\x1b[95m',
  brightCyan: '\x1b[96m',
  brightYellow: '\x1b[93m',
};

export const style = {
  bold: (text: string) => `${colors.bold}${text}${colors.reset}`,
  dim: (text: string) => `${colors.dim}${text}${colors.reset}`,

  success: (text: string) => `${colors.green}${text}${colors.reset}`,
  error: (text: string) => `${colors.red}${text}${colors.reset}`,
  warning: (text: string) => `${colors.yellow}${text}${colors.reset}`,
  highlight: (text: string) => `${colors.brightMagenta}${text}${colors.reset}`,
  muted: (text: string) => `${colors.brightBlack}${text}${colors.reset}`,

  primary: (text: string) => `${colors.brightCyan}${text}${colors.reset}`,
  accent: (text: string) => `${colors.brightMagenta}${text}${colors.reset}`,

  command: (text: string) => `${colors.bold}${colors.cyan}${text}${colors.reset}`,
  path: (text: string) => `${colors.brightBlue}${text}${colors.reset}`,
  number: (text: string) => `${colors.brightYellow}${text}${colors.reset}`,
  label: (text: string) => `${colors.dim}${text}${colors.reset}`,
};

export const icons = {
  success: '✓',
  error: '✗',
  warning: '⚠',

  arrowRight: '▸',
  up: '↑',
  down: '↓',
  flat: '→',

  list: '📋',
  trace: '📊',
  flag: '🚩',
  star: '⭐',
  bulb: '💡',
};

export const box = {
  horizontal: '─',
  dHorizontal: '═',
};

export const BANNER_MINIMAL = `${style.accent('skillgrade')} ${style.muted('·')} ${style.dim('rubric scoring for skill and agent runs')}`;

export function subheader(title: string): string {
  return `\n${style.bold(title)}\n${style.dim(box.horizontal.repeat(40))}`;
}

export function keyValue(key: string, value: string | number, indent = 0): string {
  const pad = '  '.repeat(indent);
  return `${pad}${style.label(key + ':')} ${value}`;
}

export function progressBar(current: number, total: number, width = 30): string {
  const ratio = total > 0 ? Math.min(1, Math.max(0, current / total)) : 0;
  const filled = Math.round(ratio * width);
  const empty = width - filled;

  const bar = scoreColor(ratio * 10)('█'.repeat(filled)) + style.dim('░'.repeat(empty));
  return `${bar} ${style.muted(`${Math.round(ratio * 100)}%`)}`;
}

/** Green from 8.0, yellow from 5.0, red below. */
export function scoreColor(score: number): (text: string) => string {
  if (score >= 8) return style.success;
  if (score >= 5) return style.warning;
  return style.error;
}

export function formatError(message: string, suggestions?: string[]): string {
  const lines: string[] = [];
  lines.push(`\n${style.error(`${icons.error} Error:`)} ${message}`);

  if (suggestions && suggestions.length > 0) {
    lines.push('');
    lines.push(style.dim('  Suggestions:'));
    for (const suggestion of suggestions) {
      lines.push(`    ${style.dim(icons.arrowRight)} ${suggestion}`);
    }
  }

  lines.push('');
  return lines.join('\n');
}

export function formatWarning(message: string): string {
  return `${style.warning(icons.warning)} ${message}`;
}

export function commandExample(command: string, description?: string): string {
  if (description) {
    return `  ${style.command(command)}  ${style.dim(description)}`;
  }
  return `  ${style.command(command)}`;
}

export function nextSteps(steps: { command: string; description: string }[]): string {
  const lines: string[] = [];
  lines.push(`\n${style.bold('Next steps:')}`);

  for (const step of steps) {
    lines.push(commandExample(step.command, step.description));
  }

  lines.push('');
  return lines.join('\n');
}
