import { Command } from 'commander';
import { ScorecardStore } from '../../history/scorecard-store.js';
import { buildHistoryReport, formatHistoryReport } from '../../report/history-report.js';
import { formatScorecard } from '../../report/scorecard-viewer.js';
import { exitWithError, projectPaths, type ProjectOptions } from '../context.js';
import { formatWarning, icons, nextSteps, style } from '../theme.js';

interface ReportOptions extends ProjectOptions {
  limit: string;
  last: boolean;
  evidence: boolean;
  json: boolean;
}

export const reportCommand = new Command('report')
  .description('Show score history, or the latest scorecard with --last')
  .argument('[subject]', 'Only scorecards of this skill or agent')
  .option('-n, --limit <count>', 'Number of scorecards to include', '10')
  .option('--last', 'Show the most recent scorecard in full', false)
  .option('--evidence', 'Show evidence excerpts with --last', false)
  .option('--json', 'Output as JSON', false)
  .option('-C, --cwd <dir>', 'Project root holding .skillgrade/')
  .addHelpText('after', `
${style.bold('Examples:')}
  ${style.command('skillgrade report')}                     ${style.dim('Recent scorecards of every subject')}
  ${style.command('skillgrade report code-review -n 5')}    ${style.dim('Last five runs of one subject')}
  ${style.command('skillgrade report code-review --last')}  ${style.dim('Full card of the latest run')}
`)
  .action(async (subject: string | undefined, options: ReportOptions) => {
    try {
      const limit = Number.parseInt(options.limit, 10);
      if (!Number.isInteger(limit) || limit < 1) {
        throw new Error(`--limit must be a positive integer, got "${options.limit}"`);
      }

      const store = new ScorecardStore(projectPaths(options).scoresDir);
      const { records, warnings } = await store.list(subject);
      for (const warning of warnings) {
        console.error(formatWarning(warning));
      }

      if (records.length === 0) {
        console.log(`\n${style.warning(`${icons.warning} No scorecards found${subject ? ` for ${subject}` : ''}.`)}`);
        console.log(nextSteps([
          { command: 'skillgrade judge <subject> -t <transcript>', description: 'Score a transcript' },
        ]));
        return;
      }

      const latest = records[0];
      if (options.last && latest) {
        console.log(formatScorecard(latest.scorecard, { json: options.json, showEvidence: options.evidence }));
        return;
      }

      const report = buildHistoryReport(records, subject ?? null, limit);
      console.log(options.json ? JSON.stringify(report, null, 2) : formatHistoryReport(report));
    } catch (error) {
      exitWithError(error, [
        'Check that the project root contains a .skillgrade directory',
        'Use --limit with a positive number',
      ]);
    }
  });
