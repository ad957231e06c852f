import { Command } from 'commander';
import { existsSync } from 'fs';
import { join } from 'path';
import { ScorecardStore } from '../../history/scorecard-store.js';
import { BENCHMARKS_FILE, compareToBenchmarks, formatBenchmark, loadBenchmarks } from '../../report/benchmark.js';
import { BUNDLED_RUBRICS_DIR } from '../../rubrics/resolver.js';
import { exitWithError, projectPaths, type ProjectOptions } from '../context.js';
import { formatWarning, icons, nextSteps, style } from '../theme.js';

interface BenchmarkOptions extends ProjectOptions {
  limit: string;
  json: boolean;
}

export const benchmarkCommand = new Command('benchmark')
  .description('Compare average scores of a subject against benchmark standards')
  .argument('<subject>', 'Skill or agent name')
  .option('-n, --limit <count>', 'Number of recent scorecards to average', '10')
  .option('--rubrics-dir <dir>', 'Directory containing rubric YAML files and benchmarks.yaml')
  .option('-C, --cwd <dir>', 'Project root holding .skillgrade/')
  .option('--json', 'Output as JSON', false)
  .addHelpText('after', `
${style.bold('Examples:')}
  ${style.command('skillgrade benchmark code-review')}         ${style.dim('Compare the last 10 runs')}
  ${style.command('skillgrade benchmark code-review --json')}  ${style.dim('Machine-readable comparison')}
`)
  .action(async (subject: string, options: BenchmarkOptions) => {
    try {
      const limit = Number.parseInt(options.limit, 10);
      if (!Number.isInteger(limit) || limit < 1) {
        throw new Error(`--limit must be a positive integer, got "${options.limit}"`);
      }

      const paths = projectPaths(options);
      const benchmarksDir = existsSync(join(paths.rubricsDir, BENCHMARKS_FILE)) ? paths.rubricsDir : BUNDLED_RUBRICS_DIR;
      const { standards, warnings } = loadBenchmarks(benchmarksDir);

      const listing = await new ScorecardStore(paths.scoresDir).list(subject);
      for (const warning of [...warnings, ...listing.warnings]) {
        console.error(formatWarning(warning));
      }

      const comparison = compareToBenchmarks(listing.records.slice(0, limit).map(r => r.scorecard), subject, standards);
      if (!comparison) {
        console.log(`\n${style.warning(`${icons.warning} No scorecards found for ${subject}.`)}`);
        console.log(nextSteps([
          { command: `skillgrade judge ${subject} -t <transcript>`, description: 'Score a transcript first' },
        ]));
        return;
      }

      console.log(options.json ? JSON.stringify(comparison, null, 2) : formatBenchmark(comparison));
    } catch (error) {
      exitWithError(error, [
        'Check that benchmarks.yaml is valid YAML',
        'Use --limit with a positive number',
      ]);
    }
  });
