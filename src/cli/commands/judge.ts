import { Command } from 'commander';
import { loadConfig } from '../../config/loader.js';
import { evaluate } from '../../judge/evaluate.js';
import { formatScorecard } from '../../report/scorecard-viewer.js';
import { exitWithError, projectPaths, type ProjectOptions } from '../context.js';
import { icons, nextSteps, style } from '../theme.js';

interface JudgeOptions extends ProjectOptions {
  transcript: string;
  rubric?: string;
  json: boolean;
  evidence?: boolean;
  dryRun: boolean;
}

export const judgeCommand = new Command('judge')
  .description('Score a transcript of a skill or agent execution')
  .argument('<subject>', 'Skill or agent name')
  .requiredOption('-t, --transcript <path>', 'Path to the transcript file')
  .option('-r, --rubric <name>', 'Rubric name or path (skips automatic matching)')
  .option('--rubrics-dir <dir>', 'Directory containing rubric YAML files')
  .option('-C, --cwd <dir>', 'Project root holding .skillgrade/')
  .option('--evidence', 'Show evidence excerpts under each dimension')
  .option('--no-evidence', 'Hide evidence excerpts')
  .option('--dry-run', 'Score without saving the scorecard', false)
  .option('--json', 'Output the scorecard as JSON', false)
  .addHelpText('after', `
${style.bold('Examples:')}
  ${style.command('skillgrade judge code-review -t run.jsonl')}            ${style.dim('Score a transcript')}
  ${style.command('skillgrade judge deploy -t run.txt -r security')}       ${style.dim('Use a specific rubric')}
  ${style.command('skillgrade judge deploy -t run.txt --json --dry-run')}  ${style.dim('Print JSON, save nothing')}
`)
  .action(async (subject: string, options: JudgeOptions) => {
    try {
      const paths = projectPaths(options);
      const loaded = await loadConfig(paths.configPath);

      const { scorecard, path } = await evaluate({
        subject,
        transcriptPath: options.transcript,
        mode: 'manual',
        paths,
        config: loaded,
        rubric: options.rubric,
        dryRun: options.dryRun,
      });

      console.log(formatScorecard(scorecard, {
        json: options.json,
        showEvidence: options.evidence ?? loaded.config.manual_judge.show_evidence,
      }));

      if (!options.json) {
        if (path) {
          console.log(`${style.success(icons.success)} Saved ${style.path(path)}`);
        }
        console.log(nextSteps([
          { command: `skillgrade report ${subject}`, description: 'Score history for this subject' },
          { command: `skillgrade benchmark ${subject}`, description: 'Compare against benchmarks' },
        ]));
      }
    } catch (error) {
      exitWithError(error, [
        'Check that the transcript path exists and is not empty',
        `Run ${style.command('skillgrade rubrics')} to list available rubrics`,
        'Rubric weights must sum to 1.0',
      ]);
    }
  });
