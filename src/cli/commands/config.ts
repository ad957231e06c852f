import { Command } from 'commander';
import { loadConfig, saveConfig } from '../../config/loader.js';
import { setAutoJudgeEnabled, setSubjectPolicy, setThreshold, type SubjectPolicy } from '../../config/policy.js';
import type { Config } from '../../config/schema.js';
import { exitWithError, projectPaths, type ProjectOptions } from '../context.js';
import { formatWarning, icons, keyValue, style, subheader } from '../theme.js';

async function update(options: ProjectOptions, change: (config: Config) => Config, message: string): Promise<void> {
  try {
    const { configPath } = projectPaths(options);
    const { config, warnings } = await loadConfig(configPath);
    for (const warning of warnings) {
      console.error(formatWarning(warning));
    }
    await saveConfig(configPath, change(config));
    console.log(`${style.success(icons.success)} ${message} ${style.muted(`(${configPath})`)}`);
  } catch (error) {
    exitWithError(error, ['Check that the .skillgrade directory is writable']);
  }
}

function policyCommand(name: string, policy: SubjectPolicy, description: string, message: (subject: string) => string): Command {
  return new Command(name)
    .description(description)
    .argument('<subject>', 'Skill or agent name')
    .option('-C, --cwd <dir>', 'Project root holding .skillgrade/')
    .action(async (subject: string, options: ProjectOptions) => {
      await update(options, config => setSubjectPolicy(config, subject, policy), message(subject));
    });
}

const showCommand = new Command('show')
  .description('Print the effective configuration')
  .option('-C, --cwd <dir>', 'Project root holding .skillgrade/')
  .option('--json', 'Output as JSON', false)
  .action(async (options: ProjectOptions & { json: boolean }) => {
    try {
      const { configPath } = projectPaths(options);
      const { config, warnings } = await loadConfig(configPath);
      for (const warning of warnings) {
        console.error(formatWarning(warning));
      }

      if (options.json) {
        console.log(JSON.stringify(config, null, 2));
        return;
      }

      const { auto_judge: auto, manual_judge: manual, scoring } = config;
      console.log(subheader(`Configuration ${style.muted(configPath)}`));
      console.log(keyValue('Auto judge', auto.enabled ? style.success('enabled') : style.warning('disabled'), 1));
      console.log(keyValue('Threshold', style.number(auto.threshold.toFixed(1)), 1));
      console.log(keyValue('Block on critical', String(auto.block_on_critical), 1));
      console.log(keyValue('Always', auto.always.join(', ') || style.dim('none'), 1));
      console.log(keyValue('Never', auto.never.join(', ') || style.dim('none'), 1));
      console.log(keyValue('Show evidence', String(manual.show_evidence), 1));
      console.log(keyValue('Default rubric', scoring.default_rubric, 1));
      const overrides = Object.entries(scoring.dimensions).map(([name, weight]) => `${name} ${weight}`);
      console.log(keyValue('Weight overrides', overrides.join(', ') || style.dim('none'), 1));
      console.log();
    } catch (error) {
      exitWithError(error, ['Check that the config file is valid JSON']);
    }
  });

const thresholdCommand = new Command('threshold')
  .description('Set the automatic blocking threshold (0-10)')
  .argument('<value>', 'Final composite below which automatic evaluations block')
  .option('-C, --cwd <dir>', 'Project root holding .skillgrade/')
  .action(async (value: string, options: ProjectOptions) => {
    const threshold = Number(value);
    await update(options, config => setThreshold(config, threshold), `Threshold set to ${value}`);
  });

export const configCommand = new Command('config')
  .description('Show or edit the project configuration')
  .addCommand(showCommand)
  .addCommand(
    new Command('enable')
      .description('Turn automatic evaluation on')
      .option('-C, --cwd <dir>', 'Project root holding .skillgrade/')
      .action(async (options: ProjectOptions) => {
        await update(options, config => setAutoJudgeEnabled(config, true), 'Automatic evaluation enabled');
      }),
  )
  .addCommand(
    new Command('disable')
      .description('Turn automatic evaluation off')
      .option('-C, --cwd <dir>', 'Project root holding .skillgrade/')
      .action(async (options: ProjectOptions) => {
        await update(options, config => setAutoJudgeEnabled(config, false), 'Automatic evaluation disabled');
      }),
  )
  .addCommand(policyCommand('always', 'always', 'Evaluate a subject automatically on every run', s => `${s} will always be evaluated`))
  .addCommand(policyCommand('never', 'never', 'Never evaluate or block a subject automatically', s => `${s} will never be evaluated automatically`))
  .addCommand(policyCommand('clear', 'none', 'Remove a subject from the always and never lists', s => `${s} removed from always/never`))
  .addCommand(thresholdCommand)
  .addHelpText('after', `
${style.bold('Examples:')}
  ${style.command('skillgrade config show')}                 ${style.dim('Print the configuration')}
  ${style.command('skillgrade config always code-review')}   ${style.dim('Judge code-review after every run')}
  ${style.command('skillgrade config threshold 6.5')}        ${style.dim('Block automatic runs below 6.5')}
`);
