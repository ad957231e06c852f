#!/usr/bin/env node

import { Command } from 'commander';
import { benchmarkCommand } from './commands/benchmark.js';
import { configCommand } from './commands/config.js';
import { hookCommand } from './commands/hook.js';
import { judgeCommand } from './commands/judge.js';
import { reportCommand } from './commands/report.js';
import { rubricsCommand } from './commands/rubrics.js';
import { BANNER_MINIMAL, style } from './theme.js';

const program = new Command();

program
  .name('skillgrade')
  .description(`${BANNER_MINIMAL}\n\nDeterministic rubric scoring for skill and agent execution transcripts.`)
  .version('0.1.0')
  .configureHelp({
    sortSubcommands: true,
    subcommandTerm: (cmd) => style.command(cmd.name()) + ' ' + style.dim(cmd.usage()),
  })
  .addHelpText('afterAll', `
${style.bold('Examples:')}

  ${style.dim('# Score a transcript by hand')}
  $ skillgrade judge code-review --transcript ./run.jsonl

  ${style.dim('# Judge a skill automatically from the stop hook')}
  $ skillgrade config always code-review
  $ skillgrade hook stop < payload.json

  ${style.dim('# Follow quality over time')}
  $ skillgrade report code-review && skillgrade benchmark code-review

${style.muted('For more info, run any command with --help')}
`);

program.addCommand(judgeCommand);
program.addCommand(hookCommand);

program.addCommand(reportCommand);
program.addCommand(benchmarkCommand);

program.addCommand(rubricsCommand);
program.addCommand(configCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
