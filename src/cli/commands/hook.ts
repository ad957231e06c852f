import { Command } from 'commander';
import { text } from 'stream/consumers';
import { isHookEvent, runHook, HOOK_EVENTS } from '../../judge/hook.js';
import { projectPaths, type ProjectOptions } from '../context.js';
import { style } from '../theme.js';

export const hookCommand = new Command('hook')
  .description('Lifecycle hook entry point; reads the hook payload from stdin')
  .argument('<event>', `Hook event (${HOOK_EVENTS.join(', ')})`)
  .option('-C, --cwd <dir>', 'Project root holding .skillgrade/')
  .option('--rubrics-dir <dir>', 'Directory containing rubric YAML files')
  .addHelpText('after', `
${style.bold('Exit codes:')}
  ${style.dim('0')}  continue (passed, skipped, or evaluation failed)
  ${style.dim('2')}  block; reasons are written to stderr

${style.bold('Examples:')}
  ${style.command('skillgrade hook stop < payload.json')}
  ${style.command('skillgrade hook subagent-stop < payload.json')}
`)
  .action(async (event: string, options: ProjectOptions) => {
    if (!isHookEvent(event)) {
      console.error(`skillgrade: evaluation skipped (unknown hook event "${event}")`);
      return;
    }

    let input: string;
    try {
      input = await text(process.stdin);
    } catch (error) {
      console.error(`skillgrade: evaluation skipped (${error instanceof Error ? error.message : String(error)})`);
      return;
    }

    const result = await runHook(event, input, { paths: projectPaths(options) });
    if (result.stdout) process.stdout.write(result.stdout + '\n');
    if (result.stderr) process.stderr.write(result.stderr + '\n');
    process.exitCode = result.exitCode;
  });
