import { Command } from 'commander';
import { listRubrics } from '../../rubrics/rubric-loader.js';
import { BUNDLED_RUBRICS_DIR } from '../../rubrics/resolver.js';
import { exitWithError, projectPaths, type ProjectOptions } from '../context.js';
import { formatError, icons, keyValue, style, subheader } from '../theme.js';

export const rubricsCommand = new Command('rubrics')
  .description('List available rubrics')
  .option('--rubrics-dir <dir>', 'Directory containing rubric YAML files')
  .option('-C, --cwd <dir>', 'Project root')
  .addHelpText('after', `
${style.bold('Examples:')}
  ${style.command('skillgrade rubrics')}                              ${style.dim('Project and bundled rubrics')}
  ${style.command('skillgrade rubrics --rubrics-dir ./my-rubrics')}   ${style.dim('Use a custom directory')}
`)
  .action((options: ProjectOptions) => {
    try {
      const { rubricsDir } = projectPaths(options);
      const dirs = rubricsDir === BUNDLED_RUBRICS_DIR ? [rubricsDir] : [rubricsDir, BUNDLED_RUBRICS_DIR];
      const listings = dirs.flatMap(dir => listRubrics(dir).map(listing => ({ dir, listing })));

      if (listings.length === 0) {
        console.log(formatError(`No rubrics found in ${style.path(rubricsDir)}`, [
          'Create rubric YAML files in the rubrics directory',
          'Use --rubrics-dir to specify a different location',
        ]));
        return;
      }

      console.log(subheader(`Available Rubrics (${style.number(String(listings.length))})`));
      console.log();

      for (const { dir, listing } of listings) {
        const origin = dir === BUNDLED_RUBRICS_DIR ? style.muted(' (bundled)') : '';
        if (!listing.rubric) {
          console.log(`${style.error(icons.error)} ${style.bold(listing.id)}${origin}`);
          console.log(keyValue('Error', style.error(listing.error ?? 'unknown error'), 1));
          console.log();
          continue;
        }

        const { rubric } = listing;
        console.log(`${icons.list} ${style.bold(style.primary(listing.id))}${origin}`);
        console.log(keyValue('Description', rubric.description, 1));
        console.log(keyValue('Weights', rubric.dimensions.map(d => `${d.name} ${style.number(d.weight.toFixed(2))}`).join(', '), 1));
        console.log(keyValue('Red flags', rubric.redFlags.map(f => style.highlight(f.id)).join(', ') || style.dim('none'), 1));
        console.log(keyValue('Bonuses', rubric.bonuses.map(b => style.highlight(b.id)).join(', ') || style.dim('none'), 1));
        console.log();
      }
    } catch (error) {
      exitWithError(error, [
        'Check that the rubrics directory exists',
        'Ensure rubric files are valid YAML',
      ]);
    }
  });
