import chalk from 'chalk';
import { Command } from 'commander';

import { loadCliConfig } from '../config';
import { Assignment, collectAssignment, collectOverrides, createEngine, DEFAULT_CONFIG_FILE, readTextFile } from '../context';
import { displayPlan } from '../reporter';

interface PlanOptions {
  var: Assignment[];
  varFile?: string;
}

export function createPlanCommand(): Command {
  const command = new Command('plan');

  command
    .description('Show the order in which a configuration would be evaluated')
    .argument('[config]', 'Path to config file', DEFAULT_CONFIG_FILE)
    .option('--var <id=value>', 'Set a variable (repeatable)', collectAssignment, [])
    .option('--var-file <path>', 'Read variable values from a JSON file')
    .action(async (configPath: string, options: PlanOptions) => {
      try {
        const content = await readTextFile(configPath);
        const engine = createEngine(loadCliConfig());
        const store = engine.load(content);

        console.log(chalk.blue('Calculating plan...'));
        const overrides = await collectOverrides(store, options);
        displayPlan(store, await engine.plan(store, overrides));
      } catch (error) {
        console.error(chalk.red('Plan failed:'), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });

  return command;
}
