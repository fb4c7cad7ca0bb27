import { DeclarationStore, EvaluationResult } from '@strata/engine';
import chalk from 'chalk';
import { Command } from 'commander';
import inquirer from 'inquirer';

import { loadCliConfig } from '../config';
import { Assignment, collectAssignment, collectOverrides, createEngine, DEFAULT_CONFIG_FILE, parsePositiveInteger, readTextFile } from '../context';
import { displayFailures, displayOutputs, displayPlan, toJsonReport } from '../reporter';

interface ApplyOptions {
  var: Assignment[];
  varFile?: string;
  maxConcurrency?: number;
  yes?: boolean;
  json?: boolean;
  showSensitive?: boolean;
}

async function confirmApply(autoConfirm: boolean): Promise<boolean> {
  if (autoConfirm) return true;

  const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
    {
      type: 'confirm',
      name: 'confirm',
      message: 'Do you want to provision these resources?',
      default: false,
    },
  ]);

  return confirm;
}

function report(store: DeclarationStore, result: EvaluationResult, options: ApplyOptions): void {
  const showSensitive = options.showSensitive === true;

  if (options.json) {
    console.log(JSON.stringify(toJsonReport(result, showSensitive), null, 2));
    return;
  }

  if (result.success) {
    const provisioned = store.resources().filter((resource) => result.statuses[resource.id] === 'Resolved').length;
    console.log(chalk.green(`\nApply complete! Resources: ${provisioned} provisioned.`));
  } else {
    console.error(chalk.red('\nApply failed:'));
    displayFailures(store, result);
  }

  displayOutputs(result.outputs, showSensitive);
}

async function executeApply(configPath: string, options: ApplyOptions): Promise<boolean> {
  const content = await readTextFile(configPath);
  const engine = createEngine(loadCliConfig(), options.maxConcurrency);
  const store = engine.load(content);
  const overrides = await collectOverrides(store, options);

  const plan = await engine.plan(store, overrides);
  if (plan.missingVariables.length > 0) throw new Error(`Missing values for required variables: ${plan.missingVariables.join(', ')}`);

  if (!options.json) displayPlan(store, plan);

  if (!(await confirmApply(options.yes === true))) {
    console.log(chalk.yellow('Apply cancelled.'));
    return true;
  }

  if (!options.json) console.log(chalk.blue('\nApplying...'));
  const result = await engine.evaluate(store, overrides);
  report(store, result, options);

  return result.success;
}

export function createApplyCommand(): Command {
  const command = new Command('apply');

  command
    .description('Evaluate a configuration and provision its resources')
    .argument('[config]', 'Path to config file', DEFAULT_CONFIG_FILE)
    .option('--var <id=value>', 'Set a variable (repeatable)', collectAssignment, [])
    .option('--var-file <path>', 'Read variable values from a JSON file')
    .option('--max-concurrency <n>', 'Nodes evaluated at the same time', parsePositiveInteger)
    .option('-y, --yes', 'Skip confirmation prompt')
    .option('--json', 'Print the result as JSON')
    .option('--show-sensitive', 'Print sensitive output values')
    .action(async (configPath: string, options: ApplyOptions) => {
      let succeeded: boolean;

      try {
        succeeded = await executeApply(configPath, options);
      } catch (error) {
        console.error(chalk.red('Apply failed:'), error instanceof Error ? error.message : error);
        succeeded = false;
      }

      if (!succeeded) process.exit(1);
    });

  return command;
}
