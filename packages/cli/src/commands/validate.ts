import { DeclarationStore, Engine } from '@strata/engine';
import chalk from 'chalk';
import { Command } from 'commander';

import { loadCliConfig } from '../config';
import { createEngine, DEFAULT_CONFIG_FILE, readTextFile } from '../context';

function checkDeclarations(engine: Engine, content: string): DeclarationStore {
  console.log(chalk.cyan('→ Checking syntax and declarations...'));
  const store = engine.load(content);
  console.log(chalk.green(`  ✓ ${store.variables().length} variable(s), ${store.resources().length} resource(s), ${store.outputs().length} output(s)`));
  return store;
}

async function checkGraph(engine: Engine, store: DeclarationStore): Promise<void> {
  console.log(chalk.cyan('→ Checking references and resource schemas...'));
  const graph = await engine.validate(store);
  console.log(chalk.green(`  ✓ ${graph.evaluationOrder().length} node(s), no cycles`));
}

export function createValidateCommand(): Command {
  const command = new Command('validate');

  command
    .description('Validate a configuration without provisioning anything')
    .argument('[config]', 'Path to config file', DEFAULT_CONFIG_FILE)
    .action(async (configPath: string) => {
      try {
        const content = await readTextFile(configPath);
        console.log(chalk.bold(`\nValidating ${configPath}...\n`));

        const engine = createEngine(loadCliConfig());
        const store = checkDeclarations(engine, content);
        await checkGraph(engine, store);

        console.log(chalk.green('\n✓ Configuration is valid\n'));
      } catch (error) {
        console.error(chalk.red('  ✗ Validation failed:'), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });

  return command;
}
