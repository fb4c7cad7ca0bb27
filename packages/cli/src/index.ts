#!/usr/bin/env tsx
import { Command } from 'commander';

import { createApplyCommand } from './commands/apply';
import { createPlanCommand } from './commands/plan';
import { createValidateCommand } from './commands/validate';

const program = new Command();

program.name('strata').description('Evaluate declarative infrastructure configurations against a resource provider').version('0.1.0');

program.addCommand(createValidateCommand());
program.addCommand(createPlanCommand());
program.addCommand(createApplyCommand());

await program.parseAsync();
