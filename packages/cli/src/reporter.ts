import { Literal } from '@strata/contracts';
import { DeclarationStore, EvaluationResult, OutputResult, PlanSummary } from '@strata/engine';
import chalk from 'chalk';

export const REDACTED = '(sensitive value)';

export function displayValue(output: OutputResult, showSensitive: boolean): string {
  return output.sensitive && !showSensitive ? REDACTED : JSON.stringify(output.value);
}

/** How a node is named on screen: `var.region`, `output.url` or the resource id */
export function label(store: DeclarationStore, id: string): string {
  const declaration = store.get(id);
  if (declaration?.type === 'Variable') return `var.${id}`;
  if (declaration?.type === 'Output') return `output.${id}`;
  return id;
}

export function displayPlan(store: DeclarationStore, plan: PlanSummary): void {
  console.log(chalk.bold(`\nStrata will evaluate ${plan.order.length} node(s) in ${plan.stages.length} stage(s):\n`));

  for (const [index, stage] of plan.stages.entries()) console.log(`  ${chalk.cyan(`Stage ${index + 1}:`)} ${stage.map((id) => label(store, id)).join(', ')}`);

  if (plan.missingVariables.length > 0) console.log(chalk.yellow(`\nVariables without a value: ${plan.missingVariables.join(', ')}`));
}

export function displayOutputs(outputs: Record<string, OutputResult>, showSensitive: boolean): void {
  const entries = Object.entries(outputs);
  if (entries.length === 0) return;

  console.log(chalk.cyan('\nOutputs:'));
  for (const [id, output] of entries) console.log(chalk.white(`  ${id} = ${displayValue(output, showSensitive)}`));
}

export function displayFailures(store: DeclarationStore, result: EvaluationResult): void {
  for (const error of result.errors) console.error(chalk.red(`  ✗ ${error.message}`));

  if (result.blocked.length > 0) console.error(chalk.yellow(`\nBlocked: ${result.blocked.map((id) => label(store, id)).join(', ')}`));
  if (result.pending.length > 0) console.error(chalk.gray(`Not started: ${result.pending.map((id) => label(store, id)).join(', ')}`));
}

export interface JsonReport {
  success: boolean;
  outputs: Record<string, { value: Literal; sensitive: boolean }>;
  errors: Array<{ code: string; message: string; details: Record<string, unknown> }>;
  statuses: EvaluationResult['statuses'];
  blocked: string[];
  pending: string[];
}

export function toJsonReport(result: EvaluationResult, showSensitive: boolean): JsonReport {
  const outputs: JsonReport['outputs'] = {};
  for (const [id, output] of Object.entries(result.outputs))
    outputs[id] = { value: output.sensitive && !showSensitive ? REDACTED : output.value, sensitive: output.sensitive };

  return {
    success: result.success,
    outputs,
    errors: result.errors.map((error) => ({ code: error.code, message: error.message, details: error.details })),
    statuses: result.statuses,
    blocked: result.blocked,
    pending: result.pending,
  };
}
