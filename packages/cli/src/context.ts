import { isLiteralMap, Literal } from '@strata/contracts';
import { asLiteral, createLogger, DeclarationStore, Engine, overridesFromEnv, parseOverride } from '@strata/engine';
import { SimulatedProvider } from '@strata/provider-simulated';
import { InvalidArgumentError } from 'commander';
import fs from 'node:fs/promises';
import path from 'node:path';

import { CliConfig } from './config';

export const DEFAULT_CONFIG_FILE = 'main.strata';

export type Assignment = readonly [id: string, raw: string];

export interface OverrideFlags {
  var: Assignment[];
  varFile?: string;
}

export function createEngine(config: CliConfig, maxConcurrency?: number): Engine {
  const engine = new Engine({
    maxConcurrency: maxConcurrency ?? config.maxConcurrency,
    logger: createLogger({ level: config.logLevel, format: config.logFormat }),
  });
  engine.registerProvider(new SimulatedProvider({ latencyMs: config.latencyMs }));
  return engine;
}

export async function readTextFile(file: string): Promise<string> {
  const fullPath = path.resolve(process.cwd(), file);

  try {
    await fs.access(fullPath);
  } catch {
    throw new Error(`${file} not found.`);
  }

  return fs.readFile(fullPath, 'utf8');
}

/** Option parser for repeatable `--var id=value` */
export function collectAssignment(value: string, previous: Assignment[]): Assignment[] {
  const separator = value.indexOf('=');
  if (separator < 1) throw new InvalidArgumentError(`Expected id=value, got "${value}".`);

  return [...previous, [value.slice(0, separator).trim(), value.slice(separator + 1)]];
}

export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) throw new InvalidArgumentError('Must be a positive integer.');
  return parsed;
}

export async function readVarFile(file: string): Promise<Record<string, Literal>> {
  const content = await readTextFile(file);

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error(`${file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!isLiteralMap(parsed)) throw new Error(`${file} must contain a JSON object of variable values.`);

  const values: Record<string, Literal> = {};
  for (const [id, raw] of Object.entries(parsed)) {
    const value = asLiteral(raw);
    if (value === undefined) throw new Error(`${file}: value of "${id}" must be a string, number, bool or object.`);
    values[id] = value;
  }

  return values;
}

/**
 * Variable values from every source. Later sources win:
 * STRATA_VAR_* environment variables, then the variable file, then `--var`.
 */
export async function collectOverrides(store: DeclarationStore, flags: OverrideFlags, env: NodeJS.ProcessEnv = process.env): Promise<Record<string, Literal>> {
  const overrides = overridesFromEnv(env, store);

  if (flags.varFile) Object.assign(overrides, await readVarFile(flags.varFile));

  for (const [id, raw] of flags.var) {
    const declaration = store.get(id);
    // Undeclared ids pass through; the engine warns about them
    overrides[id] = declaration?.type === 'Variable' ? parseOverride(id, declaration.variableType, raw) : raw;
  }

  return overrides;
}
