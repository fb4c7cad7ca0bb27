import { IProvider, ISchema, LiteralMap, ProvisionResult } from '@strata/contracts';

import { Logger } from '../src/logger';

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  meta: Record<string, unknown>;
}

/** Keeps log entries in memory instead of writing them */
export class RecordingLogger implements Logger {
  constructor(
    readonly entries: LogEntry[] = [],
    private readonly base: Record<string, unknown> = {}
  ) {}

  debug(message: string, meta: Record<string, unknown> = {}): void {
    this.entries.push({ level: 'debug', message, meta: { ...this.base, ...meta } });
  }

  info(message: string, meta: Record<string, unknown> = {}): void {
    this.entries.push({ level: 'info', message, meta: { ...this.base, ...meta } });
  }

  warn(message: string, meta: Record<string, unknown> = {}): void {
    this.entries.push({ level: 'warn', message, meta: { ...this.base, ...meta } });
  }

  error(message: string, meta: Record<string, unknown> = {}): void {
    this.entries.push({ level: 'error', message, meta: { ...this.base, ...meta } });
  }

  child(meta: Record<string, unknown>): Logger {
    return new RecordingLogger(this.entries, { ...this.base, ...meta });
  }

  messages(level: LogEntry['level']): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}

export type FakeHandler = (inputs: LiteralMap) => ProvisionResult | Promise<ProvisionResult>;

export interface ProvisionCall {
  kind: string;
  inputs: LiteralMap;
}

/** In-process provider; each kind answers through its handler and every call is recorded */
export class FakeProvider implements IProvider {
  readonly resources: string[];
  readonly calls: ProvisionCall[] = [];

  constructor(
    private handlers: Record<string, FakeHandler>,
    private schemas: Record<string, ISchema> = {}
  ) {
    this.resources = Object.keys(handlers);
  }

  async getSchema(kind: string): Promise<ISchema> {
    return this.schemas[kind] ?? {};
  }

  async validate(_kind: string, _inputs: LiteralMap): Promise<void> {}

  async provision(kind: string, inputs: LiteralMap): Promise<ProvisionResult> {
    this.calls.push({ kind, inputs });
    const handler = this.handlers[kind];
    if (!handler) throw new Error(`Unsupported resource kind: ${kind}`);
    return handler(inputs);
  }
}

/** Echoes the inputs back with a computed id */
export const echo =
  (computed: LiteralMap = {}): FakeHandler =>
  (inputs) => ({ attributes: { ...inputs, ...computed } });

export const failing =
  (message: string): FakeHandler =>
  () => {
    throw new Error(message);
  };

/** A promise plus the functions that settle it, for controlling when a fake call returns */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (error: Error) => void } {
  let resolve: (value: T) => void = () => {};
  let reject: (error: Error) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
