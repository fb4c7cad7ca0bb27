import fs from 'node:fs/promises';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createValidateCommand } from '../src/commands/validate';
import { STACK } from './fixtures';

vi.mock('node:fs/promises');
vi.mock('chalk', () => ({
  default: {
    cyan: (m: string) => m,
    green: (m: string) => m,
    red: (m: string) => m,
    bold: (m: string) => m,
  },
}));

describe('CLI: validate command', () => {
  beforeEach(() => {
    vi.resetAllMocks();
    vi.mocked(fs.access).mockResolvedValue(undefined);

    vi.spyOn(process, 'exit').mockImplementation((() => {}) as never);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should accept a valid configuration', async () => {
    vi.mocked(fs.readFile).mockResolvedValue(STACK);

    await createValidateCommand().parseAsync(['node', 'strata', 'stack.strata']);

    expect(console.log).toHaveBeenCalledWith('\nValidating stack.strata...\n');
    expect(console.log).toHaveBeenCalledWith('  ✓ 2 variable(s), 2 resource(s), 2 output(s)');
    expect(console.log).toHaveBeenCalledWith('  ✓ 6 node(s), no cycles');
    expect(console.log).toHaveBeenCalledWith('\n✓ Configuration is valid\n');
    expect(process.exit).not.toHaveBeenCalled();
  });

  it('should fail if the file does not exist', async () => {
    vi.mocked(fs.access).mockRejectedValue(new Error('ENOENT'));

    await createValidateCommand().parseAsync(['node', 'strata']);

    expect(console.error).toHaveBeenCalledWith('  ✗ Validation failed:', 'main.strata not found.');
    expect(process.exit).toHaveBeenCalledWith(1);
  });

  it('should report syntax errors', async () => {
    vi.mocked(fs.readFile).mockResolvedValue('resource "network" {');

    await createValidateCommand().parseAsync(['node', 'strata']);

    expect(console.error).toHaveBeenCalledWith('  ✗ Validation failed:', expect.stringMatching(/^Syntax error: /));
    expect(process.exit).toHaveBeenCalledWith(1);
  });

  it('should report references to undeclared nodes', async () => {
    vi.mocked(fs.readFile).mockResolvedValue('output "net" {\n  value = network.missing.id\n}\n');

    await createValidateCommand().parseAsync(['node', 'strata']);

    expect(console.error).toHaveBeenCalledWith('  ✗ Validation failed:', 'Reference to undeclared "network.missing" in "net"');
    expect(process.exit).toHaveBeenCalledWith(1);
  });

  it('should report dependency cycles', async () => {
    vi.mocked(fs.readFile).mockResolvedValue('output "a" {\n  value = output.b\n}\noutput "b" {\n  value = output.a\n}\n');

    await createValidateCommand().parseAsync(['node', 'strata']);

    expect(console.error).toHaveBeenCalledWith('  ✗ Validation failed:', 'Dependency cycle detected: a -> b -> a');
    expect(process.exit).toHaveBeenCalledWith(1);
  });

  it('should check literal attributes against the provider schema', async () => {
    vi.mocked(fs.readFile).mockResolvedValue(`
resource "database_instance" "main" {
  identifier = "app-db"
  username = "app"
  password = "test-secret"
  size = "large"
}
`);

    await createValidateCommand().parseAsync(['node', 'strata']);

    expect(console.error).toHaveBeenCalledWith('  ✗ Validation failed:', '"database_instance.main": unsupported attribute "size"');
    expect(process.exit).toHaveBeenCalledWith(1);
  });

  it('should report resource kinds no provider handles', async () => {
    vi.mocked(fs.readFile).mockResolvedValue('resource "queue" "jobs" {\n  name = "jobs"\n}\n');

    await createValidateCommand().parseAsync(['node', 'strata']);

    expect(console.error).toHaveBeenCalledWith('  ✗ Validation failed:', 'No provider registered for resource kind "queue" (used by "queue.jobs")');
    expect(process.exit).toHaveBeenCalledWith(1);
  });
});
