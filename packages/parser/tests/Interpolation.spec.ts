import { describe, expect, it } from 'vitest';

import { parseConfig } from '../src/Parser';

function parseValue(literal: string) {
  const [block] = parseConfig(`output "sample" { value = ${literal} }`);
  return block.type === 'Output' ? block.value : undefined;
}

describe('String interpolation', () => {
  it('should split a template into text and reference parts', () => {
    expect(parseValue('"http://${load_balancer.web.dns_name}/health"')).toEqual({
      type: 'Template',
      parts: [
        { type: 'Text', value: 'http://' },
        { type: 'Reference', value: ['load_balancer', 'web', 'dns_name'] },
        { type: 'Text', value: '/health' },
      ],
    });
  });

  it('should split a connection URL built from several declarations', () => {
    const value = parseValue('"postgresql://${var.db_username}:${var.db_password}@${database_instance.postgres.endpoint}:5432/db"');

    expect(value).toEqual({
      type: 'Template',
      parts: [
        { type: 'Text', value: 'postgresql://' },
        { type: 'Reference', value: ['var', 'db_username'] },
        { type: 'Text', value: ':' },
        { type: 'Reference', value: ['var', 'db_password'] },
        { type: 'Text', value: '@' },
        { type: 'Reference', value: ['database_instance', 'postgres', 'endpoint'] },
        { type: 'Text', value: ':5432/db' },
      ],
    });
  });

  it('should trim whitespace inside the braces', () => {
    expect(parseValue('"${ var.name }"')).toEqual({ type: 'Template', parts: [{ type: 'Reference', value: ['var', 'name'] }] });
  });

  it('should keep $${ as literal text', () => {
    expect(parseValue('"cost $${var.x}"')).toEqual({ type: 'String', value: 'cost ${var.x}' });
  });

  it('should mix an escaped marker with a real reference', () => {
    expect(parseValue('"$${literal} and ${var.x}"')).toEqual({
      type: 'Template',
      parts: [
        { type: 'Text', value: '${literal} and ' },
        { type: 'Reference', value: ['var', 'x'] },
      ],
    });
  });

  it('should reject a single-segment interpolation', () => {
    expect(() => parseValue('"${name}"')).toThrow('Invalid interpolation "name": expected a dotted reference.');
  });

  it('should reject an unterminated interpolation', () => {
    expect(() => parseValue('"${var.x"')).toThrow('Unterminated interpolation in string.');
  });
});
