import { IResourceHandler, ISchema, LiteralMap } from '@strata/contracts';

import { checkInputs, resourceId, stringInput } from '../inputs';

const CIDR = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/;

export class NetworkResource implements IResourceHandler {
  async getSchema(): Promise<ISchema> {
    return {
      name: { type: 'string', required: true },
      cidr: { type: 'string', required: true },
      region: { type: 'string' },
      id: { type: 'string', computed: true },
      gateway: { type: 'string', computed: true },
    };
  }

  async validate(inputs: LiteralMap): Promise<void> {
    checkInputs('network', await this.getSchema(), inputs);

    if (!this.octets(stringInput(inputs, 'cidr'))) throw new Error('network "cidr" must be an IPv4 CIDR block (e.g. 10.0.0.0/16)');
  }

  async create(inputs: LiteralMap): Promise<LiteralMap> {
    const octets = this.octets(stringInput(inputs, 'cidr'));
    if (!octets) throw new Error('network "cidr" must be an IPv4 CIDR block (e.g. 10.0.0.0/16)');

    const [a, b, c, d] = octets;

    return {
      ...inputs,
      region: stringInput(inputs, 'region', 'local'),
      id: resourceId('net', 'network', inputs),
      gateway: `${a}.${b}.${c}.${d + 1}`,
    };
  }

  private octets(cidr: string): number[] | undefined {
    const match = CIDR.exec(cidr);
    if (!match) return undefined;

    const [, ...groups] = match;
    const numbers = groups.map(Number);
    const prefix = numbers.pop() ?? 0;
    if (prefix > 30 || numbers.some((octet) => octet > 255)) return undefined;

    return numbers;
  }
}
