import { IResourceHandler, ISchema, LiteralMap } from '@strata/contracts';

import { assertPositiveInteger, checkInputs, numberInput, resourceId, stringInput } from '../inputs';

const DEFAULT_PORTS: Record<string, number> = { postgres: 5432, mysql: 3306 };

export class DatabaseInstanceResource implements IResourceHandler {
  async getSchema(): Promise<ISchema> {
    return {
      identifier: { type: 'string', required: true },
      engine: { type: 'string' }, // postgres (default) or mysql
      username: { type: 'string', required: true },
      password: { type: 'string', required: true, sensitive: true },
      port: { type: 'number' },
      network_id: { type: 'string' },
      tags: { type: 'object' },
      id: { type: 'string', computed: true },
      endpoint: { type: 'string', computed: true },
    };
  }

  async validate(inputs: LiteralMap): Promise<void> {
    checkInputs('database_instance', await this.getSchema(), inputs);

    const engine = stringInput(inputs, 'engine', 'postgres');
    if (!Object.hasOwn(DEFAULT_PORTS, engine)) throw new Error(`database_instance "engine" must be one of ${Object.keys(DEFAULT_PORTS).join(', ')}`);

    if (stringInput(inputs, 'password').length < 8) throw new Error('database_instance "password" must be at least 8 characters');

    assertPositiveInteger('database_instance', 'port', numberInput(inputs, 'port', DEFAULT_PORTS[engine]), 65_535);
  }

  async create(inputs: LiteralMap): Promise<LiteralMap> {
    const engine = stringInput(inputs, 'engine', 'postgres');

    return {
      ...inputs,
      engine,
      port: numberInput(inputs, 'port', DEFAULT_PORTS[engine]),
      id: resourceId('db', 'database_instance', inputs),
      endpoint: `${stringInput(inputs, 'identifier')}.${engine}.sim.internal`,
    };
  }
}
