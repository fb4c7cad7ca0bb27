import { IResourceHandler, ISchema, LiteralMap } from '@strata/contracts';

import { assertPositiveInteger, checkInputs, digest, numberInput, resourceId, stringInput } from '../inputs';

const PORTS: Record<string, number> = { redis: 6379, memcached: 11_211 };

export class CacheClusterResource implements IResourceHandler {
  async getSchema(): Promise<ISchema> {
    return {
      name: { type: 'string', required: true },
      engine: { type: 'string' }, // redis (default) or memcached
      nodes: { type: 'number' },
      network_id: { type: 'string' },
      id: { type: 'string', computed: true },
      endpoint: { type: 'string', computed: true },
      port: { type: 'number', computed: true },
      auth_token: { type: 'string', computed: true, sensitive: true },
    };
  }

  async validate(inputs: LiteralMap): Promise<void> {
    checkInputs('cache_cluster', await this.getSchema(), inputs);

    const engine = stringInput(inputs, 'engine', 'redis');
    if (!Object.hasOwn(PORTS, engine)) throw new Error(`cache_cluster "engine" must be one of ${Object.keys(PORTS).join(', ')}`);

    assertPositiveInteger('cache_cluster', 'nodes', numberInput(inputs, 'nodes', 1), 20);
  }

  async create(inputs: LiteralMap): Promise<LiteralMap> {
    const engine = stringInput(inputs, 'engine', 'redis');

    return {
      ...inputs,
      engine,
      nodes: numberInput(inputs, 'nodes', 1),
      id: resourceId('cache', 'cache_cluster', inputs),
      endpoint: `${stringInput(inputs, 'name')}.cache.sim.internal`,
      port: PORTS[engine],
      auth_token: digest('cache_cluster/auth_token', inputs, 32),
    };
  }
}
