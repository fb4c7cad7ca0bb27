import { IResourceHandler, ISchema, LiteralMap } from '@strata/contracts';

import { assertPositiveInteger, checkInputs, numberInput, resourceId, stringInput } from '../inputs';

export class ContainerClusterResource implements IResourceHandler {
  async getSchema(): Promise<ISchema> {
    return {
      name: { type: 'string', required: true },
      network_id: { type: 'string', required: true },
      node_count: { type: 'number' },
      image: { type: 'string' }, // e.g. "${container_registry.app.repository_url}:latest"
      environment: { type: 'object' },
      id: { type: 'string', computed: true },
      endpoint: { type: 'string', computed: true },
    };
  }

  async validate(inputs: LiteralMap): Promise<void> {
    checkInputs('container_cluster', await this.getSchema(), inputs);

    assertPositiveInteger('container_cluster', 'node_count', numberInput(inputs, 'node_count', 2), 100);
  }

  async create(inputs: LiteralMap): Promise<LiteralMap> {
    return {
      ...inputs,
      node_count: numberInput(inputs, 'node_count', 2),
      id: resourceId('cluster', 'container_cluster', inputs),
      endpoint: `https://${stringInput(inputs, 'name')}.cluster.sim.internal`,
    };
  }
}
