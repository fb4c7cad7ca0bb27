import { IResourceHandler, ISchema, LiteralMap } from '@strata/contracts';

import { checkInputs, resourceId, stringInput } from '../inputs';

const REPOSITORY_NAME = /^[\da-z][\d._a-z-]*$/;

export class ContainerRegistryResource implements IResourceHandler {
  async getSchema(): Promise<ISchema> {
    return {
      name: { type: 'string', required: true },
      id: { type: 'string', computed: true },
      repository_url: { type: 'string', computed: true },
    };
  }

  async validate(inputs: LiteralMap): Promise<void> {
    checkInputs('container_registry', await this.getSchema(), inputs);

    if (!REPOSITORY_NAME.test(stringInput(inputs, 'name'))) throw new Error('container_registry "name" must be lowercase letters, digits, ".", "_" or "-"');
  }

  async create(inputs: LiteralMap): Promise<LiteralMap> {
    return {
      ...inputs,
      id: resourceId('cr', 'container_registry', inputs),
      repository_url: `registry.sim.internal/${stringInput(inputs, 'name')}`,
    };
  }
}
