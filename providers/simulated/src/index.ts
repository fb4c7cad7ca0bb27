import { IProvider, IResourceHandler, ISchema, LiteralMap, ProvisionResult } from '@strata/contracts';
import { setTimeout } from 'node:timers/promises';

import { CacheClusterResource } from './resources/CacheClusterResource';
import { ContainerClusterResource } from './resources/ContainerClusterResource';
import { ContainerRegistryResource } from './resources/ContainerRegistryResource';
import { DatabaseInstanceResource } from './resources/DatabaseInstanceResource';
import { LoadBalancerResource } from './resources/LoadBalancerResource';
import { NetworkResource } from './resources/NetworkResource';

export interface SimulatedProviderOptions {
  /** Delay before each provisioning call returns, to mimic a remote API */
  latencyMs?: number;
}

/**
 * In-process provider for a typical application stack.
 * Every call is deterministic: the same inputs always produce the same computed attributes.
 */
export class SimulatedProvider implements IProvider {
  readonly resources = ['network', 'database_instance', 'cache_cluster', 'load_balancer', 'container_registry', 'container_cluster'];
  private handlers: Map<string, IResourceHandler> = new Map();

  constructor(private options: SimulatedProviderOptions = {}) {
    this.handlers.set('network', new NetworkResource());
    this.handlers.set('database_instance', new DatabaseInstanceResource());
    this.handlers.set('cache_cluster', new CacheClusterResource());
    this.handlers.set('load_balancer', new LoadBalancerResource());
    this.handlers.set('container_registry', new ContainerRegistryResource());
    this.handlers.set('container_cluster', new ContainerClusterResource());
  }

  async getSchema(kind: string): Promise<ISchema> {
    return await this.handler(kind).getSchema();
  }

  async validate(kind: string, inputs: LiteralMap): Promise<void> {
    await this.handler(kind).validate(inputs);
  }

  async provision(kind: string, inputs: LiteralMap): Promise<ProvisionResult> {
    const handler = this.handler(kind);
    await handler.validate(inputs);

    if (this.options.latencyMs) await setTimeout(this.options.latencyMs);

    const attributes = await handler.create(inputs);
    const schema = await handler.getSchema();

    return {
      attributes,
      sensitiveAttributes: Object.keys(attributes).filter((name) => Object.hasOwn(schema, name) && schema[name].sensitive === true),
    };
  }

  private handler(kind: string): IResourceHandler {
    const handler = this.handlers.get(kind);
    if (!handler) throw new Error(`Unsupported resource kind: ${kind}`);
    return handler;
  }
}

export { CacheClusterResource } from './resources/CacheClusterResource';
export { ContainerClusterResource } from './resources/ContainerClusterResource';
export { ContainerRegistryResource } from './resources/ContainerRegistryResource';
export { DatabaseInstanceResource } from './resources/DatabaseInstanceResource';
export { LoadBalancerResource } from './resources/LoadBalancerResource';
export { NetworkResource } from './resources/NetworkResource';
