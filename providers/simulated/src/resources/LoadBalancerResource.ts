import { IResourceHandler, ISchema, LiteralMap } from '@strata/contracts';

import { assertPositiveInteger, checkInputs, digest, numberInput, resourceId, stringInput } from '../inputs';

export class LoadBalancerResource implements IResourceHandler {
  async getSchema(): Promise<ISchema> {
    return {
      name: { type: 'string', required: true },
      network_id: { type: 'string', required: true },
      port: { type: 'number' },
      target_port: { type: 'number' },
      id: { type: 'string', computed: true },
      dns_name: { type: 'string', computed: true },
      url: { type: 'string', computed: true },
    };
  }

  async validate(inputs: LiteralMap): Promise<void> {
    checkInputs('load_balancer', await this.getSchema(), inputs);

    assertPositiveInteger('load_balancer', 'port', numberInput(inputs, 'port', 443), 65_535);
    assertPositiveInteger('load_balancer', 'target_port', numberInput(inputs, 'target_port', 8080), 65_535);
  }

  async create(inputs: LiteralMap): Promise<LiteralMap> {
    const port = numberInput(inputs, 'port', 443);
    const dnsName = `${stringInput(inputs, 'name')}-${digest('load_balancer', inputs, 8)}.lb.sim.internal`;

    return {
      ...inputs,
      port,
      target_port: numberInput(inputs, 'target_port', 8080),
      id: resourceId('lb', 'load_balancer', inputs),
      dns_name: dnsName,
      url: this.url(dnsName, port),
    };
  }

  private url(host: string, port: number): string {
    if (port === 443) return `https://${host}`;
    if (port === 80) return `http://${host}`;
    return `http://${host}:${port}`;
  }
}
