import { IProvider, ISchema, LiteralMap, ProvisionResult } from '@strata/contracts';

/** Maps resource kinds to the provider that provisions them */
export class ProviderRegistry {
  private providers: Map<string, IProvider> = new Map();

  /**
   * Register a provider for every kind it lists
   */
  register(provider: IProvider): void {
    for (const kind of provider.resources) if (this.providers.has(kind)) throw new Error(`Provider for resource kind "${kind}" already registered`);

    for (const kind of provider.resources) this.providers.set(kind, provider);
  }

  get(kind: string): IProvider | undefined {
    return this.providers.get(kind);
  }

  has(kind: string): boolean {
    return this.providers.has(kind);
  }

  kinds(): string[] {
    return [...this.providers.keys()];
  }

  async getSchema(kind: string): Promise<ISchema | undefined> {
    const provider = this.providers.get(kind);
    if (!provider) return undefined;

    return provider.getSchema(kind);
  }

  async provision(kind: string, inputs: LiteralMap): Promise<ProvisionResult> {
    const provider = this.providers.get(kind);
    if (!provider) throw new Error(`No provider registered for resource kind "${kind}"`);

    return provider.provision(kind, inputs);
  }
}
