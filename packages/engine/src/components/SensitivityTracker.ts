import { DeclarationStore } from '../declarations/DeclarationStore';
import { BindingLookup } from '../values/Value';
import { ReferenceGraph } from './ReferenceGraphBuilder';

/**
 * Node-level sensitivity over the bound value graph.
 * A node is sensitive if its declaration says so, its bound value is sensitive
 * (e.g. a provider flagged an attribute), or any node it references is sensitive.
 * Answers are cached once a node is bound, since they cannot change after that.
 */
export class SensitivityTracker {
  private cache: Map<string, boolean> = new Map();

  constructor(
    private store: DeclarationStore,
    private graph: ReferenceGraph,
    private bindings: BindingLookup
  ) {}

  isSensitive(id: string): boolean {
    const cached = this.cache.get(id);
    if (cached !== undefined) return cached;

    const declaration = this.store.get(id);
    if (!declaration) throw new Error(`Unknown node "${id}"`);

    const bound = this.bindings.lookup(id);
    const declared = declaration.type !== 'Resource' && declaration.sensitive;
    const result = declared || (bound?.isSensitive() ?? false) || this.graph.dependenciesOf(id).some((dependency) => this.isSensitive(dependency));

    if (bound) this.cache.set(id, result);
    return result;
  }

  sensitiveNodes(): string[] {
    return this.store
      .all()
      .map((declaration) => declaration.id)
      .filter((id) => this.isSensitive(id));
  }
}
