import { Graph } from '@strata/graph';

import { Declaration, DeclarationStore, expressionsOf } from '../declarations/DeclarationStore';
import { collectReferences } from '../declarations/Expression';
import { CycleDetectedError, UndeclaredReferenceError } from '../errors';

/**
 * Acyclic "references" graph over a declaration store.
 * An edge A -> B means A's expressions reference B.
 */
export class ReferenceGraph {
  constructor(private readonly graph: Graph<null>) {}

  nodeIds(): string[] {
    return this.graph.nodeIds();
  }

  edges(): Array<[string, string]> {
    return this.graph.edges();
  }

  /** Referenced nodes first; ties broken by declaration order */
  evaluationOrder(): string[] {
    return this.graph.topologicalOrder();
  }

  /** Layers of nodes with no dependency on each other */
  stages(): string[][] {
    return this.graph.topologicalSort();
  }

  dependenciesOf(id: string): string[] {
    return this.graph.successors(id);
  }

  dependentsOf(id: string): string[] {
    return this.graph.predecessors(id);
  }

  /** Everything that references `id`, directly or through other nodes */
  transitiveDependentsOf(id: string): Set<string> {
    const seen = new Set<string>();
    const queue = [...this.graph.predecessors(id)];

    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      queue.push(...this.graph.predecessors(next));
    }

    return seen;
  }
}

export class ReferenceGraphBuilder {
  /**
   * @throws UndeclaredReferenceError for a reference to an unknown id
   * @throws CycleDetectedError when declarations reference each other in a loop
   */
  build(store: DeclarationStore): ReferenceGraph {
    const graph = new Graph<null>();

    for (const declaration of store.all()) graph.addNode(declaration.id, null);

    for (const declaration of store.all())
      for (const target of this.referencedIds(declaration)) {
        if (!store.has(target)) throw new UndeclaredReferenceError(target, declaration.id);
        graph.addEdge(declaration.id, target);
      }

    const cycle = graph.findCycle();
    if (cycle) throw new CycleDetectedError(cycle);

    return new ReferenceGraph(graph);
  }

  // One entry per distinct target, in first-use order
  private referencedIds(declaration: Declaration): string[] {
    const targets = expressionsOf(declaration).flatMap((expression) => collectReferences(expression).map((reference) => reference.target));
    return [...new Set(targets)];
  }
}
