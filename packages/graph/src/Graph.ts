/**
 * Directed graph of "depends on" edges.
 * An edge A -> B means A depends on B, so B is ordered before A.
 * Node insertion order is kept and used to break ties.
 */
export class Graph<T> {
  private nodes: Map<string, T> = new Map();
  private adjacencyList: Map<string, Set<string>> = new Map();
  private reverseAdjacencyList: Map<string, Set<string>> = new Map();

  addNode(id: string, data: T): void {
    if (this.nodes.has(id)) throw new Error(`Node ${id} already exists`);
    this.nodes.set(id, data);
    this.adjacencyList.set(id, new Set());
    this.reverseAdjacencyList.set(id, new Set());
  }

  addEdge(from: string, to: string): void {
    if (!this.nodes.has(from)) throw new Error(`Node ${from} does not exist`);
    if (!this.nodes.has(to)) throw new Error(`Node ${to} does not exist`);

    this.edgesOf(this.adjacencyList, from).add(to);
    this.edgesOf(this.reverseAdjacencyList, to).add(from);
  }

  getNode(id: string): T | undefined {
    return this.nodes.get(id);
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  get size(): number {
    return this.nodes.size;
  }

  nodeIds(): string[] {
    return [...this.nodes.keys()];
  }

  /** Nodes that `id` depends on */
  successors(id: string): string[] {
    return [...this.edgesOf(this.adjacencyList, id)];
  }

  /** Nodes that depend on `id` */
  predecessors(id: string): string[] {
    return [...this.edgesOf(this.reverseAdjacencyList, id)];
  }

  edges(): Array<[string, string]> {
    const result: Array<[string, string]> = [];
    for (const [from, targets] of this.adjacencyList) for (const to of targets) result.push([from, to]);
    return result;
  }

  /**
   * Returns every node after all nodes it depends on.
   * Among ready nodes the earliest inserted comes first, so the order is stable across runs.
   */
  topologicalOrder(): string[] {
    const position = this.positions();
    const remaining = this.calculateOutDegrees();
    const ready: string[] = [];
    const result: string[] = [];

    for (const [node, degree] of remaining) if (degree === 0) ready.push(node);

    while (ready.length > 0) {
      ready.sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
      const node = ready.shift();
      if (node === undefined) break;
      result.push(node);

      for (const dependent of this.edgesOf(this.reverseAdjacencyList, node)) {
        const degree = (remaining.get(dependent) ?? 0) - 1;
        remaining.set(dependent, degree);
        if (degree === 0) ready.push(dependent);
      }
    }

    if (result.length !== this.nodes.size) throw new Error('Dependency Cycle Detected');

    return result;
  }

  /*
   * Returns nodes in topological order, grouped by layers for parallel execution.
   * Format: [['A', 'B'], ['C']] -> A and B have no dependencies, C depends on A and/or B.
   */
  topologicalSort(): string[][] {
    const position = this.positions();
    const remaining = this.calculateOutDegrees();
    const result: string[][] = [];
    let queue: string[] = [];

    for (const [node, degree] of remaining) if (degree === 0) queue.push(node);

    while (queue.length > 0) {
      const currentLayer = [...queue].sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
      result.push(currentLayer);

      const nextQueue: string[] = [];

      for (const node of currentLayer)
        for (const dependent of this.edgesOf(this.reverseAdjacencyList, node)) {
          const degree = (remaining.get(dependent) ?? 0) - 1;
          remaining.set(dependent, degree);
          if (degree === 0) nextQueue.push(dependent);
        }

      queue = nextQueue;
    }

    const totalNodes = result.reduce((acc, layer) => acc + layer.length, 0);
    if (totalNodes !== this.nodes.size) throw new Error('Dependency Cycle Detected');

    return result;
  }

  /**
   * Finds one cycle, listed from its first node back to that node (e.g. ['a', 'b', 'a']).
   * A self-edge yields ['a', 'a']. Returns undefined for an acyclic graph.
   */
  findCycle(): string[] | undefined {
    const visited = new Set<string>();
    const onStack = new Set<string>();
    const stack: string[] = [];

    const visit = (node: string): string[] | undefined => {
      visited.add(node);
      onStack.add(node);
      stack.push(node);

      for (const next of this.edgesOf(this.adjacencyList, node)) {
        if (onStack.has(next)) return [...stack.slice(stack.indexOf(next)), next];
        if (!visited.has(next)) {
          const cycle = visit(next);
          if (cycle) return cycle;
        }
      }

      stack.pop();
      onStack.delete(node);
      return undefined;
    };

    for (const node of this.nodes.keys())
      if (!visited.has(node)) {
        const cycle = visit(node);
        if (cycle) return cycle;
      }

    return undefined;
  }

  private edgesOf(list: Map<string, Set<string>>, id: string): Set<string> {
    const edges = list.get(id);
    if (!edges) throw new Error(`Node ${id} does not exist`);
    return edges;
  }

  private positions(): Map<string, number> {
    const position = new Map<string, number>();
    let index = 0;
    for (const node of this.nodes.keys()) position.set(node, index++);
    return position;
  }

  private calculateOutDegrees(): Map<string, number> {
    const degrees: Map<string, number> = new Map();
    for (const [node, targets] of this.adjacencyList) degrees.set(node, targets.size);
    return degrees;
  }
}
