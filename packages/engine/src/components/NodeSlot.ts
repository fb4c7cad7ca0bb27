import { StrataError } from '../errors';
import { BindingLookup, Value } from '../values/Value';

export type NodeStatus = 'Pending' | 'Resolving' | 'Resolved' | 'Failed';

/**
 * Binding slot of one declaration.
 * Pending -> Resolving -> Resolved | Failed; a Pending node may also fail directly when blocked.
 * The value is written once and read many times.
 */
export class NodeSlot {
  private currentStatus: NodeStatus = 'Pending';
  private value?: Value;
  private failure?: StrataError;

  constructor(readonly id: string) {}

  get status(): NodeStatus {
    return this.currentStatus;
  }

  get bound(): Value | undefined {
    return this.value;
  }

  get error(): StrataError | undefined {
    return this.failure;
  }

  begin(): void {
    if (this.currentStatus !== 'Pending') throw new Error(`Node "${this.id}" cannot start from ${this.currentStatus}`);
    this.currentStatus = 'Resolving';
  }

  resolve(value: Value): void {
    if (this.currentStatus !== 'Resolving') throw new Error(`Node "${this.id}" cannot resolve from ${this.currentStatus}`);
    this.value = value;
    this.currentStatus = 'Resolved';
  }

  fail(error: StrataError): void {
    if (this.currentStatus === 'Resolved' || this.currentStatus === 'Failed') throw new Error(`Node "${this.id}" cannot fail from ${this.currentStatus}`);
    this.failure = error;
    this.currentStatus = 'Failed';
  }
}

export class BindingTable implements BindingLookup {
  private slots: Map<string, NodeSlot> = new Map();

  constructor(ids: Iterable<string>) {
    for (const id of ids) this.slots.set(id, new NodeSlot(id));
  }

  slot(id: string): NodeSlot {
    const slot = this.slots.get(id);
    if (!slot) throw new Error(`Unknown node "${id}"`);
    return slot;
  }

  /** Only Resolved nodes have a value */
  lookup(id: string): Value | undefined {
    return this.slots.get(id)?.bound;
  }

  isResolved(id: string): boolean {
    return this.slots.get(id)?.status === 'Resolved';
  }

  idsWithStatus(status: NodeStatus): string[] {
    return [...this.slots.values()].filter((slot) => slot.status === status).map((slot) => slot.id);
  }

  statuses(): Record<string, NodeStatus> {
    const result: Record<string, NodeStatus> = {};
    for (const [id, slot] of this.slots) result[id] = slot.status;
    return result;
  }
}
