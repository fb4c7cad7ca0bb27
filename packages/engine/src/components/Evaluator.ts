import { Literal, LiteralMap, ProvisionResult } from '@strata/contracts';

import { Declaration, DeclarationStore, OutputDeclaration, ResourceDeclaration, VariableDeclaration } from '../declarations/DeclarationStore';
import { BlockedByDependencyError, MissingRequiredVariableError, ProvisioningError, StrataError, toStrataError } from '../errors';
import { Logger } from '../logger';
import { ExpressionResolver } from '../resolvers/ExpressionResolver';
import { checkType } from '../values/types';
import { ObjectValue, Value } from '../values/Value';
import { BindingTable, NodeStatus } from './NodeSlot';
import { ReferenceGraph } from './ReferenceGraphBuilder';
import { SensitivityTracker } from './SensitivityTracker';

export type Provisioner = (kind: string, inputs: LiteralMap) => Promise<ProvisionResult>;

export type Overrides = Readonly<Record<string, Literal>>;

export interface OutputResult {
  value: Literal;
  sensitive: boolean;
}

export interface EvaluationResult {
  success: boolean;
  /** Resolved outputs only, in declaration order */
  outputs: Record<string, OutputResult>;
  /** Bound value of every resolved node */
  values: ReadonlyMap<string, Value>;
  statuses: Record<string, NodeStatus>;
  /** Node failures in the order they happened, followed by blocked nodes */
  errors: StrataError[];
  firstError?: StrataError;
  blocked: string[];
  /** Nodes never started because evaluation halted */
  pending: string[];
  order: string[];
}

export interface EvaluatorOptions {
  maxConcurrency: number;
  logger: Logger;
}

export class Evaluator {
  constructor(
    private store: DeclarationStore,
    private graph: ReferenceGraph,
    private provision: Provisioner,
    private options: EvaluatorOptions
  ) {}

  async evaluate(overrides: Overrides = {}): Promise<EvaluationResult> {
    return new EvaluationRun(this.store, this.graph, this.provision, this.options, overrides).run();
  }
}

/** State of a single evaluation pass */
class EvaluationRun {
  private order: string[];
  private bindings: BindingTable;
  private resolver: ExpressionResolver;
  private tracker: SensitivityTracker;
  private failures: StrataError[] = [];
  private blocked: BlockedByDependencyError[] = [];
  private inFlight: Map<string, Promise<void>> = new Map();
  private logger: Logger;

  constructor(
    private store: DeclarationStore,
    private graph: ReferenceGraph,
    private provision: Provisioner,
    private options: EvaluatorOptions,
    private overrides: Overrides
  ) {
    this.order = graph.evaluationOrder();
    this.bindings = new BindingTable(this.order);
    this.resolver = new ExpressionResolver(this.bindings);
    this.tracker = new SensitivityTracker(store, graph, this.bindings);
    this.logger = options.logger.child({ component: 'evaluator' });
  }

  private get halted(): boolean {
    return this.failures.length > 0;
  }

  async run(): Promise<EvaluationResult> {
    this.logger.info('Evaluation started', { nodes: this.order.length, maxConcurrency: this.options.maxConcurrency });

    for (const id of Object.keys(this.overrides))
      if (this.store.get(id)?.type !== 'Variable') this.logger.warn('Ignoring override for undeclared variable', { variable: id });

    // Variables first, so a missing value stops the run before any provider is called
    for (const variable of this.store.variables()) this.bindVariable(variable);

    await this.drain();

    return this.buildResult();
  }

  private bindVariable(declaration: VariableDeclaration): void {
    const slot = this.bindings.slot(declaration.id);
    slot.begin();

    try {
      slot.resolve(Value.from(this.variableValue(declaration), declaration.sensitive));
      this.logger.debug('Node resolved', { node: declaration.id, type: declaration.type });
    } catch (error) {
      this.fail(declaration.id, error);
    }
  }

  private variableValue(declaration: VariableDeclaration): Literal {
    if (Object.hasOwn(this.overrides, declaration.id)) return checkType(declaration.id, declaration.variableType, this.overrides[declaration.id]);
    if (declaration.default !== undefined) return declaration.default;
    throw new MissingRequiredVariableError(declaration.id);
  }

  /** Worker pool: keeps up to maxConcurrency nodes in flight until nothing else can start */
  private async drain(): Promise<void> {
    for (;;) {
      for (const declaration of this.startable()) {
        if (this.inFlight.size >= this.options.maxConcurrency) break;
        this.start(declaration);
      }

      if (this.inFlight.size === 0) return;
      await Promise.race(this.inFlight.values());
    }
  }

  private startable(): Declaration[] {
    const result: Declaration[] = [];

    for (const id of this.order) {
      const declaration = this.store.get(id);
      if (!declaration || declaration.type === 'Variable') continue;
      if (this.bindings.slot(id).status !== 'Pending') continue;
      // Once something failed, only nodes that make no external call may still run
      if (this.halted && declaration.type === 'Resource') continue;
      if (this.graph.dependenciesOf(id).every((dependency) => this.bindings.isResolved(dependency))) result.push(declaration);
    }

    return result;
  }

  private start(declaration: Declaration): void {
    const slot = this.bindings.slot(declaration.id);
    slot.begin();
    this.logger.debug('Node resolving', { node: declaration.id, type: declaration.type });

    const task = this.evaluateNode(declaration)
      .then(
        (value) => {
          slot.resolve(value);
          this.logger.debug('Node resolved', { node: declaration.id, type: declaration.type });
        },
        (error: unknown) => this.fail(declaration.id, error)
      )
      .finally(() => this.inFlight.delete(declaration.id));

    this.inFlight.set(declaration.id, task);
  }

  private async evaluateNode(declaration: Declaration): Promise<Value> {
    if (declaration.type === 'Resource') return this.evaluateResource(declaration);
    if (declaration.type === 'Output') return this.evaluateOutput(declaration);
    throw new Error(`Variable "${declaration.id}" is bound before scheduling`);
  }

  private async evaluateResource(declaration: ResourceDeclaration): Promise<Value> {
    const inputs: Record<string, Literal> = {};
    const sensitiveInputs = new Set<string>();

    for (const [name, expression] of declaration.attributes) {
      const value = this.resolver.resolve(expression, declaration.id);
      inputs[name] = value.resolvedValue();
      if (value.isSensitive()) sensitiveInputs.add(name);
    }

    this.logger.info('Provisioning resource', { node: declaration.id, kind: declaration.kind });

    let result: ProvisionResult;
    try {
      result = await this.provision(declaration.kind, inputs);
    } catch (error) {
      throw new ProvisioningError(declaration.id, declaration.kind, error);
    }

    const flagged = new Set(result.sensitiveAttributes ?? []);
    const entries = Object.entries(result.attributes).map(([name, literal]): [string, Value] => [name, Value.from(literal, flagged.has(name) || sensitiveInputs.has(name))]);

    return new ObjectValue(entries);
  }

  private async evaluateOutput(declaration: OutputDeclaration): Promise<Value> {
    const value = this.resolver.resolve(declaration.expression, declaration.id);
    return this.tracker.isSensitive(declaration.id) || value.isSensitive() ? value.markSensitive() : value;
  }

  private fail(id: string, error: unknown): void {
    const failure = toStrataError(error);
    this.bindings.slot(id).fail(failure);
    this.failures.push(failure);
    this.logger.error('Node failed', { node: id, code: failure.code, error: failure.message });

    for (const dependent of this.graph.transitiveDependentsOf(id)) {
      const slot = this.bindings.slot(dependent);
      if (slot.status !== 'Pending') continue;

      const blocked = new BlockedByDependencyError(dependent, id);
      slot.fail(blocked);
      this.blocked.push(blocked);
    }
  }

  private buildResult(): EvaluationResult {
    const outputs: Record<string, OutputResult> = {};
    const values = new Map<string, Value>();

    for (const id of this.order) {
      const value = this.bindings.lookup(id);
      if (value) values.set(id, value);
    }

    for (const output of this.store.outputs()) {
      const value = values.get(output.id);
      if (value) outputs[output.id] = { value: value.resolvedValue(), sensitive: this.tracker.isSensitive(output.id) };
    }

    const pending = this.bindings.idsWithStatus('Pending');
    const result: EvaluationResult = {
      success: this.failures.length === 0 && pending.length === 0,
      outputs,
      values,
      statuses: this.bindings.statuses(),
      errors: [...this.failures, ...this.blocked],
      firstError: this.failures[0],
      blocked: this.blocked.map((error) => error.node),
      pending,
      order: this.order,
    };

    this.logger.info('Evaluation finished', { success: result.success, failed: this.failures.length, blocked: result.blocked.length, pending: pending.length });
    return result;
  }
}
