import { IProvider, ISchema, ISchemaDefinition } from '@strata/contracts';

import { ConfigLoader } from './components/ConfigLoader';
import { EvaluationResult, Evaluator, Overrides } from './components/Evaluator';
import { ReferenceGraph, ReferenceGraphBuilder } from './components/ReferenceGraphBuilder';
import { EngineOptions, resolveEngineOptions, ResolvedEngineOptions } from './config';
import { DeclarationStore, ResourceDeclaration } from './declarations/DeclarationStore';
import { ConfigurationError } from './errors';
import { Logger } from './logger';
import { ProviderRegistry } from './ProviderRegistry';
import { typeOfLiteral } from './values/types';

export interface PlanSummary {
  /** Groups of nodes that can be evaluated together, in order */
  stages: string[][];
  order: string[];
  /** Variables with neither a default nor an override */
  missingVariables: string[];
}

export class Engine {
  private registry = new ProviderRegistry();
  private loader = new ConfigLoader();
  private graphBuilder = new ReferenceGraphBuilder();
  private options: ResolvedEngineOptions;
  private logger: Logger;

  constructor(options: EngineOptions = {}) {
    this.options = resolveEngineOptions(options);
    this.logger = this.options.logger.child({ component: 'engine' });
  }

  /**
   * Register a provider for the resource kinds it lists
   */
  registerProvider(provider: IProvider): void {
    this.registry.register(provider);
    this.logger.debug('Provider registered', { kinds: provider.resources });
  }

  async getSchema(kind: string): Promise<ISchema | undefined> {
    return this.registry.getSchema(kind);
  }

  /**
   * Parse configuration text into declarations
   */
  load(source: string): DeclarationStore {
    const store = this.loader.load(source);
    this.logger.debug('Configuration loaded', {
      variables: store.variables().length,
      resources: store.resources().length,
      outputs: store.outputs().length,
    });
    return store;
  }

  /**
   * Build the reference graph and check every resource against its provider's schema.
   * Nothing is provisioned.
   * @throws UndeclaredReferenceError, CycleDetectedError from the graph builder
   * @throws ConfigurationError listing resources whose kind or literal attributes the providers reject
   */
  async validate(store: DeclarationStore): Promise<ReferenceGraph> {
    const graph = this.graphBuilder.build(store);
    const issues: string[] = [];

    for (const resource of store.resources()) {
      const schema = await this.registry.getSchema(resource.kind);
      if (schema) issues.push(...this.checkAttributes(resource, schema));
      else issues.push(`No provider registered for resource kind "${resource.kind}" (used by "${resource.id}")`);
    }

    if (issues.length > 0) throw new ConfigurationError(issues.length === 1 ? issues[0] : `${issues.length} problems found:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`, { issues });

    return graph;
  }

  async plan(store: DeclarationStore, overrides: Overrides = {}): Promise<PlanSummary> {
    const graph = await this.validate(store);

    return {
      stages: graph.stages(),
      order: graph.evaluationOrder(),
      missingVariables: store
        .variables()
        .filter((variable) => variable.default === undefined && !Object.hasOwn(overrides, variable.id))
        .map((variable) => variable.id),
    };
  }

  async evaluate(store: DeclarationStore, overrides: Overrides = {}): Promise<EvaluationResult> {
    const graph = await this.validate(store);
    const evaluator = new Evaluator(store, graph, (kind, inputs) => this.registry.provision(kind, inputs), this.options);

    return evaluator.evaluate(overrides);
  }

  async apply(source: string, overrides: Overrides = {}): Promise<EvaluationResult> {
    return this.evaluate(this.load(source), overrides);
  }

  // Only literal attributes can be checked before evaluation
  private checkAttributes(resource: ResourceDeclaration, schema: ISchema): string[] {
    const issues: string[] = [];
    const given = new Set<string>();

    for (const [name, expression] of resource.attributes) {
      given.add(name);
      const definition: ISchemaDefinition | undefined = Object.hasOwn(schema, name) ? schema[name] : undefined;

      if (!definition) issues.push(`"${resource.id}": unsupported attribute "${name}"`);
      else if (definition.computed) issues.push(`"${resource.id}": attribute "${name}" is computed by the provider`);
      else if (expression.type === 'Literal' && typeOfLiteral(expression.value) !== definition.type)
        issues.push(`"${resource.id}": attribute "${name}" must be of type ${definition.type}, got ${typeOfLiteral(expression.value)}`);
    }

    for (const [name, definition] of Object.entries(schema)) if (definition.required && !definition.computed && !given.has(name)) issues.push(`"${resource.id}": missing required attribute "${name}"`);

    return issues;
  }
}

export { ConfigLoader } from './components/ConfigLoader';
export { Evaluator } from './components/Evaluator';
export type { EvaluationResult, EvaluatorOptions, OutputResult, Overrides, Provisioner } from './components/Evaluator';
export { BindingTable, NodeSlot } from './components/NodeSlot';
export type { NodeStatus } from './components/NodeSlot';
export { ReferenceGraph, ReferenceGraphBuilder } from './components/ReferenceGraphBuilder';
export { SensitivityTracker } from './components/SensitivityTracker';
export { DEFAULT_MAX_CONCURRENCY, EngineOptionsSchema, resolveEngineOptions } from './config';
export type { EngineOptions, ResolvedEngineOptions } from './config';
export { DeclarationStore, expressionsOf } from './declarations/DeclarationStore';
export type { Declaration, OutputDeclaration, ResourceDeclaration, VariableDeclaration } from './declarations/DeclarationStore';
export { collectReferences, literal, literalKeys, object, objectKeys, ref, template } from './declarations/Expression';
export type { Expression, LiteralExpression, ObjectExpression, ReferenceExpression, TemplateExpression } from './declarations/Expression';
export * from './errors';
export { createLogger, getLoggerConfig } from './logger';
export type { LogFormat, Logger, LoggerConfig, LogLevel } from './logger';
export { ENV_PREFIX, overridesFromEnv, parseOverride } from './overrides';
export { ProviderRegistry } from './ProviderRegistry';
export { ExpressionResolver } from './resolvers/ExpressionResolver';
export { asLiteral, checkType, isVariableType, typeOfLiteral, VARIABLE_TYPES } from './values/types';
export type { VariableType } from './values/types';
export { interpolate, ObjectValue, ReferenceValue, ScalarValue, Value } from './values/Value';
export type { BindingLookup, ValueKind } from './values/Value';
