export type Scalar = string | number | boolean;

/** A fully resolved value: a scalar or an insertion-ordered map of them */
export type Literal = Scalar | LiteralMap;

export interface LiteralMap {
  readonly [key: string]: Literal;
}

export type SchemaType = 'string' | 'number' | 'bool' | 'object';

export interface ISchemaDefinition {
  type: SchemaType;
  required?: boolean;
  sensitive?: boolean; // Reported back as sensitive after provisioning
  computed?: boolean; // Set by the provider, never accepted as input
}

export type ISchema = Record<string, ISchemaDefinition>;

export interface ProvisionResult {
  attributes: LiteralMap;
  /** Names of returned attributes whose contents must not be displayed */
  sensitiveAttributes?: readonly string[];
}

/** The contract that ALL providers must implement */
export interface IProvider {
  /** Resource kinds handled by this provider (e.g., ['network', 'database_instance']) */
  readonly resources: readonly string[];

  /** Returns the schema for a specific resource kind */
  getSchema(kind: string): Promise<ISchema>;

  /** Validates inputs against the resource schema. Throws validation error if invalid. */
  validate(kind: string, inputs: LiteralMap): Promise<void>;

  /**
   * Turns fully literal inputs into a live resource.
   * Called exactly once per resource; a rejection is a provisioning failure.
   */
  provision(kind: string, inputs: LiteralMap): Promise<ProvisionResult>;
}

/**
 * Resource Handler Interface
 * Each resource kind (e.g., database_instance, load_balancer) implements this interface
 */
export interface IResourceHandler {
  /**
   * Returns the schema for this resource
   */
  getSchema(): Promise<ISchema>;

  /**
   * Validate resource inputs before provisioning
   */
  validate(inputs: LiteralMap): Promise<void>;

  /**
   * Provision the resource
   * @returns Computed attributes (e.g., id, endpoint)
   */
  create(inputs: LiteralMap): Promise<LiteralMap>;
}

export function isLiteralMap(value: unknown): value is LiteralMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
