export type TemplatePart = { type: 'Text'; value: string } | { type: 'Reference'; value: string[] };

export type AttributeValue =
  | { type: 'String'; value: string }
  | { type: 'Template'; parts: TemplatePart[] } // "text ${a.b} more"
  | { type: 'Number'; value: number }
  | { type: 'Boolean'; value: boolean }
  | { type: 'Reference'; value: string[] } // e.g., ["database_instance", "postgres", "endpoint"]
  | { type: 'Object'; entries: Array<[string, AttributeValue]> };

export interface ResourceBlock {
  type: 'Resource';
  resourceType: string; // e.g., "database_instance"
  name: string; // e.g., "postgres"
  attributes: Record<string, AttributeValue>;
  line: number;
}

export interface VariableBlock {
  type: 'Variable';
  name: string; // e.g., "environment"
  attributes: Record<string, AttributeValue>; // type, default, sensitive, description
  line: number;
}

export interface OutputBlock {
  type: 'Output';
  name: string;
  value: AttributeValue;
  attributes: Record<string, AttributeValue>; // sensitive, description
  line: number;
}

export type Statement = ResourceBlock | VariableBlock | OutputBlock;
export type Program = Statement[];
