// JSON Schema (draft-07) types, limited to the keywords the generator emits

export type JsonSchemaType =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'null'
  | 'object'
  | 'array';

export type JsonSchema = {
  $schema?: string;
  $ref?: string;
  $comment?: string;
  title?: string;
  description?: string;
  type?: JsonSchemaType | JsonSchemaType[];

  // objects
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;

  // arrays
  items?: JsonSchema | JsonSchema[];
  additionalItems?: boolean | JsonSchema;
  minItems?: number;
  maxItems?: number;

  // numbers
  minimum?: number;
  maximum?: number;
  exclusiveMinimum?: number;
  exclusiveMaximum?: number;
  multipleOf?: number;

  // strings
  minLength?: number;
  maxLength?: number;
  pattern?: string;
  format?: string;

  enum?: unknown[];
  const?: unknown;
  default?: unknown;

  oneOf?: JsonSchema[];
  anyOf?: JsonSchema[];
  allOf?: JsonSchema[];
  not?: JsonSchema;

  definitions?: Record<string, JsonSchema>;
};

export const DRAFT_07 = 'http://json-schema.org/draft-07/schema#';
