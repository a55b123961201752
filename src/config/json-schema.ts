/**
 * JSON Schema generator for policy gate configuration
 *
 * Converts Zod schemas to JSON Schema format for IDE validation,
 * documentation, and external tooling integration.
 *
 * @module config/json-schema
 */

import { zodToJsonSchema } from 'zod-to-json-schema';
import { RootConfigSchema } from './schema';

/**
 * JSON Schema metadata for policy gate configuration.
 */
const SCHEMA_METADATA = {
  $id: 'https://example.com/vuln-policy-gate/schema/config.schema.json',
  title: 'Vulnerability Policy Gate Configuration',
  description:
    'Configuration schema for the vulnerability policy gate. Use this schema to validate .policy-gate.yml files.',
} as const;

/** Default location of the published schema */
const DEFAULT_SCHEMA_URL = './schema/config.schema.json';

/** Keys kept at the top of each schema object, in this order */
const KEY_PRIORITY = ['$schema', '$id', 'title', 'description', 'type', 'properties', 'required'];

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Generate JSON Schema from the Zod configuration schema.
 *
 * Produces a deterministic JSON Schema with sorted keys for
 * consistent output across runs.
 *
 * @returns JSON Schema object
 */
export function generateJsonSchema(): Record<string, unknown> {
  const rawSchema: unknown = zodToJsonSchema(RootConfigSchema, {
    name: 'PolicyGateConfig',
    $refStrategy: 'none',
    target: 'jsonSchema7',
  });

  // The schema comes with a definitions wrapper; extract the config schema
  const definitions = isJsonObject(rawSchema) ? rawSchema.definitions : undefined;
  const configSchema = isJsonObject(definitions) ? definitions.PolicyGateConfig : undefined;

  const result: Record<string, unknown> = {
    $schema: 'http://json-schema.org/draft-07/schema#',
    ...SCHEMA_METADATA,
    type: 'object',
    ...(isJsonObject(configSchema) ? configSchema : {}),
  };

  const sorted = sortObjectKeys(result);
  return isJsonObject(sorted) ? sorted : result;
}

/**
 * Generate JSON Schema as a formatted string.
 *
 * @returns JSON Schema as a pretty-printed string
 */
export function generateJsonSchemaString(): string {
  const schema = generateJsonSchema();
  return JSON.stringify(schema, null, 2) + '\n';
}

function compareKeys(a: string, b: string): number {
  const aIndex = KEY_PRIORITY.indexOf(a);
  const bIndex = KEY_PRIORITY.indexOf(b);

  if (aIndex !== -1 && bIndex !== -1) {
    return aIndex - bIndex;
  }
  if (aIndex !== -1) {
    return -1;
  }
  if (bIndex !== -1) {
    return 1;
  }
  return a.localeCompare(b);
}

/**
 * Recursively sort object keys for deterministic output.
 */
function sortObjectKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortObjectKeys);
  }
  if (!isJsonObject(value)) {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort(compareKeys)) {
    result[key] = sortObjectKeys(value[key]);
  }
  return result;
}

/**
 * Get the yaml-language-server directive for schema validation.
 *
 * Users can add this comment at the top of their .policy-gate.yml
 * to enable schema validation in VS Code and other editors.
 *
 * @param schemaUrl - URL or path to the schema file
 * @returns The yaml-language-server directive comment
 */
export function getYamlSchemaDirective(schemaUrl = DEFAULT_SCHEMA_URL): string {
  return `# yaml-language-server: $schema=${schemaUrl}`;
}
