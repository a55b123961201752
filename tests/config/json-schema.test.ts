/**
 * Tests for JSON Schema generation from Zod config.
 */

import { describe, it, expect } from 'vitest';
import Ajv from 'ajv';
import {
  generateJsonSchema,
  generateJsonSchemaString,
  getYamlSchemaDirective,
} from '../../src/config/json-schema';

function child(value: unknown, key: string): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Expected an object holding '${key}'`);
  }
  const next: unknown = Object.getOwnPropertyDescriptor(value, key)?.value;
  if (typeof next !== 'object' || next === null || Array.isArray(next)) {
    throw new Error(`Expected '${key}' to be an object`);
  }
  return Object.fromEntries(Object.entries(next));
}

function property(schema: Record<string, unknown>, ...path: string[]): Record<string, unknown> {
  let current = schema;
  for (const key of path) {
    current = child(child(current, 'properties'), key);
  }
  return current;
}

describe('JSON Schema Generation', () => {
  describe('generateJsonSchema', () => {
    it('should generate a valid JSON Schema draft-07', () => {
      const schema = generateJsonSchema();

      expect(schema.$schema).toBe('http://json-schema.org/draft-07/schema#');
      expect(schema.$id).toBeDefined();
      expect(schema.title).toBe('Vulnerability Policy Gate Configuration');
      expect(schema.description).toContain('.policy-gate.yml');
    });

    it('should include all top-level properties', () => {
      const properties = child(generateJsonSchema(), 'properties');

      expect(Object.keys(properties).sort()).toEqual([
        'audit',
        'bypass',
        'exceptions',
        'report',
        'results_dir',
        'severity_threshold',
        'version',
      ]);
    });

    it('should include severity enum values', () => {
      const threshold = property(generateJsonSchema(), 'severity_threshold');

      expect(threshold.enum).toEqual(['LOW', 'MEDIUM', 'HIGH', 'CRITICAL']);
      expect(threshold.default).toBe('HIGH');
    });

    it('should include bypass modes', () => {
      const mode = property(generateJsonSchema(), 'bypass', 'mode');

      expect(mode.enum).toEqual(['static', 'signed']);
    });

    it('should include exception limits', () => {
      const exceptions = property(generateJsonSchema(), 'exceptions');

      expect(exceptions.type).toBe('array');
      expect(exceptions.maxItems).toBe(500);
    });

    it('should disallow unknown top-level keys', () => {
      expect(generateJsonSchema().additionalProperties).toBe(false);
    });

    it('should produce deterministic output (sorted keys)', () => {
      expect(generateJsonSchemaString()).toBe(generateJsonSchemaString());
      expect(Object.keys(generateJsonSchema()).slice(0, 4)).toEqual([
        '$schema',
        '$id',
        'title',
        'description',
      ]);
    });
  });

  describe('generateJsonSchemaString', () => {
    it('should produce valid JSON', () => {
      expect((): unknown => JSON.parse(generateJsonSchemaString())).not.toThrow();
    });

    it('should be formatted with 2-space indentation and end with a newline', () => {
      const schemaString = generateJsonSchemaString();

      expect(schemaString).toContain('\n  "');
      expect(schemaString.endsWith('\n')).toBe(true);
    });
  });

  describe('getYamlSchemaDirective', () => {
    it('should point at the local schema by default', () => {
      expect(getYamlSchemaDirective()).toBe(
        '# yaml-language-server: $schema=./schema/config.schema.json'
      );
    });

    it('should accept custom schema URL', () => {
      const customUrl = 'https://example.com/my-schema.json';

      expect(getYamlSchemaDirective(customUrl)).toBe(`# yaml-language-server: $schema=${customUrl}`);
    });
  });

  describe('Schema Validation with Ajv', () => {
    const validate = new Ajv({ strict: false }).compile(generateJsonSchema());

    it('should validate a minimal config', () => {
      expect(validate({ version: '1', severity_threshold: 'HIGH' })).toBe(true);
    });

    it('should validate a full config', () => {
      const fullConfig = {
        version: '1',
        severity_threshold: 'MEDIUM',
        exceptions: ['openssl', 'libssl*'],
        results_dir: 'scan-results',
        bypass: { enabled: true, mode: 'signed', secret_env: 'GATE_BYPASS_SECRET' },
        audit: { log_dir: 'logs/audit', max_attempts: 5 },
        report: { enabled: false, dir: 'reports' },
      };

      const isValid = validate(fullConfig);
      if (!isValid) {
        console.error('Validation errors:', validate.errors);
      }
      expect(isValid).toBe(true);
    });

    it('should reject invalid severity value', () => {
      expect(validate({ version: '1', severity_threshold: 'SEVERE' })).toBe(false);
      expect(validate.errors).toBeDefined();
    });

    it('should reject unknown bypass keys', () => {
      expect(validate({ bypass: { secret: 'test-secret' } })).toBe(false);
    });

    it('should reject too many exceptions', () => {
      const exceptions = Array.from({ length: 501 }, (_, i) => `pkg-${i}`);

      expect(validate({ exceptions })).toBe(false);
    });
  });
});
