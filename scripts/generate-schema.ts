#!/usr/bin/env node
/**
 * Script to generate JSON Schema from Zod configuration.
 *
 * Usage: npm run generate-schema
 *
 * This generates schema/config.schema.json for editor validation.
 */

import { writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { generateJsonSchemaString } from '../src/config/json-schema';

const rootDir = join(__dirname, '..');
const schemaDir = join(rootDir, 'schema');
const outputPath = join(schemaDir, 'config.schema.json');

mkdirSync(schemaDir, { recursive: true });

const schemaContent = generateJsonSchemaString();
writeFileSync(outputPath, schemaContent, 'utf8');

console.log(`✓ Generated JSON Schema: ${outputPath}`);
console.log(`  Size: ${(schemaContent.length / 1024).toFixed(1)} KB`);
