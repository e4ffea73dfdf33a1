/**
 * pqcscan Configuration JSON Schema Generator
 *
 * Generates JSON Schema for IDE autocompletion and validation
 */

import { CATEGORIES } from '../core/taxonomy.js';

export interface JSONSchemaType {
  $schema?: string;
  $id?: string;
  title?: string;
  description?: string;
  type?: string | string[];
  properties?: Record<string, JSONSchemaType>;
  items?: JSONSchemaType;
  required?: string[];
  additionalProperties?: boolean;
  enum?: (string | number | boolean | null)[];
  default?: unknown;
  minimum?: number;
  examples?: unknown[];
}

/**
 * Output format options
 */
export const OUTPUT_FORMATS = ['text', 'json', 'sarif'] as const;

/**
 * Traversal policies
 */
export const TRAVERSAL_POLICIES = ['shallow', 'deep'] as const;

/**
 * Generate the full JSON Schema for pqcscan configuration
 */
export function generateConfigSchema(): JSONSchemaType {
  return {
    $schema: 'http://json-schema.org/draft-07/schema#',
    $id: 'pqcscan.schema.json',
    title: 'pqcscan Configuration',
    description: 'Configuration file schema for pqcscan - quantum-vulnerable cryptography scanner for Go',
    type: 'object',
    properties: {
      $schema: {
        type: 'string',
        description: 'Path to this schema'
      },

      // Analysis options
      ignorePaths: {
        type: 'array',
        description: 'Gitignore-style patterns for files to skip',
        items: { type: 'string' },
        default: [],
        examples: [['gen/**', '**/*.pb.go']]
      },
      includeTests: {
        type: 'boolean',
        description: 'Also scan external test packages (package foo_test)',
        default: false
      },
      traversal: {
        type: 'string',
        description: 'shallow checks top-level statements of each function; deep checks every call',
        enum: [...TRAVERSAL_POLICIES],
        default: 'shallow'
      },
      concurrency: {
        type: 'number',
        description: 'Number of files read and parsed in parallel',
        default: 10,
        minimum: 1
      },

      // Output options
      output: {
        type: 'string',
        description: 'Output format for scan results',
        enum: [...OUTPUT_FORMATS],
        default: 'text'
      },

      // Extra taxonomy entries
      taxonomy: {
        type: 'object',
        description: 'Packages and functions to flag in addition to the built-in list',
        properties: {
          modules: {
            type: 'array',
            description: 'Import paths and the category they belong to',
            items: {
              type: 'object',
              properties: {
                path: { type: 'string' },
                category: { type: 'string', enum: [...CATEGORIES] }
              },
              required: ['path', 'category'],
              additionalProperties: false
            },
            default: [],
            examples: [[{ path: 'golang.org/x/crypto/curve25519', category: 'elliptic-curve' }]]
          },
          functions: {
            type: 'array',
            description: 'Functions of a package to flag when called',
            items: {
              type: 'object',
              properties: {
                module: { type: 'string' },
                name: { type: 'string' }
              },
              required: ['module', 'name'],
              additionalProperties: false
            },
            default: [],
            examples: [[{ module: 'golang.org/x/crypto/curve25519', name: 'X25519' }]]
          }
        },
        additionalProperties: false
      },

      // Watch mode options
      watch: {
        type: 'object',
        description: 'File watcher options for continuous scanning',
        properties: {
          debounce: {
            type: 'number',
            description: 'Debounce delay in milliseconds before re-scanning',
            default: 500,
            minimum: 0,
            examples: [250, 500, 1000]
          },
          quiet: {
            type: 'boolean',
            description: 'Show only summary line (no detailed output)',
            default: false
          }
        },
        additionalProperties: false
      },

      // CI options
      ci: {
        type: 'object',
        description: 'CI/CD integration options',
        properties: {
          annotations: {
            type: 'boolean',
            description: 'Output GitHub Actions annotations',
            default: false
          }
        },
        additionalProperties: false
      }
    },
    additionalProperties: false
  };
}

/**
 * Format schema as JSON string
 */
export function formatSchema(indent: number = 2): string {
  return JSON.stringify(generateConfigSchema(), null, indent);
}

/**
 * Generate a sample config with $schema reference
 */
export function generateConfigWithSchema(): string {
  const config = {
    $schema: './pqcscan.schema.json',
    ignorePaths: ['gen/**'],
    traversal: 'shallow',
    ci: {
      annotations: true
    }
  };

  return JSON.stringify(config, null, 2);
}
