/**
 * pqcscan - SARIF Output Formatter
 *
 * Generates SARIF 2.1.0 format for GitHub Code Scanning integration.
 * See: https://docs.oasis-open.org/sarif/sarif/v2.1.0/sarif-v2.1.0.html
 */

import type { Diagnostic, FileResult, ScanOutput } from '../types.js';
import { CATEGORY_INFO, type Category } from '../core/taxonomy.js';

const SARIF_VERSION = '2.1.0';
const SARIF_SCHEMA = 'https://raw.githubusercontent.com/oasis-tcs/sarif-spec/master/Schemata/sarif-schema-2.1.0.json';
const TOOL_NAME = 'pqcscan';

// ============================================================
// SARIF Types (subset for our needs)
// ============================================================

type SarifLevel = 'error' | 'warning' | 'note' | 'none';

export interface SarifRun {
  tool: SarifTool;
  results: SarifResult[];
  invocations: SarifInvocation[];
}

interface SarifTool {
  driver: SarifToolDriver;
}

interface SarifToolDriver {
  name: string;
  version: string;
  rules: SarifRule[];
}

export interface SarifRule {
  id: string;
  name: string;
  shortDescription: { text: string };
  fullDescription?: { text: string };
  help?: { text: string };
  defaultConfiguration: {
    level: SarifLevel;
  };
  properties?: {
    tags?: string[];
    'security-severity'?: string;
  };
}

export interface SarifResult {
  ruleId: string;
  level: SarifLevel;
  message: { text: string };
  locations: SarifLocation[];
  fingerprints?: Record<string, string>;
  properties?: Record<string, string>;
}

interface SarifLocation {
  physicalLocation: {
    artifactLocation: {
      uri: string;
      uriBaseId?: string;
    };
    region?: {
      startLine: number;
      startColumn?: number;
    };
  };
}

interface SarifNotification {
  level: SarifLevel;
  message: { text: string };
  locations?: SarifLocation[];
}

interface SarifInvocation {
  executionSuccessful: boolean;
  startTimeUtc?: string;
  workingDirectory?: { uri: string };
  toolExecutionNotifications?: SarifNotification[];
}

export interface SarifOutput {
  $schema: string;
  version: string;
  runs: SarifRun[];
}

// ============================================================
// Rule IDs
// ============================================================

interface RuleDefinition {
  id: string;
  name: string;
  shortDescription: string;
  fullDescription: string;
  help: string;
  level: SarifLevel;
  severity: string;
  tags: string[];
}

function importRule(id: string, name: string, category: Category): RuleDefinition {
  const info = CATEGORY_INFO[category];
  return {
    id,
    name,
    shortDescription: `Import of a package using quantum-vulnerable ${info.label}`,
    fullDescription: info.description,
    help: `Consider ${info.replacement}`,
    level: 'warning',
    severity: '5.0',
    tags: ['security', 'cryptography', 'post-quantum'],
  };
}

export const IMPORT_RULES: Readonly<Record<Category, RuleDefinition>> = {
  'elliptic-curve': importRule('PQC001', 'EllipticCurveImport', 'elliptic-curve'),
  'integer-factorization': importRule('PQC002', 'IntegerFactorizationImport', 'integer-factorization'),
  'key-exchange': importRule('PQC003', 'KeyExchangeImport', 'key-exchange'),
};

export const CALL_RULE: RuleDefinition = {
  id: 'PQC004',
  name: 'VulnerableFunctionCall',
  shortDescription: 'Call of a function implementing quantum-vulnerable cryptography',
  fullDescription: 'The called function relies on public-key cryptography that a quantum computer can break',
  help: 'Replace the call with a post-quantum alternative such as crypto/mlkem',
  level: 'error',
  severity: '7.0',
  tags: ['security', 'cryptography', 'post-quantum'],
};

// ============================================================
// Converter
// ============================================================

/**
 * Convert scan output to SARIF format
 */
export function toSarif(output: ScanOutput): SarifOutput {
  const failed = output.files.filter(f => f.status === 'error');

  return {
    $schema: SARIF_SCHEMA,
    version: SARIF_VERSION,
    runs: [
      {
        tool: {
          driver: {
            name: TOOL_NAME,
            version: output.version,
            rules: generateRules(),
          },
        },
        results: output.files.flatMap(f => f.diagnostics.map(diagnosticToSarif)),
        invocations: [
          {
            executionSuccessful: failed.length === 0,
            startTimeUtc: output.timestamp,
            workingDirectory: { uri: `file://${output.sourceDir}` },
            ...(failed.length > 0 ? { toolExecutionNotifications: failed.map(failureToNotification) } : {}),
          },
        ],
      },
    ],
  };
}

/**
 * Generate rule definitions
 */
function generateRules(): SarifRule[] {
  return [...Object.values(IMPORT_RULES), CALL_RULE].map((rule) => ({
    id: rule.id,
    name: rule.name,
    shortDescription: { text: rule.shortDescription },
    fullDescription: { text: rule.fullDescription },
    help: { text: rule.help },
    defaultConfiguration: { level: rule.level },
    properties: {
      tags: rule.tags,
      'security-severity': rule.severity,
    },
  }));
}

function location(file: string, line?: number, column?: number): SarifLocation {
  return {
    physicalLocation: {
      artifactLocation: {
        uri: file,
        uriBaseId: '%SRCROOT%',
      },
      ...(line !== undefined ? { region: { startLine: line, startColumn: column } } : {}),
    },
  };
}

/**
 * Convert a diagnostic to a SARIF result
 */
function diagnosticToSarif(diagnostic: Diagnostic): SarifResult {
  const rule = diagnostic.kind === 'import' ? IMPORT_RULES[diagnostic.category] : CALL_RULE;
  const { file, line, column } = diagnostic.position;
  const properties: Record<string, string> = diagnostic.kind === 'import'
    ? { module: diagnostic.module, category: diagnostic.category }
    : { module: diagnostic.module, function: diagnostic.functionName };

  return {
    ruleId: rule.id,
    level: rule.level,
    message: { text: diagnostic.message },
    locations: [location(file, line, column)],
    fingerprints: {
      'pqcscan/finding': `${file}:${line}:${column}:${rule.id}`,
    },
    properties,
  };
}

function failureToNotification(result: FileResult): SarifNotification {
  return {
    level: 'error',
    message: { text: result.error ?? 'analysis failed' },
    locations: [location(result.file)],
  };
}
