import { createLogger } from '../logger.js';
import type { ToolArguments, ToolDefinition } from '../types/tool.js';

const logger = createLogger('tool-validator');

/**
 * Result of tool argument validation
 */
export interface ToolValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

interface ObjectSchema {
  properties: Record<string, unknown>;
  required: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readObjectSchema(schema: Record<string, unknown>): ObjectSchema {
  const properties = isRecord(schema.properties) ? schema.properties : {};
  const required = Array.isArray(schema.required)
    ? schema.required.filter((name): name is string => typeof name === 'string')
    : [];
  return { properties, required };
}

/**
 * Validate type of a value against a JSON Schema type name
 */
function validateType(value: unknown, expectedType: string): boolean {
  switch (expectedType) {
    case 'string':
      return typeof value === 'string';
    case 'number':
    case 'integer':
      return typeof value === 'number' && (expectedType !== 'integer' || Number.isInteger(value));
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return isRecord(value);
    case 'null':
      return value === null;
    default:
      return true; // Unknown type, accept
  }
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Validate call arguments against a tool's JSON Schema.
 *
 * Checks required parameters and the declared `type` of each known property.
 * Unknown parameters only produce warnings.
 */
export function validateToolArguments(
  definition: ToolDefinition,
  args: ToolArguments
): ToolValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const { properties, required } = readObjectSchema(definition.parameters);

  for (const param of required) {
    if (!(param in args) || args[param] === undefined || args[param] === null) {
      errors.push(`Missing required parameter: ${param}`);
    }
  }

  for (const [key, value] of Object.entries(args)) {
    const propDef = properties[key];
    if (!isRecord(propDef)) {
      warnings.push(`Unknown parameter: ${key}`);
      continue;
    }

    // missing required values were reported above
    if (value === undefined || value === null) {
      continue;
    }

    const declared = propDef.type;
    const types = Array.isArray(declared)
      ? declared.filter((t): t is string => typeof t === 'string')
      : typeof declared === 'string'
        ? [declared]
        : [];

    if (types.length > 0 && !types.some((t) => validateType(value, t.toLowerCase()))) {
      errors.push(`Parameter ${key}: expected type ${types.join(' | ')}, got ${describeType(value)}`);
      continue;
    }

    if (Array.isArray(propDef.enum) && !propDef.enum.includes(value)) {
      errors.push(`Parameter ${key}: must be one of ${propDef.enum.map((v) => JSON.stringify(v)).join(', ')}`);
    }
  }

  const valid = errors.length === 0;

  if (!valid) {
    logger.debug({ toolName: definition.name, errors, warnings }, 'Tool argument validation failed');
  } else if (warnings.length > 0) {
    logger.debug({ toolName: definition.name, warnings }, 'Tool argument validation warnings');
  }

  return { valid, errors, warnings };
}

export function formatIssues(issues: string[]): string {
  return issues.join('; ');
}
