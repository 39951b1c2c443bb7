import { z } from 'zod';
import { ToolExecutionError, ValidationError, errorMessage } from '../errors.js';
import type {
  ApiToolDefinition,
  JsonSchema,
  Tool,
  ToolArguments,
  ToolDefinition,
} from '../types/tool.js';
import { formatIssues, validateToolArguments } from './validator.js';

const TOOL_NAME_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

/**
 * A tool body. May return anything; non-string results are sent to the model as JSON.
 */
export type ToolHandler<A = ToolArguments> = (args: A) => unknown;

/**
 * Tool from a raw JSON Schema
 */
export interface CreateToolOptions {
  name: string;
  description: string;
  parameters?: JsonSchema;
  handler: ToolHandler;
}

/**
 * Options for `tool()`. `name` defaults to the handler's function name.
 */
export interface ToolOptions<S extends z.ZodType<ToolArguments>> {
  parameters: S;
  name?: string;
  description?: string;
}

function assertToolSpec(name: string, description: string, parameters: JsonSchema): void {
  if (!TOOL_NAME_PATTERN.test(name)) {
    throw new ValidationError(
      `Invalid tool name "${name}": use 1-64 letters, digits, underscores or hyphens`
    );
  }
  if (!description.trim()) {
    throw new ValidationError(`Tool "${name}" needs a description`);
  }
  if (parameters.type !== 'object') {
    throw new ValidationError(`Tool "${name}" parameters must be a JSON Schema of type "object"`);
  }
}

function formatOutput(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return '';
  return JSON.stringify(value) ?? String(value);
}

async function runHandler<A>(name: string, handler: ToolHandler<A>, args: A): Promise<string> {
  try {
    return formatOutput(await handler(args));
  } catch (error) {
    throw new ToolExecutionError(name, errorMessage(error), error);
  }
}

/**
 * Build a tool from a handler and a zod object schema.
 *
 * The schema is converted to the JSON Schema advertised to the model, and
 * incoming arguments are parsed with it before the handler sees them.
 *
 * Without `name` the handler's function name is used. Bundlers and
 * transpilers (esbuild, tsx) may rename functions, so pass `name` for code
 * that is built that way.
 *
 * @example
 * const searchDatabase = tool(
 *   async ({ query }) => db.search(query),
 *   {
 *     description: 'Search the product database',
 *     parameters: z.object({ query: z.string().describe('Search terms') }),
 *   }
 * );
 */
export function tool<S extends z.ZodType<ToolArguments>>(
  handler: ToolHandler<z.output<S>>,
  options: ToolOptions<S>
): Tool {
  const name = options.name ?? handler.name;
  const description = (options.description ?? `Execute ${name}`).trim();

  let parameters: JsonSchema;
  try {
    parameters = { ...z.toJSONSchema(options.parameters, { io: 'input' }) };
  } catch (error) {
    throw new ValidationError(`Tool "${name}" parameters cannot be expressed as JSON Schema: ${errorMessage(error)}`);
  }
  delete parameters.$schema;

  assertToolSpec(name, description, parameters);

  return {
    name,
    description,
    parameters,
    async invoke(args: ToolArguments): Promise<string> {
      const parsed = options.parameters.safeParse(args);
      if (!parsed.success) {
        const issues = parsed.error.issues.map(
          (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
        );
        throw new ToolExecutionError(name, `Invalid arguments: ${formatIssues(issues)}`, parsed.error);
      }
      return runHandler(name, handler, parsed.data);
    },
  };
}

/**
 * Build a tool from an explicit JSON Schema.
 * Arguments are checked with `validateToolArguments` before the handler runs.
 */
export function createTool(options: CreateToolOptions): Tool {
  const parameters: JsonSchema = options.parameters ?? { type: 'object', properties: {} };
  const description = options.description.trim();
  assertToolSpec(options.name, description, parameters);

  const definition: ToolDefinition = { name: options.name, description, parameters };

  return {
    ...definition,
    async invoke(args: ToolArguments): Promise<string> {
      const result = validateToolArguments(definition, args);
      if (!result.valid) {
        throw new ToolExecutionError(definition.name, `Invalid arguments: ${formatIssues(result.errors)}`);
      }
      return runHandler(definition.name, options.handler, args);
    },
  };
}

export function isTool(value: unknown): value is Tool {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'description' in value &&
    typeof value.description === 'string' &&
    'parameters' in value &&
    typeof value.parameters === 'object' &&
    'invoke' in value &&
    typeof value.invoke === 'function'
  );
}

/**
 * The advertised part of a tool, without its handler
 */
export function toToolDefinition(source: ToolDefinition): ToolDefinition {
  return {
    name: source.name,
    description: source.description,
    parameters: source.parameters,
  };
}

/**
 * Platform wire form, as sent when creating remote agents
 */
export function toApiToolDefinition(source: ToolDefinition): ApiToolDefinition {
  return {
    type: 'function',
    function: {
      name: source.name,
      description: source.description,
      parameters: source.parameters,
    },
  };
}
