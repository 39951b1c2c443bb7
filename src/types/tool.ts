/**
 * JSON Schema object describing a tool's parameters
 */
export type JsonSchema = Record<string, unknown>;

/**
 * Arguments as the model sends them, before validation
 */
export type ToolArguments = Record<string, unknown>;

/**
 * The part of a tool that is advertised to a model
 */
export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly parameters: JsonSchema;
}

/**
 * A tool the agent can execute by name.
 * `invoke` validates the arguments, runs the handler and returns its output as text.
 */
export interface Tool extends ToolDefinition {
  invoke(args: ToolArguments): Promise<string>;
}

/**
 * A tool invocation requested by the model
 */
export interface ToolCall {
  id: string;
  name: string;
  arguments: ToolArguments;
}

/**
 * Platform wire form of a tool definition
 */
export interface ApiToolDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: JsonSchema;
  };
}
