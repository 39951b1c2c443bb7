import { createLogger } from '../logger.js';
import { DuplicateToolError, UnknownToolError, ValidationError } from '../errors.js';
import type { Tool, ToolDefinition } from '../types/tool.js';
import { toToolDefinition } from './tool.js';

const logger = createLogger('tool-registry');

/**
 * Tool Registry
 *
 * Holds the tools an agent can call, keyed by name, in registration order.
 * The order is the order tools are advertised to the model.
 *
 * Once locked the registry is read-only, which lets concurrent runs share it.
 */
export class ToolRegistry {
  private readonly tools: Map<string, Tool> = new Map();
  private isLocked = false;

  constructor(tools: Iterable<Tool> = []) {
    for (const entry of tools) {
      this.register(entry);
    }
  }

  /**
   * Register a tool
   * @throws DuplicateToolError if a tool with the same name is already registered
   */
  register(tool: Tool): void {
    if (this.isLocked) {
      throw new ValidationError(`Cannot register tool "${tool.name}": registry is locked`);
    }
    if (this.tools.has(tool.name)) {
      throw new DuplicateToolError(tool.name);
    }

    this.tools.set(tool.name, tool);
    logger.debug({ toolName: tool.name }, 'Tool registered');
  }

  /**
   * Look up a tool by name
   * @throws UnknownToolError if no tool has that name
   */
  resolve(name: string): Tool {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name, this.names());
    }
    return tool;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Tools in registration order
   */
  list(): Tool[] {
    return Array.from(this.tools.values());
  }

  /**
   * Definitions to advertise to the model, in registration order
   */
  definitions(): ToolDefinition[] {
    return this.list().map(toToolDefinition);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * Freeze the registry. Further `register` calls fail.
   */
  lock(): this {
    this.isLocked = true;
    return this;
  }

  get locked(): boolean {
    return this.isLocked;
  }
}
