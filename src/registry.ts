/**
 * Name → tool lookup, populated once at startup.
 */

import { type ToolDefinition, type ToolDescriptor } from './types';
import { type ToolModule } from './module';
import { duplicateToolError, unknownToolError } from './errors';

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDescriptor>();

  /** Register a single tool.  Throws DuplicateTool if the name is taken. */
  register(tool: ToolDescriptor): void {
    const { name } = tool.definition;
    if (this.tools.has(name)) {
      throw duplicateToolError(name);
    }
    this.tools.set(name, tool);
  }

  registerModule(module: ToolModule): void {
    for (const tool of module.tools) {
      this.register(tool);
    }
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Throws UnknownTool when `name` was never registered. */
  get(name: string): ToolDescriptor {
    const tool = this.tools.get(name);
    if (!tool) {
      throw unknownToolError(name);
    }
    return tool;
  }

  /** Definitions in registration order, as advertised by `tools/list`. */
  list(): ToolDefinition[] {
    return [...this.tools.values()].map((tool) => tool.definition);
  }
}

/** Build a registry from modules, registering them in the given order. */
export function createRegistry(modules: readonly ToolModule[]): ToolRegistry {
  const registry = new ToolRegistry();
  for (const module of modules) {
    registry.registerModule(module);
  }
  return registry;
}
