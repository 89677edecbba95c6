/**
 * @fileoverview Typed tool registry
 *
 * Explicit name → handler map for tools exposed to a generator. Arguments are
 * validated with each tool's zod schema before the handler runs. `dispatch`
 * always resolves to a JSON string; failures are reported as `{"error": ...}`
 * so they can be fed back to the model as a tool message.
 */

import { z } from 'zod';
import { getErrorMessage } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';

/** OpenAI-style function tool definition */
export interface ToolDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export interface ToolHandler<A> {
  definition: ToolDefinition;
  args: z.ZodType<A, z.ZodTypeDef, unknown>;
  run(args: A): unknown;
}

interface RegisteredTool {
  definition: ToolDefinition;
  invoke(raw: unknown): Promise<unknown>;
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  register<A>(handler: ToolHandler<A>): this {
    const name = handler.definition.function.name;
    if (this.tools.has(name)) {
      throw new Error(`Tool already registered: ${name}`);
    }
    this.tools.set(name, {
      definition: handler.definition,
      invoke: async (raw) => {
        const parsed = handler.args.safeParse(raw);
        if (!parsed.success) {
          throw new Error(parsed.error.issues.map((issue) => `${issue.path.join('.') || 'args'}: ${issue.message}`).join('; '));
        }
        return handler.run(parsed.data);
      },
    });
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  definitions(): ToolDefinition[] {
    return Array.from(this.tools.values(), (tool) => tool.definition);
  }

  /**
   * Run a tool by name. `rawArgs` may be the JSON argument string a model
   * produced or an already-parsed object.
   */
  async dispatch(name: string, rawArgs: string | Record<string, unknown>): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      return JSON.stringify({ error: `Tool '${name}' not found.`, arguments: rawArgs });
    }

    let args: unknown = rawArgs;
    if (typeof rawArgs === 'string') {
      try {
        args = rawArgs.trim() ? JSON.parse(rawArgs) : {};
      } catch (error) {
        return JSON.stringify({ error: `Invalid arguments for tool '${name}': ${getErrorMessage(error)}`, arguments: rawArgs });
      }
    }

    try {
      const output = await tool.invoke(args);
      logDebug('Tool call completed', { tool: name });
      return JSON.stringify(output);
    } catch (error) {
      return JSON.stringify({ error: `Exception in handling tool '${name}': ${getErrorMessage(error)}`, arguments: args });
    }
  }
}
