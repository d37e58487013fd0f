import type { z } from 'zod';
import type { RegisteredTool, ToolHandler, ToolMetadata } from '../types/tool.js';
import type { ToolResponse } from '../types/response.js';
import { describeError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { error, elapsed } from './helpers.js';

/**
 * Holds the MCP tools and runs them. Arguments are checked against each
 * tool's schema before its handler sees them, and every call answers with a
 * ToolResponse: bad arguments, unknown names and thrown errors included.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  register<Shape extends z.ZodRawShape>(
    metadata: ToolMetadata<z.ZodObject<Shape, 'strip'>>,
    handler: ToolHandler<Shape>
  ): void {
    if (this.tools.has(metadata.name)) {
      logger.warn({ tool: metadata.name }, 'Duplicate tool registration, overwriting');
    }
    this.tools.set(metadata.name, {
      metadata,
      execute: async (raw) => {
        const start = performance.now();
        const parsed = metadata.inputSchema.safeParse(raw);
        if (!parsed.success) {
          return error(metadata.name, elapsed(start), {
            code: 'INVALID_ARGUMENTS',
            category: 'validation',
            message: parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '),
          });
        }
        return handler(parsed.data, start);
      },
    });
  }

  async dispatch(name: string, args: Record<string, unknown>): Promise<ToolResponse> {
    const tool = this.tools.get(name);
    if (!tool) {
      return error(name, 0, { code: 'UNKNOWN_TOOL', category: 'not_found', message: `No tool named ${name}` });
    }
    const start = performance.now();
    try {
      return await tool.execute(args);
    } catch (err) {
      const message = describeError(err);
      logger.error({ tool: name, error: message }, 'Tool execution error');
      return error(name, elapsed(start), {
        code: 'INTERNAL_ERROR',
        category: 'state',
        message,
        remediation: ['Check server logs for details'],
      });
    }
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  list(): RegisteredTool[] {
    return [...this.tools.values()];
  }

  get size(): number {
    return this.tools.size;
  }
}
