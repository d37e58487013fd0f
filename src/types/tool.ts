import type { z } from 'zod';
import type { ToolResponse } from './response.js';

/** Metadata declared by every tool at registration time. */
export interface ToolMetadata<S extends z.AnyZodObject = z.AnyZodObject> {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: S;
  readonly annotations?: {
    readOnlyHint?: boolean;
    destructiveHint?: boolean;
    idempotentHint?: boolean;
    openWorldHint?: boolean;
  };
}

/** Receives arguments already parsed by the tool's schema. */
export type ToolHandler<Shape extends z.ZodRawShape> = (
  args: z.objectOutputType<Shape, z.ZodTypeAny, 'strip'>,
  start: number
) => Promise<ToolResponse>;

export interface RegisteredTool {
  readonly metadata: ToolMetadata;
  readonly execute: (args: Record<string, unknown>) => Promise<ToolResponse>;
}
