import type { EmbeddedPip } from '../pip/embedded-pip.js';
import type { ToolContext } from './context.js';
import { ToolRegistry } from './registry.js';
import { registerPipTools } from './pip/index.js';
import { registerPythonTools } from './python/index.js';

export function createToolContext(pip: EmbeddedPip): ToolContext {
  const ctx: ToolContext = { pip, registry: new ToolRegistry() };
  registerPythonTools(ctx);
  registerPipTools(ctx);
  return ctx;
}
