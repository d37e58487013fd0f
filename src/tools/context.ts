import type { EmbeddedPip } from '../pip/embedded-pip.js';
import type { ToolRegistry } from './registry.js';

/**
 * Shared tool context, created once at startup and passed to every tool module.
 */
export interface ToolContext {
  readonly pip: EmbeddedPip;
  readonly registry: ToolRegistry;
}
