#!/usr/bin/env node

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { logger } from './shared/logger.js';
import { bootstrap } from './bootstrap.js';
import { createToolContext } from './tools/index.js';

async function main(): Promise<void> {
  logger.info('Starting embedded-pip MCP server');

  // ── Phase 1: Config and workflows ─────────────────────────────
  const { pip } = bootstrap();

  // ── Phase 2: Tool registry ────────────────────────────────────
  const ctx = createToolContext(pip);
  logger.info({ toolCount: ctx.registry.size, package: pip.packageName }, 'All tool modules registered');

  // ── Phase 3: MCP server ───────────────────────────────────────
  const server = new McpServer({
    name: 'embedded-pip',
    version: '0.1.0',
  });

  for (const tool of ctx.registry.list()) {
    const meta = tool.metadata;
    server.registerTool(
      meta.name,
      {
        title: meta.name,
        description: meta.description,
        inputSchema: meta.inputSchema.shape,
        annotations: {
          readOnlyHint: meta.annotations?.readOnlyHint ?? false,
          destructiveHint: meta.annotations?.destructiveHint ?? false,
          idempotentHint: meta.annotations?.idempotentHint ?? false,
          openWorldHint: meta.annotations?.openWorldHint ?? false,
        },
      },
      async (args: Record<string, unknown>) => {
        const response = await ctx.registry.dispatch(meta.name, args);
        return {
          content: [{ type: 'text' as const, text: JSON.stringify(response, null, 2) }],
        };
      },
    );
  }

  // ── Phase 4: Connect transport ────────────────────────────────
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ tools: ctx.registry.size }, 'embedded-pip MCP server running on stdio');
}

main().catch((err) => {
  logger.fatal({ error: err }, 'Fatal startup error');
  process.exit(1);
});
