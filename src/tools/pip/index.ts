import { z } from 'zod';
import type { ToolContext } from '../context.js';
import { success, operationFailed, elapsed } from '../helpers.js';

const packageArg = z.string().min(1).optional().describe('Package name; defaults to the configured package');
const extraArgs = z.array(z.string()).optional().default([]).describe('Extra arguments appended to the pip command line');

export function registerPipTools(ctx: ToolContext): void {
  // ── pip_probe ───────────────────────────────────────────────────
  ctx.registry.register({
    name: 'pip_probe', description: "Check whether a package resolves in the embedded interpreter's site-packages. Starts no process.",
    inputSchema: z.object({ package: packageArg }),
    annotations: { readOnlyHint: true },
  }, async (args, start) => {
    const pkg = args.package ?? ctx.pip.packageName;
    const available = await ctx.pip.isAvailable(pkg);
    return success('pip_probe', elapsed(start), { package: pkg, available });
  });

  // ── pip_ensure ──────────────────────────────────────────────────
  ctx.registry.register({
    name: 'pip_ensure', description: 'Install the package unless it already resolves in the embedded interpreter.',
    inputSchema: z.object({ package: packageArg }),
    annotations: { idempotentHint: true },
  }, async (args, start) => {
    const pkg = args.package ?? ctx.pip.packageName;
    if (!(await ctx.pip.ensureInstalled(pkg))) return operationFailed('pip_ensure', elapsed(start), `Could not make ${pkg} available`);
    return success('pip_ensure', elapsed(start), { package: pkg, available: true });
  });

  // ── pip_install ─────────────────────────────────────────────────
  ctx.registry.register({
    name: 'pip_install', description: 'Run pip install for a package in the embedded interpreter.',
    inputSchema: z.object({ package: packageArg, extra_args: extraArgs }),
    annotations: { destructiveHint: false },
  }, async (args, start) => {
    const pkg = args.package ?? ctx.pip.packageName;
    if (!(await ctx.pip.install(pkg, args.extra_args))) return operationFailed('pip_install', elapsed(start), `pip install ${pkg} failed`);
    return success('pip_install', elapsed(start), { package: pkg, installed: true });
  });

  // ── pip_uninstall ───────────────────────────────────────────────
  ctx.registry.register({
    name: 'pip_uninstall', description: 'Uninstall a package from the embedded interpreter. With verify (default) the package must resolve first and must no longer resolve afterwards.',
    inputSchema: z.object({
      package: packageArg,
      extra_args: extraArgs,
      verify: z.boolean().optional().default(true).describe('Probe before and after uninstalling'),
    }),
    annotations: { destructiveHint: true },
  }, async (args, start) => {
    const pkg = args.package ?? ctx.pip.packageName;
    const ok = args.verify
      ? await ctx.pip.uninstallAndVerify(pkg, args.extra_args)
      : await ctx.pip.uninstall(pkg, args.extra_args);
    if (!ok) return operationFailed('pip_uninstall', elapsed(start), `Uninstalling ${pkg} failed`);
    return success('pip_uninstall', elapsed(start), { package: pkg, uninstalled: true, verified: args.verify });
  });

  // ── pip_show ────────────────────────────────────────────────────
  ctx.registry.register({
    name: 'pip_show', description: "Show pip's metadata for an installed package.",
    inputSchema: z.object({ package: packageArg }),
    annotations: { readOnlyHint: true },
  }, async (args, start) => {
    const pkg = args.package ?? ctx.pip.packageName;
    const info = await ctx.pip.show(pkg);
    if (info === null) return operationFailed('pip_show', elapsed(start), `No pip metadata for ${pkg}`);
    return success('pip_show', elapsed(start), { package: pkg, info: info.trim() });
  });

  // ── pip_list ────────────────────────────────────────────────────
  ctx.registry.register({
    name: 'pip_list', description: 'List every package installed in the embedded interpreter.',
    inputSchema: z.object({}),
    annotations: { readOnlyHint: true },
  }, async (_args, start) => {
    const output = await ctx.pip.list();
    if (output === null) return operationFailed('pip_list', elapsed(start), 'pip list failed');
    return success('pip_list', elapsed(start), { output: output.trim() });
  });

  // ── pip_cleanup ─────────────────────────────────────────────────
  ctx.registry.register({
    name: 'pip_cleanup', description: 'Delete leftover files of the package from site-packages using the configured glob patterns.',
    inputSchema: z.object({ package: packageArg }),
    annotations: { destructiveHint: true },
  }, async (args, start) => {
    const pkg = args.package ?? ctx.pip.packageName;
    if (!(await ctx.pip.cleanup(pkg))) return operationFailed('pip_cleanup', elapsed(start), 'Could not determine site-packages');
    return success('pip_cleanup', elapsed(start), { package: pkg, cleaned: true });
  });
}
