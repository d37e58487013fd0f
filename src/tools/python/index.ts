import { z } from 'zod';
import { EmbeddedPipErrorCode } from '../../shared/errors.js';
import type { ToolContext } from '../context.js';
import { success, error, operationFailed, elapsed } from '../helpers.js';

export function registerPythonTools(ctx: ToolContext): void {
  ctx.registry.register({
    name: 'python_locate', description: 'Resolve the interpreter bundled with the editor.',
    inputSchema: z.object({}),
    annotations: { readOnlyHint: true },
  }, async (_args, start) => {
    const python = await ctx.pip.locate();
    if (!python) {
      return error('python_locate', elapsed(start), {
        code: EmbeddedPipErrorCode.INTERPRETER_NOT_FOUND, category: 'not_found',
        message: 'No embedded Python found',
        remediation: ['Set editor.executable in the config file or EMBEDDED_PIP_EDITOR to the editor binary'],
      });
    }
    return success('python_locate', elapsed(start), { python });
  });

  ctx.registry.register({
    name: 'python_open_folder', description: "Open the interpreter's folder in the system file browser.",
    inputSchema: z.object({}),
    annotations: { readOnlyHint: true, openWorldHint: true },
  }, async (_args, start) => {
    if (!(await ctx.pip.openPythonFolder())) return operationFailed('python_open_folder', elapsed(start), 'Could not open the interpreter folder');
    return success('python_open_folder', elapsed(start), { opened: true });
  });

  ctx.registry.register({
    name: 'python_open_terminal', description: "Open a command prompt in the interpreter's folder (Windows only).",
    inputSchema: z.object({}),
    annotations: { readOnlyHint: true, openWorldHint: true },
  }, async (_args, start) => {
    if (!(await ctx.pip.openTerminalAtPython())) return operationFailed('python_open_terminal', elapsed(start), 'Could not open a terminal at the interpreter folder');
    return success('python_open_terminal', elapsed(start), { opened: true });
  });
}
