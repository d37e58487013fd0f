import { z } from 'zod';

export const EmbeddedPipConfigSchema = z.object({
  package: z.string().min(1),
  editor: z.object({
    executable: z.string().min(1).nullable(),
    name_prefix: z.string().min(1),
  }),
  pip: z.object({
    install_args: z.array(z.string()),
    uninstall_args: z.array(z.string()),
  }),
  cleanup: z.object({
    patterns: z.array(z.string().min(1)),
    run_after_uninstall: z.boolean(),
  }),
});

export type EmbeddedPipConfig = z.infer<typeof EmbeddedPipConfigSchema>;

export const DEFAULT_CONFIG: EmbeddedPipConfig = {
  package: 'PySide6',
  editor: { executable: null, name_prefix: 'unrealeditor' },
  pip: {
    install_args: ['--no-warn-script-location'],
    uninstall_args: ['--yes'],
  },
  cleanup: {
    patterns: ['PySide6*', 'shiboken6*', '*pyside6*'],
    run_after_uninstall: true,
  },
};
