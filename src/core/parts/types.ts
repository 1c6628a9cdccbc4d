import { z } from 'zod';

import { resolveParallelBuildCount } from '../../config/env.js';

export const PART_NAME_PATTERN = /^[a-z0-9][a-z0-9+._-]*$/;

export const PartName = z
  .string()
  .min(1)
  .regex(PART_NAME_PATTERN, { message: 'part names must be lowercase alphanumerics, optionally separated by + . _ -' });

export const SourceDescriptor = z.object({
  /** Source handler kind; `local` copies a directory relative to the project dir. */
  type: z.string().min(1).default('local'),
  location: z.string().min(1),
  /** Declared version (tag, commit, checksum). Handlers fold it into the source identity. */
  version: z.string().min(1).optional()
});

export const ScriptOverride = z.object({
  /** Replaces the built-in behaviour of the step. */
  run: z.string().optional(),
  /** Runs before the built-in behaviour (or before `run`). */
  before: z.string().optional(),
  /** Runs after the built-in behaviour (or after `run`). */
  after: z.string().optional()
});

export const StepOverrides = z.object({
  pull: ScriptOverride.optional(),
  overlay: ScriptOverride.optional(),
  build: ScriptOverride.optional(),
  stage: ScriptOverride.optional(),
  prime: ScriptOverride.optional()
});

export const Fileset = z.array(z.string().min(1)).default(['**']);

export const PermissionSchema = z
  .object({
    /** Glob over paths relative to the part's install tree; `*` covers everything. */
    path: z.string().min(1).default('*'),
    owner: z.number().int().nonnegative().optional(),
    group: z.number().int().nonnegative().optional(),
    /** Octal string: `755`, `0755` and `0o755` are the same mode. */
    mode: z
      .string()
      .regex(/^(0o?)?[0-7]{1,4}$/, { message: 'mode must be an octal number such as 755' })
      .optional()
  })
  .strict()
  .refine((p) => (p.owner === undefined) === (p.group === undefined), { message: 'owner and group must be set together' });

export const PartDefinitionSchema = z.object({
  name: PartName,
  plugin: z.string().min(1).default('nil'),
  after: z.array(PartName).default([]),
  source: SourceDescriptor.optional(),
  properties: z.record(z.string(), z.unknown()).default({}),
  stage: Fileset,
  prime: Fileset,
  /** `from -> to` renames applied inside the install tree after build. */
  organize: z.record(z.string(), z.string()).default({}),
  overrides: StepOverrides.default({}),
  /** Ordered `{ NAME: value }` entries exported to build scripts. */
  buildEnvironment: z.array(z.record(z.string(), z.string())).default([]),
  /** Mode and ownership applied to matching files as they are staged and primed; later entries win. */
  permissions: z.array(PermissionSchema).default([])
});

export type PartDefinitionInput = z.input<typeof PartDefinitionSchema>;
export type PartDefinition = z.infer<typeof PartDefinitionSchema>;
export type SourceDescriptor = z.infer<typeof SourceDescriptor>;
export type ScriptOverride = z.infer<typeof ScriptOverride>;
export type Permission = z.infer<typeof PermissionSchema>;

export const OverlayOptions = z.object({
  enabled: z.boolean().default(false),
  /** Base filesystem the layers stack on; an empty base is used when absent. */
  base: z.string().min(1).optional()
});

export const ProjectOptionsSchema = z.object({
  workDir: z.string().min(1),
  /** Relative source locations resolve against this directory. */
  projectDir: z.string().min(1),
  parallelBuildCount: z.number().int().positive().default(() => resolveParallelBuildCount()),
  targetArch: z.string().min(1).default(process.arch),
  /** Parts allowed to overwrite (or be overwritten by) other parts' staged files. */
  allowOverwrite: z.array(PartName).default([]),
  overlay: OverlayOptions.default({ enabled: false }),
  /** Upper bound on actions executed at the same time. */
  concurrency: z.number().int().positive().default(1),
  /** Extra variables exported to every step script. */
  environment: z.record(z.string(), z.string()).default({})
});

export type ProjectOptionsInput = z.input<typeof ProjectOptionsSchema>;
export type ProjectOptions = z.infer<typeof ProjectOptionsSchema>;
