import { dirname, resolve } from 'node:path';
import { YAMLParseError } from 'yaml';
import { z } from 'zod';

import { isNotFound, readYaml } from '../../utils/fs.js';
import { ProjectFileError } from '../errors.js';
import { PartDefinitionSchema, ProjectOptionsSchema, type PartDefinition } from '../parts/types.js';

const FileOptionsSchema = ProjectOptionsSchema.omit({ projectDir: true }).partial();

/**
 * `parts.yaml`: parts keyed by name, plus optional project options. The project directory is
 * the directory holding the file.
 */
export const ProjectFileSchema = z
  .object({
    parts: z.record(z.string(), PartDefinitionSchema.omit({ name: true })),
    options: FileOptionsSchema.default({})
  })
  .strict();

export type FileOptions = z.infer<typeof FileOptionsSchema>;

export interface ProjectFile {
  path: string;
  projectDir: string;
  parts: PartDefinition[];
  options: FileOptions;
}

export async function loadProjectFile(path: string): Promise<ProjectFile> {
  const abs = resolve(path);
  let raw: unknown;
  try {
    raw = await readYaml(abs);
  } catch (err) {
    if (isNotFound(err)) throw new ProjectFileError(abs, 'The file does not exist.');
    if (err instanceof YAMLParseError) throw new ProjectFileError(abs, err.message);
    throw err;
  }

  const parsed = ProjectFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `- ${i.path.join('.') || '(root)'}: ${i.message}`).join('\n');
    throw new ProjectFileError(abs, details);
  }

  const parts = Object.entries(parsed.data.parts).map(([name, body]) => ({ ...body, name }));
  return { path: abs, projectDir: dirname(abs), parts, options: parsed.data.options };
}
