import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';

import { ProjectFileError } from '../src/core/errors.js';
import { loadProjectFile } from '../src/core/project/loader.js';
import { tempDir } from './helpers.js';

async function projectFile(content: string): Promise<string> {
  const path = join(await tempDir('loader'), 'parts.yaml');
  await writeFile(path, content, 'utf8');
  return path;
}

async function loadError(path: string): Promise<ProjectFileError> {
  try {
    await loadProjectFile(path);
  } catch (err) {
    if (err instanceof ProjectFileError) return err;
    throw err;
  }
  throw new Error('expected the project file to be rejected');
}

describe('loadProjectFile', () => {
  it('reads parts keyed by name and the project options', async () => {
    const path = await projectFile(
      [
        'parts:',
        '  hello:',
        '    plugin: dump',
        '    source:',
        '      location: src/hello',
        '    stage: [bin]',
        '  app:',
        '    plugin: make',
        '    after: [hello]',
        '    properties:',
        '      make-parameters: [PREFIX=/usr]',
        'options:',
        '  allowOverwrite: [app]',
        '  overlay:',
        '    enabled: true',
        ''
      ].join('\n')
    );

    const project = await loadProjectFile(path);

    expect(project.path).toBe(path);
    expect(project.projectDir).toBe(join(path, '..'));
    expect(project.parts).toEqual([
      {
        name: 'hello',
        plugin: 'dump',
        after: [],
        source: { type: 'local', location: 'src/hello' },
        properties: {},
        stage: ['bin'],
        prime: ['**'],
        organize: {},
        overrides: {},
        buildEnvironment: []
      },
      {
        name: 'app',
        plugin: 'make',
        after: ['hello'],
        properties: { 'make-parameters': ['PREFIX=/usr'] },
        stage: ['**'],
        prime: ['**'],
        organize: {},
        overrides: {},
        buildEnvironment: []
      }
    ]);
    expect(project.options).toEqual({ allowOverwrite: ['app'], overlay: { enabled: true } });
  });

  it('reports a missing file', async () => {
    const path = join(await tempDir('loader'), 'parts.yaml');
    const err = await loadError(path);
    expect(err.brief).toBe(`Invalid project file '${path}'.`);
    expect(err.details).toBe('The file does not exist.');
  });

  it('reports schema problems with their location', async () => {
    const err = await loadError(await projectFile('parts:\n  hello:\n    after: hello-deps\nbogus: 1\n'));
    expect(err.details).toBe(["- parts.hello.after: Expected array, received string", "- (root): Unrecognized key(s) in object: 'bogus'"].join('\n'));
  });

  it('treats an empty file as missing its parts', async () => {
    const err = await loadError(await projectFile(''));
    expect(err.details).toBe('- parts: Required');
  });

  it('reports YAML syntax errors', async () => {
    const err = await loadError(await projectFile('parts: [\n'));
    expect(err.brief).toMatch(/^Invalid project file '.*parts\.yaml'\.$/);
    expect(err.details).not.toBe('');
  });
});
