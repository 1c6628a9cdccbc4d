import { availableParallelism } from 'node:os';
import { describe, expect, it } from 'vitest';

import { resolveLogJson, resolveLogLevel, resolveParallelBuildCount, resolveWorkDir } from '../src/config/env.js';

describe('environment configuration', () => {
  it('reads and clamps the parallel build count', () => {
    const count = (value: string) => resolveParallelBuildCount({ PARTWRIGHT_PARALLEL_BUILD_COUNT: value });
    expect(count('8')).toBe(8);
    expect(count('3.7')).toBe(3);
    expect(count('0')).toBe(1);
    expect(count('-4')).toBe(1);
    expect(count('9999')).toBe(512);
    expect(count('many')).toBe(Math.max(1, availableParallelism()));
    expect(resolveParallelBuildCount({})).toBe(Math.max(1, availableParallelism()));
  });

  it('defaults the work directory', () => {
    expect(resolveWorkDir({})).toBe('.partwright');
    expect(resolveWorkDir({ PARTWRIGHT_WORK_DIR: '  ' })).toBe('.partwright');
    expect(resolveWorkDir({ PARTWRIGHT_WORK_DIR: ' out ' })).toBe('out');
  });

  it('accepts known log levels only', () => {
    expect(resolveLogLevel({ PARTWRIGHT_LOG_LEVEL: ' DEBUG ' })).toBe('debug');
    expect(resolveLogLevel({ PARTWRIGHT_LOG_LEVEL: 'loud' })).toBe('info');
    expect(resolveLogLevel({})).toBe('info');
  });

  it('switches JSON logs on with truthy words', () => {
    expect(resolveLogJson({ PARTWRIGHT_LOG_JSON: 'yes' })).toBe(true);
    expect(resolveLogJson({ PARTWRIGHT_LOG_JSON: 'TRUE' })).toBe(true);
    expect(resolveLogJson({ PARTWRIGHT_LOG_JSON: '0' })).toBe(false);
    expect(resolveLogJson({})).toBe(false);
  });
});
