import { describe, expect, it } from 'vitest';

import {
  dependencyPrerequisiteStep,
  dependencyTargetFor,
  isStep,
  lifecycleSteps,
  maxStep,
  nextSteps,
  previousStep,
  stepsThrough
} from '../src/core/steps.js';

const plain = { overlay: false };
const layered = { overlay: true };

describe('lifecycle steps', () => {
  it('leaves overlay out unless layered builds are enabled', () => {
    expect(lifecycleSteps(plain)).toEqual(['pull', 'build', 'stage', 'prime']);
    expect(lifecycleSteps(layered)).toEqual(['pull', 'overlay', 'build', 'stage', 'prime']);
  });

  it('navigates between neighbouring steps', () => {
    expect(previousStep('pull', plain)).toBeNull();
    expect(previousStep('build', plain)).toBe('pull');
    expect(previousStep('build', layered)).toBe('overlay');
    expect(nextSteps('build', plain)).toEqual(['stage', 'prime']);
    expect(stepsThrough('stage', plain)).toEqual(['pull', 'build', 'stage']);
    expect(maxStep('stage', 'build')).toBe('stage');
  });

  it('recognises step names', () => {
    expect(isStep('prime')).toBe(true);
    expect(isStep('deploy')).toBe(false);
  });
});

describe('dependency policy', () => {
  it('maps each step to the step its dependencies must reach', () => {
    expect(dependencyPrerequisiteStep('pull', plain)).toBeNull();
    expect(dependencyPrerequisiteStep('overlay', plain)).toBeNull();
    expect(dependencyPrerequisiteStep('overlay', layered)).toBe('overlay');
    expect(dependencyPrerequisiteStep('build', plain)).toBe('stage');
    expect(dependencyPrerequisiteStep('stage', plain)).toBe('stage');
    expect(dependencyPrerequisiteStep('prime', plain)).toBe('prime');
  });

  it('derives the target step dependencies must be brought to', () => {
    expect(dependencyTargetFor('pull', plain)).toBeNull();
    expect(dependencyTargetFor('pull', layered)).toBeNull();
    expect(dependencyTargetFor('overlay', layered)).toBe('overlay');
    expect(dependencyTargetFor('build', plain)).toBe('stage');
    expect(dependencyTargetFor('prime', layered)).toBe('prime');
  });
});
