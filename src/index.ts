export {
  LifecycleManager,
  type ActionResult,
  type ActionStatus,
  type ExecuteOptions,
  type LifecycleManagerOptions,
  type RunEvent,
  type RunOutcome
} from './core/lifecycle-manager.js';
export type { Invalidation, PlanOptions, StepStatus, StepStatusKind } from './core/planner.js';
export { HookRegistry, type HookPoint, type RunCallback, type RunInfo, type StepCallback, type StepInfo } from './core/hooks.js';
export { actionKey, describeAction, type Action, type ActionReason, type ActionType } from './core/actions.js';
export { STEPS, StepSchema, isStep, lifecycleSteps, dependencyPrerequisiteStep, type Step, type StepOptions } from './core/steps.js';
export {
  PartDefinitionSchema,
  PermissionSchema,
  ProjectOptionsSchema,
  type PartDefinition,
  type PartDefinitionInput,
  type Permission,
  type ProjectOptions,
  type ProjectOptionsInput
} from './core/parts/types.js';
export type { PartGraph, ResolvedPart } from './core/parts/graph.js';
export * from './core/errors.js';
export type { Plugin, PluginContext, SourceContext, SourceHandler, SourceSnapshot } from './core/plugins/types.js';
export { PluginRegistry } from './core/plugins/registry.js';
export { parsePluginProperties } from './core/plugins/properties.js';
export { NilPlugin } from './core/plugins/nil.js';
export { DumpPlugin } from './core/plugins/dump.js';
export { MakePlugin, MakeProperties } from './core/plugins/make.js';
export { SourceRegistry } from './core/sources/registry.js';
export { LocalSource } from './core/sources/local.js';
export type { StepState, DirtyMarker, FingerprintInputs } from './core/state/types.js';
export type { ScriptInvocation, ScriptRunner } from './core/executor/step-runner.js';
export { ShellScriptRunner, ScriptError } from './core/executor/step-runner.js';
export { JournalReader } from './core/journal/reader.js';
export type { JournalEntry, JournalEventType } from './core/journal/types.js';
export { loadProjectFile, type ProjectFile } from './core/project/loader.js';
export { Logger, quietLogger, type LogLevel, type LoggerOptions } from './utils/logger.js';
