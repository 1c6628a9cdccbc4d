import type { HookPoint } from './hooks.js';
import type { Step } from './steps.js';

/**
 * Base class for every failure the engine reports to callers.
 *
 * `brief` is a one-line summary, `details` carries the specifics and `resolution` a hint for
 * the user. `toString()` joins the three so CLI output and logs read the same.
 */
export class PartsError extends Error {
  readonly brief: string;
  readonly details?: string;
  readonly resolution?: string;

  constructor(args: { brief: string; details?: string; resolution?: string; cause?: unknown }) {
    super([args.brief, args.details].filter(Boolean).join('\n'), args.cause === undefined ? undefined : { cause: args.cause });
    this.name = new.target.name;
    this.brief = args.brief;
    this.details = args.details;
    this.resolution = args.resolution;
  }

  override toString(): string {
    return [this.brief, this.details, this.resolution].filter(Boolean).join('\n');
  }
}

// ── Pre-execution: graph ────────────────────────────────────────────────────

export class GraphError extends PartsError {}

export class CycleError extends GraphError {
  constructor(readonly partNames: string[]) {
    super({
      brief: 'A circular dependency chain was detected.',
      details: `Parts involved: ${partNames.map((n) => `'${n}'`).join(', ')}`,
      resolution: 'Review the parts definition to remove dependency cycles.'
    });
  }
}

export class UnknownDependencyError extends GraphError {
  constructor(
    readonly partName: string,
    readonly dependencyName: string
  ) {
    super({
      brief: `Part '${partName}' depends on '${dependencyName}', which is not defined.`,
      resolution: "Check the part's 'after' list."
    });
  }
}

export class DuplicatePartError extends GraphError {
  constructor(readonly partName: string) {
    super({
      brief: `Part '${partName}' is defined more than once.`,
      resolution: 'Part names must be unique.'
    });
  }
}

export class UnknownPartError extends GraphError {
  constructor(readonly partName: string) {
    super({
      brief: `A part named '${partName}' is not defined in the parts list.`,
      resolution: "Review the parts definition and make sure it's correct."
    });
  }
}

export class PartDefinitionError extends PartsError {
  constructor(problems: string[], subject: 'part definitions' | 'project options' = 'part definitions') {
    super({
      brief: `Invalid ${subject}.`,
      details: problems.map((p) => `- ${p}`).join('\n'),
      resolution: 'Review the parts definition and make sure it conforms to the schema.'
    });
  }
}

// ── Pre-execution: plugins and properties ──────────────────────────────────

export class PluginResolutionError extends PartsError {
  constructor(
    readonly partName: string,
    readonly kind: string,
    what: 'plugin' | 'source type' = 'plugin'
  ) {
    super({
      brief: `Part '${partName}' uses ${what} '${kind}', which is not registered.`,
      resolution: what === 'plugin' ? 'Use one of the registered plugins or register a custom plugin.' : 'Use a registered source type.'
    });
  }
}

/** A single part's property violation, raised by `Plugin.validateProperties`. */
export class PluginPropertyError extends PartsError {
  constructor(
    readonly partName: string,
    readonly problems: string[]
  ) {
    super({
      brief: `Invalid properties for part '${partName}'.`,
      details: problems.map((p) => `- ${p}`).join('\n')
    });
  }
}

/** Aggregates every offending part so the user sees all violations in one run. */
export class PropertyValidationError extends PartsError {
  constructor(readonly errors: PluginPropertyError[]) {
    super({
      brief: `Part property validation failed for ${errors.map((e) => `'${e.partName}'`).join(', ')}.`,
      details: errors.map((e) => e.toString()).join('\n'),
      resolution: 'Fix the part properties and run again.'
    });
  }
}

// ── Execution ──────────────────────────────────────────────────────────────

export class StepExecutionError extends PartsError {
  constructor(
    readonly part: string,
    readonly step: Step,
    cause: unknown,
    details?: string
  ) {
    super({
      brief: `Failed to run the ${step} step for part '${part}'.`,
      details: details ?? describeCause(cause),
      resolution: 'Check the output above; partial outputs are kept for inspection and the step will be retried on the next run.',
      cause
    });
  }
}

export class DependencyNotReadyError extends StepExecutionError {
  constructor(part: string, step: Step, readonly dependency: string, readonly dependencyStep: Step) {
    super(part, step, undefined, `Dependency '${dependency}' has not completed its ${dependencyStep} step.`);
  }
}

export class ConflictError extends PartsError {
  constructor(
    readonly part: string,
    readonly otherPart: string | null,
    readonly paths: string[]
  ) {
    const other = otherPart ?? '(unowned)';
    super({
      brief: `Failed to stage: parts '${part}' and '${other}' have the following files, but with different contents or permissions:`,
      details: paths.map((p) => `    ${p}`).join('\n'),
      resolution: "Make the files identical, exclude them from one part's stage fileset, or list one of the parts in allowOverwrite."
    });
  }
}

export class FileOrganizeError extends PartsError {
  constructor(
    readonly part: string,
    message: string
  ) {
    super({
      brief: `Failed to organize part '${part}': ${message}.`,
      resolution: "Review the part's 'organize' mapping."
    });
  }
}

export class CancelledError extends PartsError {
  constructor() {
    super({ brief: 'The run was cancelled.' });
  }
}

// ── State ──────────────────────────────────────────────────────────────────

/** Never escapes the state store: unreadable state is reported and treated as absent. */
export class StateCorruptionError extends PartsError {
  constructor(
    readonly path: string,
    reason: string
  ) {
    super({
      brief: `Unreadable state file '${path}'.`,
      details: reason,
      resolution: 'The step will run again.'
    });
  }
}

// ── Callbacks ──────────────────────────────────────────────────────────────

export class CallbackRegistrationError extends PartsError {
  constructor(point: HookPoint, name: string) {
    super({ brief: `The ${point} callback '${name || 'anonymous'}' is already registered.` });
  }
}

/** A prologue or epilogue callback that threw. Step callbacks fail their step instead. */
export class CallbackError extends PartsError {
  constructor(
    readonly point: HookPoint,
    cause: unknown
  ) {
    super({ brief: `The ${point} callback failed.`, details: describeCause(cause), cause });
  }
}

// ── Project file (CLI loader) ──────────────────────────────────────────────

export class ProjectFileError extends PartsError {
  constructor(
    readonly path: string,
    details: string
  ) {
    super({
      brief: `Invalid project file '${path}'.`,
      details,
      resolution: 'Review the YAML file and make sure it conforms to the schema.'
    });
  }
}

export function describeCause(cause: unknown): string | undefined {
  if (cause === undefined || cause === null) return undefined;
  if (cause instanceof PartsError) return cause.toString();
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
