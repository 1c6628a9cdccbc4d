import { z } from 'zod';

import { ActionReasonSchema } from '../actions.js';
import { StepSchema } from '../steps.js';

export const STATE_FORMAT_VERSION = 1;

export const TimestampIso = z
  .string()
  .refine((s) => !Number.isNaN(Date.parse(s)), { message: 'timestamp must be ISO datetime' });

export const FingerprintInputsSchema = z.object({
  /** Part properties of interest to the step, kept verbatim for change explanations. */
  properties: z.record(z.string(), z.unknown()),
  /** Project options of interest to the step. */
  options: z.record(z.string(), z.unknown()),
  /** Source identity; pull only. */
  source: z.string().nullable(),
  /** Fingerprint of the same part's previous step. */
  previous: z.string().nullable(),
  /** `"<part>:<step>"` of every consumed dependency state, mapped to its fingerprint. */
  dependencies: z.record(z.string(), z.string())
});

export type FingerprintInputs = z.infer<typeof FingerprintInputsSchema>;

export const DirtyMarkerSchema = z.object({
  reason: ActionReasonSchema,
  cause: z.string()
});

export type DirtyMarker = z.infer<typeof DirtyMarkerSchema>;

export const StepStateSchema = z.object({
  version: z.literal(STATE_FORMAT_VERSION),
  part: z.string().min(1),
  step: StepSchema,
  fingerprint: z.string().min(1),
  inputs: FingerprintInputsSchema,
  /** Paths the step placed in a shared area (stage, prime, overlay), relative to that area. */
  files: z.array(z.string()),
  directories: z.array(z.string()),
  completedAt: TimestampIso,
  dirty: DirtyMarkerSchema.optional()
});

export type StepState = z.infer<typeof StepStateSchema>;
