import { z } from 'zod';

import { ActionReasonSchema } from '../actions.js';
import { TimestampIso } from '../state/types.js';
import { StepSchema } from '../steps.js';

export const JournalEventType = z.enum([
  'run_started',
  'action_started',
  'action_completed',
  'action_failed',
  'run_completed',
  'run_failed',
  'run_cancelled',
  'step_cleaned'
]);

export type JournalEventType = z.infer<typeof JournalEventType>;

const ActionRef = z.object({
  part: z.string(),
  step: StepSchema,
  reason: ActionReasonSchema,
  type: z.enum(['run', 'rerun'])
});

const Envelope = {
  seq: z.number().int().positive(),
  timestamp: TimestampIso,
  runId: z.string().optional()
};

export const RunStartedEvent = z.object({
  ...Envelope,
  type: z.literal('run_started'),
  data: z.object({ actions: z.number().int().nonnegative() })
});

export const ActionStartedEvent = z.object({
  ...Envelope,
  type: z.literal('action_started'),
  data: ActionRef
});

export const ActionCompletedEvent = z.object({
  ...Envelope,
  type: z.literal('action_completed'),
  data: ActionRef.extend({ durationMs: z.number().nonnegative(), fingerprint: z.string() })
});

export const ActionFailedEvent = z.object({
  ...Envelope,
  type: z.literal('action_failed'),
  data: ActionRef.extend({ durationMs: z.number().nonnegative(), error: z.string() })
});

export const RunFinishedEvent = z.object({
  ...Envelope,
  type: z.enum(['run_completed', 'run_failed', 'run_cancelled']),
  data: z.object({ completed: z.number().int().nonnegative(), failed: z.number().int().nonnegative(), error: z.string().optional() })
});

export const StepCleanedEvent = z.object({
  ...Envelope,
  type: z.literal('step_cleaned'),
  data: z.object({ part: z.string(), step: StepSchema })
});

export const JournalEntrySchema = z.discriminatedUnion('type', [
  RunStartedEvent,
  ActionStartedEvent,
  ActionCompletedEvent,
  ActionFailedEvent,
  RunFinishedEvent,
  StepCleanedEvent
]);

export type JournalEntry = z.infer<typeof JournalEntrySchema>;

type WithoutEnvelope<T> = T extends unknown ? Omit<T, 'seq' | 'timestamp'> : never;

export type JournalEntryInput = WithoutEnvelope<JournalEntry>;
