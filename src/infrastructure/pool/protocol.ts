import { z } from 'zod';

/**
 * IPC messages between the process pool and its worker processes
 */

const ClassificationResultSchema = z.object({
  item: z.string(),
  predictedLabel: z.string(),
  scores: z.record(z.number()),
});

export const JobOutcomeSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('completed'), results: z.array(ClassificationResultSchema), log: z.string() }),
  z.object({ status: z.literal('failed'), error: z.string(), log: z.string() }),
  z.object({ status: z.literal('aborted'), log: z.string() }),
]);

export const ParentMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('run'),
    jobId: z.string(),
    items: z.array(z.string()),
    categories: z.array(z.string()),
  }),
  z.object({ type: z.literal('cancel'), jobId: z.string() }),
  z.object({ type: z.literal('shutdown') }),
]);

export const ChildMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ready'), pid: z.number().int() }),
  z.object({ type: z.literal('progress'), jobId: z.string(), processed: z.number().int().nonnegative() }),
  z.object({ type: z.literal('done'), jobId: z.string(), outcome: JobOutcomeSchema }),
]);

export type ParentMessage = z.infer<typeof ParentMessageSchema>;
export type ChildMessage = z.infer<typeof ChildMessageSchema>;
