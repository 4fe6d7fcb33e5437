import { z } from 'zod';
import { submissionStatusValues } from '@tasflow/domain';

const positiveId = z.number().int().positive();

export const outboxTaskPayloadSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('video_sync'),
    publicationId: positiveId,
    url: z.string().url(),
  }),
  z.object({
    kind: z.literal('grant_publication_roles'),
    authorIds: z.array(positiveId),
    publicationTitle: z.string().min(1),
  }),
  z.object({
    kind: z.literal('notify_publication'),
    submissionId: positiveId,
    publicationId: positiveId,
  }),
  z.object({
    kind: z.literal('notify_dormant'),
    submissionId: positiveId,
    status: z.enum(submissionStatusValues),
  }),
]);

export type OutboxTaskPayload = z.infer<typeof outboxTaskPayloadSchema>;
export type OutboxTaskKind = OutboxTaskPayload['kind'];

/** `running` tasks are claimed by one dispatcher until done, failed or stale. */
export type OutboxTaskState = 'pending' | 'running' | 'done' | 'failed';

export type OutboxTask = Readonly<{
  id: number;
  payload: OutboxTaskPayload;
  state: OutboxTaskState;
  attempts: number;
  lastError: string | null;
  createdAt: Date;
  updatedAt: Date;
}>;

export const decodeOutboxPayload = (value: unknown): OutboxTaskPayload => {
  const raw: unknown = typeof value === 'string' ? JSON.parse(value) : value;
  return outboxTaskPayloadSchema.parse(raw);
};

export const encodeOutboxPayload = (payload: OutboxTaskPayload): string =>
  JSON.stringify(outboxTaskPayloadSchema.parse(payload));
