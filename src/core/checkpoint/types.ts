// src/core/checkpoint/types.ts
import { z } from 'zod';

/** On-disk shape of the checkpoint file. */
export const CheckpointFileSchema = z.object({
  lastPage: z.number().int().nonnegative(),
  credentialToken: z.string().nullable().optional(),
  failedUploadIds: z.array(z.coerce.string()).default([]),
  failedDistribution: z.record(z.array(z.coerce.string())).default({}),
});

export type CheckpointFile = z.infer<typeof CheckpointFileSchema>;
