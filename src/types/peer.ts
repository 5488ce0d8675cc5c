import { z } from 'zod';

export const PeerStatus = z.enum(['online', 'offline']);
export type PeerStatus = z.infer<typeof PeerStatus>;

/** Presence record a machine publishes about itself. */
export const PeerRecordSchema = z.object({
  id: z.string().min(1),
  status: PeerStatus,
  lastSeen: z.string().datetime(),
  /** pending + in_progress tasks owned by this machine at lastSeen */
  load: z.number().int().nonnegative(),
  descriptor: z.string().optional(),
});

export type PeerRecord = z.infer<typeof PeerRecordSchema>;

export interface PeerLoad {
  id: string;
  load: number;
}
