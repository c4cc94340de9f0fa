import { z } from 'zod';
import { safe } from '@tabula/core';

/**
 * Actor record as the host hands it to scripts.
 * `fatigue` and `gains` are fractions in [0, 1]; `weight` is the 0-100 body slider.
 */
export const ActorSchema = z.object({
  name: z.string().min(1),
  weight: z.number().min(0).max(100),
  fatigue: z.number().min(0).max(1),
  gains: z.number().min(0).max(1),
  lastTrained: z.number().nonnegative(),
  stats: z.object({
    stamina: z.number().min(0).max(100),
    health: z.number().min(0).max(100)
  })
});

export type Actor = z.infer<typeof ActorSchema>;

/**
 * Validate raw host data; a malformed record comes back as Left
 */
export const parseActor = safe((raw: unknown): Actor => ActorSchema.parse(raw));
