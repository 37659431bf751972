import { z } from 'zod';

export const ConfigUpdateBody = z
  .object({
    min_cycle: z.coerce.number().int().positive(),
    max_cycle: z.coerce.number().int().positive(),
    min_strength: z.coerce.number().finite(),
    max_strength: z.coerce.number().finite(),
  })
  .refine((b) => b.min_cycle <= b.max_cycle, {
    message: 'min_cycle must not exceed max_cycle',
    path: ['min_cycle'],
  })
  .refine((b) => b.min_strength <= b.max_strength, {
    message: 'min_strength must not exceed max_strength',
    path: ['min_strength'],
  });

export type ConfigUpdate = z.infer<typeof ConfigUpdateBody>;
