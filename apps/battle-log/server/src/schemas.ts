import { z } from 'zod';

const optionalText = z
  .string()
  .optional()
  .transform((s) => (s && s.trim() ? s : undefined));

export const overrideQuerySchema = z.object({
  p1_name: optionalText,
  p2_name: optionalText,
  p1_avatar: optionalText,
  p2_avatar: optionalText,
  both_name: optionalText,
  both_avatar: optionalText,
});

export const matchupQuerySchema = overrideQuerySchema.extend({
  matchup: z.string().min(1),
  occurrence: z.coerce.number().int().min(0).default(0),
});

export const listQuerySchema = z.object({
  top: z.coerce.number().int().min(1).default(80),
});

export const battleIndexSchema = z.coerce.number().int().min(0);
