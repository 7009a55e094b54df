import { z } from 'zod';
import { DEFAULT_PATTERN } from '../utils/detect.js';

export const settingsSchema = z.object({
  pattern: z.string().min(1).default(DEFAULT_PATTERN),
  kindPolicy: z.enum(['required', 'infer']).default('required'),
});

export type Settings = z.infer<typeof settingsSchema>;
