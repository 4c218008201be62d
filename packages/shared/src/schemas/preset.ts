import { z } from 'zod';
import { RawInputsSchema } from './blueprint.js';

/** A preset file; its id comes from the file name. */
export const PresetFileSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  icon: z.string().optional(),
  apps: z.array(z.string().min(1)).min(1, 'a preset needs at least one app'),
});

/** Per-app raw inputs for applying a preset, keyed by app name. */
export const PresetInputsSchema = z.record(z.string(), RawInputsSchema);
