import cron from 'node-cron';
import { z } from 'zod';

const settingsSchema = z.object({
  // Default to the mounted volume path in containers.
  DB_PATH: z.string().default('/botdata/rules.db'),
  RESET_CRON: z
    .string()
    .default('0 0 * * *')
    .refine((expr) => cron.validate(expr), { message: 'RESET_CRON is not a valid cron expression' }),
  TZ: z.string().default('America/Chicago'),
  RUN_ONCE: z
    .enum(['0', '1'])
    .default('0')
    .transform((flag) => flag === '1'),
});

export type Settings = z.infer<typeof settingsSchema>;

// Empty variables count as unset, so `DB_PATH=` in .env falls back to the default.
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const parsed = settingsSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}
