import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5050),
  API_SETTINGS_PATH: z.string().optional(),
  GEOCODER_PROVIDER: z.enum(['regions', 'nominatim']).default('regions'),
  GEOCODER_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  NOMINATIM_URL: z.string().url().default('https://nominatim.openstreetmap.org'),
  // overrides dataSources.landPriceApi.enabled from the settings file
  LAND_PRICE_API_ENABLED: booleanFlag.optional()
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment configuration: ${parsed.error.message}`);
  }
  return parsed.data;
}
