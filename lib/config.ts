import { z } from 'zod';

export const DEFAULT_PORT = 8080;
export const DEFAULT_RECORDS_BLOB = 'baby_growth_data.csv';
export const DEFAULT_REFERENCE_BLOB = 'tab_wfa_girls_p_0_13.csv';

export interface AppConfig {
  storage: {
    connectionString: string;
    containerName: string;
  };
  port: number;
  recordsBlob: string;
  referenceBlob: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

const requiredSetting = (name: string) =>
  z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);

const envSchema = z.object({
  AZURE_STORAGE_CONNECTION_STRING: requiredSetting('AZURE_STORAGE_CONNECTION_STRING'),
  AZURE_CONTAINER_NAME: requiredSetting('AZURE_CONTAINER_NAME'),
  PORT: z.coerce
    .number({ invalid_type_error: 'PORT must be a number' })
    .int('PORT must be an integer')
    .min(1, 'PORT must be between 1 and 65535')
    .max(65535, 'PORT must be between 1 and 65535')
    .default(DEFAULT_PORT),
  GROWTH_RECORDS_BLOB: z.string().trim().min(1).default(DEFAULT_RECORDS_BLOB),
  REFERENCE_CURVES_BLOB: z.string().trim().min(1).default(DEFAULT_REFERENCE_BLOB),
});

// Empty strings count as unset so a blank line in .env falls back to the default
function withoutBlanks(env: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }
  return result;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => issue.message));
  }

  const settings = parsed.data;
  return {
    storage: {
      connectionString: settings.AZURE_STORAGE_CONNECTION_STRING,
      containerName: settings.AZURE_CONTAINER_NAME,
    },
    port: settings.PORT,
    recordsBlob: settings.GROWTH_RECORDS_BLOB,
    referenceBlob: settings.REFERENCE_CURVES_BLOB,
  };
}
