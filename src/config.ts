import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const str = z.string().min(1);

export const HostSchema = z.enum(['ticktick.com', 'dida365.com']);

export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'debug']);

export const DEFAULT_TIMEOUT_MS = 30_000;

/** `KEY=` in a dotenv file means unset. */
const unsetIfBlank = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => (typeof v === 'string' && v.trim() === '' ? undefined : v), schema.optional());

export const EnvSchema = z.object({
  // open API (OAuth)
  TICKTICK_CLIENT_ID: unsetIfBlank(str),
  TICKTICK_CLIENT_SECRET: unsetIfBlank(str),
  TICKTICK_REDIRECT_URI: unsetIfBlank(str),
  TICKTICK_ACCESS_TOKEN: unsetIfBlank(str),

  // session API (login)
  TICKTICK_USERNAME: unsetIfBlank(str),
  TICKTICK_PASSWORD: unsetIfBlank(str),
  TICKTICK_DEVICE_ID: unsetIfBlank(str),

  // behavior
  TICKTICK_HOST: unsetIfBlank(HostSchema),
  TICKTICK_TIMEOUT_MS: unsetIfBlank(z.coerce.number().int().positive()),
  TICKTICK_LOG_LEVEL: unsetIfBlank(LogLevelSchema),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

export function readEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = describeIssues(parsed.error);
    throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}

/**
 * Settings consumed by the client. Every field is optional here so that a
 * missing one surfaces as a Configuration error when the client opens.
 */
export interface TickTickSettings {
  clientId?: string;
  clientSecret?: string;
  redirectUri?: string;
  accessToken?: string;
  username?: string;
  password?: string;
  deviceId?: string;
  timeoutMs?: number;
  host?: z.infer<typeof HostSchema>;
}

export const SettingsSchema = z.object({
  clientId: str.optional(),
  clientSecret: str.optional(),
  redirectUri: z.string().url().optional(),
  accessToken: str,
  username: str,
  password: str,
  deviceId: z
    .string()
    .regex(/^[0-9a-f]{24}$/, 'must be 24 lowercase hex characters')
    .optional(),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  host: HostSchema.default('ticktick.com'),
});

export type ResolvedSettings = z.infer<typeof SettingsSchema>;

/** Validate settings; every problem is reported in one Configuration error. */
export function resolveSettings(settings: TickTickSettings): ResolvedSettings {
  const parsed = SettingsSchema.safeParse(settings);
  if (!parsed.success) {
    const issues = describeIssues(parsed.error);
    throw new ConfigurationError(`Invalid settings: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}

export function settingsFromEnv(env: EnvConfig = readEnv()): TickTickSettings {
  return {
    clientId: env.TICKTICK_CLIENT_ID,
    clientSecret: env.TICKTICK_CLIENT_SECRET,
    redirectUri: env.TICKTICK_REDIRECT_URI,
    accessToken: env.TICKTICK_ACCESS_TOKEN,
    username: env.TICKTICK_USERNAME,
    password: env.TICKTICK_PASSWORD,
    deviceId: env.TICKTICK_DEVICE_ID,
    timeoutMs: env.TICKTICK_TIMEOUT_MS,
    host: env.TICKTICK_HOST,
  };
}

export function doctorReport(env: EnvConfig = readEnv()) {
  const missing: string[] = [];
  const notes: string[] = [];

  if (!env.TICKTICK_ACCESS_TOKEN) {
    missing.push('TICKTICK_ACCESS_TOKEN');
    if (!env.TICKTICK_CLIENT_ID) missing.push('TICKTICK_CLIENT_ID');
    if (!env.TICKTICK_CLIENT_SECRET) missing.push('TICKTICK_CLIENT_SECRET');
    notes.push('Open API: run `npm run oauth` with client id/secret set to obtain TICKTICK_ACCESS_TOKEN.');
  }
  if (!env.TICKTICK_USERNAME) missing.push('TICKTICK_USERNAME');
  if (!env.TICKTICK_PASSWORD) missing.push('TICKTICK_PASSWORD');

  if (!env.TICKTICK_DEVICE_ID) notes.push('Session API: TICKTICK_DEVICE_ID optional (random per run otherwise).');
  notes.push('Session API: accounts with two-factor authentication cannot log in.');

  return {
    host: env.TICKTICK_HOST ?? 'ticktick.com',
    missing: [...new Set(missing)],
    notes: [...new Set(notes)],
  };
}
