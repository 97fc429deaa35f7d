import { z } from 'zod';
import { ConfigError } from './errors';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const emptyToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const onOff = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => ['on', 'off', 'true', 'false', '1', '0'].includes(value), {
    message: 'expected on/off, true/false or 1/0',
  })
  .transform((value) => value === 'on' || value === 'true' || value === '1');

const intSetting = (min: number, max: number, fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));

const EnvSchema = z.object({
  SKYGUARD_WIDTH: intSetting(200, 4000, 800),
  SKYGUARD_HEIGHT: intSetting(200, 4000, 600),
  SKYGUARD_FPS: intSetting(1, 240, 60),
  SKYGUARD_SEED: z.preprocess(emptyToUndefined, z.coerce.number().int().nonnegative().optional()),
  SKYGUARD_SOUND: z.preprocess(emptyToUndefined, onOff.default('on')),
  SKYGUARD_KEY_HOLD_MS: intSetting(16, 1000, 180),
  LOG_LEVEL: z.preprocess(emptyToUndefined, z.enum(LOG_LEVELS).default('info')),
  SKYGUARD_LOG_FILE: z.preprocess(emptyToUndefined, z.string().trim().optional()),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface GameConfig {
  width: number;
  height: number;
  targetFps: number;
  seed?: number;
  sound: boolean;
  keyHoldMs: number;
  logLevel: LogLevel;
  logFile?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GameConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  const data = parsed.data;
  return {
    width: data.SKYGUARD_WIDTH,
    height: data.SKYGUARD_HEIGHT,
    targetFps: data.SKYGUARD_FPS,
    seed: data.SKYGUARD_SEED,
    sound: data.SKYGUARD_SOUND,
    keyHoldMs: data.SKYGUARD_KEY_HOLD_MS,
    logLevel: data.LOG_LEVEL,
    logFile: data.SKYGUARD_LOG_FILE,
  };
}
