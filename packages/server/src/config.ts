// Server configuration from environment variables
//
// Parsed once at startup. Empty variables count as unset.

import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigurationError } from '@rvlink/runtime';
import type { LogLevel } from '@rvlink/runtime';

const CONFIG_DIRECTORY = fileURLToPath(new URL('../../../config/', import.meta.url));

export type BusKind = 'socketcan' | 'replay' | 'virtual';

export type ServerConfig = {
  port: number;
  host: string;
  logLevel: LogLevel;
  specificationPath: string;
  mappingDirectory: string;
  model?: string;
  interfaces: string[];
  bus: BusKind;
  replayFile?: string;

  /** Playback speed for the replay bus; 0 replays as fast as possible */
  replaySpeed: number;

  databaseUrl?: string;
  subscriberQueueCapacity: number;
};

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(8000),
    HOST: z.string().default('0.0.0.0'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    RVC_SPEC_PATH: z.string().default(`${CONFIG_DIRECTORY}rvc-spec.json`),
    RVC_MAPPING_DIR: z.string().default(CONFIG_DIRECTORY),
    RVC_MODEL: z.string().optional(),
    CAN_INTERFACES: z
      .string()
      .default('can0')
      .transform((value) =>
        value
          .split(',')
          .map((name) => name.trim())
          .filter((name) => name.length > 0)
      )
      .pipe(z.array(z.string()).min(1, 'at least one interface is required')),
    CAN_BUS: z.enum(['socketcan', 'replay', 'virtual']).default('socketcan'),
    CAN_REPLAY_FILE: z.string().optional(),
    CAN_REPLAY_SPEED: z.coerce.number().min(0).default(1),
    DATABASE_URL: z.string().url().optional(),
    SUBSCRIBER_QUEUE_CAPACITY: z.coerce.number().int().min(1).default(256),
  })
  .superRefine((env, ctx) => {
    if (env.CAN_BUS === 'replay' && !env.CAN_REPLAY_FILE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CAN_REPLAY_FILE'],
        message: 'is required when CAN_BUS is replay',
      });
    }
  });

/**
 * Parse the server configuration.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined>): ServerConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = EnvSchema.safeParse(present);

  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    host: values.HOST,
    logLevel: values.LOG_LEVEL,
    specificationPath: values.RVC_SPEC_PATH,
    mappingDirectory: values.RVC_MAPPING_DIR,
    model: values.RVC_MODEL,
    interfaces: values.CAN_INTERFACES,
    bus: values.CAN_BUS,
    replayFile: values.CAN_REPLAY_FILE,
    replaySpeed: values.CAN_REPLAY_SPEED,
    databaseUrl: values.DATABASE_URL,
    subscriberQueueCapacity: values.SUBSCRIBER_QUEUE_CAPACITY,
  };
}
