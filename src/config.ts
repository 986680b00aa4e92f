import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ValidationError } from './errors';
import { MAX_PERMISSIONS, MAX_USERNAME_BYTES } from './handshake';

export const DEFAULT_COMMAND_TIMEOUT = 10; // seconds
export const DEFAULT_RECONNECT_LIMIT = 10;
export const DEFAULT_HANDSHAKE_TIMEOUT = 5000; // ms
export const MAX_TIMER_DELAY = 0x7fffffff; // ms, largest delay setTimeout honours

export const clientOptionsSchema = z.object({
  host: z.string().trim().min(1),
  port: z.number().int().min(1).max(65535),
  password: z.string().min(1),
  permissions: z.bigint().min(0n).max(MAX_PERMISSIONS).default(MAX_PERMISSIONS),
  kickPower: z.number().int().min(0).max(0xff).default(0xff),
  username: z
    .string()
    .refine((value) => Buffer.byteLength(value, 'utf-8') <= MAX_USERNAME_BYTES, {
      message: `must not exceed ${MAX_USERNAME_BYTES} UTF-8 bytes`,
    })
    .optional(),
  suppressCommandResponses: z.boolean().default(false),
  subscribeConsole: z.boolean().default(false),
  subscribeLogs: z.boolean().default(false),
  handshakeTimeout: z
    .number()
    .int()
    .positive()
    .max(MAX_TIMER_DELAY)
    .default(DEFAULT_HANDSHAKE_TIMEOUT),
  reconnectLimit: z.number().int().min(0).default(DEFAULT_RECONNECT_LIMIT),
  reconnectDelay: z.number().int().min(0).max(MAX_TIMER_DELAY).default(0),
});

export type ClientOptionsInput = z.input<typeof clientOptionsSchema>;
export type ClientConfig = z.output<typeof clientOptionsSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * @throws {ValidationError} When any option is missing or out of range.
 */
export function parseClientOptions(input: unknown): ClientConfig {
  const result = clientOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(`Invalid client options: ${formatIssues(result.error)}`);
  }
  return result.data;
}

const integer = z
  .string()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .transform((value) => Number(value));

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  QUERY_HOST: z.string(),
  QUERY_PORT: integer,
  QUERY_PASSWORD: z.string(),
  QUERY_PERMISSIONS: z
    .string()
    .regex(/^\d+$/, 'must be a non-negative integer')
    .transform((value) => BigInt(value))
    .optional(),
  QUERY_KICK_POWER: integer.optional(),
  QUERY_USERNAME: z.string().optional(),
  QUERY_SUPPRESS_RESPONSES: flag.optional(),
  QUERY_SUBSCRIBE_CONSOLE: flag.optional(),
  QUERY_SUBSCRIBE_LOGS: flag.optional(),
  QUERY_HANDSHAKE_TIMEOUT: integer.optional(),
  QUERY_RECONNECT_LIMIT: integer.optional(),
  QUERY_RECONNECT_DELAY: integer.optional(),
});

export interface LoadOptions {
  /**
   * Variables to read. When omitted, a `.env` file is loaded into `process.env` first.
   */
  env?: NodeJS.ProcessEnv;
  /**
   * Path of the `.env` file, defaults to dotenv's lookup in the working directory.
   */
  dotenvPath?: string;
}

/**
 * Build client options from `QUERY_*` environment variables.
 *
 * @example
 * ```ts
 * const client = new QueryClient({ ...loadClientOptions(), logger });
 * ```
 */
export function loadClientOptions({ env, dotenvPath }: LoadOptions = {}): ClientConfig {
  let source = env;
  if (!source) {
    dotenv.config(dotenvPath ? { path: dotenvPath } : undefined);
    source = process.env;
  }

  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new ValidationError(`Invalid environment: ${formatIssues(result.error)}`);
  }
  const vars = result.data;

  return parseClientOptions({
    host: vars.QUERY_HOST,
    port: vars.QUERY_PORT,
    password: vars.QUERY_PASSWORD,
    permissions: vars.QUERY_PERMISSIONS,
    kickPower: vars.QUERY_KICK_POWER,
    username: vars.QUERY_USERNAME,
    suppressCommandResponses: vars.QUERY_SUPPRESS_RESPONSES,
    subscribeConsole: vars.QUERY_SUBSCRIBE_CONSOLE,
    subscribeLogs: vars.QUERY_SUBSCRIBE_LOGS,
    handshakeTimeout: vars.QUERY_HANDSHAKE_TIMEOUT,
    reconnectLimit: vars.QUERY_RECONNECT_LIMIT,
    reconnectDelay: vars.QUERY_RECONNECT_DELAY,
  });
}
