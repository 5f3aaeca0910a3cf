import { z } from 'zod';
import { ControllerClientConfig, QueryOptions } from './types/index.js';

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

export const ConnectionParametersSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, '')),
  username: z.string().min(1),
  password: z.string().min(1),
  site: z.string().min(1).default('default'),
  verifyTls: z.boolean().default(false),
});

const EnvSchema = z.object({
  UNIFI_CONTROLLER_URL: z.string({ required_error: 'Required' }),
  UNIFI_CONTROLLER_USERNAME: z.string({ required_error: 'Required' }),
  UNIFI_CONTROLLER_PASSWORD: z.string({ required_error: 'Required' }),
  UNIFI_CONTROLLER_SITE: z.string().optional(),
  UNIFI_VERIFY_TLS: booleanFlag.default('false'),
  UNIFI_DEBUG: booleanFlag.default('false'),
});

/**
 * Reads connection settings from the environment (populated from `.env` by
 * the CLI through dotenv).
 */
export function loadControllerConfig(env: NodeJS.ProcessEnv = process.env): ControllerClientConfig {
  const parsedEnv = EnvSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new ConfigurationError(formatIssues(parsedEnv.error));
  }

  const vars = parsedEnv.data;
  const params = ConnectionParametersSchema.safeParse({
    baseUrl: vars.UNIFI_CONTROLLER_URL,
    username: vars.UNIFI_CONTROLLER_USERNAME,
    password: vars.UNIFI_CONTROLLER_PASSWORD,
    site: vars.UNIFI_CONTROLLER_SITE || undefined,
    verifyTls: vars.UNIFI_VERIFY_TLS,
  });
  if (!params.success) {
    throw new ConfigurationError(formatIssues(params.error));
  }

  return { ...params.data, debug: vars.UNIFI_DEBUG };
}

// ============================================================================
// Query Options
// ============================================================================

const count = z
  .string()
  .trim()
  .min(1, 'Expected a number')
  .pipe(z.coerce.number().int().nonnegative())
  .optional();
const macAddress = z
  .string()
  .trim()
  .regex(/^([0-9a-f]{2}[:-]){5}[0-9a-f]{2}$/i, 'Expected a MAC address')
  .optional();
const identifier = z.string().trim().min(1).optional();

const QueryOptionsSchema = z
  .object({
    since: count,
    startNum: count,
    limitNum: count,
    startEpoch: count,
    endEpoch: count,
    createdTime: count,
    deviceMac: macAddress,
    clientMac: macAddress,
    networkId: identifier,
    wlanId: identifier,
  })
  .strict();

export function parseQueryOptions(input: Record<string, string | undefined>): QueryOptions {
  const result = QueryOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
  return result.data;
}
