import { RPC } from '@common/constants/config';
import { ConfigurationError, errorMessage } from '@common/utils/error-handler';
import type { BindAddress, HealthCheckConfig } from '@types';
import * as yaml from 'js-yaml';
import { z } from 'zod';

const BIND_ADDRESS = /^(?:\[([0-9a-fA-F:.]+)\]|([^:[\]]*)):(\d+)$/;
const MAX_PORT = 65_535;

const isHttpUrl = (value: string): boolean => {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
};

const positiveInt = (field: string) =>
  z
    .number({ invalid_type_error: `${field} must be a number` })
    .int(`${field} must be a whole number`)
    .positive(`${field} must be positive`);

const endpointSchema = z.object({
  name: z.string({ required_error: 'endpoint name is required' }).trim().min(1, 'endpoint name must not be empty'),
  url: z
    .string({ required_error: 'endpoint url is required' })
    .trim()
    .min(1, 'endpoint url must not be empty')
    .refine(isHttpUrl, 'endpoint url must be an http(s) URL'),
});

const configFileSchema = z.object({
  endpoints: z
    .array(endpointSchema, { required_error: 'endpoints are required' })
    .min(1, 'at least one endpoint is required')
    .superRefine((endpoints, ctx) => {
      const seen = new Set<string>();
      endpoints.forEach((endpoint, index) => {
        if (seen.has(endpoint.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, 'name'],
            message: `duplicate endpoint name "${endpoint.name}"`,
          });
        }
        seen.add(endpoint.name);
      });
    }),
  interval: z
    .number({ required_error: 'interval is required', invalid_type_error: 'interval must be a number of minutes' })
    .int('interval must be a whole number of minutes')
    .positive('interval must be a positive number of minutes'),
  method: z.string({ required_error: 'method is required' }).trim().min(1, 'method must not be empty'),
  prometheus: z.object(
    {
      address: z.union([z.string().trim().min(1, 'address must not be empty'), z.number().int()], {
        errorMap: () => ({ message: 'address is required' }),
      }),
    },
    { required_error: 'prometheus section is required' },
  ),
  timeouts: z
    .object({
      probeMs: positiveInt('probeMs').default(RPC.PROBE.DEADLINE_MS),
      connectMs: positiveInt('connectMs').default(RPC.PROBE.CONNECT_TIMEOUT_MS),
    })
    .default({}),
  pool: z
    .object({
      maxIdleSockets: positiveInt('maxIdleSockets').default(RPC.POOL.MAX_IDLE_SOCKETS),
      idleTimeoutMs: positiveInt('idleTimeoutMs').default(RPC.POOL.IDLE_TIMEOUT_MS),
    })
    .default({}),
  checkOnStartup: z.boolean().default(false),
  concurrency: z.enum(['parallel', 'sequential']).default('parallel'),
});

/**
 * Parse a `[host]:port` listen address. An empty host leaves `host` unset so the server listens on every interface.
 */
export function parseBindAddress(address: string): BindAddress {
  const trimmed = address.trim();
  const match = BIND_ADDRESS.exec(/^\d+$/.test(trimmed) ? `:${trimmed}` : trimmed);

  if (!match) {
    throw new ConfigurationError(`Invalid bind address "${address}": expected [host]:port`, 'prometheus.address');
  }

  const port = Number(match[3]);
  if (port < 1 || port > MAX_PORT) {
    throw new ConfigurationError(`Invalid bind address "${address}": port out of range`, 'prometheus.address');
  }

  const host = match[1] ?? match[2];
  return host ? { host, port } : { port };
}

/**
 * Parse and validate the YAML configuration document
 */
export function parseHealthCheckConfig(source: string, origin = 'configuration'): HealthCheckConfig {
  let document: unknown;
  try {
    document = yaml.load(source);
  } catch (error) {
    throw new ConfigurationError(`Error parsing ${origin}: ${errorMessage(error)}`);
  }

  if (document === undefined || document === null) {
    throw new ConfigurationError(`${origin} is empty`);
  }

  const parsed = configFileSchema.safeParse(document);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue.path.join('.');
    throw new ConfigurationError(`Invalid ${origin}: ${key || '(root)'}: ${issue.message}`, key || undefined);
  }

  const file = parsed.data;
  return {
    endpoints: file.endpoints.map(({ name, url }) => ({ name, url })),
    intervalMinutes: file.interval,
    method: file.method,
    metricsAddress: parseBindAddress(String(file.prometheus.address)),
    probeTimeoutMs: file.timeouts.probeMs,
    connectTimeoutMs: file.timeouts.connectMs,
    maxIdleSockets: file.pool.maxIdleSockets,
    idleSocketTimeoutMs: file.pool.idleTimeoutMs,
    checkOnStartup: file.checkOnStartup,
    concurrency: file.concurrency,
  };
}
