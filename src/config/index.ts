import dotenv from 'dotenv';
import { parseArgs } from 'util';
import { DEFAULT_METRIC_PREFIX } from '../metrics/schema';
import { isLevelName } from '../lib/logger';
import type { LevelName } from '../lib/logger';
import { CLUSTER_NAME_PATTERN, STATUS_SHAPES } from '../types/rbd/mirror-status';
import type { StatusShape } from '../types/rbd/mirror-status';

dotenv.config();

export type Config = {
  pool: string;
  http: {
    address: string;
    port: number;
  };
  rbd: {
    binary: string;
    timeoutMs: number;
    cluster?: string;
  };
  metrics: {
    prefix: string;
    clusterLabel: boolean;
    shape: StatusShape;
  };
  log: {
    level: LevelName;
    json: boolean;
  };
  debug: boolean;
  showVersion: boolean;
};

type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const getEnv = (env: Env, key: string, fallback: string): string => {
  const value = env[key];
  if (value === undefined) return fallback;
  return value.trim();
};

const getEnvOptional = (env: Env, key: string): string | undefined => {
  const value = env[key];
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const toInteger = (value: string, key: string, min: number, max: number): number => {
  const parsed = Number(value);
  if (value.length === 0 || !Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new ConfigError(`${key} must be an integer between ${min} and ${max}`);
  }
  return parsed;
};

const toBoolean = (value: string, key: string): boolean => {
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'y'].includes(normalized)) return true;
  if (['false', '0', 'no', 'n', ''].includes(normalized)) return false;
  throw new ConfigError(`${key} must be boolean-like (true/false)`);
};

const toShape = (value: string, key: string): StatusShape => {
  const match = STATUS_SHAPES.find((shape) => shape === value);
  if (!match) {
    throw new ConfigError(`${key} must be one of ${STATUS_SHAPES.join(', ')}`);
  }
  return match;
};

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        pool: { type: 'string' },
        ipaddress: { type: 'string' },
        port: { type: 'string' },
        version: { type: 'boolean' },
        debug: { type: 'boolean' },
        rbd: { type: 'string' },
        timeout: { type: 'string' },
        cluster: { type: 'string' },
        'cluster-label': { type: 'boolean' },
        prefix: { type: 'string' },
        shape: { type: 'string' },
      },
    }).values;
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }
}

// Prometheus metric name rules; the prefix starts every exported name.
const METRIC_PREFIX_RE = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;

/**
 * Flags win over environment variables (a `.env` file included), which win over defaults.
 */
export function loadConfig(argv: string[] = process.argv.slice(2), env: Env = process.env): Config {
  const values = parseFlags(argv);

  const debug = values.debug ?? toBoolean(getEnv(env, 'RBD_EXPORTER_DEBUG', 'false'), 'RBD_EXPORTER_DEBUG');
  const pool = values.pool ?? getEnv(env, 'RBD_EXPORTER_POOL', 'ceph-pool1');
  if (!pool) {
    throw new ConfigError('pool must not be empty');
  }

  const cluster = values.cluster ?? getEnvOptional(env, 'RBD_CLUSTER');
  if (cluster !== undefined && !new RegExp(CLUSTER_NAME_PATTERN).test(cluster)) {
    throw new ConfigError(`cluster must match ${CLUSTER_NAME_PATTERN}`);
  }

  const prefix = values.prefix ?? getEnv(env, 'RBD_EXPORTER_METRIC_PREFIX', DEFAULT_METRIC_PREFIX);
  if (prefix !== '' && !METRIC_PREFIX_RE.test(prefix)) {
    throw new ConfigError(`prefix must match ${METRIC_PREFIX_RE.source}`);
  }

  const envLevel = (getEnvOptional(env, 'LOG_LEVEL') ?? 'info').toLowerCase();
  const level: LevelName = debug ? 'debug' : isLevelName(envLevel) ? envLevel : 'info';

  return {
    pool,
    http: {
      address: values.ipaddress ?? getEnv(env, 'RBD_EXPORTER_ADDRESS', ''),
      port: toInteger(values.port ?? getEnv(env, 'RBD_EXPORTER_PORT', '9125'), 'port', 1, 65535),
    },
    rbd: {
      binary: values.rbd ?? getEnv(env, 'RBD_BINARY', 'rbd'),
      timeoutMs: toInteger(values.timeout ?? getEnv(env, 'RBD_TIMEOUT_MS', '15000'), 'timeout', 1, 600_000),
      cluster,
    },
    metrics: {
      prefix,
      clusterLabel:
        values['cluster-label'] ??
        toBoolean(getEnv(env, 'RBD_EXPORTER_CLUSTER_LABEL', 'false'), 'RBD_EXPORTER_CLUSTER_LABEL'),
      shape: toShape(values.shape ?? getEnv(env, 'RBD_EXPORTER_STATUS_SHAPE', 'auto'), 'shape'),
    },
    log: {
      level,
      json: getEnv(env, 'LOG_JSON', '0') === '1',
    },
    debug,
    showVersion: values.version ?? false,
  };
}
