/**
 * core/config.ts
 *
 * Builds the SessionConfig. Precedence, highest first:
 *   CLI flags  →  PC_TOOLKIT_* environment variables  →  config/session.json  →  defaults
 *
 * config/ is found beside the package, not in the working directory, so the
 * installed bin picks up its policies wherever it is started.
 */

import * as fs from 'fs';
import * as path from 'path';
import Ajv from 'ajv';
import { LogLevel, SessionConfig, TransportMode } from './types';
import { errorMessage } from './errors';
import { scopedLogger } from './logger';

const log = scopedLogger('core/config');
const ajv = new Ajv({ allErrors: true });

const LOG_LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];
const TRANSPORTS: TransportMode[] = ['stdio', 'http'];

const SESSION_SCHEMA = {
  type: 'object',
  properties: {
    transportMode: { type: 'string', enum: TRANSPORTS },
    port: { type: 'integer', minimum: 1, maximum: 65535 },
    elevationPreApproved: { type: 'boolean' },
    elevationWhitelist: { type: 'array', items: { type: 'string' } },
    logLevel: { type: 'string', enum: LOG_LEVELS },
    auditLogPath: { type: 'string', minLength: 1 },
    cleanupFolders: { type: 'array', items: { type: 'string', minLength: 1 } },
    gpuCacheTtlMs: { type: 'integer', minimum: 0 }
  },
  additionalProperties: false
};

const validateSession = ajv.compile<Partial<SessionConfig>>(SESSION_SCHEMA);

// Resolved from src/core or dist/core alike
export const PROJECT_ROOT = path.resolve(__dirname, '..', '..');

/** The config directory: PC_TOOLKIT_CONFIG_DIR when set, else config/ at the package root. */
export function configDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.PC_TOOLKIT_CONFIG_DIR?.trim();
  return override ? path.resolve(override) : path.join(PROJECT_ROOT, 'config');
}

export interface CliOverrides {
  transport?: TransportMode;
  port?: number;
}

// ---------------------------------------------------------------------------
// CLI argument parsing
// ---------------------------------------------------------------------------

function asTransport(value: string | undefined): TransportMode | undefined {
  return TRANSPORTS.find(t => t === value);
}

function asLogLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find(l => l === value);
}

function asPort(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const port = parseInt(value, 10);
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : undefined;
}

export function parseCli(argv: string[]): CliOverrides {
  let transport: TransportMode | undefined;
  let port: number | undefined;

  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--transport' && argv[i + 1]) {
      transport = asTransport(argv[i + 1]);
      if (!transport) log.warn({ value: argv[i + 1] }, 'Ignoring unknown --transport value');
      i++;
    } else if (argv[i] === '--port' && argv[i + 1]) {
      port = asPort(argv[i + 1]);
      i++;
    }
  }

  return { transport, port };
}

// ---------------------------------------------------------------------------
// Session config file
// ---------------------------------------------------------------------------

function readConfigFile(configPath: string): Partial<SessionConfig> {
  if (!fs.existsSync(configPath)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (e) {
    log.warn({ configPath, error: errorMessage(e) }, 'Session config is not valid JSON, using defaults');
    return {};
  }

  if (!validateSession(parsed)) {
    log.warn({ configPath, violations: validateSession.errors }, 'Session config does not match schema, using defaults');
    return {};
  }
  return parsed;
}

export interface LoadConfigOptions {
  cli?: CliOverrides;
  env?: NodeJS.ProcessEnv;
  configPath?: string;
}

export function loadSessionConfig(options: LoadConfigOptions = {}): SessionConfig {
  const cli = options.cli ?? {};
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? path.join(configDir(env), 'session.json');
  const fileConfig = readConfigFile(configPath);

  return {
    transportMode: cli.transport ?? asTransport(env.PC_TOOLKIT_TRANSPORT) ?? fileConfig.transportMode ?? 'stdio',
    port: cli.port ?? asPort(env.PC_TOOLKIT_PORT) ?? fileConfig.port ?? 3000,
    elevationPreApproved: fileConfig.elevationPreApproved ?? false,
    elevationWhitelist: fileConfig.elevationWhitelist ?? [],
    logLevel: asLogLevel(env.PC_TOOLKIT_LOG_LEVEL) ?? fileConfig.logLevel ?? 'info',
    auditLogPath: env.PC_TOOLKIT_AUDIT_LOG || fileConfig.auditLogPath || 'audit.log',
    cleanupFolders: fileConfig.cleanupFolders,
    gpuCacheTtlMs: fileConfig.gpuCacheTtlMs ?? 10000
  };
}
