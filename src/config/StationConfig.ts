import fs from 'node:fs';
import path from 'node:path';
import { ConfigError } from '../supervisor/errors';
import type { ManagedService, ReadinessProbeConfig } from '../supervisor/types';

export interface RuntimeConfig {
  dir: string;
  binDir: string;
  create: string[];
  install: string[];
  manifest?: string;
  shellEnv?: string[];
}

export interface StationConfig {
  projectRoot: string;
  runtime: RuntimeConfig;
  registryFile: string;
  reconcile: {
    settleMs: number;
    scanProcessTable: boolean;
  };
  stopTimeoutMs: number;
  directories: string[];
  services: ManagedService[];
  logging: {
    level: string;
    file: string;
  };
}

export interface LoadConfigOptions {
  projectRoot: string;
  /** Explicit config file; must exist. Defaults to `config/station.json` when present. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export const DEFAULT_CONFIG_FILE = 'config/station.json';

const DEFAULT_SETTLE_MS = 1_000;
const DEFAULT_STOP_TIMEOUT_MS = 10_000;
const DEFAULT_PROBE: Omit<ReadinessProbeConfig, 'host' | 'port'> = {
  attempts: 10,
  intervalMs: 500,
  timeoutMs: 1_000,
};

type RawRecord = Record<string, unknown>;

export function loadStationConfig(options: LoadConfigOptions): StationConfig {
  const env = options.env ?? process.env;
  const root = path.resolve(options.projectRoot);
  const explicit = options.configPath ?? normalizeString(env.STATION_CONFIG);

  let raw: RawRecord = {};
  if (explicit) {
    const file = path.resolve(root, explicit);
    if (!fs.existsSync(file)) {
      throw new ConfigError(`Config file not found: ${file}`);
    }
    raw = readJson(file);
  } else if (fs.existsSync(path.join(root, DEFAULT_CONFIG_FILE))) {
    raw = readJson(path.join(root, DEFAULT_CONFIG_FILE));
  }

  return parseStationConfig(raw, root, env);
}

export function parseStationConfig(raw: RawRecord, projectRoot: string, env: NodeJS.ProcessEnv = {}): StationConfig {
  const resolve = (value: string): string => path.resolve(projectRoot, value);

  const runtimeRaw = extractRecord(raw.runtime, 'runtime');
  const runtimeDir = normalizeString(runtimeRaw.dir) ?? '.venv';
  const binDir = normalizeString(runtimeRaw.binDir) ?? path.join(runtimeDir, 'bin');
  const manifest = runtimeRaw.manifest === null ? undefined : normalizeString(runtimeRaw.manifest) ?? 'requirements.txt';
  const runtime: RuntimeConfig = {
    dir: resolve(runtimeDir),
    binDir: resolve(binDir),
    create: normalizeCommand(runtimeRaw.create, 'runtime.create') ?? [ 'python3', '-m', 'venv', runtimeDir ],
    install: normalizeCommand(runtimeRaw.install, 'runtime.install') ??
      [ path.join(binDir, 'pip'), 'install', '-q', '-r', manifest ?? 'requirements.txt' ],
    manifest: manifest ? resolve(manifest) : undefined,
    shellEnv: runtimeRaw.shellEnv === null ? undefined : normalizeCommand(runtimeRaw.shellEnv, 'runtime.shellEnv') ?? [ 'opam', 'env' ],
  };

  const reconcileRaw = extractRecord(raw.reconcile, 'reconcile');
  const scanOverride = normalizeBoolean(env.STATION_SCAN_PROCESS_TABLE);

  const directories = normalizeStringList(raw.directories, 'directories') ?? [ 'logs', 'data', 'music' ];

  if (raw.services !== undefined && !Array.isArray(raw.services)) {
    throw new ConfigError('services must be an array');
  }
  const servicesRaw: unknown[] = Array.isArray(raw.services) ? raw.services : defaultServices();
  const services = servicesRaw.map((item, index) => parseService(item, index, projectRoot));

  const loggingRaw = extractRecord(raw.logging, 'logging');

  return {
    projectRoot,
    runtime,
    registryFile: resolve(normalizeString(raw.registryFile) ?? '.station/processes.json'),
    reconcile: {
      settleMs: normalizeDuration(reconcileRaw.settleMs, 'reconcile.settleMs') ?? DEFAULT_SETTLE_MS,
      scanProcessTable: scanOverride ?? normalizeBoolean(reconcileRaw.scanProcessTable) ?? false,
    },
    stopTimeoutMs: normalizeDuration(raw.stopTimeoutMs, 'stopTimeoutMs') ?? DEFAULT_STOP_TIMEOUT_MS,
    directories: directories.map(resolve),
    services,
    logging: {
      level: normalizeString(env.STATION_LOG_LEVEL) ?? normalizeString(loggingRaw.level) ?? 'info',
      file: resolve(normalizeString(loggingRaw.file) ?? 'logs/station-%DATE%.log'),
    },
  };
}

function parseService(value: unknown, index: number, projectRoot: string): ManagedService {
  const where = `services[${index}]`;
  const raw = extractRecord(value, where);

  const name = normalizeString(raw.name);
  if (!name) {
    throw new ConfigError(`${where}.name is required`);
  }
  const command = normalizeString(raw.command);
  if (!command) {
    throw new ConfigError(`${where}.command is required`);
  }
  const identityPattern = normalizeString(raw.identityPattern);
  if (!identityPattern) {
    throw new ConfigError(`${where}.identityPattern is required`);
  }
  try {
    new RegExp(identityPattern);
  } catch (error: unknown) {
    throw new ConfigError(`${where}.identityPattern is not a valid regular expression: ${String(error)}`);
  }

  const args = normalizeStringList(raw.args, `${where}.args`) ?? [];
  const env = raw.env === undefined ? undefined : normalizeEnv(raw.env, `${where}.env`);

  return {
    name,
    identityPattern,
    command,
    args,
    cwd: path.resolve(projectRoot, normalizeString(raw.cwd) ?? '.'),
    logSink: path.resolve(projectRoot, normalizeString(raw.logSink) ?? `logs/${name}.log`),
    graceMs: normalizeDuration(raw.graceMs, `${where}.graceMs`),
    readiness: raw.readiness === undefined ? undefined : parseReadiness(raw.readiness, `${where}.readiness`),
    foreground: normalizeBoolean(raw.foreground) ?? false,
    echoOutput: normalizeBoolean(raw.echoOutput) ?? false,
    env,
  };
}

function parseReadiness(value: unknown, where: string): ReadinessProbeConfig {
  const raw = extractRecord(value, where);
  const port = normalizeNumber(raw.port);
  if (port === undefined || !Number.isInteger(port) || port <= 0 || port > 65_535) {
    throw new ConfigError(`${where}.port must be a TCP port`);
  }
  const attempts = normalizeNumber(raw.attempts) ?? DEFAULT_PROBE.attempts;
  if (!Number.isInteger(attempts) || attempts < 1) {
    throw new ConfigError(`${where}.attempts must be a positive integer`);
  }
  return {
    host: normalizeString(raw.host) ?? '127.0.0.1',
    port,
    attempts,
    intervalMs: normalizeDuration(raw.intervalMs, `${where}.intervalMs`) ?? DEFAULT_PROBE.intervalMs,
    timeoutMs: normalizeDuration(raw.timeoutMs, `${where}.timeoutMs`) ?? DEFAULT_PROBE.timeoutMs,
  };
}

/** The radio stack: Icecast distributes, Liquidsoap streams in the foreground. */
function defaultServices(): RawRecord[] {
  return [
    {
      name: 'icecast',
      identityPattern: 'icecast.*config/icecast\\.xml',
      command: 'icecast',
      args: [ '-c', 'config/icecast.xml' ],
      logSink: 'logs/icecast_startup.log',
      graceMs: 2_000,
    },
    {
      name: 'liquidsoap',
      identityPattern: 'liquidsoap.*config/station\\.liq',
      command: 'liquidsoap',
      args: [ 'config/station.liq' ],
      logSink: 'logs/liquidsoap.log',
      foreground: true,
      echoOutput: true,
    },
  ];
}

function readJson(file: string): RawRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error: unknown) {
    throw new ConfigError(`Cannot parse ${file}: ${String(error)}`);
  }
  return extractRecord(parsed, file);
}

function extractRecord(value: unknown, where: string): RawRecord {
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError(`${where} must be an object`);
  }
  return value;
}

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function normalizeNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value.trim());
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return undefined;
}

function normalizeDuration(value: unknown, where: string): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  const parsed = normalizeNumber(value);
  if (parsed === undefined || parsed < 0) {
    throw new ConfigError(`${where} must be a non-negative number of milliseconds`);
  }
  return parsed;
}

function normalizeBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    const lowered = value.trim().toLowerCase();
    if ([ 'true', '1', 'yes' ].includes(lowered)) {
      return true;
    }
    if ([ 'false', '0', 'no' ].includes(lowered)) {
      return false;
    }
  }
  return undefined;
}

function normalizeStringList(value: unknown, where: string): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(`${where} must be an array of strings`);
  }
  return value;
}

function normalizeCommand(value: unknown, where: string): string[] | undefined {
  const list = normalizeStringList(value, where);
  if (list !== undefined && list.length === 0) {
    throw new ConfigError(`${where} must not be empty`);
  }
  return list;
}

function normalizeEnv(value: unknown, where: string): Record<string, string> {
  const raw = extractRecord(value, where);
  const env: Record<string, string> = {};
  for (const [ key, item ] of Object.entries(raw)) {
    if (typeof item !== 'string') {
      throw new ConfigError(`${where}.${key} must be a string`);
    }
    env[key] = item;
  }
  return env;
}
