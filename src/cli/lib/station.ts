import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { setGlobalLoggerFactory } from 'global-logger-factory';
import { loadStationConfig, type StationConfig } from '../../config/StationConfig';
import { ConfigurableLoggerFactory } from '../../logging/ConfigurableLoggerFactory';
import { EnvironmentProvisioner, PACKAGE_ROOT } from '../../runtime';
import {
  BootstrapSequencer,
  ConfigError,
  ProcessReconciler,
  ProcessRegistry,
  ProcessTable,
  ServiceLauncher,
} from '../../supervisor';
import { EXIT_CONFIG_ERROR, EXIT_INTERNAL_ERROR } from './exit-codes';

export interface StationArgs {
  config?: string;
  env?: string;
}

/** Project root: `STATION_ROOT`, else the directory holding this package. */
export function resolveProjectRoot(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env.STATION_ROOT?.trim();
  return fromEnv ? path.resolve(fromEnv) : PACKAGE_ROOT;
}

/**
 * Loads `.env` (or the file named by `--env`) and the station configuration.
 * Values already present in the environment win over the env file.
 */
export function prepareStation(args: StationArgs): StationConfig {
  const bootRoot = resolveProjectRoot();
  if (args.env) {
    const envPath = path.resolve(args.env);
    if (!fs.existsSync(envPath)) {
      throw new ConfigError(`Env file not found: ${envPath}`);
    }
    dotenv.config({ path: envPath });
  } else {
    const defaultEnv = path.join(bootRoot, '.env');
    if (fs.existsSync(defaultEnv)) {
      dotenv.config({ path: defaultEnv });
    }
  }

  return loadStationConfig({
    projectRoot: resolveProjectRoot(),
    configPath: args.config,
  });
}

export function initLogger(config: StationConfig, file = true): ConfigurableLoggerFactory {
  const factory = new ConfigurableLoggerFactory(config.logging.level, {
    fileName: config.logging.file,
    file,
    showLocation: true,
  });
  setGlobalLoggerFactory(factory);
  return factory;
}

export function createRegistry(config: StationConfig): ProcessRegistry {
  return new ProcessRegistry(config.registryFile);
}

export function createReconciler(
  config: StationConfig,
  registry = createRegistry(config),
  settleMs = config.reconcile.settleMs,
): ProcessReconciler {
  return new ProcessReconciler({
    registry,
    table: new ProcessTable(),
    settleMs,
    scanProcessTable: config.reconcile.scanProcessTable,
  });
}

export function createSequencer(config: StationConfig): BootstrapSequencer {
  const provisioner = new EnvironmentProvisioner({
    projectRoot: config.projectRoot,
    runtimeDir: config.runtime.dir,
    runtimeBinDir: config.runtime.binDir,
    createCommand: config.runtime.create,
    installCommand: config.runtime.install,
    manifest: config.runtime.manifest,
    shellEnvCommand: config.runtime.shellEnv,
  });

  const registry = createRegistry(config);
  return new BootstrapSequencer({
    provisioner,
    reconciler: createReconciler(config, registry),
    launcher: new ServiceLauncher({ sharedDirectories: config.directories }),
    registry,
    stopTimeoutMs: config.stopTimeoutMs,
  });
}

export function exitForCliError(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`station: ${message}`);
  process.exit(error instanceof ConfigError ? EXIT_CONFIG_ERROR : EXIT_INTERNAL_ERROR);
}
