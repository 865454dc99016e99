import fs from 'node:fs';
import path from 'node:path';
import { getLoggerFor } from 'global-logger-factory';
import { describeError, isAbortError, ProvisionError, ProvisionWarning } from '../supervisor/errors';
import type { Provisioner, ProvisionRequest, ProvisionState } from '../supervisor/types';
import { isCommandMissing, runCommand, type CommandResult, type CommandRunner } from './CommandRunner';
import { parseShellEnv } from './ShellEnv';

export interface EnvironmentProvisionerOptions {
  /** Working directory for provisioning commands. */
  projectRoot: string;
  runtimeDir: string;
  /** Directory holding the runtime's executables, put first on PATH. */
  runtimeBinDir: string;
  createCommand: readonly string[];
  installCommand: readonly string[];
  /** Dependency manifest; installation is skipped when it does not exist. */
  manifest?: string;
  /** Command printing shell assignments for a toolchain, e.g. `opam env`. */
  shellEnvCommand?: readonly string[];
  runner?: CommandRunner;
}

/**
 * Makes sure the isolated runtime exists and its dependencies are installed.
 * Every call re-checks the filesystem; nothing is cached between runs.
 */
export class EnvironmentProvisioner implements Provisioner {
  private readonly logger = getLoggerFor(this);
  private readonly runner: CommandRunner;

  public constructor(private readonly options: EnvironmentProvisionerOptions) {
    this.runner = options.runner ?? runCommand;
  }

  public async ensure(request: ProvisionRequest = {}): Promise<ProvisionState> {
    const { signal } = request;
    const manifest = request.manifest ?? this.options.manifest;
    const state: ProvisionState = {
      runtimePresent: false,
      dependenciesInstalled: false,
      env: {},
    };

    const toolchainEnv = await this.loadShellEnv(state, signal);
    await this.ensureRuntime(signal);
    state.runtimePresent = true;
    state.env = { ...toolchainEnv, ...this.activationEnv(toolchainEnv) };

    await this.installDependencies(state, manifest, signal);
    return state;
  }

  private async ensureRuntime(signal?: AbortSignal): Promise<void> {
    const { runtimeDir, createCommand } = this.options;
    if (fs.existsSync(runtimeDir)) {
      this.logger.debug(`Runtime present at ${runtimeDir}`);
      return;
    }

    this.logger.info(`Creating runtime at ${runtimeDir}`);
    let result: CommandResult;
    try {
      result = await this.runner(createCommand, { cwd: this.options.projectRoot, signal });
    } catch (error: unknown) {
      if (isAbortError(error)) {
        throw error;
      }
      throw new ProvisionError(`Cannot create runtime at ${runtimeDir}: ${describeError(error)}`, error);
    }

    if (result.code !== 0) {
      throw new ProvisionError(`Cannot create runtime at ${runtimeDir}: ${formatFailure(createCommand, result)}`);
    }
    if (!fs.existsSync(runtimeDir)) {
      throw new ProvisionError(`${createCommand.join(' ')} succeeded but ${runtimeDir} does not exist`);
    }
  }

  private async installDependencies(state: ProvisionState, manifest?: string, signal?: AbortSignal): Promise<void> {
    const { installCommand } = this.options;
    if (!manifest || !fs.existsSync(manifest)) {
      this.logger.info('No dependency manifest found, skipping installation');
      return;
    }

    this.logger.info(`Checking dependencies from ${path.basename(manifest)}`);
    try {
      const result = await this.runner(installCommand, {
        cwd: this.options.projectRoot,
        env: { ...process.env, ...state.env },
        signal,
      });
      if (result.code === 0) {
        state.dependenciesInstalled = true;
        return;
      }
      this.warn(state, new ProvisionWarning(`Some dependencies failed to install: ${formatFailure(installCommand, result)}`));
    } catch (error: unknown) {
      if (isAbortError(error)) {
        throw error;
      }
      this.warn(state, new ProvisionWarning(`Dependency installation could not run: ${describeError(error)}`));
    }
  }

  private async loadShellEnv(state: ProvisionState, signal?: AbortSignal): Promise<Record<string, string>> {
    const command = this.options.shellEnvCommand;
    if (!command || command.length === 0) {
      return {};
    }

    try {
      const result = await this.runner(command, { cwd: this.options.projectRoot, signal });
      if (result.code !== 0) {
        this.warn(state, new ProvisionWarning(`Toolchain environment unavailable: ${formatFailure(command, result)}`));
        return {};
      }
      const env = parseShellEnv(result.stdout);
      this.logger.info(`Loaded ${Object.keys(env).length} toolchain variables from ${command[0]}`);
      return env;
    } catch (error: unknown) {
      if (isAbortError(error)) {
        throw error;
      }
      if (isCommandMissing(error)) {
        this.logger.debug(`${command[0]} not installed, skipping toolchain environment`);
        return {};
      }
      this.warn(state, new ProvisionWarning(`Toolchain environment unavailable: ${describeError(error)}`));
      return {};
    }
  }

  /** Equivalent of sourcing the runtime's activate script. */
  private activationEnv(base: Record<string, string>): Record<string, string> {
    const currentPath = base.PATH ?? process.env.PATH ?? '';
    const binDir = path.resolve(this.options.runtimeBinDir);
    return {
      VIRTUAL_ENV: path.resolve(this.options.runtimeDir),
      PATH: currentPath ? `${binDir}${path.delimiter}${currentPath}` : binDir,
    };
  }

  private warn(state: ProvisionState, warning: ProvisionWarning): void {
    this.logger.warn(`${warning.message}; continuing anyway`);
    state.lastError = warning.message;
  }
}

function formatFailure(command: readonly string[], result: CommandResult): string {
  const status = result.signal ? `signal ${result.signal}` : `exit code ${result.code ?? 'null'}`;
  const detail = (result.stderr || result.stdout).trim().split('\n').slice(-3).join(' | ');
  return `${command.join(' ')} failed with ${status}${detail ? `: ${detail}` : ''}`;
}
