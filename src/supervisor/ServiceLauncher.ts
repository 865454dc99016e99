import { spawn, type ChildProcess } from 'node:child_process';
import { createWriteStream, promises as fs } from 'node:fs';
import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { getLoggerFor } from 'global-logger-factory';
import { describeError, LaunchError } from './errors';
import { waitUntilReachable, type ConnectFn } from './ReadinessProbe';
import type { ExitStatus, Launcher, LaunchOptions, LaunchOutcome, ManagedService, ProcessHandle } from './types';

const DEFAULT_TAIL_LINES = 20;

export interface ServiceLauncherOptions {
  /** Directories every service expects, created before the first spawn. */
  sharedDirectories?: string[];
  processFactory?: typeof spawn;
  connect?: ConnectFn;
  outputTailLines?: number;
}

/**
 * Starts one external service, pipes its combined output into the service's log sink
 * and gates "up" on a readiness probe or a fixed grace period followed by one liveness check.
 */
export class ServiceLauncher implements Launcher {
  private readonly logger = getLoggerFor(this);
  private readonly sharedDirectories: string[];
  private readonly processFactory: typeof spawn;
  private readonly connect?: ConnectFn;
  private readonly outputTailLines: number;

  public constructor(options: ServiceLauncherOptions = {}) {
    this.sharedDirectories = options.sharedDirectories ?? [];
    this.processFactory = options.processFactory ?? spawn;
    this.connect = options.connect;
    this.outputTailLines = options.outputTailLines ?? DEFAULT_TAIL_LINES;
  }

  public async launch(service: ManagedService, options: LaunchOptions = {}): Promise<LaunchOutcome> {
    options.signal?.throwIfAborted();
    try {
      await this.ensureDirectories(service);
    } catch (error: unknown) {
      throw new LaunchError('SpawnFailure', service.name, `Cannot prepare directories for ${service.name}: ${describeError(error)}`, { cause: error });
    }

    options.signal?.throwIfAborted();
    this.logger.info(`Starting ${service.name}: ${[ service.command, ...service.args ].join(' ')}`);
    const sink = createWriteStream(service.logSink, { flags: 'a' });
    sink.on('error', (err) => {
      this.logger.warn(`Cannot write ${service.logSink}: ${err.message}`);
    });
    let sinkOpen = true;
    const closeSink = (): void => {
      if (sinkOpen) {
        sinkOpen = false;
        sink.end();
      }
    };
    const tail: string[] = [];

    let child: ChildProcess;
    try {
      child = this.processFactory(service.command, [ ...service.args ], {
        cwd: service.cwd,
        env: { ...process.env, ...options.env, ...service.env },
        stdio: [ 'ignore', 'pipe', 'pipe' ],
        detached: false,
      });
    } catch (error: unknown) {
      closeSink();
      throw new LaunchError('SpawnFailure', service.name, `Failed to spawn ${service.name}: ${describeError(error)}`, { cause: error });
    }

    let running = true;
    const exited = new Promise<ExitStatus>((resolve) => {
      child.once('exit', (code, signal) => {
        running = false;
        resolve({ code, signal });
      });
    });
    // Output may still arrive between 'exit' and 'close'.
    child.once('close', closeSink);

    const capture = (data: Buffer, isError: boolean): void => {
      if (sinkOpen) {
        sink.write(data);
      }
      for (const line of data.toString().split('\n')) {
        const trimmed = line.trim();
        if (!trimmed) {
          continue;
        }
        tail.push(trimmed);
        if (tail.length > this.outputTailLines) {
          tail.splice(0, tail.length - this.outputTailLines);
        }
        if (service.echoOutput) {
          if (isError) {
            this.logger.warn(`[${service.name}] ${trimmed}`);
          } else {
            this.logger.info(`[${service.name}] ${trimmed}`);
          }
        }
      }
    };
    child.stdout?.on('data', (data: Buffer) => capture(data, false));
    child.stderr?.on('data', (data: Buffer) => capture(data, true));

    const pid = await this.waitForSpawn(child, service, closeSink);

    child.on('error', (err) => {
      this.logger.error(`${service.name} (pid=${pid}) reported an error: ${err.message}`);
    });
    void exited.then(({ code, signal }) => {
      this.logger.info(`${service.name} exited with code ${code ?? 'null'} signal ${signal ?? 'null'}`);
    });

    const handle: ProcessHandle = {
      pid,
      serviceName: service.name,
      startTime: new Date(),
      outputSink: service.logSink,
      exited,
      isRunning: () => running,
    };
    options.onSpawned?.(handle);

    await this.awaitReadiness(service, handle, tail, options.signal);

    if (service.foreground) {
      this.logger.info(`${service.name} is running in the foreground (pid=${pid})`);
      const status = await exited;
      return { kind: 'exited', handle, status };
    }

    return { kind: 'running', handle };
  }

  private waitForSpawn(child: ChildProcess, service: ManagedService, closeSink: () => void): Promise<number> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error): void => {
        child.off('spawn', onSpawn);
        closeSink();
        reject(new LaunchError('SpawnFailure', service.name, `Failed to spawn ${service.name}: ${err.message}`, { cause: err }));
      };
      const onSpawn = (): void => {
        child.off('error', onError);
        if (child.pid === undefined) {
          reject(new LaunchError('SpawnFailure', service.name, `${service.name} started without a pid`));
          return;
        }
        resolve(child.pid);
      };
      child.once('error', onError);
      child.once('spawn', onSpawn);
    });
  }

  private async awaitReadiness(
    service: ManagedService,
    handle: ProcessHandle,
    tail: string[],
    signal?: AbortSignal,
  ): Promise<void> {
    if (service.readiness) {
      const { host, port } = service.readiness;
      this.logger.info(`Probing ${service.name} at ${host}:${port}`);
      const result = await waitUntilReachable(service.readiness, handle.isRunning, { connect: this.connect, signal });
      if (result === 'exited') {
        throw await this.earlyExit(service, handle, tail);
      }
      if (result === 'exhausted') {
        throw new LaunchError(
          'NotReady',
          service.name,
          `${service.name} did not accept connections on ${host}:${port} after ${service.readiness.attempts} attempts`,
          { outputTail: [ ...tail ] },
        );
      }
      this.logger.info(`${service.name} is accepting connections on ${host}:${port}`);
      return;
    }

    if (service.graceMs && service.graceMs > 0) {
      this.logger.info(`Waiting ${service.graceMs}ms before checking ${service.name}`);
      await sleep(service.graceMs, undefined, { signal });
      if (!handle.isRunning()) {
        throw await this.earlyExit(service, handle, tail);
      }
      this.logger.info(`${service.name} is still running after ${service.graceMs}ms, presumed healthy`);
    }
  }

  private async earlyExit(service: ManagedService, handle: ProcessHandle, tail: string[]): Promise<LaunchError> {
    const status = await handle.exited;
    return new LaunchError(
      'EarlyExit',
      service.name,
      `${service.name} exited during startup (code ${status.code ?? 'null'}, signal ${status.signal ?? 'null'}); see ${service.logSink}`,
      { code: status.code, signal: status.signal, outputTail: [ ...tail ] },
    );
  }

  // Directories are only ever created here, never removed.
  private async ensureDirectories(service: ManagedService): Promise<void> {
    const dirs = [ ...this.sharedDirectories, service.cwd, path.dirname(service.logSink) ];
    for (const dir of dirs) {
      if (!dir || dir === '.') {
        continue;
      }
      await fs.mkdir(dir, { recursive: true });
    }
  }
}
