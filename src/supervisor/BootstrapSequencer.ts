import { constants as osConstants } from 'node:os';
import { getLoggerFor } from 'global-logger-factory';
import { logContext } from '../logging/LogContext';
import { ConfigError, describeError, LaunchError } from './errors';
import { killProcessTree } from './kill';
import type { ProcessRegistry } from './ProcessRegistry';
import type {
  ExitOutcome,
  ExitStatus,
  Launcher,
  LaunchOutcome,
  ManagedService,
  ProcessHandle,
  ProcessKiller,
  Provisioner,
  ProvisionState,
  ReconciliationResult,
  Reconciler,
  SequencerState,
  TransitionHandler,
} from './types';

export interface SignalSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface BootstrapSequencerOptions {
  provisioner: Provisioner;
  reconciler: Reconciler;
  launcher: Launcher;
  /** Launched processes are recorded here so a later run can reconcile them. */
  registry?: ProcessRegistry;
  kill?: ProcessKiller;
  signals?: SignalSource;
  handledSignals?: NodeJS.Signals[];
  /** How long a stopped service may take before it is killed outright. */
  stopTimeoutMs?: number;
  onTransition?: TransitionHandler;
}

export class BootstrapSequencer {
  private readonly logger = getLoggerFor(this);
  private readonly provisioner: Provisioner;
  private readonly reconciler: Reconciler;
  private readonly launcher: Launcher;
  private readonly registry?: ProcessRegistry;
  private readonly kill: ProcessKiller;
  private readonly signals: SignalSource;
  private readonly handledSignals: NodeJS.Signals[];
  private readonly stopTimeoutMs: number;
  private onTransition?: TransitionHandler;

  private state: SequencerState = { phase: 'idle' };
  private handles: ProcessHandle[] = [];
  private registryWrites: Promise<void>[] = [];
  private cancelledBy?: NodeJS.Signals;
  private stopping?: Promise<void>;
  private readonly stopped = new Set<ProcessHandle>();
  private abort = new AbortController();

  public constructor(options: BootstrapSequencerOptions) {
    this.provisioner = options.provisioner;
    this.reconciler = options.reconciler;
    this.launcher = options.launcher;
    this.registry = options.registry;
    this.kill = options.kill ?? killProcessTree;
    this.signals = options.signals ?? process;
    this.handledSignals = options.handledSignals ?? [ 'SIGINT', 'SIGTERM' ];
    this.stopTimeoutMs = options.stopTimeoutMs ?? 10_000;
    this.onTransition = options.onTransition;
  }

  public setTransitionHandler(handler: TransitionHandler): void {
    this.onTransition = handler;
  }

  public getState(): SequencerState {
    return this.state;
  }

  /** Handles owned by the current run, in launch order. */
  public getHandles(): readonly ProcessHandle[] {
    return this.handles;
  }

  public async run(services: readonly ManagedService[], manifest?: string): Promise<ExitOutcome> {
    validateServices(services);

    this.handles = [];
    this.registryWrites = [];
    this.cancelledBy = undefined;
    this.stopping = undefined;
    this.stopped.clear();
    this.abort = new AbortController();

    // Installed before the first launch so an early cancellation still cleans up.
    const onSignal = (signal: NodeJS.Signals): void => this.cancel(signal);
    for (const signal of this.handledSignals) {
      this.signals.on(signal, onSignal);
    }

    try {
      const outcome = await this.sequence(services, manifest);
      await this.stopOwned();
      this.transition({ phase: 'terminated', outcome });
      this.logOutcome(outcome);
      return outcome;
    } finally {
      for (const signal of this.handledSignals) {
        this.signals.off(signal, onSignal);
      }
      await Promise.allSettled(this.registryWrites);
    }
  }

  /** Operator-initiated shutdown: stops every owned service in reverse launch order. */
  public cancel(signal: NodeJS.Signals): void {
    if (this.cancelledBy) {
      this.logger.warn(`Received ${signal} while already shutting down`);
      return;
    }
    this.cancelledBy = signal;
    this.logger.info(`Received ${signal} during ${this.state.phase}, stopping all services...`);
    this.abort.abort();
    void this.stopOwned();
  }

  private async sequence(services: readonly ManagedService[], manifest?: string): Promise<ExitOutcome> {
    const provision = await this.provision(manifest);
    if ('kind' in provision) {
      return provision;
    }
    if (this.cancelledBy) {
      return { kind: 'cancelled', signal: this.cancelledBy };
    }

    const reconciled = await this.reconcile(services);
    if (reconciled) {
      return reconciled;
    }
    if (this.cancelledBy) {
      return { kind: 'cancelled', signal: this.cancelledBy };
    }

    for (const [ index, service ] of services.entries()) {
      this.transition({ phase: 'launching', index, service: service.name });

      let result: LaunchOutcome;
      try {
        result = await logContext.run({ phase: `launching:${service.name}` }, () => this.launcher.launch(service, {
          env: provision.env,
          signal: this.abort.signal,
          onSpawned: (handle) => this.adopt(service, handle),
        }));
      } catch (error: unknown) {
        if (this.cancelledBy) {
          return { kind: 'cancelled', signal: this.cancelledBy };
        }
        return this.launchFailure(service, error);
      }

      if (this.cancelledBy) {
        return { kind: 'cancelled', signal: this.cancelledBy };
      }
      if (result.kind === 'exited') {
        return { kind: 'foregroundExit', service: service.name, code: exitCodeOf(result.status) };
      }
    }

    // Unreachable after validation: the last service is the foreground one.
    throw new ConfigError('No foreground service was launched');
  }

  private async provision(manifest?: string): Promise<ProvisionState | ExitOutcome> {
    this.transition({ phase: 'provisioning' });
    try {
      const state = await logContext.run({ phase: 'provisioning' }, () =>
        this.provisioner.ensure({ manifest, signal: this.abort.signal }));
      if (state.lastError) {
        this.logger.warn(`Provisioning finished with a warning: ${state.lastError}`);
      }
      return state;
    } catch (error: unknown) {
      if (this.cancelledBy) {
        return { kind: 'cancelled', signal: this.cancelledBy };
      }
      this.logger.error(`Provisioning failed: ${describeError(error)}`);
      return { kind: 'provisionFailed', cause: describeError(error) };
    }
  }

  private async reconcile(services: readonly ManagedService[]): Promise<ExitOutcome | undefined> {
    this.transition({ phase: 'reconciling' });
    let result: ReconciliationResult;
    try {
      result = await logContext.run({ phase: 'reconciling' }, () =>
        this.reconciler.reconcile(services.map((service) => service.identityPattern)));
    } catch (error: unknown) {
      this.logger.error(`Reconciliation failed: ${describeError(error)}`);
      return { kind: 'reconcileFailed', cause: describeError(error) };
    }

    for (const [ pid, reason ] of result.errors) {
      this.logger.warn(`Could not terminate stale pid=${pid}: ${reason}`);
    }
    this.logger.info(`Reconciled ${result.matched.size} stale instance(s), terminated ${result.terminated.size}`);
    return undefined;
  }

  private adopt(service: ManagedService, handle: ProcessHandle): void {
    this.handles.push(handle);
    // Spawned after the shutdown request was taken.
    if (this.cancelledBy) {
      void this.stopOwned();
    }
    if (service.foreground) {
      this.transition({ phase: 'running', service: service.name });
    }

    const registry = this.registry;
    if (!registry) {
      return;
    }
    this.trackRegistryWrite(registry.record({
      schemaVersion: '1.0',
      service: service.name,
      pid: handle.pid,
      identityPattern: service.identityPattern,
      commandLine: [ service.command, ...service.args ].join(' '),
      logSink: service.logSink,
      startTime: handle.startTime.toISOString(),
    }));
    void handle.exited.then(() => {
      this.trackRegistryWrite(registry.remove([ handle.pid ]));
    });
  }

  private trackRegistryWrite(write: Promise<void>): void {
    this.registryWrites.push(write.catch((error: unknown) => {
      this.logger.warn(`Cannot update process registry: ${describeError(error)}`);
    }));
  }

  private launchFailure(service: ManagedService, error: unknown): ExitOutcome {
    if (error instanceof LaunchError) {
      this.logger.error(`${error.kind} for ${service.name}: ${error.message}`);
      for (const line of error.outputTail) {
        this.logger.error(`  [${service.name}] ${line}`);
      }
    } else {
      this.logger.error(`Launching ${service.name} failed: ${describeError(error)}`);
    }
    return { kind: 'launchFailed', service: service.name, cause: describeError(error) };
  }

  /** Each call stops the handles adopted since the previous one, after that one has finished. */
  private stopOwned(): Promise<void> {
    this.stopping = (this.stopping ?? Promise.resolve()).then(() => this.stopHandles());
    return this.stopping;
  }

  private async stopHandles(): Promise<void> {
    const running = [ ...this.handles ].reverse().filter((handle) => !this.stopped.has(handle) && handle.isRunning());
    for (const handle of running) {
      this.stopped.add(handle);
      this.logger.info(`Stopping ${handle.serviceName} (pid=${handle.pid})`);
      try {
        await this.kill(handle.pid, 'SIGTERM');
      } catch (error: unknown) {
        this.logger.warn(`Failed to signal ${handle.serviceName}: ${describeError(error)}`);
      }

      if (await waitForExit(handle, this.stopTimeoutMs)) {
        continue;
      }
      this.logger.warn(`${handle.serviceName} did not stop within ${this.stopTimeoutMs}ms, killing it`);
      try {
        await this.kill(handle.pid, 'SIGKILL');
      } catch (error: unknown) {
        this.logger.error(`Failed to kill ${handle.serviceName}: ${describeError(error)}`);
      }
    }
  }

  private transition(state: SequencerState): void {
    this.state = state;
    this.logger.info(`Phase: ${describeState(state)}`);
    this.onTransition?.(state);
  }

  private logOutcome(outcome: ExitOutcome): void {
    switch (outcome.kind) {
      case 'foregroundExit':
        this.logger.info(`${outcome.service} exited with code ${outcome.code}`);
        break;
      case 'cancelled':
        this.logger.info(`Shut down after ${outcome.signal}`);
        break;
      default:
        this.logger.error(`Bootstrap aborted (${outcome.kind}): ${outcome.cause}`);
    }
  }
}

/**
 * Rejects service lists the state machine cannot run: the foreground service must be unique and last.
 */
export function validateServices(services: readonly ManagedService[]): void {
  if (services.length === 0) {
    throw new ConfigError('No services configured');
  }
  const names = new Set<string>();
  for (const service of services) {
    if (names.has(service.name)) {
      throw new ConfigError(`Duplicate service name: ${service.name}`);
    }
    names.add(service.name);
  }
  const foreground = services.filter((service) => service.foreground);
  if (foreground.length !== 1) {
    throw new ConfigError(`Exactly one foreground service is required, found ${foreground.length}`);
  }
  if (!services[services.length - 1].foreground) {
    throw new ConfigError(`Foreground service ${foreground[0].name} must be the last one launched`);
  }
}

/** Shell convention: 128 + signal number for a process killed by a signal. */
export function exitCodeOf(status: ExitStatus): number {
  if (status.code !== null) {
    return status.code;
  }
  if (status.signal) {
    return 128 + (osConstants.signals[status.signal] ?? 0);
  }
  return 1;
}

function describeState(state: SequencerState): string {
  switch (state.phase) {
    case 'launching':
      return `launching(${state.index}) ${state.service}`;
    case 'running':
      return `running ${state.service}`;
    case 'terminated':
      return `terminated (${state.outcome.kind})`;
    default:
      return state.phase;
  }
}

function waitForExit(handle: ProcessHandle, timeoutMs: number): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), timeoutMs);
    void handle.exited.then(() => {
      clearTimeout(timer);
      resolve(true);
    });
  });
}
