export interface ReadinessProbeConfig {
  host: string;
  port: number;
  attempts: number;
  intervalMs: number;
  timeoutMs: number;
}

export interface ManagedService {
  readonly name: string;
  /** Regular expression source matched against a process's full command line. */
  readonly identityPattern: string;
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd: string;
  readonly logSink: string;
  readonly graceMs?: number;
  readonly readiness?: Readonly<ReadinessProbeConfig>;
  readonly foreground: boolean;
  readonly echoOutput: boolean;
  readonly env?: Readonly<Record<string, string>>;
}

export interface ProvisionState {
  runtimePresent: boolean;
  dependenciesInstalled: boolean;
  lastError?: string;
  env: Record<string, string>;
}

export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface ProcessHandle {
  readonly pid: number;
  readonly serviceName: string;
  readonly startTime: Date;
  readonly outputSink: string;
  readonly exited: Promise<ExitStatus>;
  isRunning: () => boolean;
}

export interface ReconciliationResult {
  matched: Set<number>;
  terminated: Set<number>;
  errors: Map<number, string>;
}

export type LaunchOutcome =
  | { kind: 'running'; handle: ProcessHandle }
  | { kind: 'exited'; handle: ProcessHandle; status: ExitStatus };

export interface LaunchOptions {
  env?: Record<string, string>;
  signal?: AbortSignal;
  onSpawned?: (handle: ProcessHandle) => void;
}

export type ExitOutcome =
  | { kind: 'foregroundExit'; service: string; code: number }
  | { kind: 'cancelled'; signal: NodeJS.Signals }
  | { kind: 'provisionFailed'; cause: string }
  | { kind: 'reconcileFailed'; cause: string }
  | { kind: 'launchFailed'; service: string; cause: string };

export type SequencerState =
  | { phase: 'idle' }
  | { phase: 'provisioning' }
  | { phase: 'reconciling' }
  | { phase: 'launching'; index: number; service: string }
  | { phase: 'running'; service: string }
  | { phase: 'terminated'; outcome: ExitOutcome };

export type TransitionHandler = (state: SequencerState) => void;

export interface ProvisionRequest {
  /** Overrides the provisioner's configured dependency manifest. */
  manifest?: string;
  signal?: AbortSignal;
}

export interface Provisioner {
  ensure: (request?: ProvisionRequest) => Promise<ProvisionState>;
}

export interface Reconciler {
  reconcile: (patterns: readonly string[]) => Promise<ReconciliationResult>;
}

export interface Launcher {
  launch: (service: ManagedService, options?: LaunchOptions) => Promise<LaunchOutcome>;
}

/** Sends a signal to a process and its descendants. */
export type ProcessKiller = (pid: number, signal: NodeJS.Signals) => Promise<void>;
