export { BootstrapSequencer, validateServices, exitCodeOf } from './BootstrapSequencer';
export type { BootstrapSequencerOptions, SignalSource } from './BootstrapSequencer';
export { ProcessReconciler } from './ProcessReconciler';
export type { ProcessReconcilerOptions } from './ProcessReconciler';
export { ProcessRegistry } from './ProcessRegistry';
export type { RegistryEntry } from './ProcessRegistry';
export { ProcessTable, isProcessRunning } from './ProcessTable';
export type { LiveProcess } from './ProcessTable';
export { ServiceLauncher } from './ServiceLauncher';
export type { ServiceLauncherOptions } from './ServiceLauncher';
export { waitUntilReachable, tryConnect } from './ReadinessProbe';
export { killProcessTree } from './kill';
export * from './errors';
export * from './types';
