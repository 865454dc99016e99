import { setTimeout as sleep } from 'node:timers/promises';
import { getLoggerFor } from 'global-logger-factory';
import { describeError, ReconciliationFailure } from './errors';
import { killProcessTree } from './kill';
import type { ProcessRegistry, RegistryEntry } from './ProcessRegistry';
import type { LiveProcess, ProcessTable } from './ProcessTable';
import type { ProcessKiller, ReconciliationResult, Reconciler } from './types';

export interface ProcessReconcilerOptions {
  registry: ProcessRegistry;
  table: Pick<ProcessTable, 'isRunning' | 'readCommandLine' | 'list'>;
  kill?: ProcessKiller;
  /** Delay after termination requests so the old instances can release their ports. */
  settleMs?: number;
  /** Match against every live process instead of only the ones this orchestrator recorded. */
  scanProcessTable?: boolean;
  selfPid?: number;
}

interface CandidateSet {
  live: LiveProcess[];
  /** Registry pids that are gone or no longer belong to a managed service. */
  stale: number[];
}

export class ProcessReconciler implements Reconciler {
  private readonly logger = getLoggerFor(this);
  private readonly registry: ProcessRegistry;
  private readonly table: ProcessReconcilerOptions['table'];
  private readonly kill: ProcessKiller;
  private readonly settleMs: number;
  private readonly scanProcessTable: boolean;
  private readonly selfPid: number;

  public constructor(options: ProcessReconcilerOptions) {
    this.registry = options.registry;
    this.table = options.table;
    this.kill = options.kill ?? killProcessTree;
    this.settleMs = options.settleMs ?? 1_000;
    this.scanProcessTable = options.scanProcessTable ?? false;
    this.selfPid = options.selfPid ?? process.pid;
  }

  public async reconcile(patterns: readonly string[]): Promise<ReconciliationResult> {
    const result: ReconciliationResult = {
      matched: new Set(),
      terminated: new Set(),
      errors: new Map(),
    };

    const candidates = await this.loadCandidates();

    for (const pattern of patterns) {
      const matcher = new RegExp(pattern);
      const matches = candidates.live.filter((proc) =>
        proc.pid !== this.selfPid && !result.matched.has(proc.pid) && matcher.test(proc.commandLine));

      if (matches.length === 0) {
        this.logger.debug(`No running instance matches /${pattern}/`);
        continue;
      }

      for (const proc of matches) {
        result.matched.add(proc.pid);
        this.logger.info(`Terminating stale instance pid=${proc.pid} (${proc.commandLine})`);
        try {
          await this.kill(proc.pid, 'SIGTERM');
          result.terminated.add(proc.pid);
        } catch (error: unknown) {
          const reason = describeError(error);
          this.logger.warn(`Failed to terminate pid=${proc.pid}: ${reason}`);
          result.errors.set(proc.pid, reason);
        }
      }
    }

    if (result.terminated.size > 0 && this.settleMs > 0) {
      this.logger.info(`Waiting ${this.settleMs}ms for terminated instances to release their resources`);
      await sleep(this.settleMs);
    }

    try {
      await this.registry.remove([ ...candidates.stale, ...result.terminated ]);
    } catch (error: unknown) {
      this.logger.warn(`Cannot prune process registry ${this.registry.location}: ${describeError(error)}`);
    }
    return result;
  }

  private async loadCandidates(): Promise<CandidateSet> {
    if (this.scanProcessTable) {
      try {
        return { live: await this.table.list(), stale: [] };
      } catch (error: unknown) {
        throw new ReconciliationFailure(`Cannot enumerate live processes: ${describeError(error)}`, error);
      }
    }

    let entries: RegistryEntry[];
    try {
      entries = await this.registry.list();
    } catch (error: unknown) {
      throw new ReconciliationFailure(`Cannot read process registry ${this.registry.location}: ${describeError(error)}`, error);
    }

    const live: LiveProcess[] = [];
    const stale: number[] = [];
    for (const entry of entries) {
      const commandLine = this.table.isRunning(entry.pid) ? await this.table.readCommandLine(entry.pid) : undefined;
      if (commandLine === undefined) {
        stale.push(entry.pid);
        continue;
      }
      // The pid was recycled by an unrelated process.
      if (!new RegExp(entry.identityPattern).test(commandLine)) {
        this.logger.warn(`Recorded pid=${entry.pid} (${entry.service}) now runs "${commandLine}", leaving it alone`);
        stale.push(entry.pid);
        continue;
      }
      live.push({ pid: entry.pid, commandLine });
    }
    return { live, stale };
  }
}
