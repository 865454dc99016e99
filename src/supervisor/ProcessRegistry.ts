import { promises as fs } from 'node:fs';
import path from 'node:path';
import { getLoggerFor } from 'global-logger-factory';

export interface RegistryEntry {
  schemaVersion: '1.0';
  service: string;
  pid: number;
  identityPattern: string;
  commandLine: string;
  logSink: string;
  startTime: string;
}

/**
 * Persisted record of every process the orchestrator launched.
 * Reconciliation reads candidates from here instead of scanning arbitrary system processes.
 */
export class ProcessRegistry {
  private readonly logger = getLoggerFor(this);
  private queue: Promise<void> = Promise.resolve();

  public constructor(private readonly filePath: string) {}

  public get location(): string {
    return this.filePath;
  }

  public async list(): Promise<RegistryEntry[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      if (!Array.isArray(parsed)) {
        this.logger.warn(`Ignoring process registry ${this.filePath}: expected a JSON array`);
        return [];
      }
      return parsed.filter(isRegistryEntry);
    } catch (error: unknown) {
      this.logger.warn(`Ignoring unreadable process registry ${this.filePath}: ${String(error)}`);
      return [];
    }
  }

  public record(entry: RegistryEntry): Promise<void> {
    return this.serialize(async() => {
      const entries = await this.list();
      const next = entries.filter((item) => item.pid !== entry.pid);
      next.push(entry);
      await this.write(next);
    });
  }

  public remove(pids: Iterable<number>): Promise<void> {
    const drop = new Set(pids);
    if (drop.size === 0) {
      return Promise.resolve();
    }
    return this.serialize(async() => {
      const entries = await this.list();
      const next = entries.filter((item) => !drop.has(item.pid));
      if (next.length !== entries.length) {
        await this.write(next);
      }
    });
  }

  // Read-modify-write cycles must not interleave.
  private serialize(task: () => Promise<void>): Promise<void> {
    const run = this.queue.then(task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async write(entries: RegistryEntry[]): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    // Atomic replace.
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(entries, null, 2), 'utf-8');
    await fs.rename(tmp, this.filePath);
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRegistryEntry(record: unknown): record is RegistryEntry {
  return isRecord(record) &&
    typeof record.pid === 'number' &&
    Number.isInteger(record.pid) &&
    record.pid > 0 &&
    typeof record.service === 'string' &&
    typeof record.identityPattern === 'string' &&
    typeof record.commandLine === 'string' &&
    typeof record.logSink === 'string' &&
    typeof record.startTime === 'string';
}
