import { execFile } from 'node:child_process';
import { promises as fs } from 'node:fs';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export interface LiveProcess {
  pid: number;
  commandLine: string;
}

export interface ProcessTableOptions {
  psBin?: string;
  procRoot?: string;
}

/**
 * Reads process command lines from the operating system.
 * Prefers `/proc` on Linux and falls back to `ps` elsewhere.
 */
export class ProcessTable {
  private readonly psBin: string;
  private readonly procRoot: string;

  public constructor(options: ProcessTableOptions = {}) {
    this.psBin = options.psBin ?? 'ps';
    this.procRoot = options.procRoot ?? '/proc';
  }

  public isRunning(pid: number): boolean {
    return isProcessRunning(pid);
  }

  public async readCommandLine(pid: number): Promise<string | undefined> {
    const fromProc = await this.readProcCmdline(pid);
    if (fromProc !== undefined) {
      return fromProc;
    }
    try {
      const { stdout } = await execFileAsync(this.psBin, [ 'ww', '-p', String(pid), '-o', 'args=' ]);
      const cmd = stdout.trim();
      return cmd.length > 0 ? cmd : undefined;
    } catch {
      // ps exits non-zero when the pid is gone
      return undefined;
    }
  }

  /**
   * Lists every live process. Throws when the process table cannot be read at all.
   */
  public async list(): Promise<LiveProcess[]> {
    const { stdout } = await execFileAsync(this.psBin, [ 'ww', '-eo', 'pid=,args=' ], { maxBuffer: 16 * 1024 * 1024 });
    const rows: LiveProcess[] = [];
    for (const line of stdout.split('\n')) {
      const parsed = parsePidPrefixedLine(line);
      if (parsed) {
        rows.push(parsed);
      }
    }
    return rows;
  }

  private async readProcCmdline(pid: number): Promise<string | undefined> {
    if (process.platform !== 'linux') {
      return undefined;
    }
    try {
      const raw = await fs.readFile(`${this.procRoot}/${pid}/cmdline`);
      return formatProcCmdline(raw);
    } catch {
      return undefined;
    }
  }
}

export function isProcessRunning(pid?: number): boolean {
  if (!pid || pid <= 0) {
    return false;
  }

  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

/** `/proc/<pid>/cmdline` separates arguments with NUL bytes. */
export function formatProcCmdline(raw: Buffer): string | undefined {
  const cmd = raw.toString('utf-8').split('\u0000').filter(Boolean).join(' ').trim();
  return cmd.length > 0 ? cmd : undefined;
}

export function parsePidPrefixedLine(line: string): LiveProcess | undefined {
  const match = /^(\d+)\s+(.*)$/.exec(line.trim());
  if (!match) {
    return undefined;
  }
  const pid = Number(match[1]);
  if (!Number.isFinite(pid) || pid <= 0) {
    return undefined;
  }
  return { pid, commandLine: match[2] };
}
