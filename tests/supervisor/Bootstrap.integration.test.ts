import os from 'node:os';
import path from 'node:path';
import { spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { promises as fs } from 'node:fs';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('global-logger-factory', () => ({
  getLoggerFor: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { EnvironmentProvisioner } from '../../src/runtime/EnvironmentProvisioner';
import { BootstrapSequencer } from '../../src/supervisor/BootstrapSequencer';
import { ProcessReconciler } from '../../src/supervisor/ProcessReconciler';
import { ProcessRegistry } from '../../src/supervisor/ProcessRegistry';
import { isProcessRunning, ProcessTable } from '../../src/supervisor/ProcessTable';
import { ServiceLauncher } from '../../src/supervisor/ServiceLauncher';
import type { ManagedService, ProcessKiller } from '../../src/supervisor/types';

const NODE = process.execPath;
const STALE_MARKER = 'station-stale-marker';

const signalProcess: ProcessKiller = async (pid, signal) => {
  process.kill(pid, signal);
};

describe('Bootstrap', () => {
  let tmpDir: string;
  let runtimeDir: string;
  let registry: ProcessRegistry;

  let signals: EventEmitter;

  function createSequencer(): BootstrapSequencer {
    const provisioner = new EnvironmentProvisioner({
      projectRoot: tmpDir,
      runtimeDir,
      runtimeBinDir: path.join(runtimeDir, 'bin'),
      createCommand: [ NODE, '-e', 'require("fs").mkdirSync(process.argv[1])', runtimeDir ],
      installCommand: [ NODE, '-e', 'process.exit(0)' ],
      manifest: path.join(tmpDir, 'requirements.txt'),
    });
    return new BootstrapSequencer({
      provisioner,
      reconciler: new ProcessReconciler({ registry, table: new ProcessTable(), kill: signalProcess, settleMs: 0 }),
      launcher: new ServiceLauncher({ sharedDirectories: [ path.join(tmpDir, 'data') ] }),
      registry,
      kill: signalProcess,
      signals,
      stopTimeoutMs: 2_000,
    });
  }

  function services(): ManagedService[] {
    return [
      {
        name: 'DistributionServer',
        identityPattern: 'setInterval',
        command: NODE,
        args: [ '-e', 'setInterval(() => {}, 1000)' ],
        cwd: tmpDir,
        logSink: path.join(tmpDir, 'logs', 'distribution.log'),
        graceMs: 200,
        foreground: false,
        echoOutput: false,
      },
      {
        name: 'StreamingEngine',
        identityPattern: 'VIRTUAL_ENV',
        command: NODE,
        args: [ '-e', 'console.log(process.env.VIRTUAL_ENV); process.exit(3)' ],
        cwd: tmpDir,
        logSink: path.join(tmpDir, 'logs', 'streaming.log'),
        foreground: true,
        echoOutput: true,
      },
    ];
  }

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'station-bootstrap-'));
    runtimeDir = path.join(tmpDir, '.venv');
    registry = new ProcessRegistry(path.join(tmpDir, '.station', 'processes.json'));
    signals = new EventEmitter();
    await fs.writeFile(path.join(tmpDir, 'requirements.txt'), 'requests\n');
  });

  afterEach(async () => {
    for (const entry of await registry.list()) {
      if (isProcessRunning(entry.pid)) {
        process.kill(entry.pid, 'SIGKILL');
      }
    }
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('runs the whole stack and propagates the foreground exit code', async () => {
    const sequencer = createSequencer();
    let distributionAliveAtSecondLaunch = false;
    sequencer.setTransitionHandler((state) => {
      if (state.phase === 'launching' && state.index === 1) {
        const [ distribution ] = sequencer.getHandles();
        distributionAliveAtSecondLaunch = distribution.isRunning() && isProcessRunning(distribution.pid);
      }
    });

    const outcome = await sequencer.run(services());

    expect(outcome).toEqual({ kind: 'foregroundExit', service: 'StreamingEngine', code: 3 });
    expect(distributionAliveAtSecondLaunch).toBe(true);

    const [ distribution ] = sequencer.getHandles();
    expect(distribution.isRunning()).toBe(false);
    expect(isProcessRunning(distribution.pid)).toBe(false);

    expect((await fs.stat(runtimeDir)).isDirectory()).toBe(true);
    expect((await fs.stat(path.join(tmpDir, 'data'))).isDirectory()).toBe(true);
    expect(await registry.list()).toEqual([]);
    await vi.waitFor(async () => {
      expect(await fs.readFile(path.join(tmpDir, 'logs', 'streaming.log'), 'utf-8')).toBe(`${runtimeDir}\n`);
    }, { timeout: 2_000, interval: 20 });
  });

  it('leaves nothing running when a signal arrives as a launch begins', async () => {
    const sequencer = createSequencer();
    sequencer.setTransitionHandler((state) => {
      if (state.phase === 'launching' && state.index === 0) {
        signals.emit('SIGTERM', 'SIGTERM');
      }
    });

    const outcome = await sequencer.run(services());

    expect(outcome).toEqual({ kind: 'cancelled', signal: 'SIGTERM' });
    const alive = sequencer.getHandles().filter((handle) => isProcessRunning(handle.pid));
    expect(alive).toEqual([]);
    expect(await registry.list()).toEqual([]);
  });

  it('terminates an instance left behind by an earlier run', async () => {
    const stale = spawn(NODE, [ '-e', 'setInterval(() => {}, 1000)', STALE_MARKER ], { stdio: 'ignore' });
    const staleExit = new Promise<NodeJS.Signals | null>((resolve) => {
      stale.once('exit', (_code, signal) => resolve(signal));
    });
    await new Promise<void>((resolve, reject) => {
      stale.once('spawn', resolve);
      stale.once('error', reject);
    });
    const stalePid = stale.pid;
    if (stalePid === undefined) {
      throw new Error('stale process has no pid');
    }
    await registry.record({
      schemaVersion: '1.0',
      service: 'DistributionServer',
      pid: stalePid,
      identityPattern: STALE_MARKER,
      commandLine: `node ${STALE_MARKER}`,
      logSink: path.join(tmpDir, 'logs', 'distribution.log'),
      startTime: new Date().toISOString(),
    });

    const [ distribution, streaming ] = services();
    const outcome = await createSequencer().run([ { ...distribution, identityPattern: STALE_MARKER }, streaming ]);

    expect(outcome).toMatchObject({ kind: 'foregroundExit', code: 3 });
    await expect(staleExit).resolves.toBe('SIGTERM');
  });
});
