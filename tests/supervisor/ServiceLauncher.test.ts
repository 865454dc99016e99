import os from 'node:os';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
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

import { LaunchError } from '../../src/supervisor/errors';
import { ServiceLauncher } from '../../src/supervisor/ServiceLauncher';
import type { ManagedService, ProcessHandle } from '../../src/supervisor/types';

const KEEP_ALIVE = 'setInterval(() => {}, 1000)';

class MockChildProcess extends EventEmitter {
  public stdout = new PassThrough();
  public stderr = new PassThrough();
  public pid = 4321;

  public constructor() {
    super();
    process.nextTick(() => this.emit('spawn'));
  }

  public finish(code: number): void {
    this.emit('exit', code, null);
    this.emit('close', code, null);
  }
}

describe('ServiceLauncher', () => {
  let tmpDir: string;
  let spawned: ProcessHandle[];

  function service(name: string, script: string, overrides: Partial<ManagedService> = {}): ManagedService {
    return {
      name,
      identityPattern: name,
      command: process.execPath,
      args: [ '-e', script ],
      cwd: tmpDir,
      logSink: path.join(tmpDir, 'logs', `${name}.log`),
      foreground: false,
      echoOutput: false,
      ...overrides,
    };
  }

  function track(handle: ProcessHandle): void {
    spawned.push(handle);
  }

  async function readSink(file: string, expected: string): Promise<string> {
    let content = '';
    await vi.waitFor(async () => {
      content = await fs.readFile(file, 'utf-8');
      expect(content).toContain(expected);
    }, { timeout: 2_000, interval: 20 });
    return content;
  }

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'station-launch-'));
    spawned = [];
  });

  afterEach(async () => {
    for (const handle of spawned) {
      if (handle.isRunning()) {
        process.kill(handle.pid, 'SIGKILL');
        await handle.exited;
      }
    }
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('reports a spawn failure when the command does not exist', async () => {
    const launcher = new ServiceLauncher();
    const target = service('missing', '', { command: path.join(tmpDir, 'no-such-binary'), args: [] });

    const error = await launcher.launch(target).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(LaunchError);
    expect(error).toMatchObject({ kind: 'SpawnFailure', service: 'missing' });
  });

  it('reports an early exit when the service dies during its grace period', async () => {
    const launcher = new ServiceLauncher();
    const target = service('icecast', 'console.error("bind failed"); process.exit(2)', { graceMs: 300 });

    const error = await launcher.launch(target, { onSpawned: track }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(LaunchError);
    expect(error).toMatchObject({
      kind: 'EarlyExit',
      service: 'icecast',
      code: 2,
      signal: null,
      outputTail: [ 'bind failed' ],
    });
    await readSink(target.logSink, 'bind failed');
  });

  it('returns a running handle once the grace period passes', async () => {
    const launcher = new ServiceLauncher();
    const onSpawned = vi.fn(track);

    const outcome = await launcher.launch(service('icecast', KEEP_ALIVE, { graceMs: 100 }), { onSpawned });

    expect(outcome.kind).toBe('running');
    expect(onSpawned).toHaveBeenCalledWith(outcome.handle);
    expect(outcome.handle.serviceName).toBe('icecast');
    expect(outcome.handle.isRunning()).toBe(true);

    process.kill(outcome.handle.pid, 'SIGTERM');
    await expect(outcome.handle.exited).resolves.toEqual({ code: null, signal: 'SIGTERM' });
    expect(outcome.handle.isRunning()).toBe(false);
  });

  it('waits for a foreground service to exit and keeps its output', async () => {
    const launcher = new ServiceLauncher();
    const target = service('liquidsoap', 'console.log("on air"); process.exit(3)', {
      foreground: true,
      echoOutput: true,
    });

    const outcome = await launcher.launch(target, { onSpawned: track });

    expect(outcome.kind).toBe('exited');
    if (outcome.kind === 'exited') {
      expect(outcome.status).toEqual({ code: 3, signal: null });
    }
    await readSink(target.logSink, 'on air');
  });

  it('appends to an existing log sink', async () => {
    const launcher = new ServiceLauncher();
    const target = service('liquidsoap', 'console.log("second")', { foreground: true });
    await fs.mkdir(path.dirname(target.logSink), { recursive: true });
    await fs.writeFile(target.logSink, 'first\n');

    await launcher.launch(target, { onSpawned: track });

    expect(await readSink(target.logSink, 'second')).toBe('first\nsecond\n');
  });

  it('lets service environment override the provisioned one', async () => {
    const launcher = new ServiceLauncher();
    const target = service('liquidsoap', 'console.log(`${process.env.STATION_A}-${process.env.STATION_B}`)', {
      foreground: true,
      env: { STATION_B: 'service' },
    });

    await launcher.launch(target, {
      env: { STATION_A: 'runtime', STATION_B: 'runtime' },
      onSpawned: track,
    });

    expect(await readSink(target.logSink, 'runtime-service')).toBe('runtime-service\n');
  });

  it('creates shared directories and the log sink directory before spawning', async () => {
    const shared = [ path.join(tmpDir, 'data'), path.join(tmpDir, 'music') ];
    const launcher = new ServiceLauncher({ sharedDirectories: shared });
    const target = service('liquidsoap', 'process.exit(0)', {
      foreground: true,
      logSink: path.join(tmpDir, 'nested', 'logs', 'liquidsoap.log'),
    });

    await launcher.launch(target, { onSpawned: track });

    for (const dir of [ ...shared, path.join(tmpDir, 'nested', 'logs') ]) {
      expect((await fs.stat(dir)).isDirectory()).toBe(true);
    }
  });

  it('treats a reachable readiness probe as up', async () => {
    const connect = vi.fn()
      .mockResolvedValueOnce(false)
      .mockResolvedValueOnce(true);
    const launcher = new ServiceLauncher({ connect });
    const target = service('icecast', KEEP_ALIVE, {
      readiness: { host: '127.0.0.1', port: 8000, attempts: 5, intervalMs: 10, timeoutMs: 50 },
    });

    const outcome = await launcher.launch(target, { onSpawned: track });

    expect(outcome.kind).toBe('running');
    expect(connect).toHaveBeenCalledTimes(2);
    expect(connect).toHaveBeenCalledWith('127.0.0.1', 8000, 50);
  });

  it('reports a service that never becomes reachable', async () => {
    const connect = vi.fn().mockResolvedValue(false);
    const launcher = new ServiceLauncher({ connect });
    const target = service('icecast', KEEP_ALIVE, {
      readiness: { host: '127.0.0.1', port: 8000, attempts: 3, intervalMs: 10, timeoutMs: 50 },
    });

    const error = await launcher.launch(target, { onSpawned: track }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(LaunchError);
    expect(error).toMatchObject({ kind: 'NotReady', service: 'icecast' });
    expect(connect).toHaveBeenCalledTimes(3);
  });

  it('stops waiting when the launch is aborted', async () => {
    const launcher = new ServiceLauncher();
    const controller = new AbortController();

    const error = await launcher.launch(service('icecast', KEEP_ALIVE, { graceMs: 10_000 }), {
      signal: controller.signal,
      onSpawned: (handle) => {
        track(handle);
        controller.abort();
      },
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(Error);
    expect(error).toMatchObject({ name: 'AbortError' });
  });

  it('spawns nothing once the launch has been aborted', async () => {
    const processFactory = vi.fn();
    const launcher = new ServiceLauncher({ processFactory });
    const controller = new AbortController();
    controller.abort();
    const target = service('icecast', KEEP_ALIVE, { graceMs: 100 });

    const error = await launcher.launch(target, { signal: controller.signal, onSpawned: track }).catch((err: unknown) => err);

    expect(error).toMatchObject({ name: 'AbortError' });
    expect(processFactory).not.toHaveBeenCalled();
    expect(spawned).toEqual([]);
    await expect(fs.stat(path.dirname(target.logSink))).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('hands the command, working directory and environment to the process factory', async () => {
    const child = new MockChildProcess();
    const processFactory = vi.fn().mockReturnValue(child);
    const launcher = new ServiceLauncher({ processFactory });
    const target = service('liquidsoap', '', {
      command: 'liquidsoap',
      args: [ 'config/station.liq' ],
      foreground: true,
      env: { LIQ_DEBUG: '1' },
    });

    const pending = launcher.launch(target, {
      env: { VIRTUAL_ENV: '/srv/radio/.venv' },
      onSpawned: (handle) => {
        expect(handle.pid).toBe(4321);
        child.stdout.write('on air\n');
        child.finish(0);
      },
    });

    await expect(pending).resolves.toMatchObject({ kind: 'exited', status: { code: 0, signal: null } });
    expect(processFactory).toHaveBeenCalledWith('liquidsoap', [ 'config/station.liq' ], expect.objectContaining({
      cwd: tmpDir,
      stdio: [ 'ignore', 'pipe', 'pipe' ],
      env: expect.objectContaining({ VIRTUAL_ENV: '/srv/radio/.venv', LIQ_DEBUG: '1' }),
    }));
  });
});
