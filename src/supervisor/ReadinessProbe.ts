import net from 'node:net';
import { setTimeout as sleep } from 'node:timers/promises';
import type { ReadinessProbeConfig } from './types';

export type ConnectFn = (host: string, port: number, timeoutMs: number) => Promise<boolean>;

export const tryConnect: ConnectFn = (host, port, timeoutMs) => new Promise((resolve) => {
  const socket = net.createConnection({ host, port });
  const finish = (ok: boolean): void => {
    socket.removeAllListeners();
    socket.destroy();
    resolve(ok);
  };
  socket.setTimeout(timeoutMs);
  socket.once('connect', () => finish(true));
  socket.once('timeout', () => finish(false));
  socket.once('error', () => finish(false));
});

export type ProbeResult = 'ready' | 'exhausted' | 'exited';

/**
 * Bounded-retry TCP probe. Stops early when `isAlive` reports the process has gone.
 */
export async function waitUntilReachable(
  config: ReadinessProbeConfig,
  isAlive: () => boolean,
  options: { connect?: ConnectFn; signal?: AbortSignal } = {},
): Promise<ProbeResult> {
  const connect = options.connect ?? tryConnect;
  for (let attempt = 1; attempt <= config.attempts; attempt++) {
    options.signal?.throwIfAborted();
    if (!isAlive()) {
      return 'exited';
    }
    if (await connect(config.host, config.port, config.timeoutMs)) {
      return 'ready';
    }
    if (attempt < config.attempts) {
      await sleep(config.intervalMs, undefined, { signal: options.signal });
    }
  }
  return isAlive() ? 'exhausted' : 'exited';
}
