import kill from 'tree-kill';
import type { ProcessKiller } from './types';

export const killProcessTree: ProcessKiller = (pid, signal) => new Promise((resolve, reject) => {
  kill(pid, signal, (err) => {
    if (err) {
      reject(err);
      return;
    }
    resolve();
  });
});
