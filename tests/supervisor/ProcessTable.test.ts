import { describe, expect, it } from 'vitest';
import { formatProcCmdline, isProcessRunning, parsePidPrefixedLine, ProcessTable } from '../../src/supervisor/ProcessTable';

describe('ProcessTable', () => {
  it('parses ps rows', () => {
    expect(parsePidPrefixedLine('  4242 icecast -c config/icecast.xml')).toEqual({
      pid: 4242,
      commandLine: 'icecast -c config/icecast.xml',
    });
    expect(parsePidPrefixedLine('PID COMMAND')).toBeUndefined();
    expect(parsePidPrefixedLine('0 swapper')).toBeUndefined();
  });

  it('joins NUL separated cmdline arguments', () => {
    const raw = Buffer.from('liquidsoap\u0000config/station.liq\u0000', 'utf-8');
    expect(formatProcCmdline(raw)).toBe('liquidsoap config/station.liq');
    expect(formatProcCmdline(Buffer.alloc(0))).toBeUndefined();
  });

  it('reports liveness of pids', () => {
    expect(isProcessRunning(process.pid)).toBe(true);
    expect(isProcessRunning(undefined)).toBe(false);
    expect(isProcessRunning(-1)).toBe(false);
  });

  it('reads the command line of the current process', async () => {
    const table = new ProcessTable();
    const commandLine = await table.readCommandLine(process.pid);
    expect(commandLine).toContain('node');
  });
});
