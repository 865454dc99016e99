import type { CommandModule } from 'yargs';
import { isProcessRunning } from '../../supervisor';
import { EXIT_NOT_RUNNING, EXIT_OK } from '../lib/exit-codes';
import { createRegistry, exitForCliError, initLogger, prepareStation } from '../lib/station';

interface StatusArgs {
  config?: string;
  env?: string;
  json: boolean;
}

export interface ServiceStatusRow {
  service: string;
  pid: number;
  running: boolean;
  uptime?: number;
  logSink: string;
}

export const statusCommand: CommandModule<object, StatusArgs> = {
  command: 'status',
  describe: 'Show services recorded by the last run',
  builder: (yargs) =>
    yargs
      .option('config', {
        alias: 'c',
        type: 'string',
        description: 'Path to station config',
      })
      .option('env', {
        alias: 'e',
        type: 'string',
        description: 'Path to .env file',
      })
      .option('json', {
        type: 'boolean',
        description: 'Output as JSON',
        default: false,
      }),
  handler: async (argv) => {
    let rows: ServiceStatusRow[];
    try {
      const config = prepareStation(argv);
      initLogger(config, false);
      const entries = await createRegistry(config).list();
      const now = Date.now();
      rows = entries.map((entry) => {
        const running = isProcessRunning(entry.pid);
        const started = Date.parse(entry.startTime);
        return {
          service: entry.service,
          pid: entry.pid,
          running,
          uptime: running && Number.isFinite(started) ? now - started : undefined,
          logSink: entry.logSink,
        };
      });
    } catch (error: unknown) {
      exitForCliError(error);
    }

    if (argv.json) {
      console.log(JSON.stringify(rows, null, 2));
    } else if (rows.length === 0) {
      console.log('No services recorded.');
    } else {
      for (const row of rows) {
        const icon = row.running ? '●' : '○';
        const uptime = row.uptime != null ? ` uptime=${formatUptime(row.uptime)}` : '';
        console.log(`${icon} ${row.service.padEnd(12)} ${row.running ? 'running' : 'stopped'} pid=${row.pid}${uptime}`);
      }
    }
    process.exit(rows.some((row) => row.running) ? EXIT_OK : EXIT_NOT_RUNNING);
  },
};

export function formatUptime(ms: number): string {
  const s = Math.floor(ms / 1000);
  if (s < 60) return `${s}s`;
  const m = Math.floor(s / 60);
  if (m < 60) return `${m}m${s % 60}s`;
  const h = Math.floor(m / 60);
  return `${h}h${m % 60}m`;
}
