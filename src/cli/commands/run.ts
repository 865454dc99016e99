import type { CommandModule } from 'yargs';
import { exitCodeFor } from '../lib/exit-codes';
import { createSequencer, exitForCliError, initLogger, prepareStation } from '../lib/station';

interface RunArgs {
  config?: string;
  env?: string;
}

export const runCommand: CommandModule<object, RunArgs> = {
  command: [ 'run', '$0' ],
  describe: 'Provision the runtime, replace stale instances and start the station',
  builder: (yargs) =>
    yargs
      .option('config', {
        alias: 'c',
        type: 'string',
        description: 'Path to station config (default: config/station.json)',
      })
      .option('env', {
        alias: 'e',
        type: 'string',
        description: 'Path to .env file',
      }),
  handler: async (argv) => {
    try {
      const config = prepareStation(argv);
      const loggerFactory = initLogger(config);
      const sequencer = createSequencer(config);
      const outcome = await sequencer.run(config.services, config.runtime.manifest);
      await loggerFactory.flush();
      process.exit(exitCodeFor(outcome));
    } catch (error: unknown) {
      exitForCliError(error);
    }
  },
};
