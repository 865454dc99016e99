import type { CommandModule } from 'yargs';
import type { ReconciliationResult } from '../../supervisor';
import { EXIT_INTERNAL_ERROR, EXIT_OK } from '../lib/exit-codes';
import { createReconciler, exitForCliError, initLogger, prepareStation } from '../lib/station';

interface StopArgs {
  config?: string;
  env?: string;
  json: boolean;
}

export const stopCommand: CommandModule<object, StopArgs> = {
  command: 'stop',
  describe: 'Stop station services recorded by a previous run',
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
    let result: ReconciliationResult;
    try {
      const config = prepareStation(argv);
      initLogger(config, false);
      const reconciler = createReconciler(config);
      result = await reconciler.reconcile(config.services.map((service) => service.identityPattern));
    } catch (error: unknown) {
      exitForCliError(error);
    }

    const errors = [ ...result.errors ].map(([ pid, reason ]) => ({ pid, reason }));
    if (argv.json) {
      console.log(JSON.stringify({
        stopped: [ ...result.terminated ],
        errors,
      }, null, 2));
    } else if (result.matched.size === 0) {
      console.log('No running services found.');
    } else {
      for (const pid of result.terminated) {
        console.log(`Stopped pid ${pid}`);
      }
      for (const { pid, reason } of errors) {
        console.error(`Failed to stop pid ${pid}: ${reason}`);
      }
    }
    process.exit(errors.length > 0 ? EXIT_INTERNAL_ERROR : EXIT_OK);
  },
};
