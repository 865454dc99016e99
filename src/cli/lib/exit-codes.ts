import type { ExitOutcome } from '../../supervisor/types';

export const EXIT_OK = 0;
export const EXIT_NOT_RUNNING = 10;
export const EXIT_INTERNAL_ERROR = 50;
export const EXIT_PROVISION_FAILED = 70;
export const EXIT_RECONCILE_FAILED = 71;
export const EXIT_LAUNCH_FAILED = 72;
export const EXIT_CONFIG_ERROR = 78;

export function exitCodeFor(outcome: ExitOutcome): number {
  switch (outcome.kind) {
    case 'foregroundExit':
      return outcome.code;
    case 'cancelled':
      return EXIT_OK;
    case 'provisionFailed':
      return EXIT_PROVISION_FAILED;
    case 'reconcileFailed':
      return EXIT_RECONCILE_FAILED;
    case 'launchFailed':
      return EXIT_LAUNCH_FAILED;
  }
}
