import type { CommandModule } from 'yargs';
import { errorMessage, RecoveryRuntimeError, RecoveryTimedOutError } from '../../errors';
import type { RecoveryAttempt } from '../../recovery/RecoveryController';
import { createContext, EXIT_FAILURE, EXIT_OK, withServiceOptions, type ServiceArgs } from '../options';

export const startCommand: CommandModule<object, ServiceArgs> = {
  command: 'start',
  describe: 'Force one recovery cycle: stop, remove and recreate the container, then wait for readiness',
  builder: (yargs) => withServiceOptions(yargs),
  handler: async (argv) => {
    try {
      const { descriptor, recovery } = createContext(argv);
      const attempt = await recovery.recover(descriptor);
      const failure = toFailure(attempt);
      if (failure) {
        console.error(failure.message);
        process.exitCode = EXIT_FAILURE;
        return;
      }
      console.log(`${descriptor.name} is ready (${attempt.attemptsConsumed} readiness check(s))`);
      process.exitCode = EXIT_OK;
    } catch (error: unknown) {
      console.error(`start failed: ${errorMessage(error)}`);
      process.exitCode = EXIT_FAILURE;
    }
  },
};

export function toFailure(attempt: RecoveryAttempt): Error | undefined {
  switch (attempt.outcome) {
    case 'succeeded':
      return undefined;
    case 'timed-out':
      return new RecoveryTimedOutError(attempt.service, attempt.attemptsConsumed);
    case 'runtime-error':
    case 'cancelled':
      return new RecoveryRuntimeError(attempt.service, attempt.error ?? attempt.outcome);
  }
}
