import type { CommandModule } from 'yargs';
import { getLoggerFor } from 'global-logger-factory';
import { errorMessage } from '../../errors';
import { SupervisionLoop } from '../../supervisor/SupervisionLoop';
import type { LoopSummary } from '../../supervisor/types';
import { createContext, EXIT_FAILURE, EXIT_OK, withServiceOptions, type ServiceArgs } from '../options';

export const monitorCommand: CommandModule<object, ServiceArgs> = {
  command: 'monitor',
  describe: 'Supervise the service in the foreground until SIGINT/SIGTERM',
  builder: (yargs) => withServiceOptions(yargs),
  handler: async (argv) => {
    try {
      const { descriptor, prober, recovery, notifier } = createContext(argv);
      const loop = new SupervisionLoop({ descriptor, prober, recovery, notifier });
      await runUntilSignal(loop);
      process.exitCode = EXIT_OK;
    } catch (error: unknown) {
      console.error(`monitor failed: ${errorMessage(error)}`);
      process.exitCode = EXIT_FAILURE;
    }
  },
};

async function runUntilSignal(loop: SupervisionLoop): Promise<LoopSummary> {
  const logger = getLoggerFor('Monitor');
  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      return;
    }
    logger.info(`Received ${signal}, stopping after the current step...`);
    controller.abort();
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);

  try {
    return await loop.run(controller.signal);
  } finally {
    process.off('SIGTERM', shutdown);
    process.off('SIGINT', shutdown);
  }
}
