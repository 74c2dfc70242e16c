import type { CommandModule } from 'yargs';
import { errorMessage } from '../../errors';
import { renderStatusReport, StatusReporter } from '../../status/StatusReporter';
import { createContext, EXIT_OK, withServiceOptions, type ServiceArgs } from '../options';

interface StatusArgs extends ServiceArgs {
  json: boolean;
  lines: number;
}

export const statusCommand: CommandModule<object, StatusArgs> = {
  command: 'status',
  describe: 'Show service status and recent logs',
  builder: (yargs) =>
    withServiceOptions(yargs)
      .option('json', {
        type: 'boolean',
        description: 'Output as JSON',
        default: false,
      })
      .option('lines', {
        type: 'number',
        description: 'Number of log lines to show',
        default: 10,
      }),
  handler: async (argv) => {
    // Informational only: always exits 0.
    try {
      const { descriptor, settings, runtime, prober } = createContext(argv);
      const reporter = new StatusReporter({
        runtime,
        prober,
        logFile: settings.logRotate ? undefined : settings.logFile,
        logLines: argv.lines,
      });
      const report = await reporter.status(descriptor);

      if (argv.json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }
      console.log(renderStatusReport(report));
    } catch (error: unknown) {
      console.error(`status unavailable: ${errorMessage(error)}`);
    }
    process.exitCode = EXIT_OK;
  },
};
