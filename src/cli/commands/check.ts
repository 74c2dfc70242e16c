import type { CommandModule } from 'yargs';
import { errorMessage } from '../../errors';
import { createContext, EXIT_FAILURE, EXIT_OK, withServiceOptions, type ServiceArgs } from '../options';

interface CheckArgs extends ServiceArgs {
  json: boolean;
}

export const checkCommand: CommandModule<object, CheckArgs> = {
  command: 'check',
  describe: 'Run a single health check (exit 0 when healthy)',
  builder: (yargs) =>
    withServiceOptions(yargs)
      .option('json', {
        type: 'boolean',
        description: 'Output as JSON',
        default: false,
      }),
  handler: async (argv) => {
    try {
      const { descriptor, prober } = createContext(argv);
      const report = await prober.inspect(descriptor);

      if (argv.json) {
        console.log(JSON.stringify({ service: descriptor.name, status: report.status, signal: report.signal }, null, 2));
      } else {
        console.log(`${descriptor.name}: ${report.status}`);
        for (const problem of report.errors) {
          console.log(`  - ${problem}`);
        }
      }
      process.exitCode = report.status === 'healthy' ? EXIT_OK : EXIT_FAILURE;
    } catch (error: unknown) {
      console.error(`check failed: ${errorMessage(error)}`);
      process.exitCode = EXIT_FAILURE;
    }
  },
};
