import path from 'node:path';
import type { CommandModule } from 'yargs';
import { errorMessage, PermissionError } from '../../errors';
import { SystemctlInitSystem } from '../../install/InitSystem';
import { Installer } from '../../install/Installer';
import { createContext, EXIT_FAILURE, EXIT_OK, settingsToArgs, withServiceOptions, type ServiceArgs } from '../options';

interface InstallArgs extends ServiceArgs {
  'unit-dir': string;
  'systemctl-bin': string;
}

export const installCommand: CommandModule<object, InstallArgs> = {
  command: 'install',
  describe: 'Install the watchdog as a systemd service, enable it on boot and start it',
  builder: (yargs) =>
    withServiceOptions(yargs)
      .option('unit-dir', {
        type: 'string',
        description: 'Directory for the unit file',
        default: '/etc/systemd/system',
      })
      .option('systemctl-bin', {
        type: 'string',
        description: 'systemctl binary',
        default: 'systemctl',
      }),
  handler: async (argv) => {
    try {
      const { descriptor, settings } = createContext(argv);
      const installer = new Installer({
        initSystem: new SystemctlInitSystem({ unitDir: argv['unit-dir'], systemctl: argv['systemctl-bin'] }),
      });
      const scriptPath = path.resolve(process.argv[1] ?? __filename);
      const result = await installer.install(descriptor, {
        command: [ process.execPath, scriptPath ],
        workingDirectory: process.cwd(),
        extraArgs: settingsToArgs(settings),
      });

      console.log(`Installed ${result.unitPath}`);
      console.log(`  systemctl status ${result.unitName}    # service status`);
      console.log(`  journalctl -u ${result.unitName} -f   # live logs`);
      console.log(`  tail -f ${settings.logFile}`);
      process.exitCode = EXIT_OK;
    } catch (error: unknown) {
      if (error instanceof PermissionError) {
        console.error(`${error.message}`);
        console.error('Run: sudo service-watchdog install');
      } else {
        console.error(`install failed: ${errorMessage(error)}`);
      }
      process.exitCode = EXIT_FAILURE;
    }
  },
};
