import { Command } from 'commander';
import { DaemonConfig, DEFAULT_CONFIG_PATH, loadConfig } from '../../daemon/config';
import { errorMessage } from '../../errors';
import { loadConfiguredRoster } from '../../roster/rosterLoader';
import { output, error } from '../util/output';

export function registerConfigCommands(program: Command): void {
	program
		.command('test-config')
		.description('Validate the configuration and the device roster')
		.option('-c, --config <path>', 'Configuration file', DEFAULT_CONFIG_PATH)
		.action(async (options: { config: string }) => {
			let config: DaemonConfig;
			try {
				config = loadConfig(options.config);
			} catch (err) {
				error(`Configuration error: ${errorMessage(err)}`);
			}

			output(config, { json: true });

			try {
				const roster = await loadConfiguredRoster(config.devices);
				output(`Device roster OK: ${roster.length} devices in ${config.devices.file}`);
			} catch (err) {
				error(`Device roster error: ${errorMessage(err)}`);
			}

			output('Configuration is valid');
		});
}
