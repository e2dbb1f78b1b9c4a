import * as fs from 'fs';
import { Command } from 'commander';
import { DEFAULT_CONFIG_PATH, loadConfig } from '../../daemon/config';
import { errorMessage } from '../../errors';
import { Device } from '../../metrics/types';
import { encryptRoster } from '../../roster/crypto';
import { loadConfiguredRoster, parseRoster, readPasswordFile } from '../../roster/rosterLoader';
import { writeFileAtomic } from '../../sinks/atomicWrite';
import { formatTable } from '../formatters/table';
import { output, error } from '../util/output';

interface ListOptions {
	config: string;
	verbose?: boolean;
}

interface EncryptOptions {
	passwordFile: string;
}

export function registerDeviceCommands(program: Command): void {
	program
		.command('list-devices')
		.description('List the devices in the roster')
		.option('-c, --config <path>', 'Configuration file', DEFAULT_CONFIG_PATH)
		.option('-v, --verbose', 'Show every roster column')
		.action(async (options: ListOptions) => {
			try {
				const roster = await loadConfiguredRoster(loadConfig(options.config).devices);
				if (!options.verbose) {
					output(roster.map(device => device.nodeId).join('\n'));
					return;
				}
				output(formatTable<Device>(roster, [
					{ title: 'NODE ID', value: d => d.nodeId },
					{ title: 'CONTACT', value: d => d.contactName },
					{ title: 'LOCATION', value: d => d.location },
					{ title: 'LATITUDE', value: d => d.latitude, align: 'right' },
					{ title: 'LONGITUDE', value: d => d.longitude, align: 'right' },
				]));
			} catch (err) {
				error(errorMessage(err));
			}
		});

	program
		.command('encrypt-roster <input> <output>')
		.description('Encrypt a plain CSV roster for use with devices.encrypted')
		.requiredOption('--password-file <path>', 'File holding the roster password')
		.action(async (input: string, outputPath: string, options: EncryptOptions) => {
			try {
				const plain = fs.readFileSync(input, 'utf-8');
				const devices = parseRoster(plain);
				const password = readPasswordFile(options.passwordFile);
				await writeFileAtomic(outputPath, encryptRoster(plain, password), 0o600);
				output(`Encrypted roster with ${devices.length} devices written to ${outputPath}`);
			} catch (err) {
				error(errorMessage(err));
			}
		});
}
