import { Command } from 'commander';
import { DaemonConfig, DEFAULT_CONFIG_PATH, loadConfig } from '../../daemon/config';
import { DeliveryCoordinator } from '../../daemon/deliveryCoordinator';
import { Logger } from '../../daemon/log';
import { PollScheduler } from '../../daemon/pollScheduler';
import { RunFlag } from '../../daemon/runFlag';
import { StatsTracker } from '../../daemon/stats';
import { errorMessage } from '../../errors';
import { renderExposition } from '../../metrics/exposition';
import { snapshotLines } from '../../metrics/types';
import { loadConfiguredRoster } from '../../roster/rosterLoader';
import { MeshtasticCliSource } from '../../telemetry/meshtasticCli';
import { error } from '../util/output';

interface OnceOptions {
	config: string;
	output?: string;
	individual?: boolean;
}

/**
 * One-shot variant of the config: only the directory sink, no stats file
 */
function oneShotConfig(config: DaemonConfig, options: OnceOptions): DaemonConfig {
	return {
		...config,
		output: {
			...config.output,
			directory: options.output ?? '',
			individualFiles: options.individual ?? config.output.individualFiles,
		},
		push: { ...config.push, url: '' },
		monitoring: { ...config.monitoring, enableStats: false },
	};
}

export function registerPollCommands(program: Command): void {
	program
		.command('once')
		.description('Poll every device once and print (or write) the metrics')
		.option('-c, --config <path>', 'Configuration file', DEFAULT_CONFIG_PATH)
		.option('-o, --output <dir>', 'Write .prom files to this directory instead of stdout')
		.option('-i, --individual', 'One file per device (with --output)')
		.action(async (options: OnceOptions) => {
			let config: DaemonConfig;
			try {
				config = oneShotConfig(loadConfig(options.config), options);
			} catch (err) {
				error(errorMessage(err));
			}

			// stdout carries the metrics; log lines go to stderr
			const logger = new Logger({
				level: config.daemon.logLevel,
				sink: line => process.stderr.write(line + '\n'),
			});

			try {
				const roster = await loadConfiguredRoster(config.devices);
				const source = MeshtasticCliSource.fromConfig(config.meshtastic, logger);
				const connected = await source.connect(config.meshtastic.mode, config.meshtastic.port);
				if (!connected.ok) {
					error(`Failed to connect to meshtastic device: ${connected.error}`);
				}

				const stats = new StatsTracker();
				try {
					const scheduler = new PollScheduler({
						roster,
						source,
						coordinator: new DeliveryCoordinator(config, stats, logger),
						stats,
						runFlag: new RunFlag(),
						getConfig: () => config,
						logger,
					});
					const result = await scheduler.runCycle();

					if (!options.output && result.snapshot) {
						process.stdout.write(renderExposition(snapshotLines(result.snapshot)));
					}
					if (result.delivery && !result.delivery.fileOk) {
						error(result.delivery.error);
					}
				} finally {
					await source.close();
				}
			} catch (err) {
				error(errorMessage(err));
			}
		});
}
