import { Command } from 'commander';
import { DEFAULT_CONFIG_PATH, loadConfig } from '../../daemon/config';
import { DaemonStats, readStatsFile } from '../../daemon/stats';
import { errorMessage } from '../../errors';
import { output, error } from '../util/output';

interface StatsOptions {
	config: string;
	json?: boolean;
}

export function formatStats(stats: DaemonStats): string {
	return [
		`Started:    ${stats.startTime ?? 'never'}`,
		`Last poll:  ${stats.lastPollTime ?? 'never'}`,
		`Polls:      ${stats.totalPolls} (${stats.successfulPolls} successful, ${stats.failedPolls} failed)`,
		`Nodes:      ${stats.nodesSuccessful}/${stats.nodesProcessed} successful`,
		`Push:       ${stats.pushSuccessful} successful, ${stats.pushFailed} failed`,
	].join('\n');
}

export function registerStatsCommands(program: Command): void {
	program
		.command('stats')
		.description('Show statistics written by the running daemon')
		.option('-c, --config <path>', 'Configuration file', DEFAULT_CONFIG_PATH)
		.option('--json', 'Output JSON')
		.action((options: StatsOptions) => {
			try {
				const { monitoring } = loadConfig(options.config);
				const stats = readStatsFile(monitoring.statsFile);
				if (!stats) {
					error(`No statistics found at ${monitoring.statsFile}`);
				}
				output(options.json ? stats : formatStats(stats), { json: options.json });
			} catch (err) {
				error(errorMessage(err));
			}
		});
}
