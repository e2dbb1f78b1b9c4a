import { Command } from 'commander';
import { DEFAULT_CONFIG_PATH, loadConfig } from '../../daemon/config';
import { LifecycleController } from '../../daemon/lifecycle';
import { getRunningPid, signalDaemon } from '../../daemon/pidFile';
import { errorMessage } from '../../errors';
import { output, error } from '../util/output';

interface RunOptions {
	config: string;
	foreground?: boolean;
	pidFile?: string;
	logFile?: string;
	user?: string;
	group?: string;
}

interface ControlOptions {
	config: string;
	pidFile?: string;
}

function resolvePidFile(options: ControlOptions): string {
	if (options.pidFile) {
		return options.pidFile;
	}
	const pidFile = loadConfig(options.config).daemon.pidFile;
	if (!pidFile) {
		throw new Error('No PID file configured');
	}
	return pidFile;
}

function sendSignal(options: ControlOptions, signal: NodeJS.Signals, what: string): void {
	try {
		const pid = signalDaemon(resolvePidFile(options), signal);
		if (pid === null) {
			error('Daemon is not running');
		}
		output(`Sent ${what} signal to daemon (PID: ${pid})`);
	} catch (err) {
		error(errorMessage(err));
	}
}

export function registerDaemonCommands(program: Command): void {
	program
		.command('run')
		.description('Start the telemetry collector daemon')
		.option('-c, --config <path>', 'Configuration file', DEFAULT_CONFIG_PATH)
		.option('-f, --foreground', 'Run in foreground (do not detach)')
		.option('-p, --pid-file <path>', 'PID file (overrides config)')
		.option('-l, --log-file <path>', 'Log file (overrides config)')
		.option('-u, --user <name>', 'User to run as (overrides config)')
		.option('-g, --group <name>', 'Group to run as (overrides config)')
		.action(async (options: RunOptions) => {
			const controller = new LifecycleController({
				configPath: options.config,
				foreground: options.foreground ?? false,
				overrides: {
					pidFile: options.pidFile,
					logFile: options.logFile,
					user: options.user,
					group: options.group,
				},
			});
			process.exit(await controller.start());
		});

	program
		.command('status')
		.description('Show whether the daemon is running')
		.option('-c, --config <path>', 'Configuration file', DEFAULT_CONFIG_PATH)
		.option('-p, --pid-file <path>', 'PID file (overrides config)')
		.action((options: ControlOptions) => {
			try {
				const pid = getRunningPid(resolvePidFile(options));
				if (pid === null) {
					output('Daemon is not running');
					process.exit(1);
				}
				output(`Daemon is running (PID: ${pid})`);
			} catch (err) {
				error(errorMessage(err));
			}
		});

	program
		.command('stop')
		.description('Stop the running daemon gracefully')
		.option('-c, --config <path>', 'Configuration file', DEFAULT_CONFIG_PATH)
		.option('-p, --pid-file <path>', 'PID file (overrides config)')
		.action((options: ControlOptions) => sendSignal(options, 'SIGTERM', 'stop'));

	program
		.command('reload')
		.description('Make the running daemon re-read its configuration')
		.option('-c, --config <path>', 'Configuration file', DEFAULT_CONFIG_PATH)
		.option('-p, --pid-file <path>', 'PID file (overrides config)')
		.action((options: ControlOptions) => sendSignal(options, 'SIGHUP', 'reload'));
}
