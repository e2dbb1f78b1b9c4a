// ─── Lifecycle Controller ────────────────────────────────────────────────────

import { errorMessage, StartupError } from '../errors';
import { Device } from '../metrics/types';
import { loadConfiguredRoster, RosterLoader } from '../roster/rosterLoader';
import { describeCollisions, nodeFileCollisions } from '../sinks/snapshotPublisher';
import { MeshtasticCliSource } from '../telemetry/meshtasticCli';
import { TelemetrySource } from '../telemetry/source';
import { VERSION } from '../version';
import { applyOverrides, ConfigOverrides, DaemonConfig, loadConfig } from './config';
import { isDetachedChild, spawnDetached } from './daemonize';
import { createSinks, DeliveryCoordinator } from './deliveryCoordinator';
import { Logger } from './log';
import { removePidFile, writePidFile } from './pidFile';
import { PollScheduler } from './pollScheduler';
import { dropPrivileges, ProcessIdentity } from './privileges';
import { RunFlag, Sleep } from './runFlag';
import { StatsTracker } from './stats';

export interface LifecycleOptions {
	configPath?: string;
	foreground: boolean;
	overrides?: ConfigOverrides;
}

/**
 * Where signal listeners are attached; `process` in production
 */
export interface SignalTarget {
	on(signal: NodeJS.Signals, listener: () => void): unknown;
	off(signal: NodeJS.Signals, listener: () => void): unknown;
}

export interface LifecycleDeps {
	createSource?: (config: DaemonConfig, logger: Logger) => TelemetrySource;
	createLogger?: (config: DaemonConfig, foreground: boolean) => Logger;
	rosterLoader?: RosterLoader;
	identity?: ProcessIdentity | null;
	signals?: SignalTarget;
	detach?: () => number | undefined;
	env?: NodeJS.ProcessEnv;
	sleep?: Sleep;
	/** Error output before logging is up */
	stderr?: (line: string) => void;
}

const STOP_SIGNALS: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
const RELOAD_SIGNAL: NodeJS.Signals = 'SIGHUP';

function defaultSource(config: DaemonConfig, logger: Logger): TelemetrySource {
	return MeshtasticCliSource.fromConfig(config.meshtastic, logger);
}

function defaultLogger(config: DaemonConfig, foreground: boolean): Logger {
	return new Logger({ level: config.daemon.logLevel, logFile: config.daemon.logFile, foreground });
}

/**
 * Per-node output needs one file per roster entry
 */
function outputFileClash(config: DaemonConfig, roster: readonly Device[]): string | null {
	if (!config.output.individualFiles || !config.output.directory) {
		return null;
	}
	const collisions = nodeFileCollisions(roster.map(device => device.nodeId));
	return collisions.length > 0 ? `Node ids share an output file: ${describeCollisions(collisions)}` : null;
}

/**
 * LifecycleController - Process lifecycle of the daemon
 *
 * Startup order: config, logging, daemonize, signals, privilege drop,
 * PID file, roster, telemetry connection, poll loop.
 */
export class LifecycleController {
	private config: DaemonConfig | null = null;
	private logger: Logger | null = null;
	private coordinator: DeliveryCoordinator | null = null;
	private scheduler: PollScheduler | null = null;
	private roster: readonly Device[] = [];
	private readonly runFlag = new RunFlag();
	private readonly stats = new StatsTracker();
	private readonly signals: SignalTarget;
	private readonly stopHandler = (): void => this.stop();
	private readonly reloadHandler = (): void => {
		this.reload();
	};

	constructor(
		private readonly options: LifecycleOptions,
		private readonly deps: LifecycleDeps = {}
	) {
		this.signals = deps.signals ?? process;
	}

	getConfig(): DaemonConfig | null {
		return this.config;
	}

	getStats(): StatsTracker {
		return this.stats;
	}

	getScheduler(): PollScheduler | null {
		return this.scheduler;
	}

	isRunning(): boolean {
		return this.runFlag.isSet();
	}

	/**
	 * Run the daemon; resolves with the process exit code
	 */
	async start(): Promise<number> {
		const stderr = this.deps.stderr ?? ((line: string) => console.error(line));

		let config: DaemonConfig;
		try {
			config = this.loadEffectiveConfig();
		} catch (error) {
			stderr(`Configuration error: ${errorMessage(error)}`);
			return 1;
		}
		this.config = config;

		let logger: Logger;
		try {
			logger = (this.deps.createLogger ?? defaultLogger)(config, this.options.foreground);
		} catch (error) {
			stderr(`Cannot initialize logging: ${errorMessage(error)}`);
			return 1;
		}
		this.logger = logger;

		if (!this.options.foreground && !isDetachedChild(this.deps.env)) {
			try {
				const pid = (this.deps.detach ?? spawnDetached)();
				logger.info('lifecycle', `Daemon started in background (PID: ${pid ?? 'unknown'})`);
				return 0;
			} catch (error) {
				logger.error('lifecycle', `Failed to daemonize: ${errorMessage(error)}`);
				stderr(`Failed to daemonize: ${errorMessage(error)}`);
				return 1;
			}
		}

		logger.info('lifecycle', `Starting ${VERSION}`, { pid: process.pid });
		this.stats.markStarted();
		this.registerSignalHandlers();

		let source: TelemetrySource | null = null;
		let pidWritten = false;

		try {
			dropPrivileges(
				{ user: config.daemon.user, group: config.daemon.group },
				logger,
				this.deps.identity
			);

			if (config.daemon.pidFile) {
				writePidFile(config.daemon.pidFile);
				pidWritten = true;
				logger.debug('lifecycle', `PID file written: ${config.daemon.pidFile}`);
			}

			const roster = await loadConfiguredRoster(config.devices, this.deps.rosterLoader);
			if (roster.length === 0) {
				throw new StartupError(`No devices found in ${config.devices.file}`);
			}
			const clash = outputFileClash(config, roster);
			if (clash) {
				throw new StartupError(clash);
			}
			this.roster = roster;
			logger.info('roster', `Loaded ${roster.length} devices`, { encrypted: config.devices.encrypted });

			source = (this.deps.createSource ?? defaultSource)(config, logger);
			const connected = await source.connect(config.meshtastic.mode, config.meshtastic.port);
			if (!connected.ok) {
				throw new StartupError(`Failed to connect to meshtastic device: ${connected.error}`);
			}

			this.coordinator = new DeliveryCoordinator(config, this.stats, logger);
			if (this.coordinator.currentSinks().push.enabled) {
				logger.info('lifecycle', `Push gateway enabled: ${config.push.url}`);
			}

			this.scheduler = new PollScheduler({
				roster,
				source,
				coordinator: this.coordinator,
				stats: this.stats,
				runFlag: this.runFlag,
				getConfig: () => this.config ?? config,
				logger,
				sleep: this.deps.sleep,
			});
			await this.scheduler.run();

			logger.info('lifecycle', 'Daemon shutdown complete');
			return 0;
		} catch (error) {
			logger.error('lifecycle', `Fatal error: ${errorMessage(error)}`);
			if (this.options.foreground) {
				stderr(`Error: ${errorMessage(error)}`);
			}
			return 1;
		} finally {
			this.runFlag.clear();
			if (source) {
				try {
					await source.close();
				} catch (error) {
					logger.warn('lifecycle', 'Error closing telemetry source', { error: errorMessage(error) });
				}
			}
			if (pidWritten) {
				try {
					removePidFile(config.daemon.pidFile);
				} catch (error) {
					logger.warn('lifecycle', 'Failed to remove PID file', { error: errorMessage(error) });
				}
			}
			this.unregisterSignalHandlers();
			logger.close();
		}
	}

	/**
	 * Ask the poll loop to finish; it exits at its next suspension point
	 */
	stop(): void {
		if (this.runFlag.isSet()) {
			this.logger?.info('lifecycle', 'Stop requested, shutting down');
		}
		this.runFlag.clear();
	}

	/**
	 * Re-read the config file. The previous config stays active on failure.
	 */
	reload(): boolean {
		const logger = this.logger;
		if (!logger) {
			return false;
		}

		logger.info('lifecycle', 'Reloading configuration');
		let next: DaemonConfig;
		try {
			next = this.loadEffectiveConfig();
		} catch (error) {
			logger.error('lifecycle', 'Failed to reload configuration, keeping previous', { error: errorMessage(error) });
			return false;
		}

		const clash = outputFileClash(next, this.roster);
		if (clash) {
			logger.error('lifecycle', 'Failed to reload configuration, keeping previous', { error: clash });
			return false;
		}

		const sinks = createSinks(next);
		this.config = next;
		this.coordinator?.reload(next, sinks);
		logger.setLevel(next.daemon.logLevel);
		logger.info('lifecycle', 'Configuration reloaded');
		return true;
	}

	private loadEffectiveConfig(): DaemonConfig {
		return applyOverrides(loadConfig(this.options.configPath), this.options.overrides ?? {});
	}

	private registerSignalHandlers(): void {
		for (const signal of STOP_SIGNALS) {
			this.signals.on(signal, this.stopHandler);
		}
		this.signals.on(RELOAD_SIGNAL, this.reloadHandler);
	}

	private unregisterSignalHandlers(): void {
		for (const signal of STOP_SIGNALS) {
			this.signals.off(signal, this.stopHandler);
		}
		this.signals.off(RELOAD_SIGNAL, this.reloadHandler);
	}
}
