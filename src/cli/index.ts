#!/usr/bin/env node

import { Command } from 'commander';
import { errorMessage } from '../errors';
import { VERSION } from '../version';
import { registerConfigCommands } from './commands/config';
import { registerDaemonCommands } from './commands/daemon';
import { registerDeviceCommands } from './commands/devices';
import { registerPollCommands } from './commands/poll';
import { registerStatsCommands } from './commands/stats';
import { error } from './util/output';

const program = new Command();

program
	.name('mesh-telemetryd')
	.description('Collects Meshtastic node telemetry for Prometheus')
	.version(VERSION);

registerDaemonCommands(program);
registerPollCommands(program);
registerConfigCommands(program);
registerDeviceCommands(program);
registerStatsCommands(program);

program.parseAsync(process.argv).catch((err: unknown) => error(errorMessage(err)));
