// ─── Config Loading & Validation ─────────────────────────────────────────────

import * as fs from 'fs';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors';
import { LogLevel } from './log';

export const DEFAULT_CONFIG_PATH = '/etc/mesh-telemetryd/config.toml';

export type SourceMode = 'serial' | 'ip';
export type NodeIdFormat = 'default' | 'clean';

export interface DaemonSection {
	readonly pollInterval: number;
	readonly errorCooldown: number;
	readonly logLevel: LogLevel;
	readonly logFile: string;
	readonly pidFile: string;
	readonly user: string;
	readonly group: string;
}

export interface MeshtasticSection {
	readonly mode: SourceMode;
	readonly port: string;
	readonly dwellTime: number;
	readonly fetchTimeout: number;
	readonly command: string;
	readonly telemetryFilter: string;
}

export interface DevicesSection {
	readonly file: string;
	readonly encrypted: boolean;
	readonly passwordFile: string;
}

export interface OutputSection {
	readonly directory: string;
	readonly individualFiles: boolean;
	readonly filePrefix: string;
	readonly nodeIdFormat: NodeIdFormat;
}

export interface PushSection {
	readonly url: string;
	readonly jobName: string;
	readonly instance: string;
	readonly timeout: number;
}

export interface MonitoringSection {
	readonly enableStats: boolean;
	readonly statsFile: string;
}

export interface DaemonConfig {
	readonly daemon: DaemonSection;
	readonly meshtastic: MeshtasticSection;
	readonly devices: DevicesSection;
	readonly output: OutputSection;
	readonly push: PushSection;
	readonly monitoring: MonitoringSection;
}

/**
 * Command-line values that take precedence over the [daemon] section
 */
export interface ConfigOverrides {
	pidFile?: string;
	logFile?: string;
	user?: string;
	group?: string;
}

function isValidRegex(source: string): boolean {
	try {
		new RegExp(source);
		return true;
	} catch {
		return false;
	}
}

function isHttpUrl(value: string): boolean {
	if (value === '') {
		return true;
	}
	try {
		const url = new URL(value);
		return url.protocol === 'http:' || url.protocol === 'https:';
	} catch {
		return false;
	}
}

const ConfigSchema = z.object({
	daemon: z.object({
		pollInterval: z.number().int().min(1).default(300),
		errorCooldown: z.number().int().min(1).default(60),
		logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
		logFile: z.string().default(''),
		pidFile: z.string().default('/run/mesh-telemetryd/mesh-telemetryd.pid'),
		user: z.string().default(''),
		group: z.string().default(''),
	}).strict().default({}),
	meshtastic: z.object({
		mode: z.enum(['serial', 'ip']).default('serial'),
		port: z.string().min(1).default('/dev/ttyACM0'),
		dwellTime: z.number().min(0).default(10),
		fetchTimeout: z.number().min(1).default(30),
		command: z.string().min(1).default('meshtastic'),
		telemetryFilter: z.string()
			.refine(isValidRegex, 'must be a valid regular expression')
			.default('Battery|Voltage|utilization'),
	}).strict().default({}),
	devices: z.object({
		file: z.string().min(1).default('/etc/mesh-telemetryd/devices.csv'),
		encrypted: z.boolean().default(false),
		passwordFile: z.string().default(''),
	}).strict().default({}),
	output: z.object({
		directory: z.string().default('/var/lib/node_exporter/textfile_collector'),
		individualFiles: z.boolean().default(false),
		filePrefix: z.string().regex(/^[A-Za-z0-9._-]+$/, 'must only contain letters, digits, ".", "_" or "-"').default('meshtastic'),
		nodeIdFormat: z.enum(['default', 'clean']).default('default'),
	}).strict().default({}),
	push: z.object({
		url: z.string().trim().refine(isHttpUrl, 'must be an http(s) URL').default(''),
		jobName: z.string().min(1).default('meshtastic_repeater_telemetry'),
		instance: z.string().default(''),
		timeout: z.number().min(1).default(30),
	}).strict().default({}),
	monitoring: z.object({
		enableStats: z.boolean().default(true),
		statsFile: z.string().default('/var/lib/mesh-telemetryd/stats.json'),
	}).strict().default({}),
}).strict();

/**
 * Validate raw (parsed) configuration; returns the list of problems
 */
export function validateConfig(raw: unknown): string[] {
	const result = ConfigSchema.safeParse(raw);
	if (result.success) {
		const errors: string[] = [];
		if (result.data.devices.encrypted && !result.data.devices.passwordFile) {
			errors.push('devices.passwordFile: required when devices.encrypted is true');
		}
		return errors;
	}
	return result.error.issues.map(issue => {
		const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
		return `${where}: ${issue.message}`;
	});
}

/**
 * Build a config value from parsed TOML data
 */
export function buildConfig(raw: unknown): DaemonConfig {
	const problems = validateConfig(raw);
	if (problems.length > 0) {
		throw new ConfigError(`Configuration validation failed:\n${problems.join('\n')}`, problems);
	}
	return deepFreeze(ConfigSchema.parse(raw));
}

/**
 * Default configuration (no file present)
 */
export function defaultConfig(): DaemonConfig {
	return buildConfig({});
}

/**
 * Load daemon configuration from a TOML file with defaults.
 * A missing file yields the defaults; a broken one throws ConfigError.
 */
export function loadConfig(configPath?: string): DaemonConfig {
	const finalPath = configPath || DEFAULT_CONFIG_PATH;

	if (!fs.existsSync(finalPath)) {
		return defaultConfig();
	}

	let content: string;
	try {
		content = fs.readFileSync(finalPath, 'utf-8');
	} catch (error) {
		throw new ConfigError(`Failed to read config file ${finalPath}: ${errorMessage(error)}`);
	}

	return buildConfig(parseTOML(content));
}

/**
 * Return a new config with command-line overrides applied to [daemon]
 */
export function applyOverrides(config: DaemonConfig, overrides: ConfigOverrides): DaemonConfig {
	const daemon: DaemonSection = {
		...config.daemon,
		...(overrides.pidFile !== undefined ? { pidFile: overrides.pidFile } : {}),
		...(overrides.logFile !== undefined ? { logFile: overrides.logFile } : {}),
		...(overrides.user !== undefined ? { user: overrides.user } : {}),
		...(overrides.group !== undefined ? { group: overrides.group } : {}),
	};
	return deepFreeze({ ...config, daemon });
}

function deepFreeze<T>(value: T): T {
	if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
		Object.freeze(value);
		for (const child of Object.values(value)) {
			deepFreeze(child);
		}
	}
	return value;
}

// ─── TOML Reader ─────────────────────────────────────────────────────────────

export type TomlValue = string | number | boolean | TomlValue[];
export type TomlTable = { [key: string]: TomlValue | TomlTable };

/**
 * Simple TOML parser (supports [sections], key = value, strings, numbers, booleans, arrays)
 */
export function parseTOML(content: string): TomlTable {
	const result: TomlTable = {};
	let currentSection: TomlTable = result;
	const problems: string[] = [];

	const lines = content.split(/\r?\n/);
	lines.forEach((rawLine, index) => {
		const line = rawLine.trim();
		const lineNo = index + 1;

		// Skip empty lines and comments
		if (!line || line.startsWith('#')) {
			return;
		}

		if (line.startsWith('[')) {
			const match = /^\[\s*([A-Za-z0-9_.-]+)\s*\]\s*(#.*)?$/.exec(line);
			if (!match) {
				problems.push(`line ${lineNo}: invalid section header`);
				return;
			}
			const section: TomlTable = {};
			result[match[1]] = section;
			currentSection = section;
			return;
		}

		const eqIndex = line.indexOf('=');
		if (eqIndex === -1) {
			problems.push(`line ${lineNo}: expected key = value`);
			return;
		}

		const key = line.slice(0, eqIndex).trim();
		if (!/^[A-Za-z0-9_-]+$/.test(key)) {
			problems.push(`line ${lineNo}: invalid key "${key}"`);
			return;
		}

		try {
			const [value, rest] = readValue(line.slice(eqIndex + 1).trim());
			if (rest && !rest.startsWith('#')) {
				throw new Error(`unexpected trailing text "${rest}"`);
			}
			currentSection[key] = value;
		} catch (error) {
			problems.push(`line ${lineNo}: ${errorMessage(error)}`);
		}
	});

	if (problems.length > 0) {
		throw new ConfigError(`Failed to parse config:\n${problems.join('\n')}`, problems);
	}

	return result;
}

/**
 * Read one value from the start of text; returns the value and the trimmed remainder
 */
function readValue(text: string): [TomlValue, string] {
	if (text.startsWith('"')) {
		return readBasicString(text);
	}

	if (text.startsWith("'")) {
		const end = text.indexOf("'", 1);
		if (end === -1) {
			throw new Error('unterminated string');
		}
		return [text.slice(1, end), text.slice(end + 1).trim()];
	}

	if (text.startsWith('[')) {
		const items: TomlValue[] = [];
		let rest = text.slice(1).trim();
		while (!rest.startsWith(']')) {
			if (!rest) {
				throw new Error('unterminated array');
			}
			const [item, after] = readValue(rest);
			items.push(item);
			rest = after.startsWith(',') ? after.slice(1).trim() : after;
		}
		return [items, rest.slice(1).trim()];
	}

	const match = /^([^\s,\]#]+)(.*)$/.exec(text);
	if (!match) {
		throw new Error('missing value');
	}
	return [parseValue(match[1]), match[2].trim()];
}

function readBasicString(text: string): [string, string] {
	let out = '';
	for (let i = 1; i < text.length; i++) {
		const ch = text[i];
		if (ch === '"') {
			return [out, text.slice(i + 1).trim()];
		}
		if (ch === '\\') {
			const next = text[++i];
			switch (next) {
				case 'n': out += '\n'; break;
				case 't': out += '\t'; break;
				case '"': out += '"'; break;
				case '\\': out += '\\'; break;
				default: throw new Error(`invalid escape "\\${next ?? ''}"`);
			}
			continue;
		}
		out += ch;
	}
	throw new Error('unterminated string');
}

function parseValue(val: string): TomlValue {
	if (val === 'true') {
		return true;
	}
	if (val === 'false') {
		return false;
	}
	if (/^[+-]?\d+$/.test(val)) {
		return parseInt(val, 10);
	}
	if (/^[+-]?\d+\.\d+$/.test(val)) {
		return parseFloat(val);
	}
	throw new Error(`unquoted value "${val}"`);
}
