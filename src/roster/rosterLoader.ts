// ─── Device Roster ───────────────────────────────────────────────────────────

import * as fs from 'fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { DevicesSection } from '../daemon/config';
import { RosterError, errorMessage } from '../errors';
import { Device } from '../metrics/types';
import { decryptRoster } from './crypto';

/**
 * Loads the ordered list of devices to poll
 */
export interface RosterLoader {
	load(filePath: string, password?: string): Promise<Device[]>;
}

const CsvRows = z.array(z.array(z.string()));
const COORDINATE = /^[+-]?(\d+\.?\d*|\.\d+)$/;

function parseCsvLine(line: string, lineNo: number): string[] {
	let rows: z.infer<typeof CsvRows>;
	try {
		rows = CsvRows.parse(parse(line, { relax_column_count: true, relax_quotes: true, trim: true }));
	} catch (error) {
		throw new RosterError(`line ${lineNo}: ${errorMessage(error)}`, lineNo);
	}
	return rows[0] ?? [];
}

/**
 * Parse roster CSV: `node_id[,contact_name[,location[,latitude[,longitude]]]]`.
 * Blank lines and lines starting with `#` are ignored.
 */
export function parseRoster(content: string): Device[] {
	const devices: Device[] = [];
	const seen = new Set<string>();

	content.split(/\r?\n/).forEach((rawLine, index) => {
		const line = rawLine.trim();
		const lineNo = index + 1;
		if (!line || line.startsWith('#')) {
			return;
		}

		const [nodeId = '', contactName = '', location = '', latitude = '', longitude = ''] = parseCsvLine(line, lineNo);

		if (!nodeId) {
			throw new RosterError(`line ${lineNo}: node id is required`, lineNo);
		}
		if (seen.has(nodeId)) {
			throw new RosterError(`line ${lineNo}: duplicate node id ${nodeId}`, lineNo);
		}
		if (latitude && !COORDINATE.test(latitude)) {
			throw new RosterError(`line ${lineNo}: latitude "${latitude}" is not a number`, lineNo);
		}
		if (longitude && !COORDINATE.test(longitude)) {
			throw new RosterError(`line ${lineNo}: longitude "${longitude}" is not a number`, lineNo);
		}

		seen.add(nodeId);
		devices.push(Object.freeze({ nodeId, contactName, location, latitude, longitude }));
	});

	return devices;
}

/**
 * Read the roster password; surrounding whitespace is not part of it
 */
export function readPasswordFile(passwordFile: string): string {
	let password: string;
	try {
		password = fs.readFileSync(passwordFile, 'utf-8').trim();
	} catch (error) {
		throw new RosterError(`Cannot read password file ${passwordFile}: ${errorMessage(error)}`);
	}
	if (!password) {
		throw new RosterError(`Password file ${passwordFile} is empty`);
	}
	return password;
}

export const fileRosterLoader: RosterLoader = {
	async load(filePath: string, password?: string): Promise<Device[]> {
		let data: Buffer;
		try {
			data = await fs.promises.readFile(filePath);
		} catch (error) {
			throw new RosterError(`Cannot read device file ${filePath}: ${errorMessage(error)}`);
		}

		const content = password ? decryptRoster(data, password) : data.toString('utf-8');
		return parseRoster(content);
	},
};

/**
 * Load the roster named by the [devices] section, decrypting when configured
 */
export async function loadConfiguredRoster(devices: DevicesSection, loader: RosterLoader = fileRosterLoader): Promise<Device[]> {
	const password = devices.encrypted ? readPasswordFile(devices.passwordFile) : undefined;
	return loader.load(devices.file, password);
}
