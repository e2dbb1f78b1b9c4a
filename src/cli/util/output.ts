export interface OutputOptions {
	json?: boolean;
}

export function output(data: unknown, options: OutputOptions = {}): void {
	if (options.json) {
		console.log(JSON.stringify(data, null, 2));
	} else if (data === null || data === undefined) {
		// Silent for void/null results
	} else {
		console.log(data);
	}
}

export function error(message: string, exitCode: number = 1): never {
	console.error(message);
	process.exit(exitCode);
}
