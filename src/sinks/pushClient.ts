// ─── Push Gateway Client ─────────────────────────────────────────────────────

import * as http from 'http';
import * as https from 'https';
import { PushSection } from '../daemon/config';
import { errorMessage } from '../errors';
import { EXPOSITION_CONTENT_TYPE, renderExposition } from '../metrics/exposition';
import { MetricLine } from '../metrics/types';

export interface PushResult {
	ok: boolean;
	skipped: boolean;
	status?: number;
	error?: string;
}

export interface PushClientOptions {
	url: string;
	jobName: string;
	instance: string;
	/** Seconds */
	timeout: number;
}

/**
 * PushClient - Best-effort delivery of exposition text to a Prometheus push gateway.
 * Failures are returned, never thrown.
 */
export class PushClient {
	private readonly baseUrl: string;

	constructor(private readonly options: PushClientOptions) {
		this.baseUrl = options.url.trim();
	}

	static fromConfig(push: PushSection): PushClient {
		return new PushClient({
			url: push.url,
			jobName: push.jobName,
			instance: push.instance,
			timeout: push.timeout,
		});
	}

	get enabled(): boolean {
		return this.baseUrl !== '';
	}

	/**
	 * `{base}/metrics/job/{job}[/instance/{instance}]`, path segments percent-encoded
	 */
	pushUrl(): string {
		const parts = [this.baseUrl.replace(/\/+$/, ''), 'metrics', 'job', encodeURIComponent(this.options.jobName)];
		if (this.options.instance) {
			parts.push('instance', encodeURIComponent(this.options.instance));
		}
		return parts.join('/');
	}

	async push(lines: readonly MetricLine[]): Promise<PushResult> {
		if (!this.enabled) {
			return { ok: true, skipped: true };
		}

		let url: URL;
		try {
			url = new URL(this.pushUrl());
		} catch (error) {
			return { ok: false, skipped: false, error: `Invalid push URL ${this.baseUrl}: ${errorMessage(error)}` };
		}

		try {
			const status = await this.post(url, renderExposition(lines));
			if (status === 200) {
				return { ok: true, skipped: false, status };
			}
			return { ok: false, skipped: false, status, error: `Push gateway returned status ${status}` };
		} catch (error) {
			return { ok: false, skipped: false, error: `Failed to push metrics to ${this.baseUrl}: ${errorMessage(error)}` };
		}
	}

	/**
	 * POST and resolve with the status once the body is drained. The timeout
	 * covers the whole exchange, not only idle periods on the socket.
	 */
	private post(url: URL, payload: string): Promise<number> {
		const body = Buffer.from(payload, 'utf-8');
		const transport = url.protocol === 'https:' ? https : http;
		const timeoutMs = this.options.timeout * 1000;

		return new Promise((resolve, reject) => {
			let response: http.IncomingMessage | null = null;

			const deadline = setTimeout(() => {
				const error = new Error(`Request timed out after ${this.options.timeout}s`);
				fail(error);
				response?.destroy(error);
				req.destroy(error);
			}, timeoutMs);

			const fail = (error: Error): void => {
				clearTimeout(deadline);
				reject(error);
			};

			const req = transport.request(url, {
				method: 'POST',
				headers: {
					'Content-Type': EXPOSITION_CONTENT_TYPE,
					'Content-Length': body.length,
				},
			}, (res) => {
				response = res;
				// Drain so the socket is released
				res.resume();
				res.on('end', () => {
					clearTimeout(deadline);
					resolve(res.statusCode ?? 0);
				});
				res.on('error', fail);
			});

			req.on('error', fail);
			req.end(body);
		});
	}
}
