import { redactUrl } from "./redact";

export type TransferStage = "fetch" | "read" | "upload";

export class ChartSyncError extends Error {
	readonly url: string;

	constructor(message: string, url: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ChartSyncError";
		this.url = redactUrl(url);
	}
}

/** The request could not be sent or no response arrived. */
export class NetworkError extends ChartSyncError {
	constructor(url: string, cause: unknown) {
		super(
			`Request to ${redactUrl(url)} failed: ${describeCause(cause)}`,
			url,
			{ cause },
		);
		this.name = "NetworkError";
	}
}

export class UnexpectedStatusError extends ChartSyncError {
	readonly status: number;
	readonly expected: number;

	constructor(url: string, status: number, expected = 200) {
		super(
			`Unexpected status code ${status} from ${redactUrl(url)} (expected ${expected}).`,
			url,
		);
		this.name = "UnexpectedStatusError";
		this.status = status;
		this.expected = expected;
	}
}

export class DecodeError extends ChartSyncError {
	constructor(url: string, cause: unknown) {
		super(
			`Invalid JSON from ${redactUrl(url)}: ${describeCause(cause)}`,
			url,
			{ cause },
		);
		this.name = "DecodeError";
	}
}

export class SchemaError extends ChartSyncError {
	readonly field: string;

	constructor(url: string, field: string, detail: string) {
		super(`Unexpected response from ${redactUrl(url)}: ${detail}`, url);
		this.name = "SchemaError";
		this.field = field;
	}
}

/**
 * Raised when the chart index of either server could not be listed. Both
 * outcomes are kept so the caller can report them together.
 */
export class ListingError extends Error {
	readonly sourceError: Error | null;
	readonly destinationError: Error | null;

	constructor(sourceError: Error | null, destinationError: Error | null) {
		const parts = [
			sourceError ? `source: ${sourceError.message}` : null,
			destinationError ? `destination: ${destinationError.message}` : null,
		].filter((part): part is string => part !== null);
		super(`Error fetching charts (${parts.join("; ")})`);
		this.name = "ListingError";
		this.sourceError = sourceError;
		this.destinationError = destinationError;
	}
}

export class TransferError extends ChartSyncError {
	readonly chart: string;
	readonly version: string;
	readonly stage: TransferStage;
	readonly reason: string;

	constructor(params: {
		chart: string;
		version: string;
		stage: TransferStage;
		server: string;
		cause: unknown;
	}) {
		const verb = {
			fetch: "fetch",
			read: "read",
			upload: "sync",
		}[params.stage];
		const preposition = params.stage === "upload" ? "to" : "from";
		super(
			`Failed to ${verb} ${params.chart}-${params.version} ${preposition} ${redactUrl(params.server)}: ${describeCause(params.cause)}`,
			params.server,
			{ cause: params.cause },
		);
		this.name = "TransferError";
		this.chart = params.chart;
		this.version = params.version;
		this.stage = params.stage;
		this.reason = describeCause(params.cause);
	}
}

/**
 * Undici reports transport failures as `TypeError: fetch failed` with the
 * socket error on `cause`; surface the innermost message.
 */
export const describeCause = (cause: unknown): string => {
	if (!(cause instanceof Error)) {
		return String(cause);
	}
	if (cause.cause instanceof Error && cause.message === "fetch failed") {
		return describeCause(cause.cause);
	}
	return cause.message;
};
