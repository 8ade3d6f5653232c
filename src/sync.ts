import pc from "picocolors";
import {
	type ChartIndex,
	chartArchiveUrl,
	chartUploadUrl,
	fetchChartArchive,
	listCharts,
	uploadChartArchive,
} from "./charts";
import { type SyncReporter, quietReporter } from "./cli/progress-reporter";
import { symbols, ui } from "./cli/ui";
import {
	type ChartDiff,
	type ChartVersionRef,
	countTransfers,
	diffCharts,
	flattenDiff,
} from "./diff";
import {
	ListingError,
	TransferError,
	type TransferStage,
	UnexpectedStatusError,
} from "./errors";
import { discardBody } from "./http";

export type SyncOptions = {
	source: string;
	destination: string;
	dryRun?: boolean;
	timeoutMs?: number;
};

type SyncDeps = {
	listCharts?: typeof listCharts;
	reporter?: SyncReporter;
};

export type TransferFailure = ChartVersionRef & {
	stage: TransferStage;
	server: string;
	message: string;
};

export type SyncReport = {
	source: string;
	destination: string;
	dryRun: boolean;
	total: number;
	synced: number;
	bytes: number;
	pending: ChartVersionRef[];
	failures: TransferFailure[];
};

type Listing =
	| { ok: true; index: ChartIndex }
	| { ok: false; error: Error };

const toError = (error: unknown) =>
	error instanceof Error ? error : new Error(String(error));

export const getSyncPlan = async (options: SyncOptions, deps: SyncDeps = {}) => {
	const list = deps.listCharts ?? listCharts;
	const settle = async (url: string): Promise<Listing> => {
		ui.step("Listing", url);
		try {
			return { ok: true, index: await list(url, options) };
		} catch (error) {
			return { ok: false, error: toError(error) };
		}
	};
	// One request at a time, source first.
	const source = await settle(options.source);
	const destination = await settle(options.destination);
	if (!source.ok || !destination.ok) {
		throw new ListingError(
			source.ok ? null : source.error,
			destination.ok ? null : destination.error,
		);
	}
	const diff: ChartDiff = diffCharts(source.index, destination.index);
	return {
		source: options.source,
		destination: options.destination,
		diff,
		total: countTransfers(diff),
		pending: flattenDiff(diff),
	};
};

/**
 * Copies one chart archive. Every response body is read to the end before
 * this returns or throws.
 */
export const transferChart = async (
	ref: ChartVersionRef,
	options: SyncOptions,
): Promise<number> => {
	const { chart, version } = ref;
	const fail = (stage: TransferStage, server: string, cause: unknown) =>
		new TransferError({ chart, version, stage, server, cause });

	const archiveUrl = chartArchiveUrl(options.source, chart, version);
	ui.step("Fetching", `${chart}-${version}`, archiveUrl);
	let response: Response;
	try {
		response = await fetchChartArchive(archiveUrl, options);
	} catch (error) {
		throw fail("fetch", options.source, error);
	}
	if (response.status !== 200) {
		try {
			await discardBody(response, archiveUrl);
		} catch (error) {
			throw fail("fetch", options.source, error);
		}
		throw fail(
			"fetch",
			options.source,
			new UnexpectedStatusError(archiveUrl, response.status, 200),
		);
	}

	let archive: ArrayBuffer;
	try {
		archive = await response.arrayBuffer();
	} catch (error) {
		throw fail("read", options.source, error);
	}

	const uploadUrl = chartUploadUrl(options.destination);
	ui.step("Uploading", `${chart}-${version}`, `${archive.byteLength} bytes`);
	let upload: Response;
	try {
		upload = await uploadChartArchive(uploadUrl, archive, options);
	} catch (error) {
		throw fail("upload", options.destination, error);
	}
	try {
		await discardBody(upload, uploadUrl);
	} catch (error) {
		throw fail("upload", options.destination, error);
	}
	if (upload.status !== 201) {
		throw fail(
			"upload",
			options.destination,
			new UnexpectedStatusError(uploadUrl, upload.status, 201),
		);
	}
	return archive.byteLength;
};

export const runSync = async (
	options: SyncOptions,
	deps: SyncDeps = {},
): Promise<SyncReport> => {
	const plan = await getSyncPlan(options, deps);
	const report: SyncReport = {
		source: plan.source,
		destination: plan.destination,
		dryRun: Boolean(options.dryRun),
		total: plan.total,
		synced: 0,
		bytes: 0,
		pending: plan.pending,
		failures: [],
	};
	if (options.dryRun) {
		return report;
	}

	const reporter = deps.reporter ?? quietReporter;
	reporter.start(plan.total);
	for (const ref of plan.pending) {
		const label = `${ref.chart}-${ref.version}`;
		try {
			report.bytes += await transferChart(ref, options);
		} catch (error) {
			if (!(error instanceof TransferError)) {
				throw error;
			}
			report.failures.push({
				chart: error.chart,
				version: error.version,
				stage: error.stage,
				server: error.url,
				message: error.message,
			});
			reporter.fail(error);
			continue;
		}
		report.synced += 1;
		reporter.advance(label);
	}
	const icon = report.failures.length > 0 ? symbols.warn : symbols.success;
	reporter.finish(
		`${icon} Synced ${report.synced} of ${ui.plural(report.total, "chart version")}`,
	);
	return report;
};

export const printSyncReport = (report: SyncReport) => {
	if (!report.dryRun) {
		return;
	}
	if (report.total === 0) {
		ui.line(`${symbols.success} Destination is up to date.`);
		return;
	}
	ui.line(
		`${symbols.info} Would sync ${ui.plural(report.total, "chart version")}:`,
	);
	for (const ref of report.pending) {
		ui.item(pc.cyan("+"), `${ref.chart}-${ref.version}`);
	}
};
