import process from "node:process";
import {
	type ChartSyncConfig,
	DEFAULT_SERVER_URL,
	loadConfig,
	resolveEndpoints,
} from "../config";
import { ListingError } from "../errors";
import { probeServer } from "../probe";
import { printSyncReport, runSync } from "../sync";
import { ExitCode } from "./exit-code";
import { CLI_NAME, createCli, parseArgs } from "./parse-args";
import { ProgressReporter, quietReporter } from "./progress-reporter";
import { isSilentMode, setSilentMode, setVerboseMode, ui } from "./ui";
import type { CliOptions } from "./types";

const USAGE_GUIDANCE = `
You must have at least one source or one destination.
${CLI_NAME} -s http://source_url -d http://destination_url
if you omit either of them, ${DEFAULT_SERVER_URL} will be used instead
${CLI_NAME} -s http://source_url (*implies -d ${DEFAULT_SERVER_URL})
---
chartmuseum --storage local --storage-local-rootdir /tmp/chartmuseum/ --port 8080
`;

export class CliExit extends Error {
	readonly code: ExitCode;

	constructor(code: ExitCode, message: string) {
		super(message);
		this.name = "CliExit";
		this.code = code;
	}
}

const printUsage = () => {
	process.stdout.write(USAGE_GUIDANCE.trimStart());
	createCli().outputHelp();
};

const checkEndpoint = async (
	label: "source" | "destination",
	baseUrl: string,
	timeoutMs?: number,
) => {
	try {
		const infoUrl = await probeServer(baseUrl, { timeoutMs });
		ui.step("Checked", label, infoUrl);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new CliExit(
			ExitCode.EndpointUnavailable,
			`Error checking ${label}: ${ui.url(`${baseUrl}/info`)}\n  ${message}`,
		);
	}
};

/**
 * Resolves endpoints, probes both servers, then copies what the destination
 * is missing. Returns the exit code for the run.
 */
export const run = async (options: CliOptions): Promise<ExitCode> => {
	let config: ChartSyncConfig;
	try {
		({ config } = await loadConfig(options.config));
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new CliExit(ExitCode.InvalidArgument, message);
	}
	let endpoints: ReturnType<typeof resolveEndpoints>;
	try {
		endpoints = resolveEndpoints(options, config);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new CliExit(ExitCode.InvalidArgument, message);
	}
	if (!endpoints) {
		printUsage();
		return ExitCode.InvalidArgument;
	}
	const timeoutMs = options.timeoutMs ?? config.timeoutMs;

	if (!options.json) {
		ui.header("Source", ui.url(endpoints.source));
		ui.header("Destination", ui.url(endpoints.destination));
	}
	await checkEndpoint("source", endpoints.source, timeoutMs);
	await checkEndpoint("destination", endpoints.destination, timeoutMs);

	const showProgress = !options.json && !isSilentMode();
	const report = await runSync(
		{
			source: endpoints.source,
			destination: endpoints.destination,
			dryRun: options.dryRun,
			timeoutMs,
		},
		{ reporter: showProgress ? new ProgressReporter() : quietReporter },
	);
	if (options.json) {
		process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
	} else {
		printSyncReport(report);
	}
	return ExitCode.Success;
};

const printListingError = (error: ListingError) => {
	ui.error("Error fetching charts:");
	if (error.sourceError) {
		process.stderr.write(`  source: ${error.sourceError.message}\n`);
	}
	if (error.destinationError) {
		process.stderr.write(`  destination: ${error.destinationError.message}\n`);
	}
};

/**
 * The main entry point of the CLI
 */
export async function main(argv = process.argv): Promise<void> {
	try {
		process.on("uncaughtException", errorHandler);
		process.on("unhandledRejection", errorHandler);

		const parsed = parseArgs(argv);

		setSilentMode(parsed.options.silent || parsed.options.json);
		setVerboseMode(parsed.options.verbose);

		if (parsed.help) {
			process.exit(ExitCode.Success);
		}

		if (parsed.positionals.length > 0) {
			ui.error(`${CLI_NAME}: unexpected arguments.`);
			printUsage();
			process.exit(ExitCode.InvalidArgument);
		}

		process.exitCode = await run(parsed.options);
	} catch (error) {
		errorHandler(error);
	}
}

function errorHandler(error: unknown): void {
	if (error instanceof CliExit) {
		ui.error(error.message);
		process.exit(error.code);
	}
	if (error instanceof ListingError) {
		printListingError(error);
		process.exit(ExitCode.FatalError);
	}
	const message = error instanceof Error ? error.message : String(error);
	ui.error(message);
	process.exit(ExitCode.FatalError);
}
