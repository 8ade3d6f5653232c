import process from "node:process";

import cac from "cac";
import { ExitCode } from "./exit-code";
import type { CliOptions } from "./types";

export const CLI_NAME = "cm-sync";

export type ParsedArgs = {
	options: CliOptions;
	positionals: string[];
	help: boolean;
};

type ParseResult = ReturnType<ReturnType<typeof cac>["parse"]>;

const readString = (value: unknown, flag: string) => {
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string" || value.length === 0) {
		throw new Error(`${flag} expects a value.`);
	}
	return value;
};

const readPositiveNumber = (value: unknown, flag: string) => {
	if (value === undefined) {
		return undefined;
	}
	const numberValue = Number(value);
	if (!Number.isFinite(numberValue) || numberValue < 1) {
		throw new Error(`${flag} must be a positive number.`);
	}
	return numberValue;
};

const buildOptions = (result: ParseResult): CliOptions => ({
	// No cac defaults for the endpoints: an omitted flag must stay undefined
	// so that "not given" differs from "given the default URL".
	source: readString(result.options.source, "--source"),
	destination: readString(result.options.destination, "--destination"),
	config: readString(result.options.config, "--config"),
	timeoutMs: readPositiveNumber(result.options.timeoutMs, "--timeout-ms"),
	dryRun: Boolean(result.options.dryRun),
	json: Boolean(result.options.json),
	silent: Boolean(result.options.silent),
	verbose: Boolean(result.options.verbose),
});

export const createCli = () => {
	const cli = cac(CLI_NAME);
	cli
		.option(
			"-s, --source <url>",
			"Source, a valid ChartMuseum URL (default: http://localhost:8080)",
		)
		.option(
			"-d, --destination <url>",
			"Destination, a valid ChartMuseum URL (default: http://localhost:8080)",
		)
		.option("--config <path>", "Path to config file")
		.option("--timeout-ms <n>", "Per-request timeout in milliseconds")
		.option("--dry-run", "List missing chart versions without copying")
		.option("--json", "Output JSON")
		.option("--silent", "Suppress non-error output")
		.option("--verbose", "Log every request")
		.help();
	return cli;
};

export const parseArgs = (argv = process.argv): ParsedArgs => {
	try {
		const cli = createCli();
		const result = cli.parse(argv, { run: false });
		return {
			options: buildOptions(result),
			positionals: [...result.args],
			help: Boolean(result.options.help),
		};
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		console.error(message);
		process.exit(ExitCode.InvalidArgument);
	}
};
