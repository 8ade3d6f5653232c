import pc from "picocolors";
import { redactUrl } from "../redact";

export const symbols = {
	error: pc.red("✖"),
	success: pc.green("✔"),
	info: pc.blue("ℹ"),
	warn: pc.yellow("⚠"),
};

let _silentMode = false;
let _verboseMode = false;

export const setSilentMode = (silent: boolean) => {
	_silentMode = silent;
};

export const setVerboseMode = (verbose: boolean) => {
	_verboseMode = verbose;
};

export const isSilentMode = () => _silentMode;

export const ui = {
	// Formatters
	url: (value: string) => pc.underline(redactUrl(value)),
	plural: (count: number, noun: string) =>
		`${count} ${noun}${count === 1 ? "" : "s"}`,

	// Components
	line: (text: string = "") => {
		if (_silentMode) return;
		process.stdout.write(`${text}\n`);
	},

	header: (label: string, value: string) => {
		if (_silentMode) return;
		process.stdout.write(`${symbols.info} ${label.padEnd(12)} ${value}\n`);
	},

	item: (icon: string, label: string, details?: string) => {
		if (_silentMode) return;
		const partLabel = pc.bold(label);
		const partDetails = details ? pc.gray(details) : "";
		process.stdout.write(`  ${icon} ${partLabel} ${partDetails}\n`);
	},

	step: (action: string, subject: string, details?: string) => {
		if (_silentMode || !_verboseMode) return;
		const icon = pc.cyan("→");
		process.stdout.write(
			`  ${icon} ${action} ${pc.bold(subject)}${details ? ` ${pc.dim(details)}` : ""}\n`,
		);
	},

	error: (message: string) => {
		process.stderr.write(`${symbols.error} ${message}\n`);
	},
};
