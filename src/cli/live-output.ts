import cliTruncate from "cli-truncate";
import { createLogUpdate } from "log-update";

type LiveOutputOptions = {
	stream?: NodeJS.WriteStream;
	maxWidth?: number;
};

/** A redrawable block of lines at the bottom of the terminal. */
export type LiveOutput = {
	render: (lines: string[]) => void;
	persist: (lines: string[]) => void;
	clear: () => void;
	stop: () => void;
};

export const createLiveOutput = (
	options: LiveOutputOptions = {},
): LiveOutput => {
	const stream = options.stream ?? process.stdout;
	const updater = createLogUpdate(stream);
	const maxWidth = options.maxWidth ?? Math.max(20, (stream.columns ?? 80) - 2);
	const format = (lines: string[]) =>
		lines
			.map((line) => cliTruncate(line, maxWidth, { position: "end" }))
			.join("\n");

	return {
		render: (lines) => {
			updater(format(lines));
		},
		persist: (lines) => {
			updater(format(lines));
			updater.done();
		},
		clear: () => {
			updater.clear();
		},
		stop: () => {
			updater.done();
		},
	};
};
