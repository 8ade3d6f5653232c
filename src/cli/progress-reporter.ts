import pc from "picocolors";
import type { TransferError } from "../errors";
import { createLiveOutput, type LiveOutput } from "./live-output";
import { symbols, ui } from "./ui";

const BAR_WIDTH = 24;

const formatDuration = (ms: number) => {
	const seconds = Math.max(0, ms / 1000);
	if (seconds < 60) {
		return `${seconds.toFixed(1)}s`;
	}
	const minutes = Math.floor(seconds / 60);
	const remainder = seconds % 60;
	return `${minutes}m ${remainder.toFixed(1)}s`;
};

export const formatBar = (position: number, total: number) => {
	const ratio = total === 0 ? 1 : Math.min(1, position / total);
	const filled = Math.round(ratio * BAR_WIDTH);
	const percent = `${Math.floor(ratio * 100)}%`.padStart(4);
	return `${percent} |${"█".repeat(filled)}${" ".repeat(BAR_WIDTH - filled)}| (${position}/${total})`;
};

/** Receives progress from the sync loop. */
export interface SyncReporter {
	start(total: number): void;
	advance(label: string): void;
	fail(error: TransferError): void;
	finish(summary?: string): void;
}

/** No progress output; failures still go to stderr. */
export const quietReporter: SyncReporter = {
	start: () => {},
	advance: () => {},
	fail: (error) => ui.error(error.message),
	finish: () => {},
};

export type ProgressReporterOptions = {
	title?: string;
	output?: LiveOutput;
	tty?: boolean;
	now?: () => number;
};

/**
 * Progress bar with failure lines stacked above it. Without a TTY the bar
 * is not drawn; failures and the final summary are written as plain lines.
 */
export class ProgressReporter implements SyncReporter {
	private readonly output: LiveOutput;
	private readonly title: string;
	private readonly hasTty: boolean;
	private readonly now: () => number;
	private readonly failures: string[] = [];
	private startTime = 0;
	private total = 0;
	private position = 0;
	private current = "";
	private errors = 0;

	constructor(options: ProgressReporterOptions = {}) {
		this.output = options.output ?? createLiveOutput();
		this.title = options.title ?? "Syncing Charts";
		this.hasTty = options.tty ?? Boolean(process.stdout.isTTY);
		this.now = options.now ?? Date.now;
	}

	get completed() {
		return this.position;
	}

	start(total: number) {
		this.total = total;
		this.position = 0;
		this.startTime = this.now();
		this.render();
	}

	advance(label: string) {
		this.position += 1;
		this.current = label;
		this.render();
	}

	fail(error: TransferError) {
		this.errors += 1;
		const label = `${error.chart}-${error.version}`;
		const details = `${error.stage} · ${error.reason}`;
		const line = `  ${symbols.error} ${pc.bold(label)} ${pc.gray(details)}`;
		if (!this.hasTty) {
			this.output.persist([line]);
			return;
		}
		this.failures.push(line);
		this.render();
	}

	finish(summary?: string) {
		const parts = [
			`Completed in ${formatDuration(this.now() - this.startTime)}`,
			this.errors
				? `${this.errors} error${this.errors === 1 ? "" : "s"}`
				: null,
		].filter((part): part is string => part !== null);
		const message = `${summary ?? symbols.info} · ${parts.join(" · ")}`;
		const lines = this.hasTty
			? [...this.failures, this.barLine(), message]
			: [message];
		this.output.persist(lines);
	}

	private barLine() {
		const label = this.current ? ` ${pc.dim(this.current)}` : "";
		return `${this.title} ${formatBar(this.position, this.total)}${label}`;
	}

	private render() {
		if (!this.hasTty) return;
		this.output.render([...this.failures, this.barLine()]);
	}
}
