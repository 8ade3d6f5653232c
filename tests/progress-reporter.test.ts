import pc from "picocolors";
import { describe, expect, it, vi } from "vitest";
import type { LiveOutput } from "../src/cli/live-output";
import {
	formatBar,
	ProgressReporter,
	quietReporter,
} from "../src/cli/progress-reporter";
import { symbols } from "../src/cli/ui";
import { type TransferStage, TransferError } from "../src/errors";

const transferError = (stage: TransferStage, reason: string) =>
	new TransferError({
		chart: "app",
		version: "1.1.0",
		stage,
		server:
			stage === "upload" ? "http://destination.test" : "http://source.test",
		cause: new Error(reason),
	});

const createOutput = () => {
	const rendered: string[][] = [];
	const persisted: string[][] = [];
	const output: LiveOutput = {
		render: (lines) => {
			rendered.push(lines);
		},
		persist: (lines) => {
			persisted.push(lines);
		},
		clear: () => {},
		stop: () => {},
	};
	return { output, rendered, persisted };
};

describe("formatBar", () => {
	it("fills the bar in proportion to the position", () => {
		expect(formatBar(1, 2)).toBe(
			` 50% |${"█".repeat(12)}${" ".repeat(12)}| (1/2)`,
		);
	});

	it("shows an empty run as complete", () => {
		expect(formatBar(0, 0)).toBe(`100% |${"█".repeat(24)}| (0/0)`);
	});
});

describe("ProgressReporter", () => {
	it("redraws the bar on a terminal", () => {
		const { output, rendered } = createOutput();
		const reporter = new ProgressReporter({ output, tty: true, title: "Sync" });

		reporter.start(2);
		reporter.advance("app-1.1.0");

		expect(rendered).toEqual([
			[`Sync ${formatBar(0, 2)}`],
			[`Sync ${formatBar(1, 2)} ${pc.dim("app-1.1.0")}`],
		]);
		expect(reporter.completed).toBe(1);
	});

	it("keeps failures above the bar on a terminal", () => {
		const { output, rendered } = createOutput();
		const reporter = new ProgressReporter({ output, tty: true, title: "Sync" });

		reporter.start(1);
		reporter.fail(transferError("fetch", "not found"));

		expect(rendered.at(-1)).toEqual([
			`  ${symbols.error} ${pc.bold("app-1.1.0")} ${pc.gray("fetch · not found")}`,
			`Sync ${formatBar(0, 1)}`,
		]);
		expect(reporter.completed).toBe(0);
	});

	it("writes plain lines without a terminal", () => {
		const { output, rendered, persisted } = createOutput();
		const now = vi.fn().mockReturnValueOnce(1000).mockReturnValueOnce(2500);
		const reporter = new ProgressReporter({ output, tty: false, now });

		reporter.start(2);
		reporter.advance("app-1.0.0");
		reporter.fail(transferError("upload", "conflict"));
		reporter.finish("Synced 1 of 2 chart versions");

		expect(rendered).toEqual([]);
		expect(persisted).toEqual([
			[
				`  ${symbols.error} ${pc.bold("app-1.1.0")} ${pc.gray("upload · conflict")}`,
			],
			["Synced 1 of 2 chart versions · Completed in 1.5s · 1 error"],
		]);
	});
});

describe("quietReporter", () => {
	it("writes each failure to stderr", () => {
		const write = vi
			.spyOn(process.stderr, "write")
			.mockImplementation(() => true);

		quietReporter.start(1);
		quietReporter.fail(transferError("fetch", "socket hang up"));
		quietReporter.finish("Synced 0 of 1 chart version");

		expect(write).toHaveBeenCalledTimes(1);
		expect(write).toHaveBeenCalledWith(
			`${symbols.error} Failed to fetch app-1.1.0 from http://source.test: socket hang up\n`,
		);
	});
});
