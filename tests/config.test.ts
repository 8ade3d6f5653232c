import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	DEFAULT_CONFIG_FILENAME,
	loadConfig,
	resolveEndpoints,
} from "../src/config";

describe("resolveEndpoints", () => {
	it("returns null when no endpoint was provided", () => {
		expect(resolveEndpoints({}, {})).toBeNull();
	});

	it("falls back to the local server for the side left out", () => {
		expect(resolveEndpoints({ source: "http://charts.test/" }, {})).toEqual({
			source: "http://charts.test",
			destination: "http://localhost:8080",
		});
	});

	it("accepts the default URL when it is given explicitly", () => {
		expect(
			resolveEndpoints(
				{
					source: "http://localhost:8080",
					destination: "http://localhost:8080",
				},
				{},
			),
		).toEqual({
			source: "http://localhost:8080",
			destination: "http://localhost:8080",
		});
	});

	it("prefers flags over the config file", () => {
		expect(
			resolveEndpoints(
				{ destination: "https://mirror.test" },
				{ source: "http://a.test", destination: "http://b.test" },
			),
		).toEqual({ source: "http://a.test", destination: "https://mirror.test" });
	});

	it("rejects URLs that are not http or https", () => {
		expect(() => resolveEndpoints({ source: "ftp://charts.test" }, {})).toThrow(
			"--source: Unsupported protocol 'ftp:'. Use http or https.",
		);
		expect(() => resolveEndpoints({ destination: "charts" }, {})).toThrow(
			"--destination: 'charts' is not a valid URL.",
		);
	});
});

describe("loadConfig", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(path.join(tmpdir(), "cm-sync-config-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("returns an empty config when no file exists", async () => {
		await expect(loadConfig(undefined, dir)).resolves.toEqual({
			config: {},
			resolvedPath: null,
		});
	});

	it("reads the default config file", async () => {
		const configPath = path.join(dir, DEFAULT_CONFIG_FILENAME);
		await writeFile(
			configPath,
			JSON.stringify({ source: "http://a.test", timeoutMs: 5000 }),
		);

		await expect(loadConfig(undefined, dir)).resolves.toEqual({
			config: { source: "http://a.test", timeoutMs: 5000 },
			resolvedPath: configPath,
		});
	});

	it("reads the cm-sync key of package.json", async () => {
		const packagePath = path.join(dir, "package.json");
		await writeFile(
			packagePath,
			JSON.stringify({
				name: "charts",
				"cm-sync": { destination: "http://b.test" },
			}),
		);

		await expect(loadConfig(undefined, dir)).resolves.toEqual({
			config: { destination: "http://b.test" },
			resolvedPath: packagePath,
		});
	});

	it("ignores a package.json without a cm-sync key", async () => {
		await writeFile(
			path.join(dir, "package.json"),
			JSON.stringify({ name: "charts" }),
		);

		await expect(loadConfig(undefined, dir)).resolves.toEqual({
			config: {},
			resolvedPath: null,
		});
	});

	it("rejects unknown keys", async () => {
		await writeFile(
			path.join(dir, "sync.json"),
			JSON.stringify({ source: "http://a.test", extra: true }),
		);

		await expect(loadConfig("sync.json", dir)).rejects.toThrow(
			"Config does not match schema: config Unrecognized key(s) in object: 'extra'",
		);
	});

	it("reports a missing explicit config file", async () => {
		await expect(loadConfig("missing.json", dir)).rejects.toThrow(
			`Failed to read config at ${path.join(dir, "missing.json")}`,
		);
	});
});
