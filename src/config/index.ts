import { access, readFile } from "node:fs/promises";
import path from "node:path";
import { normalizeBaseUrl } from "../redact";
import type { ChartSyncConfig } from "./config-schema";
import { ConfigSchema, ServerUrlSchema } from "./config-schema";

export type { ChartSyncConfig };

export const DEFAULT_CONFIG_FILENAME = "cm-sync.config.json";
export const DEFAULT_SERVER_URL = "http://localhost:8080";
const PACKAGE_JSON_FILENAME = "package.json";
const PACKAGE_CONFIG_KEY = "cm-sync";

const exists = async (target: string) => {
	try {
		await access(target);
		return true;
	} catch {
		return false;
	}
};

export const validateConfig = (input: unknown): ChartSyncConfig => {
	if (typeof input !== "object" || input === null || Array.isArray(input)) {
		throw new Error("Config must be a JSON object.");
	}
	const parsed = ConfigSchema.safeParse(input);
	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join(".") || "config"} ${issue.message}`)
			.join("; ");
		throw new Error(`Config does not match schema: ${details}`);
	}
	return parsed.data;
};

const readJsonFile = async (filePath: string): Promise<unknown> => {
	let raw: string;
	try {
		raw = await readFile(filePath, "utf8");
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`Failed to read config at ${filePath}: ${message}`);
	}
	try {
		return JSON.parse(raw);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`Invalid JSON in ${filePath}: ${message}`);
	}
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

export type LoadedConfig = {
	config: ChartSyncConfig;
	resolvedPath: string | null;
};

/**
 * Reads the config named by `--config`, else `cm-sync.config.json` in the
 * working directory, else a `"cm-sync"` key in package.json. No file at all
 * is an empty config.
 */
export const loadConfig = async (
	configPath?: string,
	cwd = process.cwd(),
): Promise<LoadedConfig> => {
	if (configPath) {
		const resolvedPath = path.resolve(cwd, configPath);
		const parsed = await readJsonFile(resolvedPath);
		if (path.basename(resolvedPath) === PACKAGE_JSON_FILENAME) {
			if (!isRecord(parsed) || parsed[PACKAGE_CONFIG_KEY] === undefined) {
				throw new Error(
					`Missing ${PACKAGE_CONFIG_KEY} config in ${resolvedPath}.`,
				);
			}
			return {
				config: validateConfig(parsed[PACKAGE_CONFIG_KEY]),
				resolvedPath,
			};
		}
		return { config: validateConfig(parsed), resolvedPath };
	}
	const defaultPath = path.resolve(cwd, DEFAULT_CONFIG_FILENAME);
	if (await exists(defaultPath)) {
		return {
			config: validateConfig(await readJsonFile(defaultPath)),
			resolvedPath: defaultPath,
		};
	}
	const packagePath = path.resolve(cwd, PACKAGE_JSON_FILENAME);
	if (await exists(packagePath)) {
		const parsed = await readJsonFile(packagePath);
		if (isRecord(parsed) && parsed[PACKAGE_CONFIG_KEY] !== undefined) {
			return {
				config: validateConfig(parsed[PACKAGE_CONFIG_KEY]),
				resolvedPath: packagePath,
			};
		}
	}
	return { config: {}, resolvedPath: null };
};

export type EndpointInput = {
	source?: string;
	destination?: string;
};

export type ResolvedEndpoints = {
	source: string;
	destination: string;
};

const parseServerUrl = (value: string, label: string) => {
	const parsed = ServerUrlSchema.safeParse(value);
	if (!parsed.success) {
		const message = parsed.error.issues[0]?.message ?? "invalid URL";
		throw new Error(`--${label}: ${message}`);
	}
	return normalizeBaseUrl(parsed.data);
};

/**
 * Flags win over the config file. At least one side must be given; the
 * other falls back to the local default server. Returns null when neither
 * side was provided.
 */
export const resolveEndpoints = (
	flags: EndpointInput,
	config: ChartSyncConfig,
): ResolvedEndpoints | null => {
	const source = flags.source ?? config.source;
	const destination = flags.destination ?? config.destination;
	if (source === undefined && destination === undefined) {
		return null;
	}
	return {
		source: parseServerUrl(source ?? DEFAULT_SERVER_URL, "source"),
		destination: parseServerUrl(
			destination ?? DEFAULT_SERVER_URL,
			"destination",
		),
	};
};
