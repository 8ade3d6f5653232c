import { InfoSchema } from "./config/config-schema";
import { getJson } from "./http";
import { normalizeBaseUrl } from "./redact";

export const INFO_PATH = "/info";

type ProbeOptions = {
	timeoutMs?: number;
};

/**
 * Checks that `url` answers 200 with a JSON object carrying a `version` key.
 * Throws NetworkError, UnexpectedStatusError, DecodeError or SchemaError.
 */
export const probe = async (url: string, options: ProbeOptions = {}) => {
	await getJson(url, InfoSchema, options);
};

export const probeServer = async (
	baseUrl: string,
	options: ProbeOptions = {},
) => {
	const url = `${normalizeBaseUrl(baseUrl)}${INFO_PATH}`;
	await probe(url, options);
	return url;
};
