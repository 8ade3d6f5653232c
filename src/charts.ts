import type { ChartIndex } from "./config/config-schema";
import { ChartIndexSchema } from "./config/config-schema";
import { getJson, request } from "./http";
import { normalizeBaseUrl } from "./redact";

export type { ChartIndex };

export const CHARTS_API_PATH = "/api/charts";
export const CHART_ARCHIVE_CONTENT_TYPE = "application/gzip";

type ChartsRequestOptions = {
	timeoutMs?: number;
};

export const listCharts = async (
	baseUrl: string,
	options: ChartsRequestOptions = {},
): Promise<ChartIndex> =>
	getJson(
		`${normalizeBaseUrl(baseUrl)}${CHARTS_API_PATH}`,
		ChartIndexSchema,
		options,
	);

export const chartArchiveUrl = (
	baseUrl: string,
	chart: string,
	version: string,
) => `${normalizeBaseUrl(baseUrl)}/charts/${chart}-${version}.tgz`;

export const chartUploadUrl = (baseUrl: string) =>
	`${normalizeBaseUrl(baseUrl)}${CHARTS_API_PATH}`;

export const fetchChartArchive = (
	url: string,
	options: ChartsRequestOptions = {},
) => request(url, { timeoutMs: options.timeoutMs });

export const uploadChartArchive = (
	url: string,
	archive: ArrayBuffer,
	options: ChartsRequestOptions = {},
) =>
	request(url, {
		method: "POST",
		headers: { "Content-Type": CHART_ARCHIVE_CONTENT_TYPE },
		body: archive,
		timeoutMs: options.timeoutMs,
	});
