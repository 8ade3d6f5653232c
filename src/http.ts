import type * as z from "zod";
import {
	DecodeError,
	NetworkError,
	SchemaError,
	UnexpectedStatusError,
} from "./errors";

export type RequestOptions = {
	method?: "GET" | "POST";
	headers?: Record<string, string>;
	body?: ArrayBuffer;
	timeoutMs?: number;
};

export const request = async (
	url: string,
	options: RequestOptions = {},
): Promise<Response> => {
	try {
		return await fetch(url, {
			method: options.method ?? "GET",
			headers: options.headers,
			body: options.body,
			signal:
				options.timeoutMs === undefined
					? undefined
					: AbortSignal.timeout(options.timeoutMs),
		});
	} catch (error) {
		throw new NetworkError(url, error);
	}
};

/** Reads and drops a body that is not needed, releasing the connection. */
export const discardBody = async (response: Response, url: string) => {
	if (response.bodyUsed) {
		return;
	}
	try {
		await response.arrayBuffer();
	} catch (error) {
		throw new NetworkError(url, error);
	}
};

export const expectStatus = async (
	response: Response,
	url: string,
	expected: number,
) => {
	if (response.status === expected) {
		return;
	}
	await discardBody(response, url);
	throw new UnexpectedStatusError(url, response.status, expected);
};

export const readJson = async (response: Response, url: string) => {
	let raw: string;
	try {
		raw = await response.text();
	} catch (error) {
		throw new NetworkError(url, error);
	}
	try {
		return JSON.parse(raw) as unknown;
	} catch (error) {
		throw new DecodeError(url, error);
	}
};

const formatIssuePath = (path: Array<string | number>) =>
	path.length === 0 ? "(root)" : path.join(".");

export const parseWith = <T extends z.ZodTypeAny>(
	schema: T,
	value: unknown,
	url: string,
): z.infer<T> => {
	const result = schema.safeParse(value);
	if (result.success) {
		return result.data;
	}
	const issue = result.error.issues[0];
	const field = issue ? formatIssuePath(issue.path) : "(root)";
	const detail = issue ? `${field}: ${issue.message}` : "invalid payload";
	throw new SchemaError(url, field, detail);
};

export const getJson = async <T extends z.ZodTypeAny>(
	url: string,
	schema: T,
	options: { timeoutMs?: number } = {},
): Promise<z.infer<T>> => {
	const response = await request(url, { timeoutMs: options.timeoutMs });
	await expectStatus(response, url, 200);
	const data = await readJson(response, url);
	return parseWith(schema, data, url);
};
