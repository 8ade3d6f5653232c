import { HttpResponse, http } from "msw";
import { describe, expect, it } from "vitest";
import {
	DecodeError,
	NetworkError,
	SchemaError,
	UnexpectedStatusError,
} from "../src/errors";
import { probe, probeServer } from "../src/probe";
import { server } from "./mocks/server";

const INFO_URL = "http://cm.test/info";

describe("probe", () => {
	it("accepts a JSON object with a version key", async () => {
		server.use(
			http.get(INFO_URL, () => HttpResponse.json({ version: "v0.16.2" })),
		);

		await expect(probe(INFO_URL)).resolves.toBeUndefined();
	});

	it("accepts a version key whatever its value", async () => {
		server.use(http.get(INFO_URL, () => HttpResponse.json({ version: null })));

		await expect(probe(INFO_URL)).resolves.toBeUndefined();
	});

	it("fails with UnexpectedStatusError on a non-200 status", async () => {
		server.use(
			http.get(INFO_URL, () => new HttpResponse("down", { status: 503 })),
		);

		const error = await probe(INFO_URL).catch((caught: unknown) => caught);

		expect(error).toBeInstanceOf(UnexpectedStatusError);
		expect(error).toMatchObject({ status: 503, url: INFO_URL });
	});

	it("fails with DecodeError on a body that is not JSON", async () => {
		server.use(
			http.get(INFO_URL, () => new HttpResponse("<html>", { status: 200 })),
		);

		await expect(probe(INFO_URL)).rejects.toBeInstanceOf(DecodeError);
	});

	it("fails with SchemaError when the version key is missing", async () => {
		server.use(http.get(INFO_URL, () => HttpResponse.json({ health: "ok" })));

		const error = await probe(INFO_URL).catch((caught: unknown) => caught);

		expect(error).toBeInstanceOf(SchemaError);
		expect(error).toMatchObject({
			field: "version",
			message:
				"Unexpected response from http://cm.test/info: version: missing 'version' key in JSON",
		});
	});

	it("fails with SchemaError when the body is not an object", async () => {
		server.use(http.get(INFO_URL, () => HttpResponse.json(["v0.16.2"])));

		const error = await probe(INFO_URL).catch((caught: unknown) => caught);

		expect(error).toBeInstanceOf(SchemaError);
		expect(error).toMatchObject({ field: "(root)" });
	});

	it("fails with NetworkError when no response arrives", async () => {
		server.use(http.get(INFO_URL, () => HttpResponse.error()));

		await expect(probe(INFO_URL)).rejects.toBeInstanceOf(NetworkError);
	});
});

describe("probeServer", () => {
	it("appends the info path to the base URL", async () => {
		server.use(
			http.get(INFO_URL, () => HttpResponse.json({ version: "v0.16.2" })),
		);

		await expect(probeServer("http://cm.test/")).resolves.toBe(INFO_URL);
	});
});
