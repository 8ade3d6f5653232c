import type { ChartIndex } from "./charts";

/** Chart name to the versions the destination is missing. */
export type ChartDiff = Record<string, string[]>;

export type ChartVersionRef = {
	chart: string;
	version: string;
};

/**
 * One-directional: versions present in `source` whose exact version string
 * is absent from `destination` under the same chart name. Charts with
 * nothing missing are left out.
 */
export const diffCharts = (
	source: ChartIndex,
	destination: ChartIndex,
): ChartDiff => {
	const diff: ChartDiff = {};
	for (const [chart, versions] of Object.entries(source)) {
		const existing = Object.hasOwn(destination, chart)
			? destination[chart]
			: [];
		const present = new Set(existing.map((record) => record.version));
		const missing = new Set<string>();
		for (const record of versions) {
			if (!present.has(record.version)) {
				missing.add(record.version);
			}
		}
		if (missing.size > 0) {
			diff[chart] = Array.from(missing);
		}
	}
	return diff;
};

export const countTransfers = (diff: ChartDiff) =>
	Object.values(diff).reduce((total, versions) => total + versions.length, 0);

export const flattenDiff = (diff: ChartDiff): ChartVersionRef[] =>
	Object.entries(diff).flatMap(([chart, versions]) =>
		versions.map((version) => ({ chart, version })),
	);
