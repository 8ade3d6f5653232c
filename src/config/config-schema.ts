import * as z from "zod";

const SUPPORTED_PROTOCOLS = new Set(["http:", "https:"]);

export const ServerUrlSchema = z
	.string()
	.min(1)
	.superRefine((value, ctx) => {
		let url: URL;
		try {
			url = new URL(value);
		} catch {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `'${value}' is not a valid URL.`,
			});
			return;
		}
		if (!SUPPORTED_PROTOCOLS.has(url.protocol)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `Unsupported protocol '${url.protocol}'. Use http or https.`,
			});
		}
	});

export const ConfigSchema = z
	.object({
		$schema: z.string().min(1).optional(),
		source: ServerUrlSchema.optional(),
		destination: ServerUrlSchema.optional(),
		timeoutMs: z.number().int().min(1).optional(),
	})
	.strict();

export type ChartSyncConfig = z.infer<typeof ConfigSchema>;

// Server payloads: only the fields the sync reads are required.

export const InfoSchema = z
	.object({})
	.passthrough()
	.refine((value) => Object.hasOwn(value, "version"), {
		message: "missing 'version' key in JSON",
		path: ["version"],
	});

export const VersionRecordSchema = z
	.object({
		version: z.string(),
	})
	.passthrough();

export const ChartIndexSchema = z.record(
	z.string(),
	z.array(VersionRecordSchema),
);

export type VersionRecord = z.infer<typeof VersionRecordSchema>;
export type ChartIndex = z.infer<typeof ChartIndexSchema>;
