import { defineBuildConfig } from "unbuild";

export default defineBuildConfig({
	entries: [{ input: "src/cli", name: "cli" }],
	declaration: false,
	clean: true,
	sourcemap: true,
	rollup: {
		emitCJS: false,
		inlineDependencies: ["picocolors"],
		esbuild: {
			minify: true,
		},
	},
});
