import { build } from "esbuild";
import fs from "node:fs";

const entries = [
	{ in: "./src/cli.ts", out: "./build/cli.js" },
	{ in: "./src/index.ts", out: "./build/index.js" },
];

for (const entry of entries) {
	await build({
		entryPoints: [entry.in],
		bundle: true,
		minify: true,
		platform: "node",
		target: "node20",
		outfile: entry.out,
		format: "esm",
		banner: {
			js: `#!/usr/bin/env node
import { createRequire } from 'module';
const require = createRequire(import.meta.url);`,
		},
		resolveExtensions: [".ts", ".js", ".json"],
	});

	// Set executable permission
	fs.chmodSync(entry.out, "755");
}
