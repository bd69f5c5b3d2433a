import { build as esbuild } from "esbuild";
import { rm } from "fs/promises";

const entries = [
  { label: "server", entry: "server/index.ts", outfile: "dist/index.js" },
  { label: "coordinator", entry: "scripts/pipeline/run-coordinator.ts", outfile: "dist/run-coordinator.js" },
];

async function buildAll() {
  await rm("dist", { recursive: true, force: true });

  for (const { label, entry, outfile } of entries) {
    console.log(`building ${label}...`);
    await esbuild({
      entryPoints: [entry],
      platform: "node",
      target: "node20",
      bundle: true,
      format: "esm",
      outfile,
      // npm packages stay external; ESM output cannot inline their require() calls
      packages: "external",
      alias: { "@shared": "./shared" },
      banner: entry.startsWith("scripts/") ? { js: "#!/usr/bin/env node" } : undefined,
      define: {
        "process.env.NODE_ENV": '"production"',
      },
      minify: true,
      logLevel: "info",
    });
  }
}

buildAll().catch((err) => {
  console.error(err);
  process.exit(1);
});
