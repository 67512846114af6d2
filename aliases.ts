import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

const TsconfigPathsSchema = z.object({
  compilerOptions: z
    .object({ paths: z.record(z.string(), z.array(z.string())).default({}) })
    .default({}),
});

const tsconfig = TsconfigPathsSchema.parse(
  JSON.parse(fs.readFileSync(path.resolve(rootDir, "tsconfig.json"), "utf-8")),
);

// Mirror tsconfig `paths` for Vitest:
// "@graph/*": ["./src/graph/*"] -> "@graph": "<root>/src/graph"
// "@nodes": ["./src/nodes/index.ts"] -> "@nodes": "<root>/src/nodes"
export const aliases: Record<string, string> = {};

for (const [alias, targets] of Object.entries(tsconfig.compilerOptions.paths)) {
  const target = targets[0];
  if (!target) continue;

  const cleanAlias = alias.replace(/\/\*$/, "");
  const cleanTarget = target.replace(/\/\*$/, "").replace(/\/index\.ts$/, "");
  aliases[cleanAlias] = path.resolve(rootDir, cleanTarget);
}
