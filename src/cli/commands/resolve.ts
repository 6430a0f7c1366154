/**
 * mirrorwatch resolve - Show where a local path would be mirrored
 */

import { loadRuntime, type ConfigFlags } from "../shared.js";

export type ResolveOptions = ConfigFlags & {
  json?: boolean;
};

const REASONS = {
  "outside-root": "is outside the watch root",
  layout: "does not follow the configured layout",
  "no-mapping": "matches no mapping rule",
} as const;

export async function resolve(localPath: string, options: ResolveOptions): Promise<void> {
  const { orchestrator } = await loadRuntime(options, { console: false });
  const result = orchestrator.resolve(localPath);

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else if (result.targetPath === null) {
    console.log(`${result.sourcePath} ${result.reason ? REASONS[result.reason] : "cannot be mapped"}`);
  } else {
    console.log(`${result.sourcePath} → ${result.targetPath}`);
    if (result.rule) {
      console.log(`  rule:  ${result.rule.sourcePrefix} → ${result.rule.targetPrefix || "(repository root)"}`);
    }
    if (result.batch) {
      console.log(`  batch: ${result.batch}`);
    }
  }

  if (result.targetPath === null) {
    process.exitCode = 1;
  }
}
