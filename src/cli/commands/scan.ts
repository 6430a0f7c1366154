/**
 * mirrorwatch scan - One-shot rescan of the watch root
 */

import { errorMessage } from "../../errors.js";
import { exitWithError, loadRuntime, type ConfigFlags } from "../shared.js";

export type ScanOptions = ConfigFlags & {
  force?: boolean;
  dryRun?: boolean;
  json?: boolean;
};

export async function scan(options: ScanOptions): Promise<void> {
  const { orchestrator, logger } = await loadRuntime(options, { console: !options.json });

  try {
    const report = await orchestrator.scan({ force: options.force, dispatch: !options.dryRun });
    const pending = orchestrator.pending();
    await logger.flush();

    if (options.json) {
      console.log(JSON.stringify({ ...report, pending }, null, 2));
      return;
    }

    console.log();
    console.log(`Scanned:    ${report.scanned}`);
    console.log(`Queued:     ${report.queued}`);
    console.log(`Deletes:    ${report.deletes}`);
    console.log(`Unchanged:  ${report.unchanged}`);
    console.log(`Unmapped:   ${report.unmapped}`);
    console.log(`Ignored:    ${report.ignored}`);

    if (report.cycle) {
      const { succeeded, failed, awaitingConfirmation } = report.cycle;
      console.log();
      console.log(`Dispatched: ${succeeded} succeeded, ${failed} failed`);
      if (awaitingConfirmation > 0) {
        console.log(`${awaitingConfirmation} change(s) need confirmation; start 'mirrorwatch run' and POST /confirm`);
      }
    }

    if (options.dryRun && pending.length > 0) {
      console.log();
      console.log("Would dispatch:");
      for (const entry of pending) {
        console.log(`  ${entry.kind.padEnd(6)} ${entry.targetPath}  (${entry.sourcePath})`);
      }
    }
  } catch (error) {
    await logger.flush();
    exitWithError(`Scan failed: ${errorMessage(error)}`);
  }
}
