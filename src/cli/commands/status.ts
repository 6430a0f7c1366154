/**
 * mirrorwatch status - Show monitoring state
 *
 * Asks the running instance over its control surface; when nothing is
 * running, falls back to the persisted sync state.
 */

import { z } from "zod";

import { errorMessage } from "../../errors.js";
import type { OrchestratorStatus } from "../../sync/orchestrator.js";
import { loadSnapshot } from "../../sync/state.js";
import { readRunningPid } from "../pid.js";
import { formatPath, loadRuntime, warn, type ConfigFlags } from "../shared.js";

export type StatusOptions = ConfigFlags & {
  json?: boolean;
};

const statusResponseSchema = z.object({
  status: z.enum(["idle", "running", "draining", "stopped", "error"]),
  monitoring: z.boolean(),
  last_event: z.string().nullable(),
  last_sync: z.string().nullable(),
  pending: z.number().int().nonnegative(),
  awaiting_confirmation: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  error: z.string().nullable(),
  transport: z.string(),
  policy: z.string(),
}) satisfies z.ZodType<OrchestratorStatus>;

/**
 * Validate a /status body; undefined when it is not one
 */
export function parseStatusResponse(body: unknown): OrchestratorStatus | undefined {
  const parsed = statusResponseSchema.safeParse(body);
  return parsed.success ? parsed.data : undefined;
}

async function fetchStatus(host: string, port: number): Promise<OrchestratorStatus | undefined> {
  try {
    const res = await fetch(`http://${host}:${port}/status`);
    if (!res.ok) return undefined;
    const live = parseStatusResponse(await res.json());
    if (!live) {
      warn("Control surface returned an unrecognized status payload");
    }
    return live;
  } catch (error) {
    warn(`Control surface unreachable: ${errorMessage(error)}`);
    return undefined;
  }
}

export async function status(options: StatusOptions): Promise<void> {
  const { homeDir, config, transport } = await loadRuntime(options, { console: false });
  const pid = await readRunningPid(homeDir);
  const live = pid !== undefined ? await fetchStatus(config.server.host, config.server.port) : undefined;

  const snapshot = await loadSnapshot(homeDir, config.watchRoot);
  const tracked = Object.keys(snapshot.files).length;

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          running: pid !== undefined,
          pid: pid ?? null,
          watchRoot: config.watchRoot,
          transport: transport.name,
          tracked,
          lastSync: snapshot.lastSync,
          live: live ?? null,
        },
        null,
        2
      )
    );
    return;
  }

  console.log("Mirrorwatch Status");
  console.log("==================");
  console.log();
  console.log(`  Process:    ${pid !== undefined ? `running (PID ${pid})` : "stopped"}`);
  console.log(`  Watch root: ${formatPath(config.watchRoot)}`);
  console.log(`  Layout:     ${config.layout}`);
  console.log(`  Transport:  ${transport.name}`);
  console.log(`  Tracked:    ${tracked} file(s)`);
  console.log(`  Last sync:  ${snapshot.lastSync ?? "never"}`);

  if (live) {
    console.log();
    console.log(`  State:      ${live.status}`);
    console.log(`  Policy:     ${live.policy}`);
    console.log(`  Last event: ${live.last_event ?? "none"}`);
    console.log(`  Pending:    ${live.pending} (${live.awaiting_confirmation} awaiting confirmation, ${live.failed} failed)`);
    if (live.error) {
      console.log(`  Error:      ${live.error}`);
    }
  }
}
