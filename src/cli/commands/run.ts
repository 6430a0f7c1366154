/**
 * mirrorwatch run - Monitor the watch root and serve the control surface
 */

import { FatalConfigError, errorMessage } from "../../errors.js";
import { createControlServer } from "../../server/http.js";
import { describePolicy } from "../../sync/policy.js";
import { readRunningPid, removePidFile, writePidFile } from "../pid.js";
import { exitWithError, formatPath, loadRuntime, type ConfigFlags } from "../shared.js";

export type RunOptions = ConfigFlags & {
  host?: string;
  port?: string;
  /** --no-server */
  server?: boolean;
  /** --no-scan */
  scan?: boolean;
};

export async function run(options: RunOptions): Promise<void> {
  const port = options.port !== undefined ? parseInt(options.port, 10) : undefined;
  if (port !== undefined && isNaN(port)) {
    exitWithError(`--port must be a number, got '${options.port}'`);
  }

  const runtime = await loadRuntime(options, {
    overrides: {
      server: {
        ...(options.host ? { host: options.host } : {}),
        ...(port !== undefined ? { port } : {}),
      },
    },
  });
  const { homeDir, config, logger, orchestrator, store } = runtime;

  const runningPid = await readRunningPid(homeDir);
  if (runningPid !== undefined) {
    exitWithError(`mirrorwatch is already running (PID ${runningPid})`, "Stop it before starting another instance");
  }
  await writePidFile(homeDir);

  logger.info(`Config: ${formatPath(runtime.configPath)}`);
  logger.info(`Policy: ${describePolicy(config.policy)}`);

  const server = options.server === false ? null : await createControlServer({ orchestrator, store, logger });
  if (server) {
    try {
      await server.listen({ host: config.server.host, port: config.server.port });
    } catch (error) {
      await removePidFile(homeDir);
      exitWithError(`Cannot listen on ${config.server.host}:${config.server.port}: ${errorMessage(error)}`);
    }
    logger.info(`Control surface on http://${config.server.host}:${config.server.port}`);
  }

  try {
    await orchestrator.start({ initialScan: options.scan !== false });
  } catch (error) {
    if (!(error instanceof FatalConfigError) || !server) {
      await server?.close();
      await removePidFile(homeDir);
      await logger.flush();
      exitWithError(errorMessage(error));
    }
    // The control surface stays up so the error shows in /status
    logger.warn("Monitoring halted; fix the config and POST /control {\"action\":\"start\"}");
  }

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}, shutting down`);

    await orchestrator.stop();
    await server?.close();
    await removePidFile(homeDir);
    await logger.flush();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        console.error(`Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      });
    });
  }
}
