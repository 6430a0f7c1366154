/**
 * HTTP control surface
 *
 * Operator endpoints for monitoring state, the automation policy, scans,
 * logs and changes awaiting confirmation. Bodies are validated with zod;
 * validation failures become 400 responses.
 */

import Fastify, {
  type FastifyError,
  type FastifyInstance,
  type FastifyPluginAsync,
  type FastifyReply,
  type FastifyRequest,
} from "fastify";
import { z, ZodError } from "zod";

import type { ConfigStore } from "../config-store.js";
import { FatalConfigError, MirrorwatchError, errorMessage } from "../errors.js";
import { readLogTail, type Logger } from "../logger.js";
import type { SyncOrchestrator } from "../sync/orchestrator.js";

export type ControlServerOptions = {
  orchestrator: SyncOrchestrator;
  store: ConfigStore;
  logger: Logger;
};

type ApiError = {
  statusCode: number;
  error: string;
  message: string;
  code?: string;
  details?: unknown;
};

const controlSchema = z.object({
  action: z.enum(["start", "stop"]),
});

const configPatchSchema = z
  .object({
    policy: z
      .object({
        autoConfirm: z.boolean().optional(),
        autoSync: z.boolean().optional(),
        autoDelete: z.boolean().optional(),
      })
      .strict()
      .optional(),
    mappings: z
      .array(z.object({ sourcePrefix: z.string().min(1), targetPrefix: z.string() }).strict())
      .optional(),
    layout: z.enum(["flat", "dated"]).optional(),
    exclude: z.array(z.string()).optional(),
  })
  .strict()
  .refine((patch) => Object.values(patch).some((value) => value !== undefined), {
    message: "Nothing to update",
  });

const scanSchema = z.object({
  force: z.boolean().default(false),
});

const logsQuerySchema = z.object({
  lines: z.coerce.number().int().min(1).max(1000).default(50),
});

const targetsSchema = z.object({
  targets: z.array(z.string().min(1)).optional(),
});

const resolveSchema = z.object({
  path: z.string().min(1),
});

export const controlRoutes: FastifyPluginAsync<ControlServerOptions> = async (
  fastify,
  { orchestrator, store, logger }
) => {
  fastify.get("/status", async () => orchestrator.status());

  /**
   * Start or stop monitoring
   */
  fastify.post("/control", async (request, reply) => {
    const { action } = controlSchema.parse(request.body ?? {});

    if (action === "stop") {
      await orchestrator.stop();
      return orchestrator.status();
    }

    try {
      await orchestrator.start({ initialScan: true });
    } catch (error) {
      if (error instanceof FatalConfigError) {
        return reply.status(409).send(orchestrator.status());
      }
      throw error;
    }
    return orchestrator.status();
  });

  /**
   * Replace the automation policy or mapping rules
   */
  fastify.post("/config", async (request) => {
    const patch = configPatchSchema.parse(request.body ?? {});
    const { config } = await store.update(patch);

    logger.info(`Configuration updated: ${Object.keys(patch).join(", ")}`);
    return {
      policy: config.policy,
      mappings: config.mappings,
      layout: config.layout,
      exclude: config.exclude,
    };
  });

  fastify.post("/scan", async (request) => {
    const { force } = scanSchema.parse(request.body ?? {});
    const { cycle, ...scan } = await orchestrator.scan({ force, dispatch: true });
    return { scan, cycle };
  });

  fastify.get("/logs", async (request) => {
    const { lines } = logsQuerySchema.parse(request.query);
    return { logs: logger.file ? await readLogTail(logger.file, lines) : [] };
  });

  fastify.get("/pending", async () => ({ pending: orchestrator.pending() }));

  fastify.post("/confirm", async (request) => {
    const { targets } = targetsSchema.parse(request.body ?? {});
    return { confirmed: orchestrator.confirm(targets) };
  });

  fastify.post("/reject", async (request) => {
    const { targets } = targetsSchema.parse(request.body ?? {});
    return { rejected: orchestrator.reject(targets) };
  });

  fastify.post("/resolve", async (request) => {
    const { path } = resolveSchema.parse(request.body ?? {});
    return orchestrator.resolve(path);
  });
};

function toApiError(error: FastifyError): ApiError {
  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      error: "Validation Error",
      message: "Request validation failed",
      details: error.errors.map((e) => ({ path: e.path.join("."), message: e.message })),
    };
  }

  if (error instanceof FatalConfigError) {
    return {
      statusCode: 400,
      error: "Invalid Configuration",
      message: error.message,
      code: error.code,
    };
  }

  if (error instanceof MirrorwatchError) {
    return { statusCode: 502, error: "Sync Error", message: error.message, code: error.code };
  }

  if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
    return {
      statusCode: error.statusCode,
      error: error.name || "Bad Request",
      message: error.message,
      code: error.code,
    };
  }

  return { statusCode: 500, error: "Internal Server Error", message: error.message };
}

/**
 * Build the control server. Call listen() on the result to serve it.
 */
export async function createControlServer(options: ControlServerOptions): Promise<FastifyInstance> {
  const server = Fastify({ logger: false });
  const { logger } = options;

  server.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    const apiError = toApiError(error);
    if (apiError.statusCode >= 500) {
      logger.error(`${request.method} ${request.url} failed: ${errorMessage(error)}`);
    } else {
      logger.warn(`${request.method} ${request.url} rejected: ${apiError.message}`);
    }
    return reply.status(apiError.statusCode).send(apiError);
  });

  server.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) => {
    const apiError: ApiError = {
      statusCode: 404,
      error: "Not Found",
      message: `Route ${request.method} ${request.url} not found`,
    };
    return reply.status(404).send(apiError);
  });

  await server.register(controlRoutes, options);

  return server;
}
