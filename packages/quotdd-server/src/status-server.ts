import Fastify from "fastify";
import type { Health } from "@quotdd/contracts";
import type { Logger } from "pino";
import type { QuoteService } from "./service.js";

export function buildStatusServer(service: QuoteService, logger: Logger) {
  const app = Fastify({ loggerInstance: logger });

  app.addHook("onRequest", async (request, reply) => {
    reply.header("x-request-id", request.id);
  });

  app.setErrorHandler((error, request, reply) => {
    request.log.error({ err: error }, "unhandled request error");
    reply.code(500).send({ error: "internal_error", requestId: request.id });
  });

  app.get("/health", async (): Promise<Health> => ({ ok: true, ts: Date.now() }));

  app.get("/ready", async (_request, reply) => {
    const status = service.status();
    if (!status.listening) {
      return reply.code(503).send(status);
    }
    return status;
  });

  return app;
}

export type StatusServer = ReturnType<typeof buildStatusServer>;
