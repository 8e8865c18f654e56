import { fastify, FastifyInstance } from "fastify";

export function buildHealthServer(): FastifyInstance {
  const server = fastify({ logger: false });

  server.get("/", async (_request, reply) => {
    return reply.type("text/plain").send("ok");
  });

  server.get("/health", async () => ({ status: "ok" }));

  return server;
}
