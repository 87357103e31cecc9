import Fastify, { type FastifyInstance, type FastifyReply } from "fastify";
import type { ToolResult } from "@chapterscope/contracts";
import { consoleLogger, ConversationTools, DEFAULT_CONFIG_PATH, type Logger } from "@chapterscope/core";

export interface CreateServerOptions {
  tools: ConversationTools;
  logRequests?: boolean;
}

type QueryRecord = Record<string, string | undefined>;

export function parseOptionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return Number(value);
}

export function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return value === "1" || value === "true";
}

export function statusForResult(result: ToolResult<object>): number {
  if (result.success) return 200;
  if (result.code === "not_found") return 404;
  if (result.code === "invalid_argument") return 400;
  return 500;
}

function send<T extends object>(reply: FastifyReply, result: ToolResult<T>): ToolResult<T> {
  reply.code(statusForResult(result));
  return result;
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const server = Fastify({ logger: options.logRequests ?? false });
  const tools = options.tools;

  server.get("/api/healthz", async () => ({ ok: true }));

  server.get("/api/projects", async (_request, reply) => send(reply, await tools.listProjects()));

  server.get("/api/stats", async (_request, reply) => send(reply, await tools.getIndexStats()));

  server.get("/api/config", async () => ({ config: tools.getCache().getConfig() }));

  server.get("/api/recent", async (request, reply) => {
    const query = request.query as QueryRecord;
    const limit = parseOptionalInt(query.limit);
    return send(reply, await tools.listRecent(limit !== undefined ? { limit } : {}));
  });

  server.get("/api/search", async (request, reply) => {
    const query = request.query as QueryRecord;
    const limit = parseOptionalInt(query.limit);
    const result = await tools.searchConversations({
      query: query.q ?? "",
      ...(limit !== undefined ? { limit } : {}),
      ...(query.project ? { project: query.project } : {}),
    });
    return send(reply, result);
  });

  server.get("/api/messages/search", async (request, reply) => {
    const query = request.query as QueryRecord;
    const limit = parseOptionalInt(query.limit);
    const includeAssistant = parseFlag(query.include_assistant);
    const result = await tools.searchMessages({
      query: query.q ?? "",
      ...(limit !== undefined ? { limit } : {}),
      ...(query.project ? { project: query.project } : {}),
      ...(includeAssistant !== undefined ? { includeAssistant } : {}),
    });
    return send(reply, result);
  });

  server.get("/api/session/:id", async (request, reply) => {
    const params = request.params as { id: string };
    return send(reply, await tools.getConversationSummary({ sessionId: params.id }));
  });

  server.get("/api/session/:id/chapters", async (request, reply) => {
    const params = request.params as { id: string };
    return send(reply, await tools.getChapters({ sessionId: params.id }));
  });

  server.get("/api/session/:id/context", async (request, reply) => {
    const params = request.params as { id: string };
    const query = request.query as QueryRecord;
    const expand = parseOptionalInt(query.expand);
    const result = await tools.getConversationContext({
      sessionId: params.id,
      start: parseOptionalInt(query.start),
      end: parseOptionalInt(query.end),
      ...(expand !== undefined ? { expand } : {}),
      ...(query.role ? { role: query.role } : {}),
    });
    return send(reply, result);
  });

  server.get("/api/session/:id/turns", async (request, reply) => {
    const params = request.params as { id: string };
    const query = request.query as QueryRecord;
    const radius = parseOptionalInt(query.radius);
    const result = await tools.getTurnContext({
      sessionId: params.id,
      turn: parseOptionalInt(query.turn),
      ...(radius !== undefined ? { radius } : {}),
      ...(query.role ? { role: query.role } : {}),
    });
    return send(reply, result);
  });

  server.get("/api/session/:id/messages", async (request, reply) => {
    const params = request.params as { id: string };
    const query = request.query as QueryRecord;
    const aroundMessage = parseOptionalInt(query.around);
    const contextSize = parseOptionalInt(query.context);
    const maxMessages = parseOptionalInt(query.max);
    const recentOnly = parseFlag(query.recent);
    const result = await tools.getConversation({
      sessionId: params.id,
      ...(aroundMessage !== undefined ? { aroundMessage } : {}),
      ...(contextSize !== undefined ? { contextSize } : {}),
      ...(maxMessages !== undefined ? { maxMessages } : {}),
      ...(recentOnly !== undefined ? { recentOnly } : {}),
    });
    return send(reply, result);
  });

  return server;
}

export interface RunServerOptions {
  host?: string;
  port?: number;
  configPath?: string;
  logger?: Logger;
}

export async function runServer(options: RunServerOptions = {}): Promise<FastifyInstance> {
  const host = options.host ?? process.env.CHAPTERSCOPE_HOST ?? "127.0.0.1";
  const port = options.port ?? Number(process.env.CHAPTERSCOPE_PORT ?? "8797");
  const configPath = options.configPath ?? process.env.CHAPTERSCOPE_CONFIG ?? DEFAULT_CONFIG_PATH;
  const logger = options.logger ?? consoleLogger;

  const tools = await ConversationTools.fromConfigPath(configPath, { logger });
  await tools.getCache().refresh();

  const server = await createServer({ tools });
  await server.listen({ host, port });

  process.once("SIGINT", () => {
    void server.close().then(() => process.exit(0));
  });

  logger.info(`chapterscope server: http://${host}:${port}`);
  return server;
}
