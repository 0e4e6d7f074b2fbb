import { randomUUID } from "node:crypto";
import { createServer, IncomingMessage, ServerResponse } from "node:http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import "dotenv/config";
import { executeRunRequest } from "./api/runEndpoint.js";
import { loadConfig } from "./config/env.js";
import { describeError } from "./domain/errors.js";
import { VectorIndex } from "./domain/vectorIndex.js";
import { createAiProviders } from "./infra/ai/aiProviders.js";
import { createLogger, Logger } from "./infra/logger.js";
import { HttpDocumentExtractor } from "./infra/parsers/documentLoader.js";
import { createVectorIndex } from "./infra/store/createVectorIndex.js";
import { DocumentQueryService } from "./services/documentQueryService.js";
import { registerAnswerDocumentQuestionsTool } from "./tools/answerDocumentQuestions.js";

interface SessionEntry {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

type SessionMap = Record<string, SessionEntry>;

interface HttpDependencies {
  service: DocumentQueryService;
  index: VectorIndex;
  serverFactory: () => McpServer;
  logger: Logger;
}

const MCP_PATH = "/mcp";
const RUN_PATH = "/api/v1/run";
const SERVER_NAME = "doc-query-retrieval";
const SERVER_VERSION = "0.1.0";

const logger = createLogger({ name: SERVER_NAME });

async function main() {
  const config = loadConfig();
  logger.level = config.logLevel;

  const { embeddings, embeddingProvider, generator } = createAiProviders(config);
  const { index } = await createVectorIndex(config, logger);
  const service = new DocumentQueryService({
    index,
    embeddings,
    embeddingProvider,
    generator,
    extractor: new HttpDocumentExtractor({
      timeoutMs: config.requestTimeoutMs,
      maxBytes: config.maxDocumentBytes,
    }),
    settings: config.retrieval,
    logger,
  });
  logger.info(
    { embeddingProvider, generationProvider: generator.name, backend: index.backend },
    "Retrieval pipeline configured",
  );

  const shutdownTasks: Array<() => Promise<void>> = [() => index.close()];

  if (config.transport === "http") {
    const stopHttpServer = await runHttpServer(config.host, config.port, {
      service,
      index,
      serverFactory: () => createAppServer(service),
      logger,
    });
    shutdownTasks.unshift(stopHttpServer);
    logger.info(
      { url: `http://${config.host}:${config.port}`, mcp: MCP_PATH, run: RUN_PATH },
      "HTTP server listening",
    );
  } else {
    await runStdioServer(createAppServer(service));
    logger.info("MCP stdio server connected");
  }

  const shutdown = async () => {
    for (const task of shutdownTasks) {
      try {
        await task();
      } catch (error) {
        logger.error({ err: error }, "Shutdown task failed");
      }
    }
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

function createAppServer(service: DocumentQueryService): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerAnswerDocumentQuestionsTool(server, service);

  return server;
}

async function runStdioServer(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

async function runHttpServer(
  host: string,
  port: number,
  deps: HttpDependencies,
): Promise<() => Promise<void>> {
  const sessions: SessionMap = {};

  const httpServer = createServer(async (req, res) => {
    try {
      const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

      if (url.pathname === "/healthz") {
        const stats = await deps.index.describe();
        writeJson(res, 200, { ok: true, index: stats });
        return;
      }

      if (url.pathname === RUN_PATH) {
        if (req.method !== "POST") {
          writeJson(res, 405, { error: "Method not allowed" });
          return;
        }
        const result = await executeRunRequest(deps.service, await readJsonBody(req));
        writeJson(res, result.status, result.body);
        return;
      }

      if (url.pathname !== MCP_PATH) {
        res.writeHead(404, { "Content-Type": "text/plain" });
        res.end("Not found");
        return;
      }

      if (req.method === "POST") {
        const body = await readJsonBody(req);
        await handleMcpPost(req, res, body, sessions, deps);
        return;
      }

      if (req.method === "GET" || req.method === "DELETE") {
        await handleSessionRequest(req, res, sessions);
        return;
      }

      writeJson(res, 405, { error: "Method not allowed" });
    } catch (error) {
      deps.logger.error({ err: error, path: req.url }, "HTTP request failed");
      if (!res.headersSent) {
        writeJson(res, error instanceof InvalidJsonError ? 400 : 500, {
          error: describeError(error),
        });
      }
    }
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.listen(port, host, () => resolve());
    httpServer.once("error", reject);
  });

  return async () => {
    await Promise.all(
      Object.values(sessions).map(async (entry) => {
        await entry.transport.close();
        await entry.server.close();
      }),
    );

    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  };
}

async function handleMcpPost(
  req: IncomingMessage,
  res: ServerResponse,
  body: unknown,
  sessions: SessionMap,
  deps: HttpDependencies,
) {
  const sessionId = getSessionId(req);
  const existing = sessionId ? sessions[sessionId] : null;

  if (existing) {
    await existing.transport.handleRequest(req, res, body);
    return;
  }

  if (sessionId && !existing) {
    writeJsonRpcError(res, 404, -32001, "Session not found");
    return;
  }

  if (!isInitializeRequest(body)) {
    writeJsonRpcError(
      res,
      400,
      -32000,
      "Initialize request is required when session is not established",
    );
    return;
  }

  const server = deps.serverFactory();
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: () => randomUUID(),
    onsessioninitialized: (newSessionId) => {
      sessions[newSessionId] = { server, transport };
    },
  });

  transport.onclose = () => {
    const closedSessionId = transport.sessionId;
    if (!closedSessionId) {
      return;
    }

    const entry = sessions[closedSessionId];
    if (!entry) {
      return;
    }

    delete sessions[closedSessionId];
    entry.server.close().catch((error: unknown) => {
      deps.logger.warn({ err: error, sessionId: closedSessionId }, "Failed to close MCP session");
    });
  };

  await server.connect(transport);
  await transport.handleRequest(req, res, body);
}

async function handleSessionRequest(
  req: IncomingMessage,
  res: ServerResponse,
  sessions: SessionMap,
) {
  const sessionId = getSessionId(req);
  if (!sessionId || !sessions[sessionId]) {
    res.writeHead(400, { "Content-Type": "text/plain" });
    res.end("Missing or invalid mcp-session-id");
    return;
  }

  await sessions[sessionId].transport.handleRequest(req, res);
}

class InvalidJsonError extends Error {}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new InvalidJsonError("Invalid JSON body");
  }
}

function getSessionId(req: IncomingMessage): string | null {
  const headerValue = req.headers["mcp-session-id"];
  if (!headerValue) {
    return null;
  }
  return Array.isArray(headerValue) ? headerValue[0] : headerValue;
}

function writeJson(res: ServerResponse, status: number, payload: unknown) {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
}

function writeJsonRpcError(
  res: ServerResponse,
  httpCode: number,
  code: number,
  message: string,
) {
  writeJson(res, httpCode, {
    jsonrpc: "2.0",
    error: { code, message },
    id: null,
  });
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "Failed to start server");
  process.exit(1);
});
