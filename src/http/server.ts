import http from "node:http";
import { URL } from "node:url";
import crypto from "node:crypto";
import type { AppContext } from "../app/context";
import type { Logger } from "../config/logger";
import { requiresConfirmation } from "../confirmation/mode";
import type { WebApprovalQueue } from "../confirmation/webQueue";
import { authenticate } from "../auth/apiKeys";
import { matchPathPattern, normalizePath } from "../policy/gate";
import { renderApprovalPage } from "./approvalPage";
import { buildOpenApiDocument, renderDocsPage } from "./docs";
import {
  AuthError,
  ConfirmationRejected,
  GatewayError,
  NotFoundError,
  PolicyError,
  toErrorResponse,
} from "./errors";
import { pathParam, readJsonBody } from "./operations";
import { findOperation, operations } from "./routes";

function withSecurityHeaders(headers: Record<string, string>): Record<string, string> {
  return {
    "x-content-type-options": "nosniff",
    "x-frame-options": "DENY",
    "cache-control": "no-store",
    ...headers,
  };
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  if (typeof value === "string") return value;
  if (Array.isArray(value) && value[0]) return value[0];
  return undefined;
}

/** Enough of a presented key to correlate log lines without disclosing it. */
function keyPrefix(authorizationHeader: string | undefined): string | null {
  const match = authorizationHeader?.match(/^Bearer\s+(\S+)/);
  return match ? `${match[1].slice(0, 8)}...` : null;
}

const APPROVAL_ID_PATTERN = /^[^/]+$/;

function isApprovalPath(path: string): boolean {
  return path === "/approval" || path.startsWith("/approval/");
}

async function streamApprovalEvents(params: {
  req: http.IncomingMessage;
  res: http.ServerResponse;
  queue: WebApprovalQueue;
  keepAliveMs: number;
  requestId: string;
}): Promise<void> {
  const { req, res, queue, keepAliveMs, requestId } = params;
  res.writeHead(
    200,
    withSecurityHeaders({
      "content-type": "text/event-stream",
      "cache-control": "no-cache",
      connection: "keep-alive",
      "x-accel-buffering": "no",
      "x-request-id": requestId,
    })
  );

  const controller = new AbortController();
  const subscription = new AbortController();
  const onClose = () => controller.abort();
  req.on("close", onClose);
  res.on("close", onClose);
  try {
    const frames = queue.streamEvents({
      keepAliveMs,
      signal: controller.signal,
      onClose: () => subscription.abort(),
    });
    for await (const frame of frames) {
      // A reader that stops draining leaves frames in its channel, where the queue drops it.
      if (!res.write(frame) && !(await waitForDrain(res, subscription.signal))) {
        res.destroy();
        break;
      }
    }
  } finally {
    req.off("close", onClose);
    res.off("close", onClose);
    if (!res.destroyed) res.end();
  }
}

/** True once the response drains; false if it closes or the subscription ends first. */
function waitForDrain(res: http.ServerResponse, subscription: AbortSignal): Promise<boolean> {
  if (subscription.aborted || res.destroyed) return Promise.resolve(false);
  return new Promise<boolean>((resolve) => {
    const finish = (drained: boolean) => {
      res.off("drain", onDrain);
      res.off("close", onResponseClose);
      subscription.removeEventListener("abort", onAbort);
      resolve(drained);
    };
    const onDrain = () => finish(true);
    const onResponseClose = () => finish(false);
    const onAbort = () => finish(false);
    res.on("drain", onDrain);
    res.on("close", onResponseClose);
    subscription.addEventListener("abort", onAbort, { once: true });
  });
}

export function startHttpServer(params: { host: string; port: number; logger: Logger; context: AppContext }): http.Server {
  const { host, port, logger, context } = params;
  const docsHtml = renderDocsPage(context.policy.listAllowed(), context.version);
  const openApi = JSON.stringify(buildOpenApiDocument(context.policy.listAllowed(), context.version));

  const server = http.createServer(async (req, res) => {
    const requestId = crypto.randomUUID();
    const startedAt = Date.now();
    const method = (req.method ?? "GET").toUpperCase();
    const url = new URL(req.url ?? "/", `http://${host}:${port}`);
    let statusCode = 500;
    let keyName: string | null = null;

    const sendJson = (status: number, payload: unknown) => {
      statusCode = status;
      res.writeHead(status, withSecurityHeaders({ "content-type": "application/json", "x-request-id": requestId }));
      res.end(JSON.stringify(payload));
    };
    const sendHtml = (html: string) => {
      statusCode = 200;
      res.writeHead(200, withSecurityHeaders({ "content-type": "text/html; charset=utf-8", "x-request-id": requestId }));
      res.end(html);
    };

    try {
      if (context.policy.decide(method, url.pathname) === "BLOCK") {
        throw new PolicyError();
      }

      const path = normalizePath(url.pathname);

      if (method === "GET" && path === "/health") {
        sendJson(200, { status: "ok", version: context.version });
        return;
      }
      if (method === "GET" && path === "/docs") {
        sendHtml(docsHtml);
        return;
      }
      if (method === "GET" && path === "/openapi.json") {
        statusCode = 200;
        res.writeHead(200, withSecurityHeaders({ "content-type": "application/json", "x-request-id": requestId }));
        res.end(openApi);
        return;
      }

      if (isApprovalPath(path)) {
        const queue = context.approvalQueue;
        if (!queue) throw new NotFoundError();

        if (method === "GET" && path === "/approval") {
          sendHtml(renderApprovalPage(queue.getPending()));
          return;
        }
        if (method === "GET" && path === "/approval/api/queue") {
          sendJson(200, { pending: queue.getPending() });
          return;
        }
        if (method === "GET" && path === "/approval/api/events") {
          statusCode = 200;
          await streamApprovalEvents({ req, res, queue, keepAliveMs: context.sseKeepAliveMs, requestId });
          return;
        }
        const decision = method === "POST" ? matchPathPattern(path, "/approval/api/{id}/{action}", { caseSensitive: true }) : null;
        if (decision && (decision.action === "approve" || decision.action === "reject")) {
          const id = pathParam(decision, "id", APPROVAL_ID_PATTERN, "Invalid request ID format");
          const approved = decision.action === "approve";
          const found = approved ? queue.approve(id) : queue.reject(id);
          if (!found) throw new NotFoundError("Request not found or already processed");
          sendJson(200, { success: true, message: approved ? "Request approved" : "Request rejected" });
          return;
        }
        throw new NotFoundError();
      }

      const match = findOperation(method, path);
      if (!match) throw new NotFoundError();

      const authorizationHeader = firstHeader(req.headers.authorization);
      try {
        keyName = (await authenticate(context.apiKeys, authorizationHeader)).name;
      } catch (error) {
        if (error instanceof AuthError) {
          logger.warn("auth_failed", { requestId, path, reason: error.message, keyPrefix: keyPrefix(authorizationHeader) });
        }
        throw error;
      }

      const { operation, params: pathParams } = match;
      const result = await operation.execute({
        method: operation.method,
        path,
        params: pathParams,
        query: url.searchParams,
        backend: context.backends[operation.backend],
        logger,
        readBody: () => readJsonBody(req),
        needsConfirmation: (isMutating) => requiresConfirmation(context.confirmationMode, isMutating),
        confirm: async (request) => {
          if (!(await context.delivery.decide(request))) throw new ConfirmationRejected();
        },
      });

      if (result.body === undefined) {
        statusCode = result.status;
        res.writeHead(result.status, withSecurityHeaders({ "x-request-id": requestId }));
        res.end();
        return;
      }
      sendJson(result.status, result.body);
    } catch (error) {
      const { status, envelope } = toErrorResponse(error);
      statusCode = status;
      if (!(error instanceof GatewayError)) {
        logger.error("gateway_http_handler_error", {
          requestId,
          method,
          path: url.pathname,
          message: error instanceof Error ? error.message : String(error),
        });
      }
      if (res.headersSent) {
        res.destroy();
        return;
      }
      res.writeHead(status, withSecurityHeaders({ "content-type": "application/json", "x-request-id": requestId }));
      res.end(JSON.stringify(envelope));
    } finally {
      logger.info("gateway_http_request", {
        requestId,
        method,
        path: url.pathname,
        statusCode,
        durationMs: Date.now() - startedAt,
        keyName,
      });
    }
  });

  server.listen(port, host, () => {
    logger.info("gateway_http_listening", { host, port, operations: operations.length });
  });

  return server;
}
