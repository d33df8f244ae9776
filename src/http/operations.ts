import type http from "node:http";
import { z } from "zod";
import type { Logger } from "../config/logger";
import type { BackendClient, QueryValue, TranslatedResponse } from "../backends/forwarder";
import { translateBackendResponse } from "../backends/forwarder";
import type { ConfirmationContext, ConfirmationRequest } from "../confirmation/types";
import type { HttpMethod } from "../policy/rules";
import { ValidationError } from "./errors";

export type BackendName = "mail" | "calendar";

export type OperationContext = {
  method: HttpMethod;
  path: string;
  params: Record<string, string>;
  query: URLSearchParams;
  backend: BackendClient;
  logger: Logger;
  readBody: () => Promise<unknown>;
  needsConfirmation: (isMutating: boolean) => boolean;
  /** Resolves when the operator allows the request; throws `ConfirmationRejected` otherwise. */
  confirm: (request: ConfirmationRequest) => Promise<void>;
};

export type Operation = {
  method: HttpMethod;
  pattern: string;
  backend: BackendName;
  execute: (ctx: OperationContext) => Promise<TranslatedResponse>;
};

export const INVALID_PARAMETERS = "Invalid request parameters";

export const USER_ID_PATTERN = /^(?:me|[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,})$/;
export const CALENDAR_ID_PATTERN = /^(?:primary|[a-zA-Z0-9._%+#-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,})$/;
export const RESOURCE_ID_PATTERN = /^[a-zA-Z0-9_-]+$/;

/** Decodes and checks one captured path segment. */
export function pathParam(params: Record<string, string>, name: string, pattern: RegExp, message: string): string {
  let value: string;
  try {
    value = decodeURIComponent(params[name] ?? "");
  } catch {
    throw new ValidationError(message);
  }
  if (!pattern.test(value)) throw new ValidationError(message);
  return value;
}

export type QueryFieldKind = "string" | "int" | "bool" | "multi";

const intParam = z
  .string()
  .regex(/^-?\d+$/)
  .transform((value) => Number(value));
const boolParam = z
  .string()
  .transform((value) => value.toLowerCase())
  .pipe(z.enum(["true", "false", "1", "0"]))
  .transform((value) => value === "true" || value === "1");

/**
 * Reads the declared query fields in declaration order; anything undeclared is
 * not forwarded.
 */
export function parseQuery(query: URLSearchParams, fields: Record<string, QueryFieldKind>): Record<string, QueryValue> {
  const output: Record<string, QueryValue> = {};
  for (const [name, kind] of Object.entries(fields)) {
    if (kind === "multi") {
      const values = query.getAll(name);
      if (values.length > 0) output[name] = values;
      continue;
    }
    const raw = query.get(name);
    if (raw === null) continue;
    if (kind === "string") {
      output[name] = raw;
      continue;
    }
    const parsed = (kind === "int" ? intParam : boolParam).safeParse(raw);
    if (!parsed.success) throw new ValidationError(INVALID_PARAMETERS, 422);
    output[name] = parsed.data;
  }
  return output;
}

export function queryRecord(params: Record<string, QueryValue>): Record<string, string> {
  const output: Record<string, string> = {};
  for (const [name, value] of Object.entries(params)) {
    if (value === undefined) continue;
    output[name] = typeof value === "object" ? value.join(",") : String(value);
  }
  return output;
}

export function parseBody<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) throw new ValidationError(INVALID_PARAMETERS, 422);
  return parsed.data;
}

/** Drops `null` members from objects, recursively, the way absent optional fields are forwarded. */
export function withoutNulls(value: unknown): unknown {
  if (Array.isArray(value)) return value.map((entry) => withoutNulls(entry));
  if (value === null || typeof value !== "object") return value;
  const output: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    if (inner === null) continue;
    output[key] = withoutNulls(inner);
  }
  return output;
}

export async function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  if (!chunks.length) return undefined;
  const raw = Buffer.concat(chunks).toString("utf8");
  try {
    return JSON.parse(raw);
  } catch {
    throw new ValidationError(INVALID_PARAMETERS, 422);
  }
}

export type ForwardPlan = {
  backendPath: string;
  isMutating: boolean;
  params?: Record<string, QueryValue>;
  body?: unknown;
  context?: ConfirmationContext | (() => Promise<ConfirmationContext>);
};

/**
 * Shared tail of every operation: confirmation when the mode asks for it, then
 * the backend call and its translation.
 */
export async function confirmAndForward(ctx: OperationContext, plan: ForwardPlan): Promise<TranslatedResponse> {
  const params = plan.params ?? {};
  if (ctx.needsConfirmation(plan.isMutating)) {
    const extra = typeof plan.context === "function" ? await plan.context() : plan.context ?? {};
    await ctx.confirm({ method: ctx.method, path: ctx.path, queryParams: queryRecord(params), ...extra });
  }
  const response = await ctx.backend.forward(ctx.method, plan.backendPath, { params, body: plan.body });
  return translateBackendResponse(response, ctx.logger);
}
