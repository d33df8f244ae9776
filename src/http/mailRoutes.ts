import { z } from "zod";
import type { BackendClient } from "../backends/forwarder";
import type { Logger } from "../config/logger";
import type { ConfirmationContext } from "../confirmation/types";
import {
  confirmAndForward,
  parseBody,
  parseQuery,
  pathParam,
  RESOURCE_ID_PATTERN,
  USER_ID_PATTERN,
  type Operation,
  type OperationContext,
} from "./operations";

const ModifyMessageSchema = z.object({
  addLabelIds: z.array(z.string()).nullish(),
  removeLabelIds: z.array(z.string()).nullish(),
});

const MessageMetadataSchema = z.object({
  snippet: z.string().optional(),
  payload: z
    .object({
      headers: z.array(z.object({ name: z.string(), value: z.string() })).optional(),
    })
    .optional(),
});

function userId(ctx: OperationContext): string {
  return pathParam(ctx.params, "userId", USER_ID_PATTERN, "Invalid userId format");
}

function resourceId(ctx: OperationContext, name: "messageId" | "labelId", label: string): string {
  return pathParam(ctx.params, name, RESOURCE_ID_PATTERN, `Invalid ${label} ID format`);
}

function header(headers: Array<{ name: string; value: string }>, name: string): string | undefined {
  return headers.find((entry) => entry.name.toLowerCase() === name.toLowerCase())?.value;
}

/**
 * Sender, subject and preview for the operator. Only fetched when a prompt is
 * about to be shown; any failure leaves the fields out.
 */
export async function fetchMessagePreview(
  backend: BackendClient,
  logger: Logger,
  user: string,
  messageId: string
): Promise<ConfirmationContext> {
  try {
    const response = await backend.forward("GET", `/users/${encodeURIComponent(user)}/messages/${messageId}`, {
      params: { format: "metadata", metadataHeaders: ["From", "Subject"] },
    });
    if (response.status !== 200) return {};
    const parsed = MessageMetadataSchema.safeParse(JSON.parse(response.text));
    if (!parsed.success) return {};
    const headers = parsed.data.payload?.headers ?? [];
    return {
      messageFrom: header(headers, "From"),
      messageSubject: header(headers, "Subject"),
      messageSnippet: parsed.data.snippet,
    };
  } catch (error) {
    logger.warn("message_preview_failed", {
      messageId,
      error: error instanceof Error ? error.message : String(error),
    });
    return {};
  }
}

function trashLike(action: "trash" | "untrash"): Operation {
  return {
    method: "POST",
    pattern: `/mail/users/{userId}/messages/{messageId}/${action}`,
    backend: "mail",
    execute: async (ctx) => {
      const user = userId(ctx);
      const messageId = resourceId(ctx, "messageId", "message");
      return confirmAndForward(ctx, {
        backendPath: `/users/${encodeURIComponent(user)}/messages/${messageId}/${action}`,
        isMutating: true,
        context: () => fetchMessagePreview(ctx.backend, ctx.logger, user, messageId),
      });
    },
  };
}

export const mailOperations: Operation[] = [
  {
    method: "GET",
    pattern: "/mail/users/{userId}/messages",
    backend: "mail",
    execute: async (ctx) => {
      const user = userId(ctx);
      return confirmAndForward(ctx, {
        backendPath: `/users/${encodeURIComponent(user)}/messages`,
        isMutating: false,
        params: parseQuery(ctx.query, {
          maxResults: "int",
          pageToken: "string",
          q: "string",
          labelIds: "multi",
          includeSpamTrash: "bool",
        }),
      });
    },
  },
  {
    method: "GET",
    pattern: "/mail/users/{userId}/messages/{messageId}",
    backend: "mail",
    execute: async (ctx) => {
      const user = userId(ctx);
      const messageId = resourceId(ctx, "messageId", "message");
      return confirmAndForward(ctx, {
        backendPath: `/users/${encodeURIComponent(user)}/messages/${messageId}`,
        isMutating: false,
        params: parseQuery(ctx.query, { format: "string", metadataHeaders: "multi" }),
      });
    },
  },
  {
    method: "GET",
    pattern: "/mail/users/{userId}/labels",
    backend: "mail",
    execute: async (ctx) =>
      confirmAndForward(ctx, {
        backendPath: `/users/${encodeURIComponent(userId(ctx))}/labels`,
        isMutating: false,
      }),
  },
  {
    method: "GET",
    pattern: "/mail/users/{userId}/labels/{labelId}",
    backend: "mail",
    execute: async (ctx) => {
      const user = userId(ctx);
      const labelId = resourceId(ctx, "labelId", "label");
      return confirmAndForward(ctx, {
        backendPath: `/users/${encodeURIComponent(user)}/labels/${labelId}`,
        isMutating: false,
      });
    },
  },
  {
    method: "POST",
    pattern: "/mail/users/{userId}/messages/{messageId}/modify",
    backend: "mail",
    execute: async (ctx) => {
      const user = userId(ctx);
      const messageId = resourceId(ctx, "messageId", "message");
      const body = parseBody(ModifyMessageSchema, await ctx.readBody());
      const addLabelIds = body.addLabelIds ?? undefined;
      const removeLabelIds = body.removeLabelIds ?? undefined;
      return confirmAndForward(ctx, {
        backendPath: `/users/${encodeURIComponent(user)}/messages/${messageId}/modify`,
        isMutating: true,
        body: { addLabelIds, removeLabelIds },
        context: { labelsToAdd: addLabelIds, labelsToRemove: removeLabelIds },
      });
    },
  },
  trashLike("trash"),
  trashLike("untrash"),
];
