import path from "node:path";
import type { Readable, Writable } from "node:stream";
import { ApiKeyStore } from "../auth/apiKeys";
import { FileCredentialStore, type CredentialStore, type FetchLike } from "../backends/credentials";
import { BackendClient } from "../backends/forwarder";
import { BackendSessionManager } from "../backends/sessionManager";
import { confirmationTimeoutMs, type GatewayEnv } from "../config/env";
import type { Logger } from "../config/logger";
import { ConsoleApprover } from "../confirmation/consoleApprover";
import { ConsoleDelivery, WebDelivery } from "../confirmation/delivery";
import { parseConfirmationMode, type ConfirmationMode } from "../confirmation/mode";
import type { ConfirmationDelivery } from "../confirmation/types";
import { WebApprovalQueue } from "../confirmation/webQueue";
import type { BackendName } from "../http/operations";
import { defaultPolicyTables, PolicyGate, type PolicyTables } from "../policy/gate";

export const GATEWAY_VERSION = "0.1.0";

export type AppContext = {
  logger: Logger;
  version: string;
  policy: PolicyGate;
  confirmationMode: ConfirmationMode;
  delivery: ConfirmationDelivery;
  approvalQueue: WebApprovalQueue | null;
  apiKeys: ApiKeyStore;
  sessions: Record<BackendName, BackendSessionManager>;
  backends: Record<BackendName, BackendClient>;
  sseKeepAliveMs: number;
  close: () => void;
};

export type AppContextOverrides = {
  fetchImpl?: FetchLike;
  consoleInput?: Readable;
  consoleOutput?: Writable;
  credentialStores?: Partial<Record<BackendName, CredentialStore>>;
  apiKeys?: ApiKeyStore;
  policyTables?: PolicyTables;
  newApprovalId?: () => string;
};

/**
 * Builds every collaborator once. When both backends point at the same token
 * file they share one session, so a refresh by either is seen by both.
 */
export function createAppContext(env: GatewayEnv, logger: Logger, overrides: AppContextOverrides = {}): AppContext {
  const timeoutMs = confirmationTimeoutMs(env);
  const fetchImpl = overrides.fetchImpl ?? fetch;

  const sharedTokenFile =
    !overrides.credentialStores?.calendar &&
    !overrides.credentialStores?.mail &&
    path.resolve(env.GATEWAY_CALENDAR_TOKEN_FILE) === path.resolve(env.GATEWAY_MAIL_TOKEN_FILE);
  const sessionFor = (name: string, store: CredentialStore) =>
    new BackendSessionManager(name, store, logger, { fetchImpl, refreshTimeoutMs: env.GATEWAY_BACKEND_TIMEOUT_MS });

  const mailSession = sessionFor(
    sharedTokenFile ? "mail+calendar" : "mail",
    overrides.credentialStores?.mail ?? new FileCredentialStore(env.GATEWAY_MAIL_TOKEN_FILE, logger)
  );
  const calendarSession = sharedTokenFile
    ? mailSession
    : sessionFor(
        "calendar",
        overrides.credentialStores?.calendar ?? new FileCredentialStore(env.GATEWAY_CALENDAR_TOKEN_FILE, logger)
      );

  const backends: Record<BackendName, BackendClient> = {
    mail: new BackendClient({
      name: "mail",
      baseUrl: env.GATEWAY_MAIL_API_BASE_URL,
      session: mailSession,
      logger,
      fetchImpl,
      timeoutMs: env.GATEWAY_BACKEND_TIMEOUT_MS,
    }),
    calendar: new BackendClient({
      name: "calendar",
      baseUrl: env.GATEWAY_CALENDAR_API_BASE_URL,
      session: calendarSession,
      logger,
      fetchImpl,
      timeoutMs: env.GATEWAY_BACKEND_TIMEOUT_MS,
    }),
  };

  let approvalQueue: WebApprovalQueue | null = null;
  let consoleApprover: ConsoleApprover | null = null;
  let delivery: ConfirmationDelivery;
  if (env.GATEWAY_CONFIRMATION_DELIVERY === "web") {
    approvalQueue = new WebApprovalQueue(logger, {
      timeoutMs,
      subscriberBuffer: env.GATEWAY_SUBSCRIBER_BUFFER,
      newId: overrides.newApprovalId,
    });
    delivery = new WebDelivery(approvalQueue, logger);
  } else {
    consoleApprover = new ConsoleApprover(logger, {
      input: overrides.consoleInput,
      output: overrides.consoleOutput,
      timeoutMs,
    });
    delivery = new ConsoleDelivery(consoleApprover, logger);
  }

  return {
    logger,
    version: GATEWAY_VERSION,
    policy: new PolicyGate(logger, overrides.policyTables ?? defaultPolicyTables),
    confirmationMode: parseConfirmationMode(env.GATEWAY_CONFIRMATION_MODE),
    delivery,
    approvalQueue,
    apiKeys: overrides.apiKeys ?? new ApiKeyStore(env.GATEWAY_API_KEYS_FILE, logger),
    sessions: { mail: mailSession, calendar: calendarSession },
    backends,
    sseKeepAliveMs: env.GATEWAY_SSE_KEEPALIVE_MS,
    close: () => {
      backends.mail.close();
      backends.calendar.close();
      consoleApprover?.close();
      const rejected = approvalQueue?.rejectAll() ?? 0;
      if (rejected > 0) logger.warn("approval_requests_rejected_on_shutdown", { count: rejected });
    },
  };
}
