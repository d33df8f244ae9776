import crypto from "node:crypto";
import type { Logger } from "../config/logger";
import { contextOf, type ConfirmationContext, type ConfirmationRequest } from "./types";

export type PendingSnapshot = ConfirmationContext & {
  id: string;
  method: string;
  path: string;
  queryParams: Record<string, string>;
  createdAt: string;
};

export type QueueEventType =
  | "connected"
  | "request_added"
  | "request_approved"
  | "request_rejected"
  | "request_timeout";

export type QueueEvent = {
  event: QueueEventType;
  pending: PendingSnapshot[];
};

type PendingApproval = {
  id: string;
  request: ConfirmationRequest;
  createdAt: Date;
  settled: boolean;
  resolve: (approved: boolean) => void;
  timer: NodeJS.Timeout | null;
};

export type ChannelResult =
  | { kind: "message"; event: QueueEvent }
  | { kind: "timeout" }
  | { kind: "closed" };

/**
 * Bounded single-consumer buffer for one live subscriber. `push` never waits:
 * a full buffer rejects the event and the queue drops the subscriber.
 */
export class EventChannel {
  private readonly buffer: QueueEvent[] = [];
  private waiter: ((result: ChannelResult) => void) | null = null;
  private readonly closeListeners: Array<() => void> = [];
  private closedFlag = false;

  constructor(readonly capacity: number) {}

  get closed(): boolean {
    return this.closedFlag;
  }

  get size(): number {
    return this.buffer.length;
  }

  push(event: QueueEvent): boolean {
    if (this.closedFlag) return false;
    if (this.waiter) {
      const deliver = this.waiter;
      this.waiter = null;
      deliver({ kind: "message", event });
      return true;
    }
    if (this.buffer.length >= this.capacity) return false;
    this.buffer.push(event);
    return true;
  }

  close(): void {
    if (this.closedFlag) return;
    this.closedFlag = true;
    const waiting = this.waiter;
    this.waiter = null;
    waiting?.({ kind: "closed" });
    for (const listener of this.closeListeners.splice(0)) listener();
  }

  /** Runs `listener` once when the channel closes, immediately if it already has. */
  onClose(listener: () => void): void {
    if (this.closedFlag) {
      listener();
      return;
    }
    this.closeListeners.push(listener);
  }

  /** Next buffered event; "timeout" after `timeoutMs` of silence; "closed" once drained and closed. */
  next(timeoutMs: number): Promise<ChannelResult> {
    const buffered = this.buffer.shift();
    if (buffered) return Promise.resolve({ kind: "message", event: buffered });
    if (this.closedFlag) return Promise.resolve({ kind: "closed" });

    return new Promise<ChannelResult>((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve({ kind: "timeout" });
      }, timeoutMs);
      this.waiter = (result) => {
        clearTimeout(timer);
        resolve(result);
      };
    });
  }
}

export type WebApprovalQueueOptions = {
  timeoutMs?: number | null;
  subscriberBuffer?: number;
  now?: () => Date;
  newId?: () => string;
};

export const SSE_KEEPALIVE_FRAME = ": keepalive\n\n";

export function formatSseFrame(event: QueueEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

/**
 * Many-outstanding operator approvals. Pending entries are kept in insertion
 * order; every change is broadcast to live subscribers.
 *
 * Settlement and removal happen inside one synchronous block, so a timeout
 * racing an operator decision delivers exactly one outcome.
 */
export class WebApprovalQueue {
  private readonly pending = new Map<string, PendingApproval>();
  private readonly subscribers = new Set<EventChannel>();
  private readonly timeoutMs: number | null;
  private readonly subscriberBuffer: number;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(
    private readonly logger: Logger,
    options: WebApprovalQueueOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? null;
    this.subscriberBuffer = options.subscriberBuffer ?? 100;
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? (() => crypto.randomUUID());
  }

  addRequest(request: ConfirmationRequest, timeoutMs: number | null = this.timeoutMs): Promise<boolean> {
    const id = this.newId();

    const outcome = new Promise<boolean>((resolve) => {
      const entry: PendingApproval = {
        id,
        request,
        createdAt: this.now(),
        settled: false,
        resolve,
        timer: null,
      };
      this.pending.set(id, entry);

      if (timeoutMs !== null) {
        entry.timer = setTimeout(() => this.expire(id), timeoutMs);
      }
    });

    this.logger.info("approval_request_added", { id, method: request.method, path: request.path });
    this.broadcast("request_added");
    return outcome;
  }

  getPending(): PendingSnapshot[] {
    return [...this.pending.values()].map((entry) => ({
      id: entry.id,
      method: entry.request.method,
      path: entry.request.path,
      queryParams: { ...entry.request.queryParams },
      ...contextOf(entry.request),
      createdAt: entry.createdAt.toISOString(),
    }));
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  approve(id: string): boolean {
    return this.decide(id, true);
  }

  reject(id: string): boolean {
    return this.decide(id, false);
  }

  subscribe(): EventChannel {
    const channel = new EventChannel(this.subscriberBuffer);
    this.subscribers.add(channel);
    return channel;
  }

  unsubscribe(channel: EventChannel): void {
    this.subscribers.delete(channel);
    channel.close();
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  /**
   * SSE frames for one client: a `connected` snapshot first, then every
   * broadcast, with a keep-alive comment after `keepAliveMs` of silence.
   * `onClose` fires as soon as the subscription ends, including when the
   * queue drops a subscriber that fell behind while the consumer was blocked.
   */
  async *streamEvents(
    options: { keepAliveMs?: number; signal?: AbortSignal; onClose?: () => void } = {}
  ): AsyncGenerator<string> {
    const keepAliveMs = options.keepAliveMs ?? 30_000;
    const channel = this.subscribe();
    if (options.onClose) channel.onClose(options.onClose);
    const onAbort = () => channel.close();
    options.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      yield formatSseFrame({ event: "connected", pending: this.getPending() });
      while (!options.signal?.aborted) {
        const next = await channel.next(keepAliveMs);
        if (next.kind === "closed") return;
        yield next.kind === "timeout" ? SSE_KEEPALIVE_FRAME : formatSseFrame(next.event);
      }
    } finally {
      options.signal?.removeEventListener("abort", onAbort);
      this.unsubscribe(channel);
    }
  }

  /** Settles any still-pending entries as rejected; used on shutdown. */
  rejectAll(): number {
    const ids = [...this.pending.keys()];
    for (const id of ids) this.decide(id, false);
    for (const channel of this.subscribers) channel.close();
    this.subscribers.clear();
    return ids.length;
  }

  private settle(entry: PendingApproval, approved: boolean): boolean {
    if (entry.settled) return false;
    entry.settled = true;
    if (entry.timer) clearTimeout(entry.timer);
    entry.resolve(approved);
    return true;
  }

  private decide(id: string, approved: boolean): boolean {
    const entry = this.pending.get(id);
    if (!entry) return false;

    this.pending.delete(id);
    this.settle(entry, approved);
    this.logger.info(approved ? "approval_request_approved" : "approval_request_rejected", { id });
    this.broadcast(approved ? "request_approved" : "request_rejected");
    return true;
  }

  private expire(id: string): void {
    const entry = this.pending.get(id);
    if (!entry || !this.settle(entry, false)) return;

    this.pending.delete(id);
    this.logger.warn("approval_request_timeout", { id, method: entry.request.method, path: entry.request.path });
    this.broadcast("request_timeout");
  }

  private broadcast(event: QueueEventType): void {
    const message: QueueEvent = { event, pending: this.getPending() };
    for (const channel of [...this.subscribers]) {
      if (!channel.push(message)) {
        this.subscribers.delete(channel);
        channel.close();
        this.logger.warn("approval_subscriber_dropped", { capacity: channel.capacity });
      }
    }
  }
}
