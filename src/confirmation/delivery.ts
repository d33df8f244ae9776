import type { Logger } from "../config/logger";
import type { ConsoleApprover } from "./consoleApprover";
import type { ConfirmationDelivery, ConfirmationRequest } from "./types";
import type { WebApprovalQueue } from "./webQueue";

function logOutcome(logger: Logger, kind: ConfirmationDelivery["kind"], request: ConfirmationRequest, approved: boolean) {
  logger.info(approved ? "confirmation_approved" : "confirmation_rejected", {
    delivery: kind,
    method: request.method,
    path: request.path,
  });
}

export class ConsoleDelivery implements ConfirmationDelivery {
  readonly kind = "console" as const;

  constructor(
    private readonly approver: ConsoleApprover,
    private readonly logger: Logger
  ) {}

  async decide(request: ConfirmationRequest): Promise<boolean> {
    const approved = await this.approver.confirm(request);
    logOutcome(this.logger, this.kind, request, approved);
    return approved;
  }
}

export class WebDelivery implements ConfirmationDelivery {
  readonly kind = "web" as const;

  constructor(
    readonly queue: WebApprovalQueue,
    private readonly logger: Logger
  ) {}

  async decide(request: ConfirmationRequest): Promise<boolean> {
    const approved = await this.queue.addRequest(request);
    logOutcome(this.logger, this.kind, request, approved);
    return approved;
  }
}
