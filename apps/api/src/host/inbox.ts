import type { Logger, Notification, NotificationSeverity } from "@usedmarket/shared";
import type { NotificationSink } from "@usedmarket/engine-session";

/** Per-player notifications, held until the player collects them. */
export class NotificationInbox implements NotificationSink {
  private readonly inboxes = new Map<string, Notification[]>();

  constructor(private readonly logger: Logger) {}

  notify(ownerId: string, message: string, severity: NotificationSeverity): void {
    const inbox = this.inboxes.get(ownerId) ?? [];
    inbox.push({ owner_id: ownerId, message, severity });
    this.inboxes.set(ownerId, inbox);
    this.logger.debug({ ownerId, severity }, message);
  }

  /** Returns and clears the player's notifications, oldest first. */
  drain(ownerId: string): Notification[] {
    const inbox = this.inboxes.get(ownerId) ?? [];
    this.inboxes.delete(ownerId);
    return inbox;
  }
}
