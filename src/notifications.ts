import type { Issue, IssueStatus, User } from "./types.js";

export interface Notification {
  recipient: string;
  subject: string;
  body: string;
}

export interface NotificationTransport {
  send(notification: Notification): Promise<void>;
}

/** Writes notifications to stderr instead of delivering them. */
export const logTransport: NotificationTransport = {
  async send({ recipient, subject }) {
    console.error(`[Notify] ${subject} -> ${recipient}`);
  },
};

/**
 * In-process outbound queue. Callers enqueue after their transaction commits
 * and move on; a single worker drains the queue in order. Delivery failures
 * are logged and dropped, never reported back to the caller.
 */
export class NotificationDispatcher {
  private readonly queue: Notification[] = [];
  private worker: Promise<void> | null = null;

  constructor(private readonly transport: NotificationTransport = logTransport) {}

  enqueue(notification: Notification): void {
    this.queue.push(notification);
    this.schedule();
  }

  /** Resolves once everything enqueued so far has been attempted. */
  async idle(): Promise<void> {
    while (this.worker) {
      await this.worker;
    }
  }

  get pending(): number {
    return this.queue.length;
  }

  private schedule(): void {
    if (this.worker) return;
    // Start on a later turn so the enqueuing request finishes first.
    this.worker = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.drain())
      .finally(() => {
        this.worker = null;
        if (this.queue.length > 0) this.schedule();
      });
  }

  private async drain(): Promise<void> {
    let next = this.queue.shift();
    while (next) {
      try {
        await this.transport.send(next);
      } catch (err) {
        console.error(
          `[Notify] Failed to deliver "${next.subject}" to ${next.recipient}:`,
          err
        );
      }
      next = this.queue.shift();
    }
  }
}

export function assignedNotification(issue: Issue, assignee: User): Notification {
  return {
    recipient: assignee.email,
    subject: `[${issue.key}] Issue assigned to you`,
    body:
      `Hi ${assignee.fullName},\n\n` +
      `${issue.key} "${issue.title}" has been assigned to you.\n` +
      `Type: ${issue.issueType}  Priority: ${issue.priority}  Status: ${issue.status}\n`,
  };
}

export function statusChangedNotification(
  issue: Issue,
  from: IssueStatus,
  changedBy: User,
  recipient: User
): Notification {
  return {
    recipient: recipient.email,
    subject: `[${issue.key}] Status changed: ${from} -> ${issue.status}`,
    body:
      `Hi ${recipient.fullName},\n\n` +
      `${changedBy.fullName} moved ${issue.key} "${issue.title}" from ${from} to ${issue.status}.\n`,
  };
}

export function welcomeNotification(user: User): Notification {
  return {
    recipient: user.email,
    subject: "Welcome to Taskboard",
    body: `Hi ${user.fullName},\n\nYour ${user.role} account has been created.\n`,
  };
}
