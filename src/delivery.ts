import { isNotificationError, toError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { MessageRef, Participant, Reviewer } from "./models.js";
import { retry, type RetryOptions } from "./retry.js";
import type { Button, MediaKind, NotificationSink } from "./sink.js";

// Notifier runs sink calls best-effort: transient failures are retried, the rest are logged and swallowed.
export class Notifier {
  constructor(
    private readonly sink: NotificationSink,
    private readonly logger: Logger,
    private readonly retryOptions: RetryOptions = {},
  ) {}

  /** True when the call went through or the sink reports it already applied. */
  async run(label: string, action: () => Promise<void>, context: Record<string, unknown> = {}): Promise<boolean> {
    try {
      await this.withRetry(action);
      return true;
    } catch (error) {
      if (isNotificationError(error, "already_applied")) {
        this.logger.debug(`${label}: already applied`, context);
        return true;
      }
      this.report(label, error, context);
      return false;
    }
  }

  async send(label: string, action: () => Promise<MessageRef>, context: Record<string, unknown> = {}): Promise<MessageRef | null> {
    try {
      return await this.withRetry(action);
    } catch (error) {
      this.report(label, error, context);
      return null;
    }
  }

  async toParticipant(participant: Participant, text: string, buttons?: Button[]): Promise<MessageRef | null> {
    return this.send(
      "direct message",
      () => this.sink.sendMessage({ kind: "direct", chat_id: participant.chat_id }, text, buttons),
      { participantId: participant.id },
    );
  }

  /** Edits `ref` when given, falling back to a fresh direct message if the edit fails. */
  async replaceOrSend(
    participant: Participant,
    ref: MessageRef | null,
    text: string,
    buttons?: Button[],
  ): Promise<MessageRef | null> {
    if (ref) {
      const edited = await this.run("edit participant message", () => this.sink.editMessage(ref, text, buttons), {
        participantId: participant.id,
      });
      if (edited) return ref;
    }
    return this.toParticipant(participant, text, buttons);
  }

  async toThread(participant: Participant, text: string, buttons?: Button[]): Promise<MessageRef | null> {
    const threadId = participant.thread_id;
    if (!threadId) return null;
    return this.send("thread message", () => this.sink.sendMessage({ kind: "thread", thread_id: threadId }, text, buttons), {
      participantId: participant.id,
      threadId,
    });
  }

  async mediaToThread(
    participant: Participant,
    mediaRef: string,
    kind: MediaKind,
    caption: string,
    buttons?: Button[],
  ): Promise<MessageRef | null> {
    const threadId = participant.thread_id;
    if (!threadId) return null;
    return this.send(
      "thread media",
      () => this.sink.sendMedia({ kind: "thread", thread_id: threadId }, mediaRef, kind, caption, buttons),
      { participantId: participant.id, threadId },
    );
  }

  async toReviewer(reviewer: Reviewer | null, text: string, buttons?: Button[]): Promise<MessageRef | null> {
    if (!reviewer) return null;
    return this.send("reviewer message", () => this.sink.sendMessage({ kind: "direct", chat_id: reviewer.chat_id }, text, buttons), {
      reviewerId: reviewer.id,
    });
  }

  async toGeneral(text: string, buttons?: Button[]): Promise<MessageRef | null> {
    return this.send("general message", () => this.sink.sendMessage({ kind: "general" }, text, buttons));
  }

  async editMessage(ref: MessageRef, text: string, buttons?: Button[]): Promise<boolean> {
    return this.run("edit message", () => this.sink.editMessage(ref, text, buttons), { messageId: ref.message_id });
  }

  async setButtons(ref: MessageRef | null, buttons: Button[]): Promise<boolean> {
    if (!ref) return false;
    return this.run("edit buttons", () => this.sink.editButtons(ref, buttons), { messageId: ref.message_id });
  }

  async renameThread(participant: Participant, title: string): Promise<boolean> {
    const threadId = participant.thread_id;
    if (!threadId) return false;
    return this.run("rename thread", () => this.sink.renameThread(threadId, title), { threadId });
  }

  async closeThread(participant: Participant): Promise<boolean> {
    const threadId = participant.thread_id;
    if (!threadId) return false;
    return this.run("close thread", () => this.sink.closeThread(threadId), { threadId });
  }

  async reopenThread(participant: Participant): Promise<boolean> {
    const threadId = participant.thread_id;
    if (!threadId) return false;
    return this.run("reopen thread", () => this.sink.reopenThread(threadId), { threadId });
  }

  /** True when the thread is gone, including when the platform no longer knows it. */
  async deleteThread(participant: Participant): Promise<boolean> {
    const threadId = participant.thread_id;
    if (!threadId) return false;
    return this.run(
      "delete thread",
      async () => {
        try {
          await this.sink.deleteThread(threadId);
        } catch (error) {
          if (!isNotificationError(error, "not_found")) throw error;
          this.logger.debug("delete thread: already gone", { threadId });
        }
      },
      { threadId },
    );
  }

  private withRetry<T>(action: () => Promise<T>): Promise<T> {
    return retry(action, {
      ...this.retryOptions,
      shouldRetry: (error) => isNotificationError(error, "transient"),
    });
  }

  private report(label: string, error: unknown, context: Record<string, unknown>): void {
    if (isNotificationError(error, "forbidden")) {
      this.logger.info(`${label}: recipient blocked delivery`, context);
      return;
    }
    this.logger.warn(`${label} failed: ${toError(error).message}`, context);
  }
}
