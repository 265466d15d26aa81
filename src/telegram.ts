import { z } from "zod";

import { NotificationError, TransportError, toError, type NotificationErrorKind } from "./errors.js";
import type { MessageRef } from "./models.js";
import type { Button, Destination, MediaKind, MediaPayload, MediaSource, NotificationSink } from "./sink.js";

export interface TelegramClientOptions {
  token: string;
  apiUrl: string;
  groupChatId: string;
  generalThreadId: string | null;
  timeoutMs?: number;
}

const envelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

const messageSchema = z.object({
  message_id: z.number(),
  chat: z.object({ id: z.union([z.number(), z.string()]) }),
});

const fileSchema = z.object({ file_path: z.string().optional() });

const ALREADY_APPLIED = ["message is not modified", "topic_not_modified", "topic_closed", "topic_not_closed"];
const NOT_FOUND = ["message to edit not found", "message thread not found", "topic_id_invalid", "chat not found"];

const classify = (status: number, description: string): NotificationErrorKind => {
  const lowered = description.toLowerCase();
  if (ALREADY_APPLIED.some((marker) => lowered.includes(marker))) return "already_applied";
  if (NOT_FOUND.some((marker) => lowered.includes(marker))) return "not_found";
  if (status === 403) return "forbidden";
  if (status === 429 || status >= 500) return "transient";
  return "rejected";
};

export const encodeCallback = (button: Button): string => `${button.action}:${button.target}`;

const keyboard = (buttons: Button[] | undefined) =>
  buttons && buttons.length > 0
    ? { inline_keyboard: buttons.map((button) => [{ text: button.label, callback_data: encodeCallback(button) }]) }
    : undefined;

// Bot API adapter for both the notification sink and the media source.
export class TelegramClient implements NotificationSink, MediaSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly options: TelegramClientOptions) {
    this.baseUrl = `${options.apiUrl}/bot${options.token}`;
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  async sendMessage(destination: Destination, text: string, buttons?: Button[]): Promise<MessageRef> {
    const result = await this.request("sendMessage", {
      ...this.address(destination),
      text,
      reply_markup: keyboard(buttons),
    });
    return this.toRef(result);
  }

  async sendMedia(
    destination: Destination,
    mediaRef: string,
    kind: MediaKind,
    caption: string,
    buttons?: Button[],
  ): Promise<MessageRef> {
    if (kind === "video_note") {
      // Round videos take no caption, so the caption and buttons follow as a message.
      await this.request("sendVideoNote", { ...this.address(destination), video_note: mediaRef });
      return this.sendMessage(destination, caption, buttons);
    }
    const method = kind === "video" ? "sendVideo" : "sendDocument";
    const result = await this.request(method, {
      ...this.address(destination),
      [kind]: mediaRef,
      caption,
      reply_markup: keyboard(buttons),
    });
    return this.toRef(result);
  }

  async editMessage(ref: MessageRef, text: string, buttons?: Button[]): Promise<void> {
    await this.request("editMessageText", {
      chat_id: ref.chat_id,
      message_id: ref.message_id,
      text,
      reply_markup: keyboard(buttons),
    });
  }

  async editButtons(ref: MessageRef, buttons: Button[]): Promise<void> {
    await this.request("editMessageReplyMarkup", {
      chat_id: ref.chat_id,
      message_id: ref.message_id,
      reply_markup: keyboard(buttons) ?? { inline_keyboard: [] },
    });
  }

  async renameThread(threadId: string, title: string): Promise<void> {
    await this.request("editForumTopic", {
      chat_id: this.options.groupChatId,
      message_thread_id: Number(threadId),
      name: title.slice(0, 128),
    });
  }

  async closeThread(threadId: string): Promise<void> {
    await this.request("closeForumTopic", { chat_id: this.options.groupChatId, message_thread_id: Number(threadId) });
  }

  async reopenThread(threadId: string): Promise<void> {
    await this.request("reopenForumTopic", { chat_id: this.options.groupChatId, message_thread_id: Number(threadId) });
  }

  async deleteThread(threadId: string): Promise<void> {
    await this.request("deleteForumTopic", { chat_id: this.options.groupChatId, message_thread_id: Number(threadId) });
  }

  async download(mediaRef: string): Promise<MediaPayload> {
    try {
      const file = fileSchema.parse(await this.request("getFile", { file_id: mediaRef }));
      if (!file.file_path) {
        throw new TransportError(`File ${mediaRef} has no download path`);
      }
      const response = await fetch(`${this.options.apiUrl}/file/bot${this.options.token}/${file.file_path}`, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        throw new TransportError(`Media download failed with HTTP ${response.status}`);
      }
      return {
        bytes: new Uint8Array(await response.arrayBuffer()),
        content_type: response.headers.get("content-type") ?? "application/octet-stream",
      };
    } catch (error) {
      if (error instanceof TransportError) throw error;
      throw new TransportError(`Media download failed: ${toError(error).message}`, toError(error));
    }
  }

  private address(destination: Destination): Record<string, string | number> {
    switch (destination.kind) {
      case "direct":
        return { chat_id: destination.chat_id };
      case "thread":
        return { chat_id: this.options.groupChatId, message_thread_id: Number(destination.thread_id) };
      case "general":
        return this.options.generalThreadId
          ? { chat_id: this.options.groupChatId, message_thread_id: Number(this.options.generalThreadId) }
          : { chat_id: this.options.groupChatId };
    }
  }

  private toRef(result: unknown): MessageRef {
    const message = messageSchema.parse(result);
    return { chat_id: String(message.chat.id), message_id: message.message_id };
  }

  private async request(method: string, payload: Record<string, unknown>): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/${method}`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new NotificationError("transient", `${method}: ${toError(error).message}`, toError(error));
    }

    const parsed = envelopeSchema.safeParse(await response.json().catch(() => null));
    if (!parsed.success) {
      throw new NotificationError(response.status >= 500 ? "transient" : "rejected", `${method}: HTTP ${response.status}`);
    }
    const envelope = parsed.data;
    if (!envelope.ok) {
      const description = envelope.description ?? `HTTP ${response.status}`;
      throw new NotificationError(classify(envelope.error_code ?? response.status, description), `${method}: ${description}`);
    }
    return envelope.result;
  }
}
