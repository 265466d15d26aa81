import type { MessageRef } from "./models.js";

export const BUTTON_ACTIONS = [
  "confirm",
  "reject",
  "reshoot",
  "appeal_start",
  "appeal_accept",
  "appeal_decline",
  "extend",
  "complete",
] as const;

export type ButtonAction = (typeof BUTTON_ACTIONS)[number];

// Button is an interactive affordance; pressing it comes back as a button event for `target`.
export type Button = {
  label: string;
  action: ButtonAction;
  target: number;
};

export type Destination =
  | { kind: "direct"; chat_id: string }
  | { kind: "thread"; thread_id: string }
  | { kind: "general" };

export type MediaKind = "video" | "video_note" | "document";

export type MediaPayload = {
  bytes: Uint8Array;
  content_type: string;
};

// NotificationSink delivers messages and manages collaboration threads; failures throw NotificationError.
export interface NotificationSink {
  sendMessage(destination: Destination, text: string, buttons?: Button[]): Promise<MessageRef>;
  sendMedia(destination: Destination, mediaRef: string, kind: MediaKind, caption: string, buttons?: Button[]): Promise<MessageRef>;
  editMessage(ref: MessageRef, text: string, buttons?: Button[]): Promise<void>;
  /** Replaces the buttons only; an empty list removes them. */
  editButtons(ref: MessageRef, buttons: Button[]): Promise<void>;
  renameThread(threadId: string, title: string): Promise<void>;
  closeThread(threadId: string): Promise<void>;
  reopenThread(threadId: string): Promise<void>;
  deleteThread(threadId: string): Promise<void>;
}

// MediaSource fetches submitted media by reference; failures throw TransportError.
export interface MediaSource {
  download(mediaRef: string): Promise<MediaPayload>;
}
