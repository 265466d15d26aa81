import { createPolicy, type CompliancePolicy } from "../../core/compliance_engine/index.js";
import { MemoryCache } from "../cache.js";
import type { Classification, Classifier } from "../classifier.js";
import { createContext, type ComplianceContext } from "../context.js";
import { NotificationError, type NotificationErrorKind } from "../errors.js";
import type { Logger, LogLevel } from "../logger.js";
import { MemoryStore } from "../memory.js";
import type { Course, CoursePatch, IntakeLog, IntakeLogPatch, MessageRef, Participant, Reviewer } from "../models.js";
import type { Button, Destination, MediaKind, MediaPayload, MediaSource, NotificationSink } from "../sink.js";

export type SinkMethod =
  | "sendMessage"
  | "sendMedia"
  | "editMessage"
  | "editButtons"
  | "renameThread"
  | "closeThread"
  | "reopenThread"
  | "deleteThread";

export type SinkCall = {
  method: SinkMethod;
  destination?: Destination;
  text?: string;
  buttons?: Button[];
  ref?: MessageRef;
  threadId?: string;
  title?: string;
  mediaRef?: string;
};

// RecordingSink keeps every call in order and fails on demand, per method.
export class RecordingSink implements NotificationSink {
  readonly calls: SinkCall[] = [];
  private readonly failures = new Map<SinkMethod, NotificationErrorKind[]>();
  private readonly persistent = new Map<SinkMethod, NotificationErrorKind>();
  private readonly failedCalls = new Set<SinkCall>();
  private nextMessageId = 100;

  failNext(method: SinkMethod, kind: NotificationErrorKind, times = 1): void {
    const queue = this.failures.get(method) ?? [];
    for (let i = 0; i < times; i += 1) queue.push(kind);
    this.failures.set(method, queue);
  }

  failAlways(method: SinkMethod, kind: NotificationErrorKind): void {
    this.persistent.set(method, kind);
  }

  async sendMessage(destination: Destination, text: string, buttons?: Button[]): Promise<MessageRef> {
    this.record({ method: "sendMessage", destination, text, buttons });
    return this.nextRef(destination);
  }

  async sendMedia(
    destination: Destination,
    mediaRef: string,
    _kind: MediaKind,
    caption: string,
    buttons?: Button[],
  ): Promise<MessageRef> {
    this.record({ method: "sendMedia", destination, mediaRef, text: caption, buttons });
    return this.nextRef(destination);
  }

  async editMessage(ref: MessageRef, text: string, buttons?: Button[]): Promise<void> {
    this.record({ method: "editMessage", ref, text, buttons });
  }

  async editButtons(ref: MessageRef, buttons: Button[]): Promise<void> {
    this.record({ method: "editButtons", ref, buttons });
  }

  async renameThread(threadId: string, title: string): Promise<void> {
    this.record({ method: "renameThread", threadId, title });
  }

  async closeThread(threadId: string): Promise<void> {
    this.record({ method: "closeThread", threadId });
  }

  async reopenThread(threadId: string): Promise<void> {
    this.record({ method: "reopenThread", threadId });
  }

  async deleteThread(threadId: string): Promise<void> {
    this.record({ method: "deleteThread", threadId });
  }

  /** Calls that went through, in order. */
  succeeded(method?: SinkMethod): SinkCall[] {
    return this.calls.filter((call) => !this.failedCalls.has(call) && (method === undefined || call.method === method));
  }

  /** Texts delivered as direct messages (new or edited) to `chatId`. */
  direct(chatId: string): string[] {
    return this.succeeded()
      .filter(
        (call) =>
          (call.destination?.kind === "direct" && call.destination.chat_id === chatId) ||
          (call.method === "editMessage" && call.ref?.chat_id === chatId),
      )
      .map((call) => call.text ?? "");
  }

  /** Texts and captions posted into `threadId`. */
  thread(threadId: string): string[] {
    return this.succeeded()
      .filter((call) => call.destination?.kind === "thread" && call.destination.thread_id === threadId)
      .map((call) => call.text ?? "");
  }

  general(): string[] {
    return this.succeeded()
      .filter((call) => call.destination?.kind === "general")
      .map((call) => call.text ?? "");
  }

  private record(call: SinkCall): void {
    this.calls.push(call);
    const queued = this.failures.get(call.method)?.shift();
    const kind = queued ?? this.persistent.get(call.method);
    if (kind !== undefined) {
      this.failedCalls.add(call);
      throw new NotificationError(kind, `${call.method} failed (${kind})`);
    }
  }

  private nextRef(destination: Destination): MessageRef {
    const chatId = destination.kind === "direct" ? destination.chat_id : "group";
    this.nextMessageId += 1;
    return { chat_id: chatId, message_id: this.nextMessageId };
  }
}

// ScriptedClassifier answers from a queue, then with its default verdict.
export class ScriptedClassifier implements Classifier {
  readonly id = "classifier";
  calls = 0;
  private readonly script: Array<Classification | Error> = [];

  constructor(private readonly fallback: Classification = { approved: true, confidence: 0.95, reason: "" }) {}

  enqueue(...results: Array<Classification | Error>): void {
    this.script.push(...results);
  }

  async classify(): Promise<Classification> {
    this.calls += 1;
    const next = this.script.shift() ?? this.fallback;
    if (next instanceof Error) throw next;
    return next;
  }
}

export class FakeMediaSource implements MediaSource {
  readonly downloads: string[] = [];
  failure: Error | null = null;

  async download(mediaRef: string): Promise<MediaPayload> {
    this.downloads.push(mediaRef);
    if (this.failure) throw this.failure;
    return { bytes: new TextEncoder().encode(mediaRef), content_type: "video/mp4" };
  }
}

export type LogEntry = {
  level: LogLevel;
  message: string;
  error?: unknown;
  context?: Record<string, unknown>;
};

// RecordingLogger collects entries; children write into the same list.
export class RecordingLogger implements Logger {
  constructor(readonly entries: LogEntry[] = []) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: "debug", message, context });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: "info", message, context });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: "warn", message, context });
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.entries.push({ level: "error", message, error, context });
  }

  child(): Logger {
    return this;
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}

export type TestHarness = {
  ctx: ComplianceContext;
  store: MemoryStore;
  cache: MemoryCache;
  sink: RecordingSink;
  classifier: ScriptedClassifier;
  media: FakeMediaSource;
  logger: RecordingLogger;
  setNow(instant: Date | string): void;
};

/**
 * Context over in-process fakes. The policy runs in UTC so local times in tests read
 * as plain ISO instants; retries do not wait.
 */
export const buildTestContext = (
  now: Date | string = "2024-05-01T09:00:00Z",
  policy: Partial<CompliancePolicy> = {},
): TestHarness => {
  let current = new Date(now);
  const clock = () => new Date(current);
  const store = new MemoryStore(clock);
  const cache = new MemoryCache(clock);
  const sink = new RecordingSink();
  const classifier = new ScriptedClassifier();
  const media = new FakeMediaSource();
  const logger = new RecordingLogger();
  const ctx = createContext({
    store,
    cache,
    sink,
    media,
    classifier,
    logger,
    clock,
    policy: createPolicy({ utcOffsetMinutes: 0, ...policy }),
    sinkRetry: { initialDelayMs: 0, maxDelayMs: 0 },
  });
  return {
    ctx,
    store,
    cache,
    sink,
    classifier,
    media,
    logger,
    setNow: (instant) => {
      current = new Date(instant);
    },
  };
};

export const seedReviewer = (store: MemoryStore, name = "Reviewer"): Promise<Reviewer> =>
  store.participants.createReviewer({ name, chat_id: "reviewer-chat" });

export const seedParticipant = (
  store: MemoryStore,
  overrides: Partial<Pick<Participant, "name" | "chat_id" | "thread_id" | "reviewer_id">> = {},
): Promise<Participant> =>
  store.participants.create({
    name: overrides.name ?? "Dana",
    chat_id: overrides.chat_id ?? "participant-chat",
    thread_id: overrides.thread_id === undefined ? "thread-1" : overrides.thread_id,
    reviewer_id: overrides.reviewer_id ?? null,
  });

/** An active course scheduled at 09:00 local, at day 5 of 21 unless overridden. */
export const seedCourse = async (store: MemoryStore, participantId: number, patch: CoursePatch = {}): Promise<Course> => {
  const created = await store.courses.create({ participant_id: participantId, total_days: 21, invite_code: "invite-1" });
  if (!created) {
    throw new Error(`Participant ${participantId} already has an open course`);
  }
  await store.courses.update(created.id, {
    status: "active",
    invite_used: true,
    scheduled_time: "09:00",
    start_date: "2024-04-26",
    current_day: 5,
    registration_message: { chat_id: "group", message_id: 1 },
    ...patch,
  });
  const course = await store.courses.get(created.id);
  if (!course) {
    throw new Error(`Course ${created.id} vanished`);
  }
  return course;
};

/** A day's log sent at 09:05 for the 09:00 occurrence of 2024-05-01, waiting for review unless patched. */
export const seedLog = async (store: MemoryStore, courseId: number, day: number, patch: IntakeLogPatch = {}): Promise<IntakeLog> => {
  const created = await store.intakeLogs.create({
    course_id: courseId,
    day,
    status: "pending_review",
    scheduled_at: "2024-05-01T09:00:00.000Z",
    taken_at: "2024-05-01T09:05:00.000Z",
    delay_minutes: 5,
    media_ref: "file-0",
    confidence: 0.5,
    verified_by: null,
    review_started_at: "2024-05-01T09:05:00.000Z",
  });
  if (!created) {
    throw new Error(`Course ${courseId} already has a log for day ${day}`);
  }
  await store.intakeLogs.update(created.id, patch);
  const log = await store.intakeLogs.get(created.id);
  if (!log) {
    throw new Error(`Log ${created.id} vanished`);
  }
  return log;
};
