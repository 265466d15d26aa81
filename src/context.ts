import type { CompliancePolicy } from "../core/compliance_engine/index.js";
import { DailyDedup, type DedupCache } from "./cache.js";
import type { Classifier } from "./classifier.js";
import { Notifier } from "./delivery.js";
import type { Logger } from "./logger.js";
import type { Clock } from "./models.js";
import type { RetryOptions } from "./retry.js";
import type { MediaSource, NotificationSink } from "./sink.js";
import type { Store } from "./store.js";

// Everything an operation needs, built once in the entrypoint and passed down explicitly.
export interface ComplianceContext {
  store: Store;
  cache: DedupCache;
  dedup: DailyDedup;
  sink: NotificationSink;
  media: MediaSource;
  classifier: Classifier;
  notifier: Notifier;
  policy: CompliancePolicy;
  logger: Logger;
  clock: Clock;
}

export interface ContextDependencies {
  store: Store;
  cache: DedupCache;
  sink: NotificationSink;
  media: MediaSource;
  classifier: Classifier;
  policy: CompliancePolicy;
  logger: Logger;
  clock?: Clock;
  sinkRetry?: RetryOptions;
}

export const createContext = (deps: ContextDependencies): ComplianceContext => ({
  store: deps.store,
  cache: deps.cache,
  dedup: new DailyDedup(deps.cache, deps.policy.dedupTtlSeconds),
  sink: deps.sink,
  media: deps.media,
  classifier: deps.classifier,
  notifier: new Notifier(deps.sink, deps.logger.child("delivery"), deps.sinkRetry),
  policy: deps.policy,
  logger: deps.logger,
  clock: deps.clock ?? (() => new Date()),
});
