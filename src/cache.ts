import type { Clock } from "./models.js";

// Dedup cache: loss of its contents may cause a duplicate notice, never a missed state change.
export interface DedupCache {
  exists(key: string): Promise<boolean>;
  setWithTTL(key: string, ttlSeconds: number): Promise<void>;
}

export class MemoryCache implements DedupCache {
  private readonly expiries = new Map<string, number>();

  constructor(private readonly clock: Clock = () => new Date()) {}

  async exists(key: string): Promise<boolean> {
    const expiry = this.expiries.get(key);
    if (expiry === undefined) {
      return false;
    }
    if (expiry <= this.clock().getTime()) {
      this.expiries.delete(key);
      return false;
    }
    return true;
  }

  async setWithTTL(key: string, ttlSeconds: number): Promise<void> {
    this.expiries.set(key, this.clock().getTime() + ttlSeconds * 1000);
  }
}

export type DedupKind =
  | `reminder_${number}`
  | "strike"
  | "removal"
  | "review_deadline"
  | "reshoot_deadline"
  | "appeal_deadline"
  | "appeal_button_expired";

// One notice per course, local calendar date and kind.
export class DailyDedup {
  constructor(
    private readonly cache: DedupCache,
    private readonly ttlSeconds: number,
  ) {}

  static key(courseId: number, dateKey: string, kind: DedupKind): string {
    return `sent:${courseId}:${dateKey}:${kind}`;
  }

  async wasSent(courseId: number, dateKey: string, kind: DedupKind): Promise<boolean> {
    return this.cache.exists(DailyDedup.key(courseId, dateKey, kind));
  }

  async markSent(courseId: number, dateKey: string, kind: DedupKind): Promise<void> {
    await this.cache.setWithTTL(DailyDedup.key(courseId, dateKey, kind), this.ttlSeconds);
  }
}
