import type { Clock } from "./store.js";

/** Admission check run before any core operation. */
export interface AdmissionGate {
  allow(key: string): Promise<boolean>;
}

/** Fixed-window counter per key, kept in process memory. */
export class MemoryRateLimiter implements AdmissionGate {
  private readonly windows = new Map<string, number>();

  constructor(
    private readonly limit: number,
    private readonly windowMs: number,
    private readonly clock: Clock = () => Date.now()
  ) {}

  async allow(key: string): Promise<boolean> {
    const window = Math.floor(this.clock() / this.windowMs);
    const windowKey = `rl:${key}:${window}`;
    const count = this.windows.get(windowKey) ?? 0;

    if (count >= this.limit) return false;

    this.windows.set(windowKey, count + 1);
    this.evictBefore(window);
    return true;
  }

  private evictBefore(window: number): void {
    for (const windowKey of this.windows.keys()) {
      const started = Number(windowKey.slice(windowKey.lastIndexOf(":") + 1));
      if (started < window) this.windows.delete(windowKey);
    }
  }
}

/** Lets everything through; for deployments that gate admission upstream. */
export const openGate: AdmissionGate = {
  allow: async () => true
};
