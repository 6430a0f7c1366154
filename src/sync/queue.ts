/**
 * Pending intents, at most one per repository path
 *
 * A newer intent for a path replaces the older one outright (last event
 * wins): create → delete collapses to delete, delete → create to create.
 * The replacement moves to the back so iteration follows the detection
 * order of the live intents.
 */

import type { SyncIntent } from "./types.js";

export type PendingState = "queued" | "awaiting-confirmation" | "approved" | "failed";

export type PendingEntry = {
  intent: SyncIntent;
  state: PendingState;
  attempts: number;
  lastError?: string;
};

export class PendingQueue {
  private entries = new Map<string, PendingEntry>();

  get size(): number {
    return this.entries.size;
  }

  /**
   * Add an intent, superseding any live intent for the same path.
   * Returns the intent that was replaced, if any.
   */
  enqueue(intent: SyncIntent): SyncIntent | undefined {
    const previous = this.entries.get(intent.targetPath);
    this.entries.delete(intent.targetPath);
    this.entries.set(intent.targetPath, { intent, state: "queued", attempts: 0 });
    return previous?.intent;
  }

  get(targetPath: string): PendingEntry | undefined {
    return this.entries.get(targetPath);
  }

  has(targetPath: string): boolean {
    return this.entries.has(targetPath);
  }

  /**
   * Remove the entry for a path. With `intent` given, only removes it if
   * that exact intent is still the live one, so a dispatch finishing after
   * a newer event arrived leaves the newer intent queued.
   */
  remove(targetPath: string, intent?: SyncIntent): boolean {
    const entry = this.entries.get(targetPath);
    if (!entry) return false;
    if (intent && entry.intent !== intent) return false;
    return this.entries.delete(targetPath);
  }

  setState(targetPath: string, state: PendingState): void {
    const entry = this.entries.get(targetPath);
    if (entry) {
      entry.state = state;
    }
  }

  /**
   * Operator approval: the entry is dispatched on the next cycle whatever
   * the policy says, with a fresh retry budget
   */
  approve(targetPath: string): boolean {
    const entry = this.entries.get(targetPath);
    if (!entry || (entry.state !== "awaiting-confirmation" && entry.state !== "failed")) {
      return false;
    }
    entry.state = "approved";
    entry.attempts = 0;
    delete entry.lastError;
    return true;
  }

  recordFailure(targetPath: string, intent: SyncIntent, message: string): PendingEntry | undefined {
    const entry = this.entries.get(targetPath);
    if (!entry || entry.intent !== intent) return undefined;
    entry.attempts += 1;
    entry.lastError = message;
    return entry;
  }

  entriesInOrder(): Array<[string, PendingEntry]> {
    return Array.from(this.entries.entries());
  }

  countByState(state: PendingState): number {
    let count = 0;
    for (const entry of this.entries.values()) {
      if (entry.state === state) count++;
    }
    return count;
  }

  clear(): number {
    const dropped = this.entries.size;
    this.entries.clear();
    return dropped;
  }
}
