import { describe, it, expect } from "vitest";

import { PendingQueue } from "../queue.js";
import type { SyncIntent } from "../types.js";

function intent(kind: SyncIntent["kind"], targetPath = "data/htdocs/a.php", detectedAt = 0): SyncIntent {
  return { kind, sourcePath: targetPath.replace(/^data\//, ""), targetPath, detectedAt };
}

describe("PendingQueue", () => {
  it("should keep one live intent per target path", () => {
    const queue = new PendingQueue();
    queue.enqueue(intent("create"));
    queue.enqueue(intent("update"));

    expect(queue.size).toBe(1);
    expect(queue.get("data/htdocs/a.php")?.intent.kind).toBe("update");
  });

  it("should collapse create then delete to delete", () => {
    const queue = new PendingQueue();
    const create = intent("create");
    expect(queue.enqueue(create)).toBeUndefined();
    expect(queue.enqueue(intent("delete"))).toBe(create);
    expect(queue.get("data/htdocs/a.php")?.intent.kind).toBe("delete");
  });

  it("should collapse delete then create to create", () => {
    const queue = new PendingQueue();
    queue.enqueue(intent("delete"));
    queue.enqueue(intent("create"));
    expect(queue.get("data/htdocs/a.php")?.intent.kind).toBe("create");
  });

  it("should move a superseding intent to the back", () => {
    const queue = new PendingQueue();
    queue.enqueue(intent("create", "data/a"));
    queue.enqueue(intent("create", "data/b"));
    queue.enqueue(intent("update", "data/a"));

    expect(queue.entriesInOrder().map(([target]) => target)).toEqual(["data/b", "data/a"]);
  });

  it("should reset state and attempts when superseded", () => {
    const queue = new PendingQueue();
    const first = intent("create");
    queue.enqueue(first);
    queue.recordFailure(first.targetPath, first, "boom");
    queue.setState(first.targetPath, "failed");

    queue.enqueue(intent("update"));
    expect(queue.get(first.targetPath)).toMatchObject({ state: "queued", attempts: 0 });
  });

  it("should not remove an entry superseded by a newer intent", () => {
    const queue = new PendingQueue();
    const old = intent("create");
    queue.enqueue(old);
    queue.enqueue(intent("update"));

    expect(queue.remove(old.targetPath, old)).toBe(false);
    expect(queue.size).toBe(1);
  });

  it("should ignore failures recorded for a superseded intent", () => {
    const queue = new PendingQueue();
    const old = intent("create");
    queue.enqueue(old);
    queue.enqueue(intent("update"));

    expect(queue.recordFailure(old.targetPath, old, "late")).toBeUndefined();
    expect(queue.get(old.targetPath)?.attempts).toBe(0);
  });

  it("should approve only entries awaiting confirmation or failed", () => {
    const queue = new PendingQueue();
    const a = intent("create", "data/a");
    queue.enqueue(a);
    expect(queue.approve("data/a")).toBe(false);

    queue.recordFailure("data/a", a, "boom");
    queue.setState("data/a", "failed");
    expect(queue.approve("data/a")).toBe(true);
    expect(queue.get("data/a")).toEqual({ intent: a, state: "approved", attempts: 0 });
  });

  it("should count entries by state and clear", () => {
    const queue = new PendingQueue();
    queue.enqueue(intent("create", "data/a"));
    queue.enqueue(intent("create", "data/b"));
    queue.setState("data/b", "awaiting-confirmation");

    expect(queue.countByState("queued")).toBe(1);
    expect(queue.countByState("awaiting-confirmation")).toBe(1);
    expect(queue.clear()).toBe(2);
    expect(queue.size).toBe(0);
  });
});
