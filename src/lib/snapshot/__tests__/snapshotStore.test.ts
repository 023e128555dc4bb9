import { describe, it, expect, vi, afterEach } from "vitest";
import { SnapshotStore } from "../snapshotStore.js";
import { recomputeCorrections } from "../../engine/recompute.js";
import { FIVE_VENUES, NO_TRIM, rec } from "../../__tests__/fixtures.js";

describe("SnapshotStore", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("starts empty", () => {
    const store = new SnapshotStore();
    expect(store.current().records).toEqual([]);
    expect(store.current().table).toBeNull();
  });

  it("freezes what it publishes", () => {
    const store = new SnapshotStore();
    const snapshot = store.publish(rec("London", "M", 4500), null);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.records)).toBe(true);
    expect(Object.isFrozen(snapshot.records[0])).toBe(true);
  });

  it("leaves a reader's snapshot untouched by later publishes", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const store = new SnapshotStore();
    const first = recomputeCorrections(FIVE_VENUES, NO_TRIM, { version: 1 });
    const second = recomputeCorrections(FIVE_VENUES, { ...NO_TRIM, baselineOverride: "London" }, { version: 2 });
    if (!first.success || !second.success) throw new Error("recompute failed");

    store.publish(FIVE_VENUES, first.value);
    const held = store.current();
    store.publish(FIVE_VENUES, second.value);

    expect(held.table?.version).toBe(1);
    expect(held.table?.baselineVenue).toBe("Maastricht");
    expect(store.current().table?.version).toBe(2);
    expect(store.current().table?.baselineVenue).toBe("London");
  });
});
