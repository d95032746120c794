import { beforeEach, describe, expect, test } from "vitest";
import pino from "pino";
import { ThicknessManager } from "./thickness-manager";

const DEFAULT = 150;

function clock(start = Date.UTC(2026, 0, 1)) {
  let t = start;
  return () => new Date((t += 1000));
}

function ids(set: ReadonlySet<number>): number[] {
  return Array.from(set).sort((a, b) => a - b);
}

describe("ThicknessManager", () => {
  let manager: ThicknessManager;

  beforeEach(() => {
    manager = new ThicknessManager({ logger: pino({ level: "silent" }), now: clock() });
  });

  test("set, undo and redo a thickness", () => {
    manager.setThickness([1, 2, 3], 200);
    expect(manager.getThickness(2, DEFAULT)).toBe(200);

    const undone = manager.undo();
    expect(ids(undone)).toEqual([1, 2, 3]);
    for (const id of [1, 2, 3]) {
      expect(manager.getThickness(id, DEFAULT)).toBe(DEFAULT);
    }
    expect(manager.groups()).toEqual([]);

    const redone = manager.redo();
    expect(ids(redone)).toEqual([1, 2, 3]);
    const groups = manager.groups();
    expect(groups).toHaveLength(1);
    expect(ids(groups[0].padIds)).toEqual([1, 2, 3]);
    expect(groups[0].thickness).toBe(200);
    expect(manager.checkInvariants()).toEqual([]);
  });

  test("undo restores the previous override, not the default", () => {
    manager.setThickness([1, 2], 100, "A");
    manager.setThickness([2, 3], 200, "B");

    expect(ids(manager.getGroupByName("A")?.padIds ?? new Set())).toEqual([1]);
    expect(manager.getThickness(2, DEFAULT)).toBe(200);

    const undone = manager.undo();
    expect(ids(undone)).toEqual([2, 3]);
    expect(manager.getThickness(2, DEFAULT)).toBe(100);
    expect(manager.getThickness(3, DEFAULT)).toBe(DEFAULT);
    expect(manager.getGroup(2)?.name).toBe("A");
    expect(ids(manager.getGroupByName("A")?.padIds ?? new Set())).toEqual([1, 2]);
    expect(manager.getGroupByName("B")).toBeUndefined();
  });

  test("a group emptied by a move is deleted and comes back on undo", () => {
    manager.setThickness([1], 100, "A");
    const createdAt = manager.getGroupByName("A")?.createdAt;
    manager.setThickness([1], 200, "B");

    expect(manager.groups().map((g) => g.name)).toEqual(["B"]);

    manager.undo();
    expect(manager.groups().map((g) => g.name)).toEqual(["A"]);
    expect(manager.getGroupByName("A")?.createdAt).toEqual(createdAt);
    expect(manager.getThickness(1, DEFAULT)).toBe(100);
  });

  test("removeGroup returns pads to default and can be undone", () => {
    manager.createGroup("fine pitch", [4, 5], 120);
    const before = manager.getGroupByName("fine pitch");

    expect(manager.removeGroup("fine pitch")).toBe(true);
    expect(manager.getThickness(4, DEFAULT)).toBe(DEFAULT);
    expect(manager.hasOverride(5)).toBe(false);

    expect(ids(manager.undo())).toEqual([4, 5]);
    expect(manager.getGroupByName("fine pitch")).toEqual(before);

    expect(ids(manager.redo())).toEqual([4, 5]);
    expect(manager.groups()).toEqual([]);
  });

  test("removing an unknown group is a no-op", () => {
    expect(manager.removeGroup("nope")).toBe(false);
    expect(manager.canUndo).toBe(false);
  });

  test("a new change clears the redo history", () => {
    manager.setThickness([1], 100);
    manager.undo();
    expect(manager.canRedo).toBe(true);

    manager.setThickness([2], 120);
    expect(manager.canRedo).toBe(false);
    expect(manager.redo().size).toBe(0);
    expect(manager.getThickness(1, DEFAULT)).toBe(DEFAULT);
  });

  test("undo and redo on empty history return empty sets", () => {
    expect(manager.undo().size).toBe(0);
    expect(manager.redo().size).toBe(0);
    expect(manager.canUndo).toBe(false);
    expect(manager.canRedo).toBe(false);
  });

  test("depth counters follow the stacks", () => {
    manager.setThickness([1], 100);
    manager.setThickness([2], 110);
    manager.undo();
    expect(manager.undoDepth).toBe(1);
    expect(manager.redoDepth).toBe(1);
  });

  test("invalid requests change nothing", () => {
    manager.setThickness([1], 100, "A");

    expect(manager.setThickness([], 100)).toBeNull();
    expect(manager.setThickness([2], -5)).toBeNull();
    expect(manager.setThickness([2], Number.NaN)).toBeNull();
    expect(manager.setThickness([2], 0)).toBeNull();
    expect(manager.setThickness([2], 100, "A")).toBeNull();
    expect(manager.createGroup("A", [3], 100)).toBe(false);

    expect(manager.undoDepth).toBe(1);
    expect(manager.groups().map((g) => g.name)).toEqual(["A"]);
  });

  test("names that cannot be saved are rejected", () => {
    expect(manager.createGroup("", [3], 200)).toBe(false);
    expect(manager.setThickness([3], 200, "   ")).toBeNull();
    expect(manager.createGroup("__proto__", [1, 2], 200)).toBe(false);

    expect(manager.undoDepth).toBe(0);
    expect(manager.groups()).toEqual([]);
    expect(manager.hasOverride(3)).toBe(false);
    expect(() =>
      manager.loadSnapshot({
        groups: [{ name: "", padIds: [1], thickness: 100, createdAt: new Date(0) }],
      })
    ).toThrow(RangeError);
  });

  test("anonymous groups get distinct generated names", () => {
    const a = manager.setThickness([1], 100);
    const b = manager.setThickness([2], 100);
    expect(a?.name).toBe("group-1");
    expect(b?.name).toBe("group-2");
  });

  test("returned groups are copies", () => {
    const group = manager.setThickness([1, 2], 100);
    expect(group).not.toBeNull();
    if (group) {
      expect(group.padIds).toBeInstanceOf(Set);
      manager.setThickness([2], 300);
      expect(ids(group.padIds)).toEqual([1, 2]);
    }
  });

  test("a pad is never in two groups", () => {
    const steps: Array<() => unknown> = [
      () => manager.setThickness([1, 2, 3], 100, "A"),
      () => manager.setThickness([3, 4], 120, "B"),
      () => manager.setThickness([1, 4, 5], 140),
      () => manager.undo(),
      () => manager.removeGroup("A"),
      () => manager.undo(),
      () => manager.undo(),
      () => manager.redo(),
      () => manager.setThickness([2, 5, 6], 90, "C"),
      () => manager.redo(),
      () => manager.undo(),
      () => manager.undo(),
      () => manager.undo(),
      () => manager.redo(),
      () => manager.redo(),
    ];

    for (const step of steps) {
      step();
      expect(manager.checkInvariants()).toEqual([]);

      const seen = new Set<number>();
      for (const g of manager.groups()) {
        for (const id of g.padIds) {
          expect(seen.has(id)).toBe(false);
          seen.add(id);
        }
      }
    }
  });

  test("clear drops groups and history", () => {
    manager.setThickness([1], 100);
    manager.setThickness([2], 100);
    manager.undo();
    manager.clear();

    expect(manager.groups()).toEqual([]);
    expect(manager.canUndo).toBe(false);
    expect(manager.canRedo).toBe(false);
  });

  test("snapshots round trip and loading clears history", () => {
    manager.setThickness([3, 1], 100, "A");
    manager.setThickness([7], 220);
    const snapshot = manager.toSnapshot();

    expect(snapshot.groups.map((g) => [g.name, g.padIds, g.thickness])).toEqual([
      ["A", [1, 3], 100],
      ["group-1", [7], 220],
    ]);

    const other = new ThicknessManager({ logger: pino({ level: "silent" }) });
    other.setThickness([9], 50);
    other.loadSnapshot(snapshot);

    expect(other.toSnapshot()).toEqual(snapshot);
    expect(other.canUndo).toBe(false);
    expect(other.getThickness(9, DEFAULT)).toBe(DEFAULT);
    expect(other.checkInvariants()).toEqual([]);
  });

  test("loading a snapshot with a shared pad is rejected", () => {
    manager.setThickness([1], 100);
    expect(() =>
      manager.loadSnapshot({
        groups: [
          { name: "A", padIds: [1, 2], thickness: 100, createdAt: new Date(0) },
          { name: "B", padIds: [2], thickness: 120, createdAt: new Date(0) },
        ],
      })
    ).toThrow(RangeError);
    expect(manager.getThickness(1, DEFAULT)).toBe(100);
  });
});
