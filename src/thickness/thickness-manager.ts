// src/thickness/thickness-manager.ts

import type { Logger } from "pino";
import { componentLogger } from "../core/logger";
import { DEFAULT_THICKNESS_MM } from "../geometry/constants";

/**
 * Marks a change that returns its pads to the default thickness.
 */
export const RESET_TO_DEFAULT: unique symbol = Symbol("reset-to-default");

export type ThicknessTarget = number | typeof RESET_TO_DEFAULT;

/**
 * Names that can be written to and read back from a group file: not blank,
 * and not an object prototype key.
 */
export function isValidGroupName(name: string): boolean {
  return name.trim().length > 0 && name !== "__proto__";
}

/**
 * Read-only view of a group handed to callers.
 */
export interface ThicknessGroup {
  readonly name: string;
  readonly padIds: ReadonlySet<number>;
  readonly thickness: number;
  readonly createdAt: Date;
}

/**
 * Group membership of a pad right before a change.
 */
export interface PriorState {
  readonly groupName: string;
  readonly thickness: number;
  readonly createdAt: Date;
}

/**
 * Undo/redo record. Pads missing from `prior` were at the default
 * thickness before the change.
 */
export interface ThicknessChange {
  readonly padIds: ReadonlySet<number>;
  readonly prior: ReadonlyMap<number, PriorState>;
  readonly next: ThicknessTarget;
  /** Group created by the change, null for resets */
  readonly groupName: string | null;
  readonly createdAt: Date;
}

/**
 * Plain representation of the group table, used for persistence.
 * Undo/redo history is not part of it.
 */
export interface GroupSnapshot {
  groups: GroupRecord[];
}

export interface GroupRecord {
  name: string;
  /** Ascending */
  padIds: number[];
  thickness: number;
  createdAt: Date;
}

interface GroupEntry {
  name: string;
  padIds: Set<number>;
  thickness: number;
  createdAt: Date;
}

export interface ThicknessManagerOptions {
  logger?: Logger;
  /** Clock used for group creation times */
  now?: () => Date;
}

const EMPTY: ReadonlySet<number> = new Set();

/**
 * Keeps thickness overrides as named groups of pads, with linear
 * undo/redo. A pad is in at most one group; pads outside any group use
 * their default thickness.
 *
 * Not synchronized: callers sharing one instance must serialize access.
 */
export class ThicknessManager {
  private readonly groupsByName = new Map<string, GroupEntry>();
  private readonly padToGroup = new Map<number, string>();
  private undoStack: ThicknessChange[] = [];
  private redoStack: ThicknessChange[] = [];
  private nameCounter = 0;

  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(options: ThicknessManagerOptions = {}) {
    this.log = componentLogger("thickness-manager", options.logger);
    this.now = options.now ?? (() => new Date());
  }

  get canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  get undoDepth(): number {
    return this.undoStack.length;
  }

  get redoDepth(): number {
    return this.redoStack.length;
  }

  /**
   * Put `padIds` into a new group at `thickness`. Pads leave their previous
   * groups, which are deleted once empty. Clears the redo history.
   *
   * Returns null without changing anything for an empty id set, a
   * thickness that is not a positive number, a name that is blank or
   * reserved, or a name already in use.
   */
  setThickness(
    padIds: Iterable<number>,
    thickness: number,
    name?: string
  ): ThicknessGroup | null {
    const ids = new Set(padIds);

    if (ids.size === 0) {
      this.log.warn("setThickness called without pads");
      return null;
    }
    if (!Number.isFinite(thickness) || thickness <= 0) {
      this.log.warn({ thickness }, "rejected non-positive thickness");
      return null;
    }
    if (name !== undefined && !isValidGroupName(name)) {
      this.log.warn({ name }, "rejected group name");
      return null;
    }
    if (name !== undefined && this.groupsByName.has(name)) {
      this.log.warn({ name }, "group name already in use");
      return null;
    }

    const groupName = name ?? this.generateName();
    const createdAt = this.now();
    const prior = this.capturePrior(ids);

    this.detachAll(ids);
    this.insertGroup(groupName, new Set(ids), thickness, createdAt);

    this.undoStack.push({ padIds: ids, prior, next: thickness, groupName, createdAt });
    this.redoStack = [];

    this.log.info({ group: groupName, pads: ids.size, thickness }, "thickness set");
    return this.getGroupByName(groupName) ?? null;
  }

  /**
   * Named variant of setThickness. False when the name is taken or the
   * input is rejected.
   */
  createGroup(name: string, padIds: Iterable<number>, thickness: number): boolean {
    return this.setThickness(padIds, thickness, name) !== null;
  }

  /**
   * Disband a group; its pads return to the default thickness.
   */
  removeGroup(name: string): boolean {
    const group = this.groupsByName.get(name);
    if (!group) return false;

    const ids = new Set(group.padIds);
    const prior = this.capturePrior(ids);
    this.detachAll(ids);

    this.undoStack.push({
      padIds: ids,
      prior,
      next: RESET_TO_DEFAULT,
      groupName: null,
      createdAt: this.now(),
    });
    this.redoStack = [];

    this.log.info({ group: name, pads: ids.size }, "group removed");
    return true;
  }

  getThickness(padId: number, defaultThickness: number = DEFAULT_THICKNESS_MM): number {
    return this.overrideOf(padId) ?? defaultThickness;
  }

  hasOverride(padId: number): boolean {
    return this.padToGroup.has(padId);
  }

  getGroup(padId: number): ThicknessGroup | undefined {
    const name = this.padToGroup.get(padId);
    return name === undefined ? undefined : this.getGroupByName(name);
  }

  getGroupByName(name: string): ThicknessGroup | undefined {
    const group = this.groupsByName.get(name);
    return group ? toView(group) : undefined;
  }

  /**
   * Current groups in creation order.
   */
  groups(): ThicknessGroup[] {
    return Array.from(this.groupsByName.values(), toView);
  }

  /**
   * Revert the latest change. Returns the pads whose override changed,
   * empty when there is nothing to undo.
   */
  undo(): ReadonlySet<number> {
    const change = this.undoStack.pop();
    if (!change) return EMPTY;

    const before = this.overridesOf(change.padIds);
    this.detachAll(change.padIds);
    this.restorePrior(change.prior);
    this.redoStack.push(change);

    const changed = this.changedSince(before);
    this.log.debug({ pads: changed.size }, "undo");
    return changed;
  }

  /**
   * Reapply the latest undone change. Returns the pads whose override
   * changed, empty when there is nothing to redo.
   */
  redo(): ReadonlySet<number> {
    const change = this.redoStack.pop();
    if (!change) return EMPTY;

    const before = this.overridesOf(change.padIds);
    const prior = this.capturePrior(change.padIds);
    this.detachAll(change.padIds);

    let groupName: string | null = null;
    if (change.next !== RESET_TO_DEFAULT) {
      groupName =
        change.groupName !== null && !this.groupsByName.has(change.groupName)
          ? change.groupName
          : this.generateName();
      this.insertGroup(groupName, new Set(change.padIds), change.next, change.createdAt);
    }

    this.undoStack.push({
      padIds: change.padIds,
      prior,
      next: change.next,
      groupName,
      createdAt: change.createdAt,
    });

    const changed = this.changedSince(before);
    this.log.debug({ pads: changed.size }, "redo");
    return changed;
  }

  /**
   * Drop all groups and history, e.g. when a new layer is loaded.
   */
  clear(): void {
    this.groupsByName.clear();
    this.padToGroup.clear();
    this.undoStack = [];
    this.redoStack = [];
    this.nameCounter = 0;
  }

  toSnapshot(): GroupSnapshot {
    return {
      groups: Array.from(this.groupsByName.values(), (g) => ({
        name: g.name,
        padIds: Array.from(g.padIds).sort((a, b) => a - b),
        thickness: g.thickness,
        createdAt: new Date(g.createdAt.getTime()),
      })),
    };
  }

  /**
   * Replace the group table with `snapshot`. Undo/redo history is cleared
   * since it refers to the replaced state.
   */
  loadSnapshot(snapshot: GroupSnapshot): void {
    const seen = new Map<number, string>();
    const names = new Set<string>();
    for (const g of snapshot.groups) {
      if (!isValidGroupName(g.name)) {
        throw new RangeError(`invalid group name "${g.name}"`);
      }
      if (names.has(g.name)) {
        throw new RangeError(`duplicate group name "${g.name}"`);
      }
      names.add(g.name);
      for (const id of g.padIds) {
        const other = seen.get(id);
        if (other !== undefined) {
          throw new RangeError(`pad ${id} is in groups "${other}" and "${g.name}"`);
        }
        seen.set(id, g.name);
      }
    }

    this.clear();
    for (const g of snapshot.groups) {
      if (!g.padIds.length) continue;
      this.insertGroup(g.name, new Set(g.padIds), g.thickness, new Date(g.createdAt.getTime()));
    }

    this.log.info({ groups: this.groupsByName.size }, "groups loaded");
  }

  /**
   * Consistency check between the group table and the pad index. Returns
   * a description per violation, empty when consistent.
   */
  checkInvariants(): string[] {
    const issues: string[] = [];
    const owners = new Map<number, string>();

    for (const group of this.groupsByName.values()) {
      if (group.padIds.size === 0) {
        issues.push(`group "${group.name}" is empty`);
      }
      for (const id of group.padIds) {
        const other = owners.get(id);
        if (other !== undefined) {
          issues.push(`pad ${id} is in "${other}" and "${group.name}"`);
        }
        owners.set(id, group.name);
        if (this.padToGroup.get(id) !== group.name) {
          issues.push(`index for pad ${id} does not point to "${group.name}"`);
        }
      }
    }

    for (const [id, name] of this.padToGroup) {
      if (owners.get(id) !== name) {
        issues.push(`index entry for pad ${id} points to "${name}" which does not hold it`);
      }
    }

    return issues;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private overrideOf(padId: number): number | undefined {
    const name = this.padToGroup.get(padId);
    if (name === undefined) return undefined;
    return this.groupsByName.get(name)?.thickness;
  }

  private overridesOf(padIds: Iterable<number>): Map<number, number | undefined> {
    const out = new Map<number, number | undefined>();
    for (const id of padIds) out.set(id, this.overrideOf(id));
    return out;
  }

  private changedSince(before: Map<number, number | undefined>): ReadonlySet<number> {
    const changed = new Set<number>();
    for (const [id, old] of before) {
      if (this.overrideOf(id) !== old) changed.add(id);
    }
    return changed;
  }

  private capturePrior(padIds: Iterable<number>): Map<number, PriorState> {
    const prior = new Map<number, PriorState>();
    for (const id of padIds) {
      const name = this.padToGroup.get(id);
      if (name === undefined) continue;
      const group = this.groupsByName.get(name);
      if (!group) continue;
      prior.set(id, {
        groupName: group.name,
        thickness: group.thickness,
        createdAt: group.createdAt,
      });
    }
    return prior;
  }

  private detachAll(padIds: Iterable<number>): void {
    for (const id of padIds) {
      const name = this.padToGroup.get(id);
      if (name === undefined) continue;
      this.padToGroup.delete(id);

      const group = this.groupsByName.get(name);
      if (!group) continue;
      group.padIds.delete(id);
      if (group.padIds.size === 0) {
        this.groupsByName.delete(name);
      }
    }
  }

  /**
   * Put pads back into the groups they were in. A group that still exists
   * with the same thickness takes them back; a vanished group is recreated
   * under its old name and creation time.
   */
  private restorePrior(prior: ReadonlyMap<number, PriorState>): void {
    const byGroup = new Map<string, { state: PriorState; ids: Set<number> }>();
    for (const [id, state] of prior) {
      let bucket = byGroup.get(state.groupName);
      if (!bucket) {
        bucket = { state, ids: new Set() };
        byGroup.set(state.groupName, bucket);
      }
      bucket.ids.add(id);
    }

    for (const { state, ids } of byGroup.values()) {
      const existing = this.groupsByName.get(state.groupName);
      if (!existing) {
        this.insertGroup(state.groupName, ids, state.thickness, state.createdAt);
      } else if (existing.thickness === state.thickness) {
        for (const id of ids) {
          existing.padIds.add(id);
          this.padToGroup.set(id, existing.name);
        }
      } else {
        this.insertGroup(this.generateName(), ids, state.thickness, state.createdAt);
      }
    }
  }

  private insertGroup(
    name: string,
    padIds: Set<number>,
    thickness: number,
    createdAt: Date
  ): void {
    this.groupsByName.set(name, { name, padIds, thickness, createdAt });
    for (const id of padIds) {
      this.padToGroup.set(id, name);
    }
  }

  private generateName(): string {
    let name: string;
    do {
      this.nameCounter += 1;
      name = `group-${this.nameCounter}`;
    } while (this.groupsByName.has(name));
    return name;
  }
}

function toView(group: GroupEntry): ThicknessGroup {
  return {
    name: group.name,
    padIds: new Set(group.padIds),
    thickness: group.thickness,
    createdAt: new Date(group.createdAt.getTime()),
  };
}
