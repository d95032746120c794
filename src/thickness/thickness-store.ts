// src/thickness/thickness-store.ts

import { readFile, writeFile } from "node:fs/promises";
import { z } from "zod";
import { ThicknessFileError } from "../core/errors";
import { isValidGroupName, type GroupSnapshot, type ThicknessManager } from "./thickness-manager";

export const GROUP_FILE_VERSION = 1;

const groupEntrySchema = z.object({
  padIds: z.array(z.number().int().positive()),
  thickness: z.number().positive().finite(),
  createdAt: z
    .string()
    .refine((s) => !Number.isNaN(Date.parse(s)), { message: "invalid timestamp" }),
});

const groupFileSchema = z
  .object({
    version: z.literal(GROUP_FILE_VERSION),
    groups: z.record(
      z.string().refine(isValidGroupName, { message: "invalid group name" }),
      groupEntrySchema
    ),
  })
  .superRefine((file, ctx) => {
    const owner = new Map<number, string>();
    for (const [name, group] of Object.entries(file.groups)) {
      for (const id of group.padIds) {
        const other = owner.get(id);
        if (other !== undefined && other !== name) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["groups", name, "padIds"],
            message: `pad ${id} is also in group "${other}"`,
          });
        }
        owner.set(id, name);
      }
    }
  });

export type GroupFile = z.infer<typeof groupFileSchema>;

/**
 * Serialize a group table as pretty printed JSON:
 *
 *   { "version": 1,
 *     "groups": { "<name>": { "padIds": [..], "thickness": n, "createdAt": ISO } } }
 */
export function serializeGroups(snapshot: GroupSnapshot): string {
  const file: GroupFile = {
    version: GROUP_FILE_VERSION,
    groups: Object.fromEntries(
      snapshot.groups.map((g) => [
        g.name,
        {
          padIds: [...g.padIds].sort((a, b) => a - b),
          thickness: g.thickness,
          createdAt: g.createdAt.toISOString(),
        },
      ])
    ),
  };
  return JSON.stringify(file, null, 2) + "\n";
}

export function parseGroups(text: string): GroupSnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ThicknessFileError("group file is not valid JSON", { cause: err });
  }

  const parsed = groupFileSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ThicknessFileError(`invalid group file: ${detail}`, { cause: parsed.error });
  }

  return {
    groups: Object.entries(parsed.data.groups).map(([name, g]) => ({
      name,
      // duplicates within one group collapse
      padIds: [...new Set(g.padIds)].sort((a, b) => a - b),
      thickness: g.thickness,
      createdAt: new Date(g.createdAt),
    })),
  };
}

export async function saveGroupsToFile(
  manager: ThicknessManager,
  path: string
): Promise<void> {
  const text = serializeGroups(manager.toSnapshot());
  try {
    await writeFile(path, text, "utf8");
  } catch (err) {
    throw new ThicknessFileError(`could not write group file ${path}`, { cause: err });
  }
}

/**
 * Replace the manager's groups with the content of `path`. The manager is
 * left untouched when the file cannot be read or validated.
 */
export async function loadGroupsFromFile(
  manager: ThicknessManager,
  path: string
): Promise<GroupSnapshot> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new ThicknessFileError(`could not read group file ${path}`, { cause: err });
  }

  const snapshot = parseGroups(text);
  manager.loadSnapshot(snapshot);
  return snapshot;
}
