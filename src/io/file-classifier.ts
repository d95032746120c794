// src/io/file-classifier.ts
import type { ZipEntry } from "./unzip";
import { normalizeGerberText } from "./file-normalizer";

export type LayerRole =
  | "top_paste"
  | "bottom_paste"
  | "top_copper"
  | "bottom_copper"
  | "top_mask"
  | "bottom_mask"
  | "top_silk"
  | "bottom_silk"
  | "outline"
  | "unknown";

export interface LayerHint {
  /** Exact base name, or a pattern with "*" wildcards such as "*-F_Paste.gbr" */
  pattern: string;
  role: LayerRole;
}

export interface LayerHints {
  hints: LayerHint[];
}

export interface ClassifiedGerberFile {
  name: string;
  role: LayerRole;
  /** Entry text after normalizeGerberText */
  getText: () => Promise<string>;
}

export interface ClassifiedFiles {
  gerbers: ClassifiedGerberFile[];
  ignored: ZipEntry[];
}

interface RoleRule {
  role: LayerRole;
  /** KiCad style layer tokens */
  tokens: string[];
  /** Protel / Eagle extensions */
  extensions: string[];
  /** Generic "top ... paste" style naming */
  words?: [side: string, layer: string];
}

// Order matters: paste is tested before copper so "top_paste" never reads as "top ... cu".
const ROLE_RULES: RoleRule[] = [
  { role: "top_paste", tokens: ["f_paste"], extensions: [".gtp", ".crc"], words: ["top", "paste"] },
  { role: "bottom_paste", tokens: ["b_paste"], extensions: [".gbp", ".crs"], words: ["bot", "paste"] },
  { role: "top_copper", tokens: ["f_cu"], extensions: [".gtl"], words: ["top", "cu"] },
  { role: "bottom_copper", tokens: ["b_cu"], extensions: [".gbl"], words: ["bot", "cu"] },
  { role: "top_mask", tokens: ["f_mask"], extensions: [".gts"], words: ["top", "mask"] },
  { role: "bottom_mask", tokens: ["b_mask"], extensions: [".gbs"], words: ["bot", "mask"] },
  { role: "top_silk", tokens: ["f_silk"], extensions: [".gto"], words: ["top", "silk"] },
  { role: "bottom_silk", tokens: ["b_silk"], extensions: [".gbo"], words: ["bot", "silk"] },
  { role: "outline", tokens: ["edge_cuts", "outline"], extensions: [".gm1", ".gko"] },
];

const GENERIC_GERBER_EXTENSIONS = [".gbr", ".gbx", ".ger", ".pho", ".art"];

/**
 * Split archive entries into Gerber layers and everything else (drill
 * files, readme, fabrication notes). An entry with no recognised role is
 * still kept when its extension says Gerber.
 */
export function classifyFiles(entries: ZipEntry[], hints?: LayerHints): ClassifiedFiles {
  const result: ClassifiedFiles = { gerbers: [], ignored: [] };

  for (const entry of entries) {
    const role = classifyLayerRole(entry.name, hints);
    if (role === "unknown" && !hasGerberExtension(entry.name.toLowerCase())) {
      result.ignored.push(entry);
      continue;
    }
    result.gerbers.push({
      name: entry.name,
      role,
      getText: async () => normalizeGerberText(await entry.text()),
    });
  }

  return result;
}

export function isPasteRole(role: LayerRole): boolean {
  return role === "top_paste" || role === "bottom_paste";
}

/**
 * Role of a file from its base name. Hints are tried first, in order.
 */
export function classifyLayerRole(name: string, hints?: LayerHints): LayerRole {
  const baseName = name.slice(name.lastIndexOf("/") + 1) || name;

  const hinted = hints?.hints.find((h) => matchesPattern(baseName, h.pattern));
  if (hinted) return hinted.role;

  const lower = baseName.toLowerCase();
  const rule = ROLE_RULES.find(
    (r) =>
      r.tokens.some((t) => lower.includes(t)) ||
      r.extensions.some((ext) => lower.endsWith(ext)) ||
      (r.words !== undefined && lower.includes(r.words[0]) && lower.includes(r.words[1]))
  );
  return rule ? rule.role : "unknown";
}

function hasGerberExtension(lowerName: string): boolean {
  return (
    GENERIC_GERBER_EXTENSIONS.some((ext) => lowerName.endsWith(ext)) ||
    ROLE_RULES.some((r) => r.extensions.some((ext) => lowerName.endsWith(ext)))
  );
}

// "*" matches any run of characters; without one the match is exact.
function matchesPattern(name: string, pattern: string): boolean {
  if (!pattern.includes("*")) return name === pattern;
  const source = pattern
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${source}$`).test(name);
}
