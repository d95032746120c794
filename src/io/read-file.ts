// src/io/read-file.ts
import { readFile } from "node:fs/promises";
import { GerberReadError } from "../core/errors";
import { normalizeGerberText } from "./file-normalizer";

/**
 * Read a Gerber file from disk as normalized text. A missing or unreadable
 * file raises GerberReadError; nothing is parsed in that case.
 */
export async function readGerberFile(path: string): Promise<string> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (err) {
    const code = err instanceof Error && "code" in err ? String(err.code) : undefined;
    const reason = code === "ENOENT" ? "file not found" : "file could not be read";
    throw new GerberReadError(path, `${reason}: ${path}`, { cause: err });
  }
  return normalizeGerberText(raw);
}
