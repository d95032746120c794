// src/io/file-normalizer.ts

const BOM = 0xfeff;

/**
 * Prepare raw Gerber text for the interpreter: drop a UTF-8 BOM and the
 * NUL padding some CAM tools append, use "\n" line endings and trim blank
 * lines at both ends. Line numbers in problems refer to the trimmed text.
 */
export function normalizeGerberText(raw: string): string {
  let text = raw.charCodeAt(0) === BOM ? raw.slice(1) : raw;
  text = text.replace(/\u0000+$/, "").replace(/\r\n?/g, "\n");

  const lines = text.split("\n");
  const first = lines.findIndex((l) => l.trim() !== "");
  if (first === -1) return "";

  let last = lines.length - 1;
  while (lines[last].trim() === "") last--;

  return first === 0 && last === lines.length - 1
    ? text
    : lines.slice(first, last + 1).join("\n");
}
