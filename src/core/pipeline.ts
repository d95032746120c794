// src/core/pipeline.ts

import { unzipGerbersZip, type ZipInput } from "../io/unzip";
import { classifyFiles, isPasteRole, type LayerRole } from "../io/file-classifier";
import { normalizeGerberText } from "../io/file-normalizer";
import { readGerberFile } from "../io/read-file";
import { parseGerber, type GerberParseResult } from "../parse/gerber-parser";
import { summarizeVolumes, type VolumeSummary } from "../volume/volume-calculator";
import type { AnalyzeOptions, LoadFromZipOptions } from "../types/options";
import { componentLogger } from "./logger";

/**
 * Result for a single Gerber layer: the parsed pads with the problems
 * found on the way, and the volume totals at the time of analysis.
 */
export interface LayerAnalysis {
  name: string;
  role: LayerRole | null;
  parse: GerberParseResult;
  summary: VolumeSummary;
}

/**
 * Analyze Gerber text that is already in memory.
 */
export function analyzeGerberText(
  name: string,
  text: string,
  options: AnalyzeOptions = {},
  role: LayerRole | null = null
): LayerAnalysis {
  const log = componentLogger("pipeline", options.logger).child({ file: name });

  const parse = parseGerber(normalizeGerberText(text), { ...options, logger: log });
  const summary = summarizeVolumes(parse.pads, options.overrides);

  log.info(
    { pads: parse.pads.length, problems: parse.problemCount, volume: summary.totalVolume },
    "layer analyzed"
  );

  return { name, role, parse, summary };
}

/**
 * Read and analyze a Gerber file from disk. Throws GerberReadError before
 * any parsing when the file cannot be read.
 */
export async function analyzeGerberFile(
  path: string,
  options: AnalyzeOptions = {}
): Promise<LayerAnalysis> {
  const text = await readGerberFile(path);
  return analyzeGerberText(path, text, options);
}

/**
 * Analyze the paste layers of a zipped Gerber set. Layers are independent
 * and parsed concurrently.
 */
export async function analyzePasteLayersFromZip(
  input: ZipInput,
  options: LoadFromZipOptions = {}
): Promise<LayerAnalysis[]> {
  const log = componentLogger("pipeline", options.logger);
  const entries = await unzipGerbersZip(input);
  const classified = classifyFiles(entries, options.layerHints);

  const selected = classified.gerbers.filter(
    (g) =>
      isPasteRole(g.role) ||
      (options.includeCopper === true && (g.role === "top_copper" || g.role === "bottom_copper"))
  );

  log.info(
    { entries: entries.length, layers: selected.map((g) => g.name) },
    "selected layers from archive"
  );

  return Promise.all(
    selected.map(async (g) => analyzeGerberText(g.name, await g.getText(), options, g.role))
  );
}

/**
 * One line status for display next to the pad table. Pad and problem
 * counts are always shown together.
 */
export function formatAnalysisStatus(analysis: LayerAnalysis, fractionDigits = 3): string {
  const parts = [
    `${analysis.name}`,
    `pads ${analysis.parse.pads.length}`,
    `problems ${analysis.parse.problemCount}`,
    `total volume ${analysis.summary.totalVolume.toFixed(fractionDigits)}`,
  ];
  if (!analysis.parse.format) parts.push("no format statement");
  if (!analysis.parse.complete) parts.push("incomplete");
  return parts.join(" | ");
}
