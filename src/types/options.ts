// src/types/options.ts
import type { Logger } from "pino";
import type { LayerHints } from "../io/file-classifier";
import type { ThicknessOverrides } from "../volume/volume-calculator";

export interface ParseOptions {
  /**
   * Thickness assigned to every new pad, in the file's length unit.
   * Defaults to 0.15 (150 µm in mm).
   */
  defaultThickness?: number;

  /**
   * Checked between lines. When aborted, the parse stops and returns the
   * pads produced so far with `complete: false`.
   */
  signal?: AbortSignal;

  /**
   * Logger to use instead of the library's root logger.
   */
  logger?: Logger;
}

export interface AnalyzeOptions extends ParseOptions {
  /**
   * Thickness overrides applied when computing volumes, usually a
   * ThicknessManager.
   */
  overrides?: ThicknessOverrides;
}

export interface LoadFromZipOptions extends AnalyzeOptions {
  /**
   * Optional hints to override layer role detection based on filenames.
   */
  layerHints?: LayerHints;

  /**
   * Also analyze copper layers, not only paste layers.
   */
  includeCopper?: boolean;
}
