// src/index.ts

export {
  analyzeGerberText,
  analyzeGerberFile,
  analyzePasteLayersFromZip,
  formatAnalysisStatus,
  type LayerAnalysis,
} from "./core/pipeline";
export { GerberReadError, ThicknessFileError, VolumeInputError } from "./core/errors";
export { logger, componentLogger, type Logger } from "./core/logger";

export {
  parseGerber,
  stepCommand,
  createInterpreterState,
  decodeCoord,
  type FormatSpec,
  type GerberParseResult,
  type InterpreterState,
  type ParseProblem,
  type ProblemKind,
  type StepOutcome,
} from "./parse/gerber-parser";
export {
  createApertureTable,
  defineAperture,
  parseApertureDefinition,
  type Aperture,
  type ApertureKind,
  type ApertureTable,
} from "./parse/aperture-table";

export {
  ThicknessManager,
  RESET_TO_DEFAULT,
  isValidGroupName,
  type GroupRecord,
  type GroupSnapshot,
  type ThicknessChange,
  type ThicknessGroup,
  type ThicknessManagerOptions,
  type ThicknessTarget,
} from "./thickness/thickness-manager";
export {
  serializeGroups,
  parseGroups,
  saveGroupsToFile,
  loadGroupsFromFile,
} from "./thickness/thickness-store";

export {
  effectiveThickness,
  padVolume,
  totalVolume,
  padSummary,
  summarizeVolumes,
  type PadVolumeSummary,
  type ThicknessOverrides,
  type VolumeSummary,
} from "./volume/volume-calculator";

export {
  makeCircle,
  makeRectangle,
  shapeArea,
  shapeExtents,
  boundingBox,
  mergeBoundingBoxes,
} from "./geometry/shapes";
export { padOutline, findOverlappingPads, coveredArea, type PadOverlap } from "./geometry/boolean-ops";
export { DEFAULT_THICKNESS_MM } from "./geometry/constants";

export {
  classifyFiles,
  classifyLayerRole,
  isPasteRole,
  type ClassifiedFiles,
  type ClassifiedGerberFile,
  type LayerHint,
  type LayerHints,
  type LayerRole,
} from "./io/file-classifier";
export { unzipGerbersZip, type ZipEntry, type ZipInput } from "./io/unzip";
export { normalizeGerberText } from "./io/file-normalizer";
export { readGerberFile } from "./io/read-file";

export type * from "./types/pad-model";
export type * from "./types/options";
