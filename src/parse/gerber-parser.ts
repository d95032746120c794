// src/parse/gerber-parser.ts

import type { LengthUnit, Pad, PadGeometry, Vec2 } from "../types/pad-model";
import type { ParseOptions } from "../types/options";
import {
  createApertureTable,
  defineAperture,
  MIN_APERTURE_ID,
  parseApertureDefinition,
  type Aperture,
  type ApertureTable,
} from "./aperture-table";
import { makeCircle, makeRectangle, shapeArea, shapeExtents } from "../geometry/shapes";
import { DEFAULT_COORDINATE_SCALE, DEFAULT_THICKNESS_MM } from "../geometry/constants";
import { componentLogger } from "../core/logger";

/**
 * Coordinate format from a %FS statement.
 */
export interface FormatSpec {
  zeroOmission: "leading" | "trailing";
  xInteger: number;
  xDecimal: number;
  yInteger: number;
  yDecimal: number;
}

export type ProblemKind =
  | "malformed"
  | "unsupported"
  | "no-aperture"
  | "unknown-aperture"
  | "degenerate-pad";

export interface ParseProblem {
  /** 1-based line number */
  line: number;
  /** Trimmed line content */
  text: string;
  kind: ProblemKind;
  message: string;
}

/**
 * Interpreter state threaded through `stepCommand`. Never mutated; each
 * step returns a new state.
 */
export interface InterpreterState {
  readonly format: FormatSpec | null;
  readonly units: LengthUnit | null;

  /** Cursor, in file units after scaling */
  readonly x: number;
  readonly y: number;

  readonly apertureId: number | null;
  readonly apertures: ApertureTable;

  readonly nextPadId: number;
  readonly defaultThickness: number;

  /** %AM macro block being collected across lines */
  readonly pendingBlock: { text: string; line: number } | null;
}

export interface StepOutcome {
  state: InterpreterState;
  pad?: Pad;
  problems: ParseProblem[];
}

export interface GerberParseResult {
  pads: readonly Pad[];
  problems: ParseProblem[];
  problemCount: number;
  /** Number of lines in the input, blank ones included */
  lineCount: number;
  /** null when the file never declared a format; coordinates are then unscaled */
  format: FormatSpec | null;
  units: LengthUnit | null;
  /** false when the parse was cancelled */
  complete: boolean;
}

// Parameter blocks we recognize but have no use for
const IGNORED_PARAMETERS = [
  "TF", "TA", "TO", "TD", "LP", "IP", "OF", "SF", "IN", "LN", "AS", "IR", "MI",
  "LM", "LR", "LS",
];

// Standalone G codes that only affect features we do not interpret
const IGNORED_G_CODES = new Set([1, 2, 3, 36, 37, 54, 55, 70, 71, 74, 75, 90]);

const FS_RE = /^FS([LTD])?([AI])X(\d)(\d)Y(\d)(\d)$/;
const SR_RE = /^SR(?:X(\d+)Y(\d+)(?:I[\d.]+J[\d.]+)?)?$/;
const SELECT_RE = /^(?:G54)?D0*(\d+)$/;
const COORD_RE = /^(?:G0?([123]))?((?:[XYIJ][+-]?\d+)+)(?:D0*(\d+))?$/;
const COORD_WORD_RE = /([XYIJ])([+-]?\d+)/g;

export function createInterpreterState(
  defaultThickness: number = DEFAULT_THICKNESS_MM
): InterpreterState {
  return {
    format: null,
    units: null,
    x: 0,
    y: 0,
    apertureId: null,
    apertures: createApertureTable(),
    nextPadId: 1,
    defaultThickness,
    pendingBlock: null,
  };
}

/**
 * Parse a Gerber layer into flashed pads.
 *
 * Only the subset needed to recover pads is interpreted:
 * - %FS (absolute notation), %MO
 * - %AD for circular (C) and rectangular (R) apertures
 * - aperture select, D01 (draw), D02 (move), D03 (flash)
 *
 * Every other line is either ignored or recorded as a problem; a bad line
 * never stops the parse.
 */
export function parseGerber(
  content: string,
  options: ParseOptions = {}
): GerberParseResult {
  const log = componentLogger("gerber-parser", options.logger);
  const lines = content.split(/\r?\n/);

  let state = createInterpreterState(options.defaultThickness ?? DEFAULT_THICKNESS_MM);
  const pads: Pad[] = [];
  const problems: ParseProblem[] = [];
  let complete = true;

  for (let i = 0; i < lines.length; i++) {
    if (options.signal?.aborted) {
      log.warn({ line: i + 1, pads: pads.length }, "parse cancelled");
      complete = false;
      break;
    }

    const previousFormat = state.format;
    const outcome = stepCommand(state, lines[i], i + 1);
    state = outcome.state;

    if (state.format !== previousFormat && state.format) {
      if (previousFormat) {
        log.warn({ line: i + 1 }, "format statement redefined");
      }
      log.info({ line: i + 1, format: state.format }, "format set");
    }

    if (outcome.pad) {
      pads.push(outcome.pad);
      log.debug(
        { line: i + 1, pad: outcome.pad.id, shape: outcome.pad.shape, position: outcome.pad.position },
        "pad created"
      );
    }

    for (const problem of outcome.problems) {
      problems.push(problem);
      log.warn({ line: problem.line, text: problem.text, kind: problem.kind }, problem.message);
    }
  }

  if (complete && state.pendingBlock) {
    const problem = unterminatedBlock(state.pendingBlock);
    problems.push(problem);
    log.warn({ line: problem.line }, problem.message);
  }

  if (!state.format && pads.length > 0) {
    log.warn("no format statement, coordinates were not scaled");
  }

  log.info(
    { pads: pads.length, problems: problems.length, lines: lines.length, complete },
    "parse finished"
  );

  return {
    pads,
    problems,
    problemCount: problems.length,
    lineCount: lines.length,
    format: state.format,
    units: state.units,
    complete,
  };
}

/**
 * Interpret a single line. Pure: returns the next state plus the pad and
 * problems the line produced.
 */
export function stepCommand(
  state: InterpreterState,
  rawLine: string,
  lineNumber: number
): StepOutcome {
  const line = rawLine.trim();

  if (state.pendingBlock) {
    const pending = state.pendingBlock;
    // a new parameter statement cannot belong to an open macro
    if (line.startsWith("%") && line !== "%") {
      const outcome = stepCommand({ ...state, pendingBlock: null }, rawLine, lineNumber);
      return { ...outcome, problems: [unterminatedBlock(pending), ...outcome.problems] };
    }
    const text = pending.text + line;
    if (!line.endsWith("%")) {
      return { state: { ...state, pendingBlock: { text, line: pending.line } }, problems: [] };
    }
    return handleParameterBlock({ ...state, pendingBlock: null }, text, pending.line);
  }

  if (!line) return { state, problems: [] };

  if (line.startsWith("%")) {
    if (line.length > 1 && line.endsWith("%")) {
      return handleParameterBlock(state, line, lineNumber);
    }
    // only aperture macros span several lines
    if (line.startsWith("%AM")) {
      return {
        state: { ...state, pendingBlock: { text: line, line: lineNumber } },
        problems: [],
      };
    }
    return { state, problems: [unterminatedBlock({ text: line, line: lineNumber })] };
  }

  return handleCommandLine(state, line, lineNumber);
}

function unterminatedBlock(block: { text: string; line: number }): ParseProblem {
  return {
    line: block.line,
    text: block.text,
    kind: "malformed",
    message: "unterminated parameter block",
  };
}

/**
 * Handle parameter blocks like:
 * - %FSLAX34Y34*%
 * - %MOMM*%
 * - %ADD10C,0.300*%
 * - %FSLAX26Y26*MOMM*%   (several statements in one block)
 */
function handleParameterBlock(
  state: InterpreterState,
  block: string,
  lineNumber: number
): StepOutcome {
  let body = block.slice(1, -1);
  if (body.endsWith("*")) body = body.slice(0, -1);

  // Macro bodies are not interpreted
  if (body.startsWith("AM")) return { state, problems: [] };

  const problems: ParseProblem[] = [];
  const problem = (kind: ProblemKind, message: string) =>
    problems.push({ line: lineNumber, text: block, kind, message });

  let next = state;
  for (const statement of body.split("*")) {
    const stmt = statement.trim();
    if (!stmt) continue;

    if (stmt.startsWith("FS")) {
      const m = FS_RE.exec(stmt);
      if (!m) {
        problem("malformed", "could not parse format statement");
        continue;
      }
      if (m[2] === "I") {
        problem("unsupported", "incremental coordinate notation is not supported");
        continue;
      }
      next = {
        ...next,
        format: {
          zeroOmission: m[1] === "T" ? "trailing" : "leading",
          xInteger: parseInt(m[3], 10),
          xDecimal: parseInt(m[4], 10),
          yInteger: parseInt(m[5], 10),
          yDecimal: parseInt(m[6], 10),
        },
      };
      continue;
    }

    if (stmt.startsWith("MO")) {
      if (stmt === "MOMM") {
        next = { ...next, units: "mm" };
      } else if (stmt === "MOIN") {
        next = { ...next, units: "in" };
      } else {
        problem("malformed", "could not parse unit statement");
      }
      continue;
    }

    if (stmt.startsWith("AD")) {
      const res = parseApertureDefinition(stmt);
      if (res.ok) {
        next = { ...next, apertures: defineAperture(next.apertures, res.aperture) };
      } else {
        problem(res.reason, res.message);
      }
      continue;
    }

    if (stmt.startsWith("SR")) {
      const m = SR_RE.exec(stmt);
      if (!m) {
        problem("malformed", "could not parse step and repeat statement");
      } else if (m[1] !== undefined && (parseInt(m[1], 10) > 1 || parseInt(m[2], 10) > 1)) {
        problem("unsupported", "step and repeat is not supported, pads are not repeated");
      }
      continue;
    }

    if (IGNORED_PARAMETERS.some((p) => stmt.startsWith(p))) continue;

    problem("malformed", `unrecognized parameter ${stmt.slice(0, 2)}`);
  }

  return { state: next, problems };
}

/**
 * Handle normal command lines:
 * - G04 comments, M02, standalone G codes
 * - aperture select, D10 or G54D10
 * - coordinate data with optional D01 / D02 / D03
 */
function handleCommandLine(
  state: InterpreterState,
  rawLine: string,
  lineNumber: number
): StepOutcome {
  const malformed = (message: string): StepOutcome => ({
    state,
    problems: [{ line: lineNumber, text: rawLine, kind: "malformed", message }],
  });

  if (rawLine.startsWith("G04")) return { state, problems: [] };

  let line = rawLine;
  if (line.endsWith("*")) line = line.slice(0, -1);

  if (/^M0?[012]$/.test(line)) return { state, problems: [] };

  const gOnly = /^G(\d{1,2})$/.exec(line);
  if (gOnly) {
    const g = parseInt(gOnly[1], 10);
    if (g === 91) {
      return {
        state,
        problems: [
          {
            line: lineNumber,
            text: rawLine,
            kind: "unsupported",
            message: "incremental coordinates are not supported",
          },
        ],
      };
    }
    if (IGNORED_G_CODES.has(g)) return { state, problems: [] };
    return malformed(`unknown G code G${gOnly[1]}`);
  }

  const select = SELECT_RE.exec(line);
  if (select) {
    const code = parseInt(select[1], 10);
    if (code >= MIN_APERTURE_ID) {
      return { state: { ...state, apertureId: code }, problems: [] };
    }
    if (code === 3) return flash(state, lineNumber, rawLine);
    if (code === 1 || code === 2) return { state, problems: [] };
    return malformed(`reserved D code D${select[1]}`);
  }

  const coord = COORD_RE.exec(line);
  if (!coord) return malformed("unrecognized command");

  const dCode = coord[3] === undefined ? null : parseInt(coord[3], 10);
  if (dCode !== null && (dCode < 1 || dCode > 3)) {
    return malformed(`unexpected D code D${coord[3]} after coordinates`);
  }

  let x = state.x;
  let y = state.y;
  for (const word of coord[2].matchAll(COORD_WORD_RE)) {
    if (word[1] === "X") x = decodeCoord(word[2], "x", state.format);
    else if (word[1] === "Y") y = decodeCoord(word[2], "y", state.format);
    // I/J arc offsets are not needed for pads
  }

  const moved: InterpreterState = { ...state, x, y };
  if (dCode === 3) return flash(moved, lineNumber, rawLine);
  return { state: moved, problems: [] };
}

/**
 * Stamp a pad at the cursor with the selected aperture.
 */
function flash(
  state: InterpreterState,
  lineNumber: number,
  text: string
): StepOutcome {
  const reject = (kind: ProblemKind, message: string): StepOutcome => ({
    state,
    problems: [{ line: lineNumber, text, kind, message }],
  });

  if (state.apertureId === null) {
    return reject("no-aperture", "flash without a selected aperture");
  }

  const aperture = state.apertures.get(state.apertureId);
  if (!aperture) {
    return reject("unknown-aperture", `flash with undefined aperture D${state.apertureId}`);
  }

  const position: Vec2 = { x: state.x, y: state.y };
  const geometry = apertureGeometry(aperture, position);
  if (!geometry) {
    return reject("degenerate-pad", `aperture D${aperture.id} has a non-positive size`);
  }

  const area = shapeArea(geometry);
  if (!(area > 0)) {
    return reject("degenerate-pad", `pad area ${area} is not positive`);
  }

  const { length, width } = shapeExtents(geometry);
  const pad: Pad = Object.freeze({
    id: state.nextPadId,
    shape: geometry.kind,
    position: Object.freeze(position),
    geometry: freezeGeometry(geometry),
    area,
    defaultThickness: state.defaultThickness,
    defaultVolume: area * state.defaultThickness,
    length,
    width,
    apertureId: aperture.id,
    line: lineNumber,
  });

  return {
    state: { ...state, nextPadId: state.nextPadId + 1 },
    pad,
    problems: [],
  };
}

function freezeGeometry(geometry: PadGeometry): PadGeometry {
  if (geometry.kind === "circle") Object.freeze(geometry.center);
  return Object.freeze(geometry);
}

function apertureGeometry(aperture: Aperture, position: Vec2): PadGeometry | null {
  if (aperture.kind === "circle") {
    if (!(aperture.size > 0)) return null;
    return makeCircle(position, aperture.size / 2);
  }

  const width = aperture.size;
  const height = aperture.secondarySize ?? aperture.size;
  if (!(width > 0) || !(height > 0)) return null;
  return makeRectangle(position, width, height);
}

/**
 * Decode an integer coordinate using the FS format.
 * Example:
 *   xDecimal = 3, leading zero omission
 *   "7550" -> 7.55
 * With trailing zero omission the digits are right padded to the full
 * width first: FSTAX24, "15" -> "150000" -> 15.0
 */
export function decodeCoord(
  numStr: string,
  axis: "x" | "y",
  format: FormatSpec | null
): number {
  const sign = numStr.startsWith("-") ? -1 : 1;
  let digits = numStr.replace(/[+\-]/g, "");

  if (!format) {
    return sign * parseInt(digits, 10) * DEFAULT_COORDINATE_SCALE;
  }

  const intDigits = axis === "x" ? format.xInteger : format.yInteger;
  const decDigits = axis === "x" ? format.xDecimal : format.yDecimal;

  if (format.zeroOmission === "trailing") {
    digits = digits.padEnd(intDigits + decDigits, "0");
  }

  const n = parseInt(digits, 10);
  return (sign * n) / Math.pow(10, decDigits);
}
