// src/parse/aperture-table.ts

export type ApertureKind = "circle" | "rectangle";

/**
 * Aperture template. Sizes are in file units, exactly as written in the
 * %AD statement.
 */
export interface Aperture {
  id: number;
  kind: ApertureKind;
  /** Diameter for circles, width (X) for rectangles */
  size: number;
  /** Rectangle height (Y); missing means square */
  secondarySize?: number;
}

export type ApertureTable = ReadonlyMap<number, Aperture>;

export type ApertureDefinitionResult =
  | { ok: true; aperture: Aperture }
  | { ok: false; reason: "malformed" | "unsupported"; message: string };

const STANDARD_UNSUPPORTED = new Set(["O", "P"]);

/** D00-D09 are operation codes */
export const MIN_APERTURE_ID = 10;

const AD_RE = /^ADD(\d+)([A-Za-z_$][A-Za-z0-9_.$]*)(?:,(.*))?$/;
const NUMBER_RE = /^(?:\d+\.?\d*|\.\d+)$/;

export function createApertureTable(): ApertureTable {
  return new Map();
}

/**
 * Returns a new table with `aperture` stored under its id. An existing
 * definition with the same id is replaced.
 */
export function defineAperture(
  table: ApertureTable,
  aperture: Aperture
): ApertureTable {
  const next = new Map(table);
  next.set(aperture.id, aperture);
  return next;
}

/**
 * Parse the body of an aperture definition, without the surrounding
 * percent signs and trailing "*", for example:
 * - ADD10C,0.254
 * - ADD11R,0.6X0.3
 * - ADD12C,0.5X0.2   (hole size ignored)
 */
export function parseApertureDefinition(body: string): ApertureDefinitionResult {
  const m = AD_RE.exec(body);
  if (!m) {
    return { ok: false, reason: "malformed", message: "unrecognized aperture definition" };
  }

  const id = parseInt(m[1], 10);
  const template = m[2];
  const rawParams = m[3];

  if (id < MIN_APERTURE_ID) {
    return { ok: false, reason: "malformed", message: `invalid aperture id ${m[1]}` };
  }

  if (template !== "C" && template !== "R") {
    const what = STANDARD_UNSUPPORTED.has(template)
      ? `aperture shape ${template}`
      : `aperture macro ${template}`;
    return { ok: false, reason: "unsupported", message: `${what} is not supported` };
  }

  if (rawParams === undefined || rawParams === "") {
    return { ok: false, reason: "malformed", message: `aperture ${id} has no size` };
  }

  const parts = rawParams.split(/[Xx]/);
  const values: number[] = [];
  for (const part of parts) {
    const trimmed = part.trim();
    if (!NUMBER_RE.test(trimmed)) {
      return {
        ok: false,
        reason: "malformed",
        message: `aperture ${id} has invalid size "${part}"`,
      };
    }
    values.push(parseFloat(trimmed));
  }

  if (template === "C") {
    // Diameter, optional hole diameter
    if (values.length > 2) {
      return { ok: false, reason: "malformed", message: `too many parameters for circle aperture ${id}` };
    }
    return { ok: true, aperture: { id, kind: "circle", size: values[0] } };
  }

  // Width, optional height, optional hole diameter
  if (values.length > 3) {
    return { ok: false, reason: "malformed", message: `too many parameters for rectangle aperture ${id}` };
  }
  const aperture: Aperture = { id, kind: "rectangle", size: values[0] };
  if (values.length >= 2) {
    aperture.secondarySize = values[1];
  }
  return { ok: true, aperture };
}
