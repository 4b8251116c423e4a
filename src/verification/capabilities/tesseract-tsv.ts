import type { TextRegion } from "../verification.types";

/** Tesseract TSV `level` of a single recognized word. */
const WORD_LEVEL = 5;
const TSV_COLUMNS = 12;

interface LineAccumulator {
  readonly tokens: string[];
  confidenceTotal: number;
  confidenceCount: number;
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

const scaleConfidence = (confidence: number): number =>
  Math.max(0, Math.min(1, confidence / 100));

/**
 * Groups word rows of Tesseract TSV output into line regions keyed by
 * block, paragraph and line. Words reported with confidence -1 carry no
 * score and are left out of the line's mean.
 */
export function parseTsvRegions(tsv: string): TextRegion[] {
  const rows = tsv
    .split(/\r?\n/)
    .filter((row) => row.trim().length > 0);

  if (rows.length <= 1) {
    return [];
  }

  const lines = new Map<string, LineAccumulator>();
  for (const row of rows.slice(1)) {
    const columns = row.split("\t");
    if (columns.length < TSV_COLUMNS) {
      continue;
    }

    const level = Number(columns[0]);
    const token = columns.slice(11).join("\t").trim();
    if (level !== WORD_LEVEL || !token) {
      continue;
    }

    const left = Number(columns[6]);
    const top = Number(columns[7]);
    const right = left + Number(columns[8]);
    const bottom = top + Number(columns[9]);
    const confidence = Number(columns[10]);
    const scored = Number.isFinite(confidence) && confidence >= 0;

    const key = `${columns[2]}-${columns[3]}-${columns[4]}`;
    const line = lines.get(key);
    if (!line) {
      lines.set(key, {
        tokens: [token],
        confidenceTotal: scored ? confidence : 0,
        confidenceCount: scored ? 1 : 0,
        x0: left,
        y0: top,
        x1: right,
        y1: bottom,
      });
      continue;
    }

    line.tokens.push(token);
    if (scored) {
      line.confidenceTotal += confidence;
      line.confidenceCount += 1;
    }
    line.x0 = Math.min(line.x0, left);
    line.y0 = Math.min(line.y0, top);
    line.x1 = Math.max(line.x1, right);
    line.y1 = Math.max(line.y1, bottom);
  }

  return [...lines.values()].map((line) => ({
    text: line.tokens.join(" "),
    confidence:
      line.confidenceCount > 0
        ? scaleConfidence(line.confidenceTotal / line.confidenceCount)
        : 0,
    boundingBox: { x0: line.x0, y0: line.y0, x1: line.x1, y1: line.y1 },
  }));
}
