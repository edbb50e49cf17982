export const MAX_ROWS = 1_048_576;
export const MAX_COLUMNS = 16_384; // XFD
export const MAX_RANGE_CELLS = 100_000;

export interface CellAddress {
  row: number; // 1-based
  col: number; // 1-based
}

export interface RangeAddress {
  startRow: number;
  startCol: number;
  endRow: number;
  endCol: number;
}

// Support absolute references (e.g. $A$1) by allowing optional `$` markers.
const CELL_RE = /^\$?([A-Z]+)\$?([1-9]\d*)$/i;

export function columnLabelToIndex(label: string): number {
  const normalized = label.trim().toUpperCase();
  if (!/^[A-Z]+$/.test(normalized)) {
    throw new Error(`Invalid column label: ${label}`);
  }

  let value = 0;
  for (const char of normalized) {
    value = value * 26 + (char.charCodeAt(0) - 64);
  }
  return value;
}

export function columnIndexToLabel(index: number): string {
  if (!Number.isInteger(index) || index <= 0) {
    throw new Error(`Invalid column index: ${index}`);
  }

  let value = index;
  let label = '';
  while (value > 0) {
    const remainder = (value - 1) % 26;
    label = String.fromCharCode(65 + remainder) + label;
    value = Math.floor((value - 1) / 26);
  }

  return label;
}

export function parseA1Cell(input: string): CellAddress {
  const match = CELL_RE.exec(input.trim());
  if (!match) {
    throw new Error(`Invalid cell reference: "${input}"`);
  }

  const col = columnLabelToIndex(match[1]);
  const row = Number(match[2]);
  if (row > MAX_ROWS || col > MAX_COLUMNS) {
    throw new Error(`Cell reference out of sheet bounds: "${input}"`);
  }

  return { row, col };
}

export function formatA1Cell(address: CellAddress): string {
  return `${columnIndexToLabel(address.col)}${address.row}`;
}

/**
 * Parses "K4:K6" (or a single cell "L178"). Reversed corners are normalized.
 */
export function parseA1Range(input: string): RangeAddress {
  const parts = input.split(':');
  if (parts.length > 2) {
    throw new Error(`Invalid range reference: "${input}"`);
  }
  const start = parseA1Cell(parts[0]);
  const end = parts.length === 2 ? parseA1Cell(parts[1]) : start;

  return {
    startRow: Math.min(start.row, end.row),
    startCol: Math.min(start.col, end.col),
    endRow: Math.max(start.row, end.row),
    endCol: Math.max(start.col, end.col)
  };
}

export function rangeSize(range: RangeAddress): number {
  return (range.endRow - range.startRow + 1) * (range.endCol - range.startCol + 1);
}

/**
 * All coordinates of a range, rows top to bottom, columns left to right
 */
export function expandRange(range: RangeAddress): string[] {
  const size = rangeSize(range);
  if (size > MAX_RANGE_CELLS) {
    throw new Error(`Range spans ${size} cells, more than ${MAX_RANGE_CELLS}`);
  }
  const addresses: string[] = [];
  for (let row = range.startRow; row <= range.endRow; row++) {
    for (let col = range.startCol; col <= range.endCol; col++) {
      addresses.push(formatA1Cell({ row, col }));
    }
  }
  return addresses;
}

/**
 * Orders A1 coordinates row-major
 */
export function compareA1(a: string, b: string): number {
  const left = parseA1Cell(a);
  const right = parseA1Cell(b);
  return left.row - right.row || left.col - right.col;
}
