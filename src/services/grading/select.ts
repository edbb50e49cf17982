import type { Cell, Selection, Sheet } from '../../types';
import { compareA1, expandRange, formatA1Cell, parseA1Cell, parseA1Range } from '../../utils/a1';
import { errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';

export type SelectedUnit =
  | { kind: 'cell'; address: string }
  | { kind: 'skipped'; unit: string; reason: string };

function skip(unit: string, error: unknown): SelectedUnit {
  const reason = errorMessage(error);
  logger.warn(`Skipping ${unit}: ${reason}`);
  return { kind: 'skipped', unit, reason };
}

export function hasBorder(cell: Cell): boolean {
  const border = cell.border;
  if (!border) {
    return false;
  }
  return [border.top, border.bottom, border.left, border.right]
    .some(style => !!style && style !== 'none');
}

/**
 * Cells of the solution sheet that carry a border on any edge, row-major
 */
export function getBorderedCells(sheet: Sheet): string[] {
  return sheet.cells()
    .filter(entry => hasBorder(entry.cell))
    .map(entry => entry.address)
    .sort(compareA1);
}

/**
 * Resolves a selection to the coordinates to grade. Student and solution are read at the same
 * coordinates. Ranges or coordinates that cannot be resolved come back as skipped units.
 */
export function selectUnits(selection: Selection, solutionSheet: Sheet): SelectedUnit[] {
  switch (selection.kind) {
    case 'ranges': {
      const units: SelectedUnit[] = [];
      for (const range of selection.ranges) {
        try {
          for (const address of expandRange(parseA1Range(range))) {
            units.push({ kind: 'cell', address });
          }
        } catch (error) {
          units.push(skip(`range ${range}`, error));
        }
      }
      return units;
    }
    case 'cells':
      return selection.cells.map((address): SelectedUnit => {
        try {
          return { kind: 'cell', address: formatA1Cell(parseA1Cell(address)) };
        } catch (error) {
          return skip(`cell ${address}`, error);
        }
      });
    case 'bordered':
      try {
        return getBorderedCells(solutionSheet).map((address): SelectedUnit => ({ kind: 'cell', address }));
      } catch (error) {
        return [skip(`bordered cells of ${solutionSheet.name}`, error)];
      }
  }
}
