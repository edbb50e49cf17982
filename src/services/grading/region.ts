import type { GradingRegion, RegionOutcome, Sheet, Tolerance, UnitResult } from '../../types';
import { errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { DEFAULT_TOLERANCE, valuesMatch } from './compare';
import { displayValue, isEmpty, normalizeValue } from './normalize';
import { selectUnits } from './select';

function gradeCell(
  address: string,
  studentSheet: Sheet,
  solutionSheet: Sheet,
  tolerance: Tolerance
): UnitResult {
  const solution = normalizeValue(solutionSheet.getCell(address).value);
  if (isEmpty(solution)) {
    return { status: 'excluded', address };
  }
  const student = normalizeValue(studentSheet.getCell(address).value);

  return {
    status: 'graded',
    address,
    student: displayValue(student),
    solution: displayValue(solution),
    match: valuesMatch(student, solution, tolerance)
  };
}

/**
 * Grades one region. Units that fail to resolve are recorded as skipped and never count
 * toward the total.
 */
export function gradeRegion(
  region: GradingRegion,
  studentSheet: Sheet,
  solutionSheet: Sheet,
  tolerance: Tolerance = DEFAULT_TOLERANCE
): RegionOutcome {
  const units: UnitResult[] = [];

  for (const selection of region.selections) {
    for (const unit of selectUnits(selection, solutionSheet)) {
      if (unit.kind === 'skipped') {
        units.push({ status: 'skipped', unit: unit.unit, reason: unit.reason });
        continue;
      }
      try {
        units.push(gradeCell(unit.address, studentSheet, solutionSheet, tolerance));
      } catch (error) {
        const reason = errorMessage(error);
        logger.warn(`Error processing ${region.name} cell ${unit.address}: ${reason}`);
        units.push({ status: 'skipped', unit: `cell ${unit.address}`, reason });
      }
    }
  }

  let correct = 0;
  let total = 0;
  for (const unit of units) {
    if (unit.status === 'graded') {
      total++;
      if (unit.match) correct++;
    }
  }

  logger.debug(`Region ${region.name}: ${correct}/${total}`);
  return { name: region.name, correct, total, units };
}
