import type { AssignmentConfig, GradeReport, RegionOutcome, SpreadsheetDocument, Tolerance } from '../types';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { resolveTolerance } from './grading/compare';
import { NO_CELLS_FEEDBACK, aggregateOutcomes, composeFeedback } from './grading/feedback';
import { gradeRegion } from './grading/region';
import { WorkbookReader } from './workbook-reader';

function failure(status: GradeReport['status'], feedback: string): GradeReport {
  return { score: 0, feedback, matches: 0, totalCells: 0, status, regions: [] };
}

export class WorkbookGrader {
  private readonly tolerance: Tolerance;
  private readonly reader: WorkbookReader;

  constructor(private readonly assignment: AssignmentConfig, reader: WorkbookReader = new WorkbookReader()) {
    this.tolerance = resolveTolerance(assignment.tolerance);
    this.reader = reader;
  }

  /**
   * Student sheets named by the regions, in order of first use
   */
  requiredSheets(): string[] {
    return [...new Set(this.assignment.regions.map(region => region.sheet))];
  }

  /**
   * Grade a student workbook against the solution workbook. Never throws; failures come back as
   * a zero-score report.
   */
  gradeWorkbook(student: SpreadsheetDocument, solution: SpreadsheetDocument): GradeReport {
    try {
      const missing = this.requiredSheets().filter(name => !student.sheetNames.includes(name));
      if (missing.length > 0) {
        logger.warn(`Missing sheets in submission: ${missing.join(', ')}`);
        return failure('missing-sheets', `Missing sheets in submission: ${missing.join(', ')}`);
      }

      const outcomes: RegionOutcome[] = [];
      for (const region of this.assignment.regions) {
        const solutionSheetName = region.solutionSheet ?? region.sheet;
        const solutionSheet = solution.getSheet(solutionSheetName);
        if (!solutionSheet) {
          logger.error(`Solution sheet '${solutionSheetName}' not found`);
          return failure('error', `Internal error: solution sheet '${solutionSheetName}' not found.`);
        }
        const studentSheet = student.getSheet(region.sheet);
        if (!studentSheet) {
          return failure('missing-sheets', `Missing sheets in submission: ${region.sheet}`);
        }
        outcomes.push(gradeRegion(region, studentSheet, solutionSheet, this.tolerance));
      }

      const { correct, total, score } = aggregateOutcomes(outcomes);
      if (total === 0) {
        logger.warn('No cells were evaluated');
        return { ...failure('no-cells', NO_CELLS_FEEDBACK), regions: outcomes };
      }

      logger.info(`Graded ${this.assignment.id}: ${correct}/${total} (score ${score})`);
      return {
        score,
        feedback: composeFeedback(outcomes, this.assignment.feedback),
        matches: correct,
        totalCells: total,
        status: 'graded',
        regions: outcomes
      };
    } catch (error) {
      logger.error(`Error grading submission: ${errorMessage(error)}`);
      return failure('error', `Error grading submission: ${errorMessage(error)}`);
    }
  }

  /**
   * Open both workbook files and grade them
   */
  async gradeFiles(studentPath: string, solutionPath: string): Promise<GradeReport> {
    try {
      const student = await this.reader.open(studentPath);
      const solution = await this.reader.open(solutionPath);
      return this.gradeWorkbook(student, solution);
    } catch (error) {
      logger.error(`Error grading ${studentPath}: ${errorMessage(error)}`);
      return failure('error', `Error grading submission: ${errorMessage(error)}`);
    }
  }
}
