// This file contains type definitions for the grading system

/**
 * Raw value of a spreadsheet cell as the workbook reader returns it
 */
export type RawCellValue = string | number | boolean | null | undefined;

/**
 * Border style of each cell edge, e.g. 'thin' or 'medium'. Absent edges have no border.
 */
export interface CellBorder {
  top?: string;
  bottom?: string;
  left?: string;
  right?: string;
}

export interface Cell {
  value: RawCellValue;
  border?: CellBorder;
}

export interface CellEntry {
  address: string; // A1 style, e.g. 'K4'
  cell: Cell;
}

/**
 * Read-only view of one worksheet
 */
export interface Sheet {
  readonly name: string;
  /**
   * Look up a cell by A1 coordinate. Cells that were never written come back with a null value.
   * Throws when the coordinate cannot be resolved.
   */
  getCell(address: string): Cell;
  /**
   * Every populated or styled cell, in row-major order
   */
  cells(): CellEntry[];
}

/**
 * Read-only spreadsheet document opened by the caller
 */
export interface SpreadsheetDocument {
  readonly sheetNames: string[];
  getSheet(name: string): Sheet | undefined;
}

/**
 * How the cells of a region are chosen
 */
export type Selection =
  | { kind: 'ranges'; ranges: string[] }
  | { kind: 'cells'; cells: string[] }
  | { kind: 'bordered' };

/**
 * A named, independently graded part of a workbook
 */
export interface GradingRegion {
  name: string;
  sheet: string; // sheet name in the student workbook
  solutionSheet?: string; // defaults to `sheet`
  selections: Selection[];
}

export interface Tolerance {
  absolute: number;
  relative: number;
}

export interface FeedbackOptions {
  listMismatches?: boolean;
  maxMismatches?: number;
}

/**
 * Region definitions and grading options for one assignment variant
 */
export interface AssignmentConfig {
  id: string;
  title?: string;
  regions: GradingRegion[];
  tolerance?: Partial<Tolerance>;
  feedback?: FeedbackOptions;
}

/**
 * Outcome of a single grading unit (a cell, or a range/coordinate that could not be resolved)
 */
export type UnitResult =
  | {
    status: 'graded';
    address: string;
    student: string;
    solution: string;
    match: boolean;
  }
  | { status: 'excluded'; address: string } // solution cell is empty
  | { status: 'skipped'; unit: string; reason: string };

export interface RegionOutcome {
  name: string;
  correct: number;
  total: number;
  units: UnitResult[];
}

export type GradeStatus = 'graded' | 'missing-sheets' | 'no-cells' | 'error';

/**
 * Represents the grading result of a submission
 */
export interface GradeReport {
  score: number; // 0..1, two decimals
  feedback: string;
  matches: number;
  totalCells: number;
  status: GradeStatus;
  regions: RegionOutcome[];
}

/**
 * Grade book entry for one graded file
 */
export interface SubmissionResult {
  filename: string;
  path: string;
  score: number;
  percentage: number;
  matches: number;
  total: number;
  feedback: string;
  status: 'Success' | 'Error';
  gradedAt: string;
}
