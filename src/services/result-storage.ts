import * as fs from 'fs';
import * as path from 'path';
import type { GradeReport, SubmissionResult } from '../types';
import { logger } from '../utils/logger';
import { formatDateTime } from '../utils/tools';

export interface ResultSummary {
  count: number;
  average: number;
  highest: number;
  lowest: number;
}

const SUMMARY_COLUMNS = ['filename', 'percentage', 'matches', 'total', 'status'] as const;

function csvField(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Grade book entry for one graded workbook
 */
export function toSubmissionResult(filePath: string, report: GradeReport, gradedAt: Date = new Date()): SubmissionResult {
  return {
    filename: path.basename(filePath),
    path: filePath,
    score: report.score,
    percentage: report.score * 100,
    matches: report.matches,
    total: report.totalCells,
    feedback: report.feedback,
    status: report.status === 'error' || report.status === 'missing-sheets' ? 'Error' : 'Success',
    gradedAt: gradedAt.toLocaleString()
  };
}

/**
 * Write the autograder feedback record to `<outputDir>/feedback.json`
 */
export async function writeAutograderFeedback(outputDirectory: string, score: number, feedback: string): Promise<string> {
  await fs.promises.mkdir(outputDirectory, { recursive: true });
  const outputPath = path.join(outputDirectory, 'feedback.json');
  await fs.promises.writeFile(
    outputPath,
    JSON.stringify({ fractionalScore: score, feedback }, null, 2),
    'utf-8'
  );
  return outputPath;
}

export class ResultStorage {
  private outputDirectory: string;
  private outputPath: string;
  private results: SubmissionResult[] = [];

  constructor(outputDirectory: string, assignmentId: string) {
    this.outputDirectory = outputDirectory;
    this.outputPath = path.join(outputDirectory, `grade-book-${assignmentId}.json`);
  }

  /**
   * Add a grading result
   */
  addResult(result: SubmissionResult): void {
    this.results.push(result);
    logger.debug(`Added result for ${result.filename}`);
  }

  /**
   * Save all results to the grade book file
   */
  async saveResults(): Promise<string> {
    try {
      await fs.promises.mkdir(this.outputDirectory, { recursive: true });
      await fs.promises.writeFile(
        this.outputPath,
        JSON.stringify(this.results, null, 2),
        'utf-8'
      );
      logger.info(`Saved ${this.results.length} grading results to ${this.outputPath}`);
      return this.outputPath;
    } catch (error) {
      logger.error(`Error saving results: ${error}`);
      throw error;
    }
  }

  /**
   * Save a `<name>_feedback.txt` file for each graded workbook
   */
  async saveFeedbackFiles(): Promise<string[]> {
    await fs.promises.mkdir(this.outputDirectory, { recursive: true });
    const written: string[] = [];
    for (const result of this.results) {
      const stem = path.basename(result.filename, path.extname(result.filename));
      const feedbackPath = path.join(this.outputDirectory, `${stem}_feedback.txt`);
      await fs.promises.writeFile(feedbackPath, result.feedback, 'utf-8');
      written.push(feedbackPath);
    }
    return written;
  }

  toCsv(): string {
    const lines = [SUMMARY_COLUMNS.join(',')];
    for (const result of this.results) {
      lines.push([
        csvField(result.filename),
        `${result.percentage.toFixed(2)}%`,
        String(result.matches),
        String(result.total),
        result.status
      ].join(','));
    }
    return lines.join('\n') + '\n';
  }

  /**
   * Save the CSV summary report
   */
  async saveSummary(now: Date = new Date()): Promise<string> {
    await fs.promises.mkdir(this.outputDirectory, { recursive: true });
    const reportPath = path.join(this.outputDirectory, `grading-summary-${formatDateTime(now)}.csv`);
    await fs.promises.writeFile(reportPath, this.toCsv(), 'utf-8');
    logger.info(`Summary report saved to: ${reportPath}`);
    return reportPath;
  }

  summarize(): ResultSummary | null {
    if (this.results.length === 0) {
      return null;
    }
    const percentages = this.results.map(result => result.percentage);
    return {
      count: percentages.length,
      average: percentages.reduce((sum, value) => sum + value, 0) / percentages.length,
      highest: Math.max(...percentages),
      lowest: Math.min(...percentages)
    };
  }

  /**
   * Get all stored results
   */
  getResults(): SubmissionResult[] {
    return this.results;
  }
}
