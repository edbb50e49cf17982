import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterAll, describe, expect, it } from 'vitest';
import { ResultStorage, toSubmissionResult, writeAutograderFeedback } from '../src/services/result-storage';
import type { GradeReport } from '../src/types';

function report(overrides: Partial<GradeReport>): GradeReport {
  return { score: 0, feedback: '', matches: 0, totalCells: 0, status: 'graded', regions: [], ...overrides };
}

const gradedAt = new Date(2024, 0, 15, 9, 30, 0);
const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sheet-autograde-results-'));

afterAll(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

function storageWithTwoResults(outputDir: string): ResultStorage {
  const storage = new ResultStorage(outputDir, 'vision-workbook');
  storage.addResult(toSubmissionResult(
    '/submissions/alice.xlsx',
    report({ score: 0.9, matches: 18, totalCells: 20, feedback: 'Excellent work!' }),
    gradedAt
  ));
  storage.addResult(toSubmissionResult(
    '/submissions/bob, jr.xlsx',
    report({ status: 'missing-sheets', feedback: 'Missing sheets in submission: GAN' }),
    gradedAt
  ));
  return storage;
}

describe('toSubmissionResult', () => {
  it('builds a grade book entry', () => {
    const result = toSubmissionResult('/submissions/alice.xlsx', report({ score: 0.9, matches: 18, totalCells: 20 }), gradedAt);

    expect(result).toMatchObject({ filename: 'alice.xlsx', matches: 18, total: 20, status: 'Success' });
    expect(result.percentage).toBeCloseTo(90);
  });

  it('marks failed submissions as errors', () => {
    expect(toSubmissionResult('x.xlsx', report({ status: 'error' })).status).toBe('Error');
    expect(toSubmissionResult('x.xlsx', report({ status: 'no-cells' })).status).toBe('Success');
  });
});

describe('ResultStorage', () => {
  it('renders the CSV summary', () => {
    expect(storageWithTwoResults(tempDir).toCsv()).toBe(
      'filename,percentage,matches,total,status\n' +
      'alice.xlsx,90.00%,18,20,Success\n' +
      '"bob, jr.xlsx",0.00%,0,0,Error\n'
    );
  });

  it('summarizes percentages', () => {
    const summary = storageWithTwoResults(tempDir).summarize();

    expect(summary?.count).toBe(2);
    expect(summary?.average).toBeCloseTo(45);
    expect(summary?.highest).toBeCloseTo(90);
    expect(summary?.lowest).toBe(0);
    expect(new ResultStorage(tempDir, 'empty').summarize()).toBeNull();
  });

  it('writes the grade book, feedback files and summary', async () => {
    const outputDir = path.join(tempDir, 'batch');
    const storage = storageWithTwoResults(outputDir);

    const gradeBook = await storage.saveResults();
    const feedbackFiles = await storage.saveFeedbackFiles();
    const summaryPath = await storage.saveSummary(gradedAt);

    expect(path.basename(gradeBook)).toBe('grade-book-vision-workbook.json');
    expect(JSON.parse(fs.readFileSync(gradeBook, 'utf-8'))).toHaveLength(2);
    expect(feedbackFiles.map(file => path.basename(file))).toEqual(['alice_feedback.txt', 'bob, jr_feedback.txt']);
    expect(fs.readFileSync(feedbackFiles[1], 'utf-8')).toBe('Missing sheets in submission: GAN');
    expect(path.basename(summaryPath)).toBe('grading-summary-20240115_093000.csv');
  });
});

describe('writeAutograderFeedback', () => {
  it('writes the fractional score record', async () => {
    const outputPath = await writeAutograderFeedback(path.join(tempDir, 'autograder'), 0.75, 'Good job!');

    expect(JSON.parse(fs.readFileSync(outputPath, 'utf-8'))).toEqual({ fractionalScore: 0.75, feedback: 'Good job!' });
  });
});
