import 'dotenv/config';
import * as path from 'path';
import { config } from './src/config';
import { logger } from './src/utils/logger';
import { errorMessage } from './src/utils/errors';
import { loadAssignment } from './src/utils/assignment-loader';
import { collectWorkbookFiles, findSubmissionFile } from './src/services/file-parser';
import { WorkbookGrader } from './src/services/grader';
import { ResultStorage, toSubmissionResult, writeAutograderFeedback } from './src/services/result-storage';

/**
 * Print the autograder record on stdout and save it to feedback.json
 */
async function sendFeedback(score: number, feedback: string): Promise<void> {
  process.stdout.write(JSON.stringify({ fractionalScore: score, feedback }) + '\n');
  try {
    await writeAutograderFeedback(config.outputDir, score, feedback);
  } catch (error) {
    logger.error(`Error writing feedback: ${errorMessage(error)}`);
  }
}

/**
 * Grade the single submission found in the submission directory
 */
async function gradeSubmission(): Promise<number> {
  const submittedPart = process.env.partId;
  if (config.partId && submittedPart !== config.partId) {
    logger.error(`Cannot find matching partId: ${submittedPart ?? '(none)'}`);
    await sendFeedback(0, 'Please verify that you have submitted to the proper part of the assignment.');
    return 1;
  }

  const submission = findSubmissionFile(path.resolve(config.submissionDir));
  if (!submission) {
    await sendFeedback(0, 'No Excel submission file found. Please submit an .xlsx or .xlsm file.');
    return 1;
  }

  const grader = new WorkbookGrader(loadAssignment(config.assignmentConfig));
  const report = await grader.gradeFiles(submission, path.resolve(config.solutionPath));
  await sendFeedback(report.score, report.feedback);

  return report.score > 0 ? 0 : 1;
}

/**
 * Grade every workbook named on the command line and write the reports
 */
async function gradeBatch(args: string[]): Promise<number> {
  const assignment = loadAssignment(config.assignmentConfig);
  const grader = new WorkbookGrader(assignment);
  const storage = new ResultStorage(config.outputDir, assignment.id);
  const solutionPath = path.resolve(config.solutionPath);

  const files = collectWorkbookFiles(args.length > 0 ? args : [process.cwd()])
    .filter(file => path.resolve(file) !== solutionPath);

  for (const file of files) {
    logger.info(`Grading: ${file}`);
    storage.addResult(toSubmissionResult(file, await grader.gradeFiles(file, solutionPath)));
  }

  await storage.saveResults();
  await storage.saveFeedbackFiles();
  await storage.saveSummary();

  const summary = storage.summarize();
  if (!summary) {
    logger.warn('No files were graded.');
    return 1;
  }
  logger.info(`Total files processed: ${summary.count}`);
  logger.info(`Average score: ${summary.average.toFixed(2)}%`);
  logger.info(`Highest score: ${summary.highest.toFixed(2)}%`);
  logger.info(`Lowest score: ${summary.lowest.toFixed(2)}%`);
  return 0;
}

async function main(): Promise<number> {
  const [command, ...args] = process.argv.slice(2);
  try {
    logger.info('Starting workbook grading');
    return command === 'batch' ? await gradeBatch(args) : await gradeSubmission();
  } catch (error) {
    logger.error(`Error in grader: ${errorMessage(error)}`);
    await sendFeedback(0, `An error occurred while grading: ${errorMessage(error)}`);
    return 1;
  }
}

// Run the application
main()
  .then(code => {
    logger.info('Exiting application');
    process.exit(code);
  })
  .catch(error => {
    logger.error(`Uncaught error: ${error}`);
    process.exit(1);
  });
