import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../utils/logger';
import { WorkbookReader } from './workbook-reader';

const reader = new WorkbookReader();

function isWorkbookFile(fileName: string): boolean {
  // '~$' files are Office lock files left next to open workbooks
  return reader.canHandle(fileName) && !path.basename(fileName).startsWith('~$');
}

function listWorkbooks(directory: string): string[] {
  return fs.readdirSync(directory)
    .filter(isWorkbookFile)
    .sort()
    .map(file => path.join(directory, file))
    .filter(filePath => fs.statSync(filePath).isFile());
}

/**
 * Find the workbook in a submission directory
 * @returns the first workbook by name, or null when there is none
 */
export function findSubmissionFile(directory: string): string | null {
  try {
    if (!fs.existsSync(directory)) {
      logger.error(`Directory does not exist: ${directory}`);
      return null;
    }
    const files = listWorkbooks(directory);
    if (files.length === 0) {
      logger.warn(`No workbook found in ${directory}`);
      return null;
    }
    if (files.length > 1) {
      logger.warn(`Found ${files.length} workbooks in ${directory}, grading ${path.basename(files[0])}`);
    }
    return files[0];
  } catch (error) {
    logger.error(`Error reading submission directory: ${error}`);
    return null;
  }
}

/**
 * Get all workbook files named by the arguments; directories are expanded one level
 */
export function collectWorkbookFiles(args: string[]): string[] {
  const files: string[] = [];

  for (const arg of args) {
    if (!fs.existsSync(arg)) {
      logger.warn(`Skipping '${arg}': not found`);
      continue;
    }
    if (fs.statSync(arg).isDirectory()) {
      logger.info(`Processing directory: ${arg}`);
      files.push(...listWorkbooks(arg));
    } else if (isWorkbookFile(arg)) {
      files.push(arg);
    } else {
      logger.warn(`Skipping '${arg}': not a workbook file or directory`);
    }
  }

  logger.info(`Found ${files.length} workbook files`);
  return files;
}
