/**
 * Application configuration loaded from environment variables with defaults
 */
export const config = {
  // Region definitions for the assignment being graded
  assignmentConfig: process.env.ASSIGNMENT_CONFIG || './assignments/vision-workbook.json',

  // Autograder part check; empty disables it
  partId: process.env.PART_ID || '',

  // File paths
  submissionDir: process.env.SUBMISSION_DIR || '/shared/submission',
  solutionPath: process.env.SOLUTION_PATH || './solutions/solution.xlsx',
  outputDir: process.env.OUTPUT_DIR || './output',

  logging: {
    toFile: process.env.LOG_TO_FILE === 'true',
    dir: process.env.LOG_DIR || './logs'
  },

  // Debug mode
  debug: process.env.APP_DEBUG === 'true'
};
