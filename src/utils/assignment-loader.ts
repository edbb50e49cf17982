import * as fs from 'fs';
import { z } from 'zod';
import type { AssignmentConfig } from '../types';
import { AssignmentConfigError, errorMessage } from './errors';
import { logger } from './logger';

const selectionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('ranges'), ranges: z.array(z.string().min(1)).min(1) }),
  z.object({ kind: z.literal('cells'), cells: z.array(z.string().min(1)).min(1) }),
  z.object({ kind: z.literal('bordered') })
]);

const regionSchema = z.object({
  name: z.string().min(1),
  sheet: z.string().min(1),
  solutionSheet: z.string().min(1).optional(),
  selections: z.array(selectionSchema).min(1)
});

export const assignmentSchema = z.object({
  id: z.string().min(1),
  title: z.string().optional(),
  regions: z.array(regionSchema).min(1),
  tolerance: z.object({
    absolute: z.number().nonnegative().optional(),
    relative: z.number().nonnegative().optional()
  }).optional(),
  feedback: z.object({
    listMismatches: z.boolean().optional(),
    maxMismatches: z.number().int().positive().optional()
  }).optional()
});

/**
 * Validates a parsed assignment definition
 * @param source - file name or label used in error messages
 */
export function parseAssignment(data: unknown, source: string): AssignmentConfig {
  const result = assignmentSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new AssignmentConfigError(issues, source);
  }

  const names = result.data.regions.map(region => region.name);
  const duplicate = names.find((name, index) => names.indexOf(name) !== index);
  if (duplicate) {
    throw new AssignmentConfigError(`duplicate region name '${duplicate}'`, source);
  }
  return result.data;
}

/**
 * Loads the region definitions for an assignment from a JSON file
 */
export function loadAssignment(filePath: string): AssignmentConfig {
  logger.info(`Loading assignment config from ${filePath}`);

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new AssignmentConfigError(errorMessage(error), filePath);
  }

  const assignment = parseAssignment(data, filePath);
  logger.info(`Loaded ${assignment.regions.length} regions for assignment ${assignment.id}`);
  return assignment;
}
