import type { FeedbackOptions, RegionOutcome } from '../../types';

export const NO_CELLS_FEEDBACK =
  'Grading failed: no cells were evaluated. This may indicate an issue with the submission format.';

const DEFAULT_MAX_MISMATCHES = 20;

export interface AggregateScore {
  correct: number;
  total: number;
  score: number;
}

/**
 * Rounds to the given number of decimals, resolving exact halves to the even neighbour
 * (`0.125` → `0.12`, `12.5` → `12`)
 */
export function roundHalfEven(value: number, digits = 0): number {
  const factor = 10 ** digits;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  if (scaled - floor === 0.5) {
    return (floor % 2 === 0 ? floor : floor + 1) / factor;
  }
  return Math.round(scaled) / factor;
}

/**
 * Sums region outcomes. The score is rounded to two decimals and is 0 when nothing was graded.
 */
export function aggregateOutcomes(outcomes: RegionOutcome[]): AggregateScore {
  const correct = outcomes.reduce((sum, outcome) => sum + outcome.correct, 0);
  const total = outcomes.reduce((sum, outcome) => sum + outcome.total, 0);
  const score = total > 0 ? roundHalfEven(correct / total, 2) : 0;
  return { correct, total, score };
}

export function closingRemark(score: number): string {
  if (score >= 0.9) {
    return 'Excellent work!';
  } else if (score >= 0.8) {
    return 'Good job! A few answers need improvement.';
  } else if (score >= 0.7) {
    return "You're on the right track, but several answers need revision.";
  }
  return 'Please review your work and try again.';
}

function percent(correct: number, total: number): string {
  return total > 0 ? roundHalfEven((correct / total) * 100).toFixed(0) : '0';
}

function mismatchLines(outcomes: RegionOutcome[], limit: number): string[] {
  const lines: string[] = [];
  for (const outcome of outcomes) {
    for (const unit of outcome.units) {
      if (unit.status === 'graded' && !unit.match) {
        lines.push(`${outcome.name} ${unit.address}: your answer was '${unit.student}', but should be '${unit.solution}'`);
      }
    }
  }
  if (lines.length <= limit) {
    return lines;
  }
  return [...lines.slice(0, limit), `...and ${lines.length - limit} more`];
}

/**
 * Builds the feedback text: overall fraction, one line per region, optional mismatch list and
 * a closing remark chosen by score.
 */
export function composeFeedback(outcomes: RegionOutcome[], options: FeedbackOptions = {}): string {
  const { correct, total, score } = aggregateOutcomes(outcomes);
  if (total === 0) {
    return NO_CELLS_FEEDBACK;
  }

  let feedback = `You scored ${correct}/${total} correct (${roundHalfEven(score * 100).toFixed(0)}%).\n\n`;
  feedback += outcomes
    .map(outcome => `${outcome.name}: ${outcome.correct}/${outcome.total} (${percent(outcome.correct, outcome.total)}%)`)
    .join('\n');

  if (options.listMismatches) {
    const lines = mismatchLines(outcomes, options.maxMismatches ?? DEFAULT_MAX_MISMATCHES);
    if (lines.length > 0) {
      feedback += `\n\nIncorrect cells:\n${lines.join('\n')}`;
    }
  }

  feedback += `\n\n${closingRemark(score)}`;
  return feedback;
}
