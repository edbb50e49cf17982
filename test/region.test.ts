import { describe, expect, it } from 'vitest';
import { gradeRegion } from '../src/services/grading/region';
import type { GradingRegion } from '../src/types';
import { MemorySheet } from './helpers/memory-workbook';

describe('gradeRegion', () => {
  it('excludes cells whose solution is empty', () => {
    const region: GradingRegion = {
      name: 'Classical',
      sheet: 'Classical',
      selections: [{ kind: 'ranges', ranges: ['K4:K5'] }]
    };
    const solution = new MemorySheet('Classical', { K4: 10, K5: null });
    const student = new MemorySheet('Classical', { K4: '10.00', K5: 'x' });

    const outcome = gradeRegion(region, student, solution);

    expect(outcome.total).toBe(1);
    expect(outcome.correct).toBe(1);
    expect(outcome.units).toEqual([
      { status: 'graded', address: 'K4', student: '10.00', solution: '10', match: true },
      { status: 'excluded', address: 'K5' }
    ]);
  });

  it('combines ranges and individual cells', () => {
    const region: GradingRegion = {
      name: 'Classical',
      sheet: 'Classical',
      selections: [
        { kind: 'ranges', ranges: ['A1:A2'] },
        { kind: 'cells', cells: ['C25'] }
      ]
    };
    const solution = new MemorySheet('Classical', { A1: 1, A2: '$2,000', C25: 'Yes' });
    const student = new MemorySheet('Classical', { A1: 1.005, A2: 2000, C25: 'yes' });

    const outcome = gradeRegion(region, student, solution);

    expect(outcome.correct).toBe(2);
    expect(outcome.total).toBe(3);
  });

  it('skips cells that cannot be read without counting them', () => {
    const region: GradingRegion = {
      name: 'GAN',
      sheet: 'GAN',
      selections: [{ kind: 'ranges', ranges: ['A1:A3'] }]
    };
    const solution = new MemorySheet('GAN', { A1: 1, A2: 2, A3: 3 });
    const student = new MemorySheet('GAN', { A1: 1, A2: 2, A3: 3 }, { failOn: ['A2'] });

    const outcome = gradeRegion(region, student, solution);

    expect(outcome.total).toBe(2);
    expect(outcome.correct).toBe(2);
    expect(outcome.units[1]).toEqual({ status: 'skipped', unit: 'cell A2', reason: 'cannot read A2' });
  });

  it('keeps other regions unaffected by a malformed range', () => {
    const solution = new MemorySheet('GAN', { A1: 1, A2: 2, B1: 'ok' });
    const student = new MemorySheet('GAN', { A1: 1, A2: 5, B1: 'ok' });
    const regionB: GradingRegion = { name: 'B', sheet: 'GAN', selections: [{ kind: 'cells', cells: ['B1'] }] };

    const cleanA = gradeRegion(
      { name: 'A', sheet: 'GAN', selections: [{ kind: 'ranges', ranges: ['A1:A2'] }] },
      student,
      solution
    );
    const brokenA = gradeRegion(
      { name: 'A', sheet: 'GAN', selections: [{ kind: 'ranges', ranges: ['A1:', 'A1:A2'] }] },
      student,
      solution
    );
    const outcomeB = gradeRegion(regionB, student, solution);

    expect(brokenA.units[0]).toMatchObject({ status: 'skipped', unit: 'range A1:' });
    expect([brokenA.correct, brokenA.total]).toEqual([cleanA.correct, cleanA.total]);
    expect([outcomeB.correct, outcomeB.total]).toEqual([1, 1]);
  });
});
