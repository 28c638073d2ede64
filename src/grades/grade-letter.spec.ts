import { computePercentage, gradeLetter, gradeLetterFor, roundTo2 } from './grade-letter';

describe('grade letters', () => {
  it('maps 45 of 50 to A+', () => {
    expect(computePercentage(45, 50)).toBe(90);
    expect(gradeLetter(45, 50)).toBe('A+');
  });

  it.each([
    [100, 'A+'],
    [90, 'A+'],
    [89.99, 'A'],
    [80, 'A'],
    [70, 'B+'],
    [69.5, 'B'],
    [60, 'B'],
    [50, 'C+'],
    [40, 'C'],
    [39.99, 'F'],
    [0, 'F'],
  ])('%p%% is %s', (percentage, letter) => {
    expect(gradeLetterFor(percentage)).toBe(letter);
  });

  it('rejects a non-positive total', () => {
    expect(() => computePercentage(10, 0)).toThrow(RangeError);
    expect(() => gradeLetter(10, -5)).toThrow('totalMarks must be positive, got -5');
  });

  it('rounds percentages to two decimals', () => {
    expect(roundTo2(computePercentage(2, 3))).toBe(66.67);
  });
});
