/** Lower bounds (percent, inclusive) of each letter, highest first. */
export const GRADE_THRESHOLDS: ReadonlyArray<readonly [number, string]> = [
  [90, 'A+'],
  [80, 'A'],
  [70, 'B+'],
  [60, 'B'],
  [50, 'C+'],
  [40, 'C'],
];

export const FAILING_LETTER = 'F';

export function computePercentage(marksObtained: number, totalMarks: number): number {
  if (!(totalMarks > 0)) {
    throw new RangeError(`totalMarks must be positive, got ${totalMarks}`);
  }
  return (marksObtained / totalMarks) * 100;
}

export function gradeLetterFor(percentage: number): string {
  for (const [floor, letter] of GRADE_THRESHOLDS) {
    if (percentage >= floor) return letter;
  }
  return FAILING_LETTER;
}

export function gradeLetter(marksObtained: number, totalMarks: number): string {
  return gradeLetterFor(computePercentage(marksObtained, totalMarks));
}

export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}
