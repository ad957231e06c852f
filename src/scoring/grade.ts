import type { Grade, GradeBand } from './types.js';

export const GRADE_TABLE: readonly GradeBand[] = [
  { grade: 'A+', label: 'Exceptional', min: 9.5, max: 10 },
  { grade: 'A', label: 'Excellent', min: 9.0, max: 9.5 },
  { grade: 'A-', label: 'Very Good', min: 8.5, max: 9.0 },
  { grade: 'B+', label: 'Good', min: 8.0, max: 8.5 },
  { grade: 'B', label: 'Above Average', min: 7.5, max: 8.0 },
  { grade: 'B-', label: 'Satisfactory', min: 7.0, max: 7.5 },
  { grade: 'C+', label: 'Adequate', min: 6.5, max: 7.0 },
  { grade: 'C', label: 'Below Average', min: 6.0, max: 6.5 },
  { grade: 'C-', label: 'Poor', min: 5.5, max: 6.0 },
  { grade: 'D', label: 'Failing', min: 3.9, max: 5.5 },
  { grade: 'F', label: 'Unacceptable', min: 0, max: 3.9 },
];

const hundredths = (value: number): number => Math.round(value * 100);

/** Bounds are compared in integer hundredths so 8.99 never rounds into the 9.0 band. */
export function mapGrade(score: number): GradeBand {
  const h = hundredths(score);
  const top = hundredths(10);

  const band = GRADE_TABLE.find(b => h >= hundredths(b.min) && (h < hundredths(b.max) || (b.max === 10 && h <= top)));
  if (!band) {
    throw new RangeError(`Score ${score} is outside [0, 10]`);
  }
  return band;
}

export function gradeLabel(grade: Grade): string {
  return GRADE_TABLE.find(b => b.grade === grade)?.label ?? grade;
}
