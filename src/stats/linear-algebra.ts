export type Matrix = number[][];

export interface LinearSolution {
  readonly x: number[];
  /**
   * Reciprocal condition estimate in [0, 1]: smallest over largest absolute
   * pivot of the elimination. Near 0 means near-singular.
   */
  readonly rcond: number;
}

/**
 * Solve A·x = b by Gaussian elimination with partial pivoting.
 * Inputs are not mutated. Returns null when a pivot is exactly zero or the
 * solution is not finite.
 */
export function solveLinearSystem(a: readonly (readonly number[])[], b: readonly number[]): LinearSolution | null {
  const n = b.length;
  if (n === 0 || a.length !== n) return null;

  const m: Matrix = a.map((row, i) => [...row, b[i]]);
  let minPivot = Infinity;
  let maxPivot = 0;

  for (let col = 0; col < n; col++) {
    let pivotRow = col;
    for (let r = col + 1; r < n; r++) {
      if (Math.abs(m[r][col]) > Math.abs(m[pivotRow][col])) pivotRow = r;
    }
    const pivot = m[pivotRow][col];
    if (pivot === 0 || !Number.isFinite(pivot)) return null;

    if (pivotRow !== col) {
      [m[col], m[pivotRow]] = [m[pivotRow], m[col]];
    }

    minPivot = Math.min(minPivot, Math.abs(pivot));
    maxPivot = Math.max(maxPivot, Math.abs(pivot));

    for (let r = col + 1; r < n; r++) {
      const factor = m[r][col] / pivot;
      if (factor === 0) continue;
      for (let c = col; c <= n; c++) {
        m[r][c] -= factor * m[col][c];
      }
    }
  }

  const x = new Array<number>(n).fill(0);
  for (let r = n - 1; r >= 0; r--) {
    let sum = m[r][n];
    for (let c = r + 1; c < n; c++) sum -= m[r][c] * x[c];
    x[r] = sum / m[r][r];
  }

  if (!x.every(Number.isFinite)) return null;
  return { x, rcond: maxPivot > 0 ? minPivot / maxPivot : 0 };
}

/** Symmetric Toeplitz matrix whose first row is `firstRow`. */
export function toeplitz(firstRow: readonly number[]): Matrix {
  const n = firstRow.length;
  const out: Matrix = [];
  for (let i = 0; i < n; i++) {
    const row: number[] = [];
    for (let j = 0; j < n; j++) row.push(firstRow[Math.abs(i - j)]);
    out.push(row);
  }
  return out;
}

/** Jᵀ·J for a Jacobian given as rows of partial derivatives. */
export function gramian(jacobian: readonly (readonly number[])[], cols: number): Matrix {
  const out: Matrix = Array.from({ length: cols }, () => new Array<number>(cols).fill(0));
  for (const row of jacobian) {
    for (let i = 0; i < cols; i++) {
      for (let j = i; j < cols; j++) {
        out[i][j] += row[i] * row[j];
      }
    }
  }
  for (let i = 0; i < cols; i++) {
    for (let j = 0; j < i; j++) out[i][j] = out[j][i];
  }
  return out;
}

/** Jᵀ·r */
export function transposeTimes(jacobian: readonly (readonly number[])[], residuals: readonly number[], cols: number): number[] {
  const out = new Array<number>(cols).fill(0);
  jacobian.forEach((row, t) => {
    for (let i = 0; i < cols; i++) out[i] += row[i] * residuals[t];
  });
  return out;
}
