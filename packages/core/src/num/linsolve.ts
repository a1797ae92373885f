/**
 * Dense linear algebra for small systems (curve fitting)
 */

export type Matrix = number[][];

export function zeros(rows: number, cols: number): Matrix {
  const m: Matrix = [];
  for (let i = 0; i < rows; i++) {
    m.push(new Array<number>(cols).fill(0));
  }
  return m;
}

/**
 * Compute A^T * A
 */
export function gram(A: Matrix): Matrix {
  const n = A.length === 0 ? 0 : A[0].length;
  const result = zeros(n, n);
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      let sum = 0;
      for (let k = 0; k < A.length; k++) {
        sum += A[k][i] * A[k][j];
      }
      result[i][j] = sum;
    }
  }
  return result;
}

/**
 * Solve Ax = b for several right-hand sides at once (columns of B), using
 * Gaussian elimination with partial pivoting.
 * Returns null if the matrix is singular.
 */
export function solveLinearSystem(A: Matrix, B: Matrix): Matrix | null {
  const n = A.length;
  const cols = n === 0 ? 0 : B[0].length;

  // Work on copies
  const L = A.map((row) => [...row]);
  const Y = B.map((row) => [...row]);

  for (let i = 0; i < n; i++) {
    let maxVal = Math.abs(L[i][i]);
    let maxRow = i;
    for (let k = i + 1; k < n; k++) {
      if (Math.abs(L[k][i]) > maxVal) {
        maxVal = Math.abs(L[k][i]);
        maxRow = k;
      }
    }

    if (maxVal < 1e-14) {
      return null;
    }

    if (maxRow !== i) {
      [L[i], L[maxRow]] = [L[maxRow], L[i]];
      [Y[i], Y[maxRow]] = [Y[maxRow], Y[i]];
    }

    for (let k = i + 1; k < n; k++) {
      const factor = L[k][i] / L[i][i];
      if (factor === 0) continue;
      for (let j = i; j < n; j++) {
        L[k][j] -= factor * L[i][j];
      }
      for (let c = 0; c < cols; c++) {
        Y[k][c] -= factor * Y[i][c];
      }
    }
  }

  // Back substitution
  const X = zeros(n, cols);
  for (let c = 0; c < cols; c++) {
    for (let i = n - 1; i >= 0; i--) {
      let sum = Y[i][c];
      for (let j = i + 1; j < n; j++) {
        sum -= L[i][j] * X[j][c];
      }
      X[i][c] = sum / L[i][i];
    }
  }

  return X;
}
