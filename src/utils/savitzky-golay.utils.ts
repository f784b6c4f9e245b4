/**
 * Savitzky-Golay smoothing: each output sample is the value, at that sample,
 * of a degree-`polyorder` polynomial fitted by least squares to a window of
 * `windowLength` neighbouring samples.
 *
 * Edge convention ("interp"): the first and last `windowLength / 2` samples
 * take the polynomial fitted to the first / last full window, evaluated at
 * their own position, instead of padding the signal.
 */

/**
 * Solves a small dense system by Gaussian elimination with partial pivoting.
 */
export function solveLinearSystem(matrix: number[][], rhs: number[]): number[] {
  const n = rhs.length;
  const m = matrix.map((row, i) => [...row, rhs[i]]);

  for (let col = 0; col < n; col++) {
    let pivotRow = col;
    for (let r = col + 1; r < n; r++) {
      if (Math.abs(m[r][col]) > Math.abs(m[pivotRow][col])) {
        pivotRow = r;
      }
    }
    if (Math.abs(m[pivotRow][col]) < 1e-12) {
      throw new Error('Singular system in least-squares fit');
    }
    [m[col], m[pivotRow]] = [m[pivotRow], m[col]];

    for (let r = col + 1; r < n; r++) {
      const factor = m[r][col] / m[col][col];
      for (let k = col; k <= n; k++) {
        m[r][k] -= factor * m[col][k];
      }
    }
  }

  const solution = new Array<number>(n).fill(0);
  for (let r = n - 1; r >= 0; r--) {
    let acc = m[r][n];
    for (let k = r + 1; k < n; k++) {
      acc -= m[r][k] * solution[k];
    }
    solution[r] = acc / m[r][r];
  }
  return solution;
}

/**
 * Filter weights for one window: the fitted value at offset `evalAt`
 * (relative to the window centre) equals `sum(weights[j] * window[j])`.
 */
export function savitzkyGolayWeights(windowLength: number, polyorder: number, evalAt: number = 0): number[] {
  const half = Math.floor(windowLength / 2);
  const offsets = Array.from({ length: windowLength }, (_, j) => j - half);
  const terms = polyorder + 1;

  // Normal equations (AᵀA) x = e, with A[j][k] = offset_j^k and e[k] = evalAt^k
  const normal = Array.from({ length: terms }, (_, a) =>
    Array.from({ length: terms }, (_, b) => offsets.reduce((sum, s) => sum + s ** (a + b), 0))
  );
  const target = Array.from({ length: terms }, (_, k) => evalAt ** k);
  const x = solveLinearSystem(normal, target);

  return offsets.map(s => x.reduce((sum, coeff, k) => sum + coeff * s ** k, 0));
}

/**
 * Largest usable odd window for a signal of `length` samples, or null when
 * no window could change the signal (the fit would pass through every sample).
 */
export function resolveWindowLength(length: number, windowLength: number, polyorder: number): number | null {
  let effective = Math.min(windowLength, length);
  if (effective % 2 === 0) {
    effective -= 1;
  }
  if (effective < 3 || effective <= polyorder + 1) {
    return null;
  }
  return effective;
}

export function savitzkyGolayFilter(signal: number[], windowLength: number, polyorder: number): number[] {
  const n = signal.length;
  const window = resolveWindowLength(n, windowLength, polyorder);
  if (window === null) {
    return [...signal];
  }

  const half = Math.floor(window / 2);
  const centreWeights = savitzkyGolayWeights(window, polyorder, 0);
  const applyWeights = (weights: number[], start: number): number =>
    weights.reduce((sum, w, j) => sum + w * signal[start + j], 0);

  const smoothed = new Array<number>(n);
  for (let i = 0; i < n; i++) {
    if (i < half) {
      smoothed[i] = applyWeights(savitzkyGolayWeights(window, polyorder, i - half), 0);
    } else if (i >= n - half) {
      smoothed[i] = applyWeights(savitzkyGolayWeights(window, polyorder, i - (n - 1 - half)), n - window);
    } else {
      smoothed[i] = applyWeights(centreWeights, i - half);
    }
  }
  return smoothed;
}
