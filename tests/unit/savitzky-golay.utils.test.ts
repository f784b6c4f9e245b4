import {
  savitzkyGolayWeights,
  savitzkyGolayFilter,
  resolveWindowLength,
  solveLinearSystem
} from '@/utils/savitzky-golay.utils';

const expectAllClose = (actual: number[], expected: number[], digits: number = 9) => {
  expect(actual).toHaveLength(expected.length);
  actual.forEach((value, i) => expect(value).toBeCloseTo(expected[i], digits));
};

describe('Savitzky-Golay Utils', () => {
  describe('solveLinearSystem', () => {
    it('should solve a small system with pivoting', () => {
      const x = solveLinearSystem([[0, 2], [3, 1]], [4, 5]);
      expectAllClose(x, [1, 2]);
    });

    it('should reject a singular system', () => {
      expect(() => solveLinearSystem([[1, 2], [2, 4]], [1, 2])).toThrow('Singular');
    });
  });

  describe('savitzkyGolayWeights', () => {
    it('should match the classic 5-point quadratic coefficients', () => {
      expectAllClose(savitzkyGolayWeights(5, 2), [-3, 12, 17, 12, -3].map(c => c / 35));
    });

    it('should give the 13-point quadratic centre weights', () => {
      const weights = savitzkyGolayWeights(13, 2);

      expect(weights[6]).toBeCloseTo(25 / 143, 9);
      expect(weights[0]).toBeCloseTo(-1 / 13, 9);
      expect(weights[1]).toBeCloseTo(0, 9);
      expect(weights.reduce((a, b) => a + b, 0)).toBeCloseTo(1, 9);
    });
  });

  describe('resolveWindowLength', () => {
    it('should keep the configured window when the signal is long enough', () => {
      expect(resolveWindowLength(20, 13, 2)).toBe(13);
      expect(resolveWindowLength(13, 13, 2)).toBe(13);
    });

    it('should shrink to the largest odd window that fits', () => {
      expect(resolveWindowLength(12, 13, 2)).toBe(11);
      expect(resolveWindowLength(6, 13, 2)).toBe(5);
      expect(resolveWindowLength(5, 13, 2)).toBe(5);
    });

    it('should give up when the fit would interpolate every sample', () => {
      expect(resolveWindowLength(4, 13, 2)).toBeNull();
      expect(resolveWindowLength(3, 13, 2)).toBeNull();
      expect(resolveWindowLength(2, 13, 0)).toBeNull();
    });
  });

  describe('savitzkyGolayFilter', () => {
    it('should preserve a quadratic signal exactly, edges included', () => {
      const signal = Array.from({ length: 20 }, (_, i) => 0.5 * i * i - 3 * i + 7);
      expectAllClose(savitzkyGolayFilter(signal, 13, 2), signal, 8);
    });

    it('should spread an interior spike with the centre weights', () => {
      const signal = new Array<number>(20).fill(0);
      signal[10] = 1;

      const smoothed = savitzkyGolayFilter(signal, 13, 2);

      expect(smoothed[10]).toBeCloseTo(25 / 143, 9);
      expect(smoothed[9]).toBeCloseTo(24 / 143, 9);
      expect(smoothed[13]).toBeCloseTo(16 / 143, 9);
    });

    it('should evaluate the first-window polynomial at the leading edge', () => {
      const signal = new Array<number>(15).fill(0);
      signal[0] = 1;

      const smoothed = savitzkyGolayFilter(signal, 13, 2);

      expect(smoothed[0]).toBeCloseTo(47 / 91, 9);
      expect(smoothed[1]).toBeCloseTo(0.3626373626, 9);
      expect(smoothed[2]).toBeCloseTo(3 / 13, 9);
    });

    it('should mirror the edge behaviour at the trailing edge', () => {
      const signal = new Array<number>(15).fill(0);
      signal[14] = 1;

      const smoothed = savitzkyGolayFilter(signal, 13, 2);

      expect(smoothed[14]).toBeCloseTo(47 / 91, 9);
      expect(smoothed[13]).toBeCloseTo(0.3626373626, 9);
      expect(smoothed[12]).toBeCloseTo(3 / 13, 9);
    });

    it('should fall back to a 5-sample window for a 6-sample signal', () => {
      const smoothed = savitzkyGolayFilter([0, 0, 10, 0, 0, 0], 13, 2);

      expectAllClose(smoothed, [-0.857142857, 3.428571429, 4.857142857, 3.428571429, 1.714285714, -1.428571429]);
    });

    it('should return short signals unchanged', () => {
      const signal = [20, 21, 22, 23];
      const smoothed = savitzkyGolayFilter(signal, 13, 2);

      expect(smoothed).toEqual(signal);
      expect(smoothed).not.toBe(signal);
    });
  });
});
