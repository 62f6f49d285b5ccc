import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import type { Triple } from '../types/cube.ts';
import { REFERENCE_PALETTE, classifyHsv, colorDistance, hueDistance } from './colorClassifier.ts';

// ─── Generators ─────────────────────────────────────────────────────────────────

const unit = (max = 1): fc.Arbitrary<number> =>
  fc.double({ min: 0, max, noNaN: true, noDefaultInfinity: true });

const arbitraryHsv = (): fc.Arbitrary<Triple> =>
  fc.tuple(unit(0.999), unit(), unit());

// ─── Properties ─────────────────────────────────────────────────────────────────

describe('hueDistance properties', () => {
  it('is symmetric and never exceeds half the circle', () => {
    fc.assert(
      fc.property(unit(0.999), unit(0.999), (a, b) => {
        const d = hueDistance(a, b);
        expect(d).toBeGreaterThanOrEqual(0);
        expect(d).toBeLessThanOrEqual(0.5);
        expect(hueDistance(b, a)).toBeCloseTo(d, 12);
      })
    );
  });
});

describe('classifyHsv properties', () => {
  it('returns X for every sample at or below the brightness gate', () => {
    fc.assert(
      fc.property(unit(0.999), unit(), unit(0.1), (h, s, v) => {
        expect(classifyHsv([h, s, v])).toBe('X');
      })
    );
  });

  it('is deterministic', () => {
    fc.assert(
      fc.property(arbitraryHsv(), (hsv) => {
        expect(classifyHsv(hsv)).toBe(classifyHsv([...hsv]));
      })
    );
  });

  it('only names a color that lies within the rejection threshold and is nearest', () => {
    fc.assert(
      fc.property(arbitraryHsv(), (hsv) => {
        const color = classifyHsv(hsv);
        if (color === 'X') return;

        const distances = REFERENCE_PALETTE.map((entry) => ({
          color: entry.color,
          d: colorDistance(hsv, entry.hsv),
        }));
        const chosen = distances.find((entry) => entry.color === color);
        expect(chosen).toBeDefined();
        if (!chosen) return;
        expect(chosen.d).toBeLessThanOrEqual(0.6);
        for (const other of distances) {
          expect(chosen.d).toBeLessThanOrEqual(other.d);
        }
      })
    );
  });
});
