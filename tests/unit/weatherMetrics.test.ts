import { dayLengthHours, heatIndex, temperatureCategory } from '@/modules/weatherMetrics';
import { TEMPERATURE_CATEGORIES } from '@/interfaces/weatherRecord';

describe('weatherMetrics (unit)', () => {
  /**
   * Purpose:
   * Verifies Core behavior:
   * - each bin is closed on the right
   * - the first bin is unbounded below, the last unbounded above
   */
  it.each<[number, string]>([
    [-40, 'Freezing'],
    [0, 'Freezing'],
    [0.01, 'Cold'],
    [10, 'Cold'],
    [10.5, 'Mild'],
    [20, 'Mild'],
    [25, 'Warm'],
    [30, 'Warm'],
    [30.1, 'Hot'],
    [48, 'Hot'],
  ])('categorizes %p °C as %s', (temperature, expected) => {
    expect(temperatureCategory(temperature)).toBe(expected);
  });

  it('maps every temperature to exactly one category', () => {
    for (let t = -60; t <= 60; t += 0.25) {
      expect(TEMPERATURE_CATEGORIES).toContain(temperatureCategory(t));
    }
  });

  /**
   * Purpose:
   * Pins the closed-form heat index against regression values.
   */
  it('reproduces pinned heat index values', () => {
    expect(heatIndex(20, 50)).toBeCloseTo(21.007388763169605, 10);
    expect(heatIndex(30, 80)).toBeCloseTo(43.76219991400233, 10);
    expect(heatIndex(12.5, 70)).toBeCloseTo(12.600266304791102, 10);
    expect(heatIndex(-5, 80)).toBeCloseTo(-8.680515704559616, 10);
  });

  it('computes day length in hours from unix seconds', () => {
    expect(dayLengthHours(1711000800, 1711044000)).toBe(12);
    expect(dayLengthHours(0, 5400)).toBe(1.5);
  });
});
