import { aggregateDailyStats, dominantWeather, WeatherSample } from '@/modules/dailyStats';

function sample(city: string, time: string, temperature: number, humidity: number, main: string): WeatherSample {
  return { city, timestamp: `2024-03-21 ${time}`, temperature, humidity, weather_main: main };
}

describe('aggregateDailyStats (unit)', () => {
  /**
   * Purpose:
   * Verifies Core behavior:
   * - one row per city, ordered by city
   * - averages, extremes and counts come from the weather rows
   * - avg_aqi comes from the same city's air rows
   */
  it('aggregates one row per city', () => {
    const stats = aggregateDailyStats(
      '2024-03-21',
      [
        sample('Tokyo, Japan', '09:00:00', 18, 60, 'Clouds'),
        sample('London, UK', '09:00:00', 8, 80, 'Rain'),
        sample('Tokyo, Japan', '10:00:00', 22, 40, 'Clear'),
        sample('Tokyo, Japan', '11:00:00', 23, 50, 'Clear'),
      ],
      [
        { city: 'Tokyo, Japan', timestamp: '2024-03-21 09:00:00', aqi: 20 },
        { city: 'Tokyo, Japan', timestamp: '2024-03-21 10:00:00', aqi: 30 },
      ]
    );

    expect(stats).toEqual([
      {
        city: 'London, UK',
        date: '2024-03-21',
        avg_temperature: 8,
        max_temperature: 8,
        min_temperature: 8,
        avg_humidity: 80,
        avg_aqi: null,
        dominant_weather: 'Rain',
        measurements_count: 1,
      },
      {
        city: 'Tokyo, Japan',
        date: '2024-03-21',
        avg_temperature: 21,
        max_temperature: 23,
        min_temperature: 18,
        avg_humidity: 50,
        avg_aqi: 25,
        dominant_weather: 'Clear',
        measurements_count: 3,
      },
    ]);
  });

  it('ignores air rows for cities without weather rows', () => {
    const stats = aggregateDailyStats(
      '2024-03-21',
      [sample('Paris, France', '09:00:00', 12, 70, 'Mist')],
      [{ city: 'Dubai, UAE', timestamp: '2024-03-21 09:00:00', aqi: 60 }]
    );

    expect(stats.map(row => row.city)).toEqual(['Paris, France']);
    expect(stats[0].avg_aqi).toBeNull();
  });

  it('returns nothing for a day without weather rows', () => {
    expect(aggregateDailyStats('2024-03-21', [], [])).toEqual([]);
  });
});

describe('dominantWeather (unit)', () => {
  it('picks the most frequent condition', () => {
    expect(
      dominantWeather([
        sample('A', '08:00:00', 1, 1, 'Rain'),
        sample('A', '09:00:00', 1, 1, 'Clear'),
        sample('A', '10:00:00', 1, 1, 'Rain'),
      ])
    ).toBe('Rain');
  });

  it('breaks ties in favour of the most recent observation', () => {
    expect(
      dominantWeather([
        sample('A', '10:00:00', 1, 1, 'Rain'),
        sample('A', '08:00:00', 1, 1, 'Clear'),
        sample('A', '09:00:00', 1, 1, 'Rain'),
        sample('A', '11:00:00', 1, 1, 'Clear'),
      ])
    ).toBe('Clear');
  });
});
