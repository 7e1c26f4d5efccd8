import { TemperatureCategory } from '../interfaces/weatherRecord';

const SECONDS_PER_HOUR = 3600;

export function dayLengthHours(sunriseSeconds: number, sunsetSeconds: number): number {
  return (sunsetSeconds - sunriseSeconds) / SECONDS_PER_HOUR;
}

/**
 * Bins are closed on the right: 0 is Freezing, 10 is Cold, 30 is Warm.
 */
export function temperatureCategory(temperatureC: number): TemperatureCategory {
  if (temperatureC <= 0) return 'Freezing';
  if (temperatureC <= 10) return 'Cold';
  if (temperatureC <= 20) return 'Mild';
  if (temperatureC <= 30) return 'Warm';
  return 'Hot';
}

/**
 * Simplified Steadman heat index in °C. The vapour pressure term uses the
 * Clausius-Clapeyron approximation with L/Rv = 5417.753 K.
 */
export function heatIndex(temperatureC: number, humidityPercent: number): number {
  const vapourPressure =
    6.11 *
    Math.exp(5417.753 * (1 / 273.16 - 1 / (273.15 + temperatureC))) *
    humidityPercent / 100;

  return temperatureC + 0.5555 * (vapourPressure - 10);
}
