export const WEATHER_KINDS = ['clear', 'fog', 'rain', 'storm'] as const;

export type WeatherKind = (typeof WEATHER_KINDS)[number];

export interface WeatherState {
  kind: WeatherKind;
  ticksRemaining: number;
  /** Locked weather never rolls over (scenario setups) */
  locked: boolean;
}
