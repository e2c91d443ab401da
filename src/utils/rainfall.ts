export interface RainfallIntensity {
  icon: string;
  label: string;
}

// Bands are in millimetres over the upstream five-minute window.
export const classifyRainfall = (mm: number): RainfallIntensity => {
  if (mm <= 0) {
    return { icon: '☀️', label: 'No rainfall detected' };
  }
  if (mm < 2.5) {
    return { icon: '🌦️', label: 'Light rainfall' };
  }
  if (mm < 10) {
    return { icon: '🌧️', label: 'Moderate rainfall' };
  }
  if (mm < 50) {
    return { icon: '⛈️', label: 'Heavy rainfall' };
  }
  return { icon: '🌩️', label: 'Very heavy rainfall' };
};
