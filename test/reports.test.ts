import {
  escapeHtml,
  renderRainfallReport,
  renderStationDirectory,
  renderWeatherOverview,
  renderWindDirectionReport,
  renderWindReport,
  renderWindSpeedReport,
  stationNotFoundMessage,
} from '../src/utils/reports';
import {
  fullSnapshot,
  rainfallBody,
  rawBody,
  rawStation,
  READING_TIME_DISPLAY,
  toPayload,
  windDirectionBody,
  windSpeedBody,
} from './fixtures';

const rainfall = () => toPayload(rainfallBody());
const windSpeed = () => toPayload(windSpeedBody());
const windDirection = () => toPayload(windDirectionBody());

test('escapeHtml escapes markup characters', () => {
  expect(escapeHtml('A & B <Test>')).toBe('A &amp; B &lt;Test&gt;');
});

test('rainfall summary lists statistics and the wettest stations', () => {
  expect(renderRainfallReport(rainfall(), null)).toBe(
    [
      '🌧️ <b>Rainfall Summary</b>',
      '',
      `📅 <b>Time</b>: ${READING_TIME_DISPLAY}`,
      '📊 <b>Statistics</b>:',
      '• Average: 4.2 mm',
      '• Minimum: 0.0 mm',
      '• Maximum: 12.4 mm',
      '• Active stations: 3',
      '',
      '🏆 <b>Top Rainfall Locations</b>:',
      '1. Clementi Road: 12.4 mm',
      '2. Marina Gardens Drive: 0.2 mm',
      '',
      '💡 <i>Use /rainfall [station] for specific station data</i>',
    ].join('\n'),
  );
});

test('rainfall summary notes a dry island', () => {
  const dry = toPayload(
    rawBody({
      stations: [rawStation('S60', 'Sentosa')],
      values: [['S60', 0]],
    }),
  );
  const lines = renderRainfallReport(dry, null).split('\n');
  expect(lines).toContain('☀️ <i>No rainfall detected across all stations</i>');
  expect(lines).not.toContain('🏆 <b>Top Rainfall Locations</b>:');
});

test('rainfall for a station shows its value and intensity', () => {
  expect(renderRainfallReport(rainfall(), 'marina')).toBe(
    [
      '🌧️ <b>Rainfall Data</b>',
      '',
      '📍 <b>Station</b>: Marina Gardens Drive (S108)',
      `📅 <b>Time</b>: ${READING_TIME_DISPLAY}`,
      '🌧️ <b>Rainfall</b>: 0.2 mm',
      '',
      '🌦️ <i>Light rainfall</i>',
    ].join('\n'),
  );
  expect(renderRainfallReport(rainfall(), 'clementi')).toContain('⛈️ <i>Heavy rainfall</i>');
  expect(renderRainfallReport(rainfall(), 'S60').split('\n').slice(-3)).toEqual([
    '🌧️ <b>Rainfall</b>: 0.0 mm',
    '',
    '☀️ <i>No rainfall detected</i>',
  ]);
});

test('rainfall for a station without a value says so', () => {
  const lines = renderRainfallReport(rainfall(), 'jurong').split('\n');
  expect(lines[lines.length - 1]).toBe('🌧️ <b>Rainfall</b>: No data');
});

test('rainfall for an unknown station returns the not-found reply', () => {
  expect(renderRainfallReport(rainfall(), 'atlantis')).toBe(stationNotFoundMessage('atlantis', 'rainfall'));
  expect(stationNotFoundMessage('<x>').split('\n')[0]).toBe("❌ <b>Station not found</b>: '&lt;x&gt;'");
});

test('rainfall for all stations sorts by value with gaps as zero', () => {
  const lines = renderRainfallReport(rainfall(), 'ALL').split('\n');
  expect(lines.filter((line) => line.startsWith('📍'))).toEqual([
    '📍 <b>Clementi Road</b> (S50): 12.4 mm',
    '📍 <b>Marina Gardens Drive</b> (S108): 0.2 mm',
    '📍 <b>Sentosa</b> (S60): 0.0 mm',
    '📍 <b>Jurong Pier Road</b> (S33): No data',
  ]);
});

test('wind speed summary ranks all stations', () => {
  const lines = renderWindSpeedReport(windSpeed(), null).split('\n');
  expect(lines).toContain('• Average: 15.8 knots');
  expect(lines).toContain('• Active stations: 3');
  expect(lines.filter((line) => /^\d\. /.test(line))).toEqual([
    '1. Tuas South Avenue 3: 30.0 knots',
    '2. Sentosa: 12.1 knots',
    '3. Marina Gardens Drive: 5.4 knots',
  ]);
});

test('wind speed for a station shows the breeze category', () => {
  const lines = renderWindSpeedReport(windSpeed(), 'tuas').split('\n');
  expect(lines.slice(-3)).toEqual(['💨 <b>Wind Speed</b>: 30.0 knots', '', '⛈️ <i>Very strong wind</i>']);
});

test('wind speed for an unknown station mentions limited wind coverage', () => {
  expect(renderWindSpeedReport(windSpeed(), 'bedok')).toContain('Wind data is only available at selected stations.');
});

test('wind direction for a station shows label and heading', () => {
  const lines = renderWindDirectionReport(windDirection(), 'sentosa').split('\n');
  expect(lines.slice(-3)).toEqual(['🧭 <b>Direction</b>: 350° (NW-N)', '', '⬆️ <i>Wind from North</i>']);
});

test('wind direction lists stations by name', () => {
  const lines = renderWindDirectionReport(windDirection(), 'all').split('\n');
  expect(lines.filter((line) => line.startsWith('📍'))).toEqual([
    '📍 <b>Marina Gardens Drive</b> (S108): 135° (SE)',
    '📍 <b>Sentosa</b> (S60): 350° (NW-N)',
    '📍 <b>Upper Changi Road North</b> (S24): No data',
  ]);

  const summary = renderWindDirectionReport(windDirection(), null).split('\n');
  expect(summary).toContain('📊 <b>Available from 3 stations</b>');
  expect(summary.filter((line) => line.startsWith('• '))).toEqual(['• Marina Gardens Drive: 135° (SE)', '• Sentosa: 350° (NW-N)']);
});

test('combined wind report joins speed and direction for a station', () => {
  expect(renderWindReport({ windSpeed: windSpeed(), windDirection: windDirection() }, 'marina')).toBe(
    [
      '🌬️ <b>Wind Data - Marina Gardens Drive</b>',
      '',
      '📍 <b>Station</b>: Marina Gardens Drive (S108)',
      `📅 <b>Time</b>: ${READING_TIME_DISPLAY}`,
      '',
      '💨 <b>Wind Speed</b>: 5.4 knots',
      '🍃 <i>Light breeze</i>',
      '🧭 <b>Wind Direction</b>: 135° (SE)',
      '↘️ <i>Wind from Southeast</i>',
      '',
      '💡 <i>Use /wind all to see all stations or /wind [station] for other stations</i>',
    ].join('\n'),
  );
});

test('combined wind report resolves stations that only report direction', () => {
  const text = renderWindReport({ windSpeed: windSpeed(), windDirection: windDirection() }, 'changi');
  expect(text).toContain('📍 <b>Station</b>: Upper Changi Road North (S24)');
  expect(text).toContain('💨 <b>Wind Speed</b>: No data');
  expect(text).toContain('🧭 <b>Wind Direction</b>: No data');
});

test('combined wind summary reports speed range and direction coverage', () => {
  const lines = renderWindReport({ windSpeed: windSpeed(), windDirection: windDirection() }, null).split('\n');
  expect(lines).toContain('• Range: 5.4 - 30.0 knots');
  expect(lines).toContain('🧭 <b>Wind Direction Data</b>: Available from 2 stations');
});

test('combined wind report for all stations pairs both readings', () => {
  const lines = renderWindReport({ windSpeed: windSpeed(), windDirection: null }, 'all').split('\n');
  expect(lines).toContain('💨 Speed: 30.0 knots | 🧭 Direction: No data');
});

test('weather overview skips missing sources', () => {
  const lines = renderWeatherOverview({ ...fullSnapshot(), windSpeed: null }).split('\n');
  expect(lines).toContain(`🌧️ <b>Rainfall</b> (as of ${READING_TIME_DISPLAY})`);
  expect(lines).toContain('• Highest: 12.4 mm at Clementi Road');
  expect(lines).toContain('• Data available from 3 stations');
  expect(lines.some((line) => line.includes('Wind Speed'))).toBe(false);
});

test('weather overview reports an error when nothing is available', () => {
  expect(renderWeatherOverview({ rainfall: null, windSpeed: null, windDirection: null })).toBe(
    '❌ <b>Error</b>: Unable to fetch weather data. Please try again later.',
  );
});

test('station directory marks each available source', () => {
  const lines = renderStationDirectory(fullSnapshot()).split('\n');
  expect(lines.filter((line) => line.startsWith('• <b>'))).toEqual([
    '• <b>Clementi Road</b> (S50) 🌧️',
    '• <b>Jurong Pier Road</b> (S33) 🌧️',
    '• <b>Marina Gardens Drive</b> (S108) 🌧️💨🧭',
    '• <b>Sentosa</b> (S60) 🌧️💨🧭',
    '• <b>Tuas South Avenue 3</b> (S115) 💨',
    '• <b>Upper Changi Road North</b> (S24) 🧭',
  ]);
  expect(renderStationDirectory({ rainfall: null, windSpeed: null, windDirection: null })).toBe(
    '❌ <b>Error</b>: Unable to fetch station data. Please try again later.',
  );
});
