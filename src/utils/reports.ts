import { METRIC_KEYS, MetricKey, SourcePayload, WeatherSnapshot } from './payload';
import { classifyRainfall } from './rainfall';
import {
  buildStationDirectory,
  buildWindObservations,
  latestTimestamp,
  latestValue,
  listStationValues,
  rankStations,
  summaryStats,
  WindObservation,
} from './readings';
import { resolveStation } from './stations';
import { formatReadingTimestamp } from './time';
import { classifyWindDirection, classifyWindSpeed, describeWindHeading } from './wind';

export const PARSE_MODE = 'HTML';

export const escapeHtml = (value: string): string =>
  value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

const bold = (value: string) => `<b>${value}</b>`;
const italic = (value: string) => `<i>${value}</i>`;
const oneDecimal = (value: number) => value.toFixed(1);

const isAllQuery = (query: string | null): boolean => query !== null && query.trim().toLowerCase() === 'all';

const timeLabel = (payload: SourcePayload | null): string => {
  const timestamp = latestTimestamp(payload);
  return timestamp ? formatReadingTimestamp(timestamp) : 'Unknown';
};

export const START_MESSAGE = [
  `🌤️ ${bold('Singapore Weather Bot')}`,
  '',
  "Welcome! I provide real-time weather data from Singapore's government APIs.",
  '',
  bold('Quick Start:'),
  '/menu - Interactive menu with all options 🎯',
  '',
  bold('Available Commands:'),
  '/weather - Get complete weather overview',
  '/rainfall [station|all] - Get rainfall data',
  '/windspeed [station|all] - Get wind speed data',
  '/winddirection [station|all] - Get wind direction data',
  '/wind [station|all] - Get complete wind data',
  '/stations - List all available stations',
  '/help - Show detailed help message',
  '',
  bold('Examples:'),
  '• <code>/weather</code> - Overall weather summary',
  '• <code>/rainfall marina</code> - Rainfall at Marina area',
  '• <code>/rainfall all</code> - All stations with rainfall data',
  '• <code>/windspeed S108</code> - Wind speed at station S108',
  '• <code>/wind marina</code> - Complete wind data for Marina area',
  '',
  'Type /menu for an interactive interface or /help for detailed instructions.',
].join('\n');

export const HELP_MESSAGE = [
  `🌤️ ${bold('Singapore Weather Bot Help')}`,
  '',
  `🎯 <code>/menu</code> - Interactive menu with buttons for all commands`,
  '',
  `🌦️ <code>/weather</code> - Complete weather overview`,
  '• Rainfall, wind speed and wind direction summary from all active stations',
  '',
  `🌧️ <code>/rainfall [station|all]</code> - Rainfall in millimetres (mm)`,
  `💨 <code>/windspeed [station|all]</code> - Wind speed in knots`,
  `🧭 <code>/winddirection [station|all]</code> - Wind direction in degrees with compass label`,
  `🌬️ <code>/wind [station|all]</code> - Wind speed and direction together`,
  '• Without a station: overall summary',
  '• With a station: that station only',
  '• With <code>all</code>: every station',
  '',
  `📍 <code>/stations</code> - List all monitoring stations`,
  '',
  bold('Station Examples:'),
  '• Station ID: <code>S108</code>, <code>S60</code>, <code>S107</code>',
  '• Place name: <code>marina</code>, <code>sentosa</code>, <code>changi</code>',
  '• Partial name: <code>jurong</code>, <code>woodlands</code>, <code>clementi</code>',
  '',
  bold('Tips:'),
  '• Station names are case-insensitive',
  '• Partial matches return the first station whose name contains the text',
  '• Data is updated every few minutes',
  '• All times shown in Singapore Time (SGT)',
].join('\n');

export const MENU_MESSAGE = `🌤️ ${bold('Singapore Weather Bot Menu')}\n\nChoose an option below to get weather data:`;

export interface InlineKeyboardButton {
  text: string;
  callback_data: string;
}

export interface InlineKeyboardMarkup {
  inline_keyboard: InlineKeyboardButton[][];
}

export const MENU_KEYBOARD: InlineKeyboardMarkup = {
  inline_keyboard: [
    [{ text: '🌦️ Complete Weather', callback_data: 'weather' }],
    [
      { text: '🌧️ Rainfall Summary', callback_data: 'rainfall' },
      { text: '🌧️ All Rainfall', callback_data: 'rainfall_all' },
    ],
    [
      { text: '💨 Wind Speed Summary', callback_data: 'windspeed' },
      { text: '💨 All Wind Speed', callback_data: 'windspeed_all' },
    ],
    [
      { text: '🧭 Wind Direction Summary', callback_data: 'winddirection' },
      { text: '🧭 All Wind Direction', callback_data: 'winddirection_all' },
    ],
    [{ text: '🌬️ Complete Wind Data', callback_data: 'wind' }],
    [{ text: '📍 All Stations', callback_data: 'stations' }],
  ],
};

export const unavailableMessage = (subject: string): string =>
  `❌ ${bold('Error')}: Unable to fetch ${subject}. Please try again later.`;

export const failureMessage = (subject: string): string =>
  `❌ ${bold('Error')}: Failed to fetch ${subject}. Please try again later.`;

export const GENERIC_ERROR_MESSAGE = `❌ ${bold('Error')}: Something went wrong. Please try again later.\n\nIf the problem persists, use /help for available commands.`;

export const UNKNOWN_OPTION_MESSAGE = `❌ ${bold('Error')}: Unknown option selected.`;

export const stationNotFoundMessage = (query: string, metric?: MetricKey): string => {
  const lines = [`❌ ${bold('Station not found')}: '${escapeHtml(query)}'`, ''];
  if (metric === 'windSpeed' || metric === 'windDirection') {
    lines.push('Wind data is only available at selected stations.');
  }
  lines.push(
    'Use /stations to see available stations, or try:',
    '• Station ID (e.g., S108)',
    '• Station name (e.g., Marina)',
    '• Partial name (e.g., jurong)',
    '• <code>all</code> to see all stations',
  );
  return lines.join('\n');
};

interface ScalarReportConfig {
  metric: 'rainfall' | 'windSpeed';
  command: string;
  icon: string;
  title: string;
  unit: string;
  topTitle: string;
  positiveOnly: boolean;
  describe: (value: number) => { icon: string; label: string };
}

const RAINFALL_REPORT: ScalarReportConfig = {
  metric: 'rainfall',
  command: '/rainfall',
  icon: '🌧️',
  title: 'Rainfall',
  unit: 'mm',
  topTitle: 'Top Rainfall Locations',
  positiveOnly: true,
  describe: classifyRainfall,
};

const WIND_SPEED_REPORT: ScalarReportConfig = {
  metric: 'windSpeed',
  command: '/windspeed',
  icon: '💨',
  title: 'Wind Speed',
  unit: 'knots',
  topTitle: 'Highest Wind Speed Locations',
  positiveOnly: false,
  describe: classifyWindSpeed,
};

const renderScalarReport = (config: ScalarReportConfig, payload: SourcePayload, query: string | null): string => {
  const { icon, title, unit, command } = config;
  const time = timeLabel(payload);

  if (isAllQuery(query)) {
    const rows = listStationValues(payload).sort((a, b) => (b.value ?? 0) - (a.value ?? 0));
    const lines = [`${icon} ${bold(`All ${title} Stations`)}`, '', `📅 ${bold('Time')}: ${time}`, ''];
    for (const { station, value } of rows) {
      const shown = value !== null ? `${oneDecimal(value)} ${unit}` : 'No data';
      lines.push(`📍 ${bold(escapeHtml(station.name))} (${escapeHtml(station.id)}): ${shown}`);
    }
    lines.push('', `💡 ${italic(`Use ${command} [station] for specific station details`)}`);
    return lines.join('\n');
  }

  if (query && query.trim()) {
    const station = resolveStation(payload.data.stations, query);
    if (!station) {
      return stationNotFoundMessage(query, config.metric);
    }
    const value = latestValue(payload.data.readings, station.id);
    const lines = [
      `${icon} ${bold(`${title} Data`)}`,
      '',
      `📍 ${bold('Station')}: ${escapeHtml(station.name)} (${escapeHtml(station.id)})`,
      `📅 ${bold('Time')}: ${time}`,
      `${icon} ${bold(title)}: ${value !== null ? `${oneDecimal(value)} ${unit}` : 'No data'}`,
    ];
    if (value !== null) {
      const category = config.describe(value);
      lines.push('', `${category.icon} ${italic(category.label)}`);
    }
    return lines.join('\n');
  }

  const stats = summaryStats(payload.data.readings);
  const lines = [
    `${icon} ${bold(`${title} Summary`)}`,
    '',
    `📅 ${bold('Time')}: ${time}`,
    `📊 ${bold('Statistics')}:`,
    `• Average: ${oneDecimal(stats.avg)} ${unit}`,
    `• Minimum: ${oneDecimal(stats.min)} ${unit}`,
    `• Maximum: ${oneDecimal(stats.max)} ${unit}`,
    `• Active stations: ${stats.count}`,
  ];
  const top = rankStations(payload, 3, { positiveOnly: config.positiveOnly });
  if (top.length) {
    lines.push('', `🏆 ${bold(config.topTitle)}:`);
    top.forEach(({ station, value }, index) => {
      lines.push(`${index + 1}. ${escapeHtml(station.name)}: ${oneDecimal(value)} ${unit}`);
    });
  } else if (config.metric === 'rainfall') {
    lines.push('', `☀️ ${italic('No rainfall detected across all stations')}`);
  }
  lines.push('', `💡 ${italic(`Use ${command} [station] for specific station data`)}`);
  return lines.join('\n');
};

export const renderRainfallReport = (payload: SourcePayload, query: string | null): string =>
  renderScalarReport(RAINFALL_REPORT, payload, query);

export const renderWindSpeedReport = (payload: SourcePayload, query: string | null): string =>
  renderScalarReport(WIND_SPEED_REPORT, payload, query);

const degreesWithLabel = (degrees: number) => `${degrees}° (${classifyWindDirection(degrees)})`;

const headingLine = (degrees: number): string | null => {
  const heading = describeWindHeading(degrees);
  return heading ? `${heading.arrow} ${italic(heading.text)}` : null;
};

export const renderWindDirectionReport = (payload: SourcePayload, query: string | null): string => {
  const time = timeLabel(payload);
  const byName = listStationValues(payload).sort((a, b) => a.station.name.localeCompare(b.station.name));

  if (isAllQuery(query)) {
    const lines = [`🧭 ${bold('All Wind Direction Stations')}`, '', `📅 ${bold('Time')}: ${time}`, ''];
    for (const { station, value } of byName) {
      const shown = value !== null ? degreesWithLabel(value) : 'No data';
      lines.push(`📍 ${bold(escapeHtml(station.name))} (${escapeHtml(station.id)}): ${shown}`);
    }
    lines.push('', `💡 ${italic('Use /winddirection [station] for specific station details')}`);
    return lines.join('\n');
  }

  if (query && query.trim()) {
    const station = resolveStation(payload.data.stations, query);
    if (!station) {
      return stationNotFoundMessage(query, 'windDirection');
    }
    const value = latestValue(payload.data.readings, station.id);
    const lines = [
      `🧭 ${bold('Wind Direction Data')}`,
      '',
      `📍 ${bold('Station')}: ${escapeHtml(station.name)} (${escapeHtml(station.id)})`,
      `📅 ${bold('Time')}: ${time}`,
    ];
    if (value === null) {
      lines.push(`🧭 ${bold('Direction')}: No data`);
      return lines.join('\n');
    }
    lines.push(`🧭 ${bold('Direction')}: ${degreesWithLabel(value)}`);
    const heading = headingLine(value);
    if (heading) {
      lines.push('', heading);
    }
    return lines.join('\n');
  }

  const lines = [
    `🧭 ${bold('Wind Direction Summary')}`,
    '',
    `📅 ${bold('Time')}: ${time}`,
    `📊 ${bold(`Available from ${payload.data.stations.length} stations`)}`,
  ];
  const withValues = byName.filter((row) => row.value !== null);
  if (withValues.length) {
    lines.push('', `🏆 ${bold('Wind Directions by Station')}:`);
    for (const { station, value } of withValues) {
      if (value !== null) {
        lines.push(`• ${escapeHtml(station.name)}: ${degreesWithLabel(value)}`);
      }
    }
  }
  lines.push('', `💡 ${italic('Use /winddirection [station] for specific station data')}`);
  return lines.join('\n');
};

const windSpeedText = (speed: number | null) => (speed !== null ? `${oneDecimal(speed)} knots` : 'No data');
const windDirectionText = (observation: WindObservation) =>
  observation.direction !== null ? `${observation.direction}° (${observation.directionLabel})` : 'No data';

export const renderWindReport = (
  wind: Pick<WeatherSnapshot, 'windSpeed' | 'windDirection'>,
  query: string | null,
): string => {
  const observations = buildWindObservations(wind.windSpeed, wind.windDirection);
  const timestamp = latestTimestamp(wind.windSpeed) ?? latestTimestamp(wind.windDirection);
  const timeLines = timestamp ? [`📅 ${bold('Time')}: ${formatReadingTimestamp(timestamp)}`, ''] : [];

  if (isAllQuery(query)) {
    const lines = [`🌬️ ${bold('Complete Wind Data (All Stations)')}`, '', ...timeLines];
    const sorted = [...observations].sort((a, b) => a.name.localeCompare(b.name));
    for (const observation of sorted) {
      lines.push(
        `📍 ${bold(escapeHtml(observation.name))} (${escapeHtml(observation.id)})`,
        `💨 Speed: ${windSpeedText(observation.speed)} | 🧭 Direction: ${windDirectionText(observation)}`,
        '',
      );
    }
    lines.push(`💡 ${italic('Use /wind [station] for specific station details')}`);
    return lines.join('\n');
  }

  if (query && query.trim()) {
    const observation = resolveStation(observations, query);
    if (!observation) {
      return stationNotFoundMessage(query, 'windSpeed');
    }
    const lines = [
      `🌬️ ${bold(`Wind Data - ${escapeHtml(observation.name)}`)}`,
      '',
      `📍 ${bold('Station')}: ${escapeHtml(observation.name)} (${escapeHtml(observation.id)})`,
      ...timeLines,
      `💨 ${bold('Wind Speed')}: ${windSpeedText(observation.speed)}`,
    ];
    if (observation.speed !== null) {
      const category = classifyWindSpeed(observation.speed);
      lines.push(`${category.icon} ${italic(category.label)}`);
    }
    lines.push(`🧭 ${bold('Wind Direction')}: ${windDirectionText(observation)}`);
    if (observation.direction !== null) {
      const heading = headingLine(observation.direction);
      if (heading) {
        lines.push(heading);
      }
    }
    lines.push('', `💡 ${italic('Use /wind all to see all stations or /wind [station] for other stations')}`);
    return lines.join('\n');
  }

  const lines = [`🌬️ ${bold('Wind Data Summary')}`, '', ...timeLines];
  const speeds = observations.flatMap((entry) => (entry.speed !== null ? [{ name: entry.name, speed: entry.speed }] : []));
  if (speeds.length) {
    const values = speeds.map((entry) => entry.speed);
    const avg = values.reduce((sum, value) => sum + value, 0) / values.length;
    lines.push(
      `💨 ${bold('Wind Speed Statistics')}:`,
      `• Average: ${oneDecimal(avg)} knots`,
      `• Range: ${oneDecimal(Math.min(...values))} - ${oneDecimal(Math.max(...values))} knots`,
      `• Active stations: ${speeds.length}`,
      '',
      `🏆 ${bold('Highest Wind Speed Locations')}:`,
    );
    [...speeds]
      .sort((a, b) => b.speed - a.speed)
      .slice(0, 3)
      .forEach((entry, index) => lines.push(`${index + 1}. ${escapeHtml(entry.name)}: ${oneDecimal(entry.speed)} knots`));
    lines.push('');
  }
  const directionCount = observations.filter((entry) => entry.direction !== null).length;
  if (directionCount) {
    lines.push(`🧭 ${bold('Wind Direction Data')}: Available from ${directionCount} stations`, '');
  }
  lines.push(`💡 ${italic('Use /wind [station] for specific station data or /wind all to see all stations')}`);
  return lines.join('\n');
};

export const renderWeatherOverview = (snapshot: WeatherSnapshot): string => {
  const { rainfall, windSpeed, windDirection } = snapshot;
  if (!rainfall && !windSpeed && !windDirection) {
    return unavailableMessage('weather data');
  }

  const lines = [`🌤️ ${bold('Singapore Weather Overview')}`, ''];
  if (rainfall) {
    const stats = summaryStats(rainfall.data.readings);
    lines.push(
      `🌧️ ${bold('Rainfall')} (as of ${timeLabel(rainfall)})`,
      `• Average: ${oneDecimal(stats.avg)} mm`,
      `• Range: ${oneDecimal(stats.min)} - ${oneDecimal(stats.max)} mm`,
      `• Active stations: ${stats.count}`,
    );
    const [peak] = rankStations(rainfall, 1, { positiveOnly: true });
    if (peak) {
      lines.push(`• Highest: ${oneDecimal(peak.value)} mm at ${escapeHtml(peak.station.name)}`);
    }
    lines.push('');
  }
  if (windSpeed) {
    const stats = summaryStats(windSpeed.data.readings);
    lines.push(
      `💨 ${bold('Wind Speed')} (as of ${timeLabel(windSpeed)})`,
      `• Average: ${oneDecimal(stats.avg)} knots`,
      `• Range: ${oneDecimal(stats.min)} - ${oneDecimal(stats.max)} knots`,
      `• Active stations: ${stats.count}`,
      '',
    );
  }
  if (windDirection) {
    lines.push(
      `🧭 ${bold('Wind Direction')} (as of ${timeLabel(windDirection)})`,
      `• Data available from ${windDirection.data.stations.length} stations`,
      '',
    );
  }
  lines.push(`💡 ${italic('Use /rainfall, /windspeed, or /winddirection with a station name for specific data')}`);
  return lines.join('\n');
};

const SOURCE_INDICATORS: Record<MetricKey, string> = {
  rainfall: '🌧️',
  windSpeed: '💨',
  windDirection: '🧭',
};

export const renderStationDirectory = (snapshot: WeatherSnapshot): string => {
  const directory = buildStationDirectory(snapshot);
  if (!directory.length) {
    return unavailableMessage('station data');
  }
  const lines = [`📍 ${bold('Available Weather Stations')}`, ''];
  for (const { station, sources } of directory) {
    const indicators = METRIC_KEYS.filter((metric) => sources.includes(metric))
      .map((metric) => SOURCE_INDICATORS[metric])
      .join('');
    lines.push(`• ${bold(escapeHtml(station.name))} (${escapeHtml(station.id)}) ${indicators}`);
  }
  lines.push(
    '',
    bold('Legend:'),
    '🌧️ Rainfall data available',
    '💨 Wind speed data available',
    '🧭 Wind direction data available',
    '',
    bold('Usage Examples:'),
    '• <code>/rainfall S108</code> - Get rainfall at Marina Gardens',
    '• <code>/windspeed marina</code> - Get wind speed at Marina area',
    '• <code>/winddirection sentosa</code> - Get wind direction at Sentosa',
  );
  return lines.join('\n');
};
