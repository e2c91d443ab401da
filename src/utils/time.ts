export const DISPLAY_TIME_ZONE = 'Asia/Singapore';
export const DISPLAY_TIME_ZONE_LABEL = 'SGT';

export const parseIsoTimeToMs = (value: string | null | undefined): number | null => {
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }

  const trimmed = value.trim();
  const withTimezone = /([zZ]|[+\-]\d{2}:\d{2})$/.test(trimmed);
  const parsed = Date.parse(withTimezone ? trimmed : `${trimmed}Z`);
  return Number.isFinite(parsed) ? parsed : null;
};

const displayFormatter = new Intl.DateTimeFormat('en-US', {
  timeZone: DISPLAY_TIME_ZONE,
  day: '2-digit',
  month: 'short',
  year: 'numeric',
  hour: '2-digit',
  minute: '2-digit',
  hour12: true,
});

/**
 * Renders an upstream reading timestamp as `DD Mon YYYY, hh:mm AM SGT`.
 * Input that does not parse is logged and returned untouched.
 */
export const formatReadingTimestamp = (timestamp: string): string => {
  const ms = parseIsoTimeToMs(timestamp);
  if (ms === null) {
    console.error(`[Time] could not format timestamp "${timestamp}"`);
    return timestamp;
  }
  const parts = displayFormatter.formatToParts(new Date(ms));
  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((entry) => entry.type === type)?.value ?? '';
  return `${part('day')} ${part('month')} ${part('year')}, ${part('hour')}:${part('minute')} ${part('dayPeriod').toUpperCase()} ${DISPLAY_TIME_ZONE_LABEL}`;
};
