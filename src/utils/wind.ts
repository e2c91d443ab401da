export const UNKNOWN_DIRECTION = 'Unknown';

export const WIND_DIRECTION_ANCHORS: ReadonlyArray<readonly [number, string]> = [
  [0, 'N'],
  [45, 'NE'],
  [90, 'E'],
  [135, 'SE'],
  [180, 'S'],
  [225, 'SW'],
  [270, 'W'],
  [315, 'NW'],
];

const ANCHOR_TOLERANCE_DEGREES = 22.5;

export const normalizeDegrees = (value: number): number => ((value % 360) + 360) % 360;

/**
 * Compass label for a bearing. Anything within 22.5° of an octant anchor takes
 * the anchor's label (ties go to the lower anchor); the remaining gap between
 * NW and a full turn is reported as the composite "NW-N".
 */
export const classifyWindDirection = (degrees: number | null | undefined): string => {
  if (degrees === null || degrees === undefined || !Number.isFinite(degrees)) {
    return UNKNOWN_DIRECTION;
  }
  const normalized = normalizeDegrees(degrees);

  let closest = WIND_DIRECTION_ANCHORS[0];
  for (const anchor of WIND_DIRECTION_ANCHORS) {
    if (Math.abs(anchor[0] - normalized) < Math.abs(closest[0] - normalized)) {
      closest = anchor;
    }
  }
  if (Math.abs(normalized - closest[0]) <= ANCHOR_TOLERANCE_DEGREES) {
    return closest[1];
  }

  const upperIndex = WIND_DIRECTION_ANCHORS.findIndex(([anchorDegrees]) => normalized < anchorDegrees);
  const last = WIND_DIRECTION_ANCHORS[WIND_DIRECTION_ANCHORS.length - 1];
  if (upperIndex === -1) {
    return `${last[1]}-${WIND_DIRECTION_ANCHORS[0][1]}`;
  }
  const lower = upperIndex === 0 ? last : WIND_DIRECTION_ANCHORS[upperIndex - 1];
  return `${lower[1]}-${WIND_DIRECTION_ANCHORS[upperIndex][1]}`;
};

export interface WindHeading {
  arrow: string;
  text: string;
}

const WIND_HEADINGS: WindHeading[] = [
  { arrow: '⬆️', text: 'Wind from North' },
  { arrow: '↗️', text: 'Wind from Northeast' },
  { arrow: '➡️', text: 'Wind from East' },
  { arrow: '↘️', text: 'Wind from Southeast' },
  { arrow: '⬇️', text: 'Wind from South' },
  { arrow: '↙️', text: 'Wind from Southwest' },
  { arrow: '⬅️', text: 'Wind from West' },
  { arrow: '↖️', text: 'Wind from Northwest' },
];

// 45° sectors centred on the anchors: [337.5, 22.5) is North.
export const describeWindHeading = (degrees: number | null | undefined): WindHeading | null => {
  if (degrees === null || degrees === undefined || !Number.isFinite(degrees)) {
    return null;
  }
  const index = Math.floor((normalizeDegrees(degrees) + 22.5) / 45) % 8;
  return WIND_HEADINGS[index];
};

export interface WindSpeedCategory {
  icon: string;
  label: string;
}

export const classifyWindSpeed = (knots: number): WindSpeedCategory => {
  if (knots < 1) {
    return { icon: '🌬️', label: 'Calm' };
  }
  if (knots < 7) {
    return { icon: '🍃', label: 'Light breeze' };
  }
  if (knots < 17) {
    return { icon: '💨', label: 'Moderate breeze' };
  }
  if (knots < 28) {
    return { icon: '🌪️', label: 'Strong breeze' };
  }
  return { icon: '⛈️', label: 'Very strong wind' };
};
