const CARDINAL_DIRECTIONS = [
  'N',
  'NNE',
  'NE',
  'ENE',
  'E',
  'ESE',
  'SE',
  'SSE',
  'S',
  'SSW',
  'SW',
  'WSW',
  'W',
  'WNW',
  'NW',
  'NNW',
] as const;

const CARDINAL_DIRECTION_SET: ReadonlySet<string> = new Set(CARDINAL_DIRECTIONS);

// Arrow points where the wind blows to: a northerly (from N) blows south.
const WIND_DIRECTION_ARROWS: Record<string, string> = {
  N: '↓',
  NNE: '↙',
  NE: '↙',
  ENE: '←',
  E: '←',
  ESE: '↖',
  SE: '↖',
  SSE: '↑',
  S: '↑',
  SSW: '↗',
  SW: '↗',
  WSW: '→',
  W: '→',
  WNW: '↘',
  NW: '↘',
  NNW: '↓',
};

const WIND_DIRECTION_NAMES_FR: Record<string, string> = {
  N: 'Nord',
  NNE: 'Nord-Nord-Est',
  NE: 'Nord-Est',
  ENE: 'Est-Nord-Est',
  E: 'Est',
  ESE: 'Est-Sud-Est',
  SE: 'Sud-Est',
  SSE: 'Sud-Sud-Est',
  S: 'Sud',
  SSW: 'Sud-Sud-Ouest',
  SW: 'Sud-Ouest',
  WSW: 'Ouest-Sud-Ouest',
  W: 'Ouest',
  WNW: 'Ouest-Nord-Ouest',
  NW: 'Nord-Ouest',
  NNW: 'Nord-Nord-Ouest',
};

// One of the 16 compass points, or null for anything else (calm, variable, free text).
export const normalizeWindDirection = (value: string | null | undefined): string | null => {
  if (typeof value !== 'string') {
    return null;
  }
  const raw = value.trim().toUpperCase();
  if (!raw) {
    return null;
  }
  const cleaned = raw.replace(/[^A-Z\s]/g, ' ').replace(/\s+/g, ' ').trim();
  const compact = cleaned.replace(/\s+/g, '');
  if (CARDINAL_DIRECTION_SET.has(compact)) {
    return compact;
  }

  const wordMap: [string, string][] = [
    ['NORTH NORTHWEST', 'NNW'],
    ['NORTH NORTHEAST', 'NNE'],
    ['SOUTH SOUTHEAST', 'SSE'],
    ['SOUTH SOUTHWEST', 'SSW'],
    ['EAST NORTHEAST', 'ENE'],
    ['EAST SOUTHEAST', 'ESE'],
    ['WEST NORTHWEST', 'WNW'],
    ['WEST SOUTHWEST', 'WSW'],
    ['NORTHWEST', 'NW'],
    ['NORTHEAST', 'NE'],
    ['SOUTHWEST', 'SW'],
    ['SOUTHEAST', 'SE'],
    ['NORTH', 'N'],
    ['SOUTH', 'S'],
    ['EAST', 'E'],
    ['WEST', 'W'],
  ];
  const cleanedNoSpace = cleaned.replace(/\s+/g, '');
  for (const [needle, normalized] of wordMap) {
    const needleNoSpace = needle.replace(/\s+/g, '');
    if (cleaned.includes(needle) || cleanedNoSpace.includes(needleNoSpace)) {
      return normalized;
    }
  }

  return null;
};

export const windDegreesToCardinal = (degrees: number | string | null | undefined): string | null => {
  if (degrees === null || degrees === undefined) {
    return null;
  }
  if (typeof degrees === 'string' && !degrees.trim()) {
    return null;
  }
  const value = Number(degrees);
  if (!Number.isFinite(value)) {
    return null;
  }
  const normalized = ((value % 360) + 360) % 360;
  return CARDINAL_DIRECTIONS[Math.round(normalized / 22.5) % CARDINAL_DIRECTIONS.length];
};

export const windDirectionArrow = (direction: string | null | undefined): string => {
  if (!direction) {
    return '?';
  }
  return WIND_DIRECTION_ARROWS[direction.toUpperCase()] ?? '?';
};

export const windDirectionNameFr = (direction: string | null | undefined): string => {
  if (!direction) {
    return '–';
  }
  return WIND_DIRECTION_NAMES_FR[direction.toUpperCase()] ?? '–';
};

// Most frequent non-null direction; ties go to the alphabetically first label.
export const findDominantDirection = (directions: readonly (string | null)[]): string | null => {
  const counts = new Map<string, number>();
  for (const direction of directions) {
    if (!direction) {
      continue;
    }
    counts.set(direction, (counts.get(direction) ?? 0) + 1);
  }

  let dominant: string | null = null;
  let dominantCount = 0;
  for (const [direction, count] of counts) {
    if (count > dominantCount || (count === dominantCount && dominant !== null && direction < dominant)) {
      dominant = direction;
      dominantCount = count;
    }
  }
  return dominant;
};
