import type { Station } from './payload';

export const STATION_ALIASES: Readonly<Record<string, string>> = {
  marina: 'S108',
  sentosa: 'S60',
  changi: 'S107',
  jurong: 'S33',
  woodlands: 'S104',
  tuas: 'S115',
  clementi: 'S50',
  bishan: 'S217',
  tampines: 'S84',
  punggol: 'S81',
  yishun: 'S209',
  hougang: 'S221',
  'pasir ris': 'S94',
  'bukit timah': 'S90',
  'toa payoh': 'S88',
  'ang mo kio': 'S109',
  geylang: 'S215',
  orchard: 'S79',
  scotts: 'S111',
};

export const resolveByAlias = (token: string): string | null => {
  const key = token.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(STATION_ALIASES, key) ? STATION_ALIASES[key] : null;
};

/** First station (in list order) whose name contains the token, ignoring case. */
export const resolveByName = <T extends Pick<Station, 'name'>>(stations: T[], token: string): T | null => {
  const needle = token.trim().toLowerCase();
  return stations.find((station) => station.name.toLowerCase().includes(needle)) ?? null;
};

export const resolveById = <T extends Pick<Station, 'id'>>(stations: T[], id: string): T | null => {
  const wanted = id.trim().toUpperCase();
  return stations.find((station) => station.id.toUpperCase() === wanted) ?? null;
};

/**
 * Alias first, then name substring, then exact id. An alias whose station is
 * not carried by this list falls through to the name and id lookups.
 */
export const resolveStation = <T extends Pick<Station, 'id' | 'name'>>(stations: T[], token: string): T | null => {
  if (!token.trim()) {
    return null;
  }
  const aliasId = resolveByAlias(token);
  if (aliasId) {
    const aliased = resolveById(stations, aliasId);
    if (aliased) {
      return aliased;
    }
  }
  return resolveByName(stations, token) ?? resolveById(stations, token);
};
