import { createEmptySnapshot, decodeSourcePayload, isMetricKey } from '../src/utils/payload';
import { rawStation, READING_TIME } from './fixtures';

test('decodeSourcePayload maps station coordinates and fills missing values', () => {
  const decoded = decodeSourcePayload({
    code: 0,
    data: {
      stations: [rawStation('S108', 'Marina Gardens Drive', 1.27, 103.87)],
      readings: [{ timestamp: READING_TIME, data: [{ stationId: 'S108' }, { stationId: 'S60', value: 1.5 }] }],
      readingUnit: 'mm',
    },
  });

  expect(decoded).toEqual({
    kind: 'ok',
    payload: {
      statusCode: 0,
      data: {
        stations: [{ id: 'S108', name: 'Marina Gardens Drive', location: { lat: 1.27, lon: 103.87 } }],
        readings: [
          {
            timestamp: READING_TIME,
            data: [
              { stationId: 'S108', value: null },
              { stationId: 'S60', value: 1.5 },
            ],
          },
        ],
        readingUnit: 'mm',
      },
    },
  });
});

test('decodeSourcePayload treats absent lists as empty', () => {
  const decoded = decodeSourcePayload({ code: 0, data: {} });
  expect(decoded).toEqual({ kind: 'ok', payload: { statusCode: 0, data: { stations: [], readings: [], readingUnit: null } } });
});

test('decodeSourcePayload reports a non-zero code as an API error', () => {
  expect(decodeSourcePayload({ code: 17, errorMsg: 'Invalid date' })).toEqual({
    kind: 'api-error',
    code: 17,
    message: 'Invalid date',
  });
  expect(decodeSourcePayload({ code: 4 })).toEqual({ kind: 'api-error', code: 4, message: null });
});

test('decodeSourcePayload flags bodies it cannot read', () => {
  expect(decodeSourcePayload('oops').kind).toBe('malformed');
  expect(decodeSourcePayload({ code: 0 }).kind).toBe('malformed');

  const decoded = decodeSourcePayload({ code: 0, data: { stations: [{ id: 'S1', name: 'X' }] } });
  expect(decoded.kind).toBe('malformed');
  if (decoded.kind === 'malformed') {
    expect(decoded.message).toMatch(/at data\.stations\.0\.location$/);
  }
});

test('isMetricKey accepts only known metrics', () => {
  expect(isMetricKey('windSpeed')).toBe(true);
  expect(isMetricKey('humidity')).toBe(false);
  expect(isMetricKey(3)).toBe(false);
});

test('createEmptySnapshot has every slot empty', () => {
  expect(createEmptySnapshot()).toEqual({ rainfall: null, windSpeed: null, windDirection: null });
});
