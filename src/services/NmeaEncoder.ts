import type { GeodeticCoordinate } from '../types/Coordinates';
import type { FixQuality, FixRecord } from '../types/Nmea';
import { computeNmeaChecksum } from './NmeaParser';

/**
 * NMEA-0183 sentence encoder
 */

export type NmeaField = string | number | undefined;

export type EncodableSentenceType = 'GGA' | 'RMC' | 'GSA' | 'VTG';

const QUALITY_CODES: Readonly<Record<FixQuality, number>> = {
  'no-fix': 0,
  gps: 1,
  dgps: 2,
  'rtk-fixed': 4,
  'rtk-float': 5,
  'dead-reckoning': 6,
};

const MODE_LETTERS: Readonly<Record<FixQuality, string>> = {
  'no-fix': 'N',
  gps: 'A',
  dgps: 'D',
  'rtk-fixed': 'R',
  'rtk-float': 'F',
  'dead-reckoning': 'E',
};

const KNOTS_TO_KMH = 1.852;

/**
 * Builds `$<talker><type>,<fields>*HH\r\n`. Undefined fields are left empty.
 */
export function encodeNmeaSentence(talker: string, type: string, fields: NmeaField[]): string {
  const body = [`${talker}${type}`, ...fields.map(f => (f === undefined ? '' : String(f)))].join(',');
  const checksum = computeNmeaChecksum(body).toString(16).toUpperCase().padStart(2, '0');
  return `$${body}*${checksum}\r\n`;
}

/**
 * Formats a fix record as one sentence of the given type
 */
export function encodeFixRecord(record: FixRecord, type: EncodableSentenceType): string {
  const talker = record.talker === 'P' ? 'GP' : record.talker;
  return encodeNmeaSentence(talker, type, FIELD_FORMATTERS[type](record));
}

const FIELD_FORMATTERS: Record<EncodableSentenceType, (record: FixRecord) => NmeaField[]> = {
  GGA: record => [
    formatTimeOfDay(record.timeOfDay),
    ...formatLatitude(record.position?.lat),
    ...formatLongitude(record.position?.lon),
    record.quality === undefined ? undefined : QUALITY_CODES[record.quality],
    record.satelliteCount === undefined ? undefined : String(record.satelliteCount).padStart(2, '0'),
    fixed(record.hdop, 1),
    fixed(record.altitudeMsl, 2),
    record.altitudeMsl === undefined ? undefined : 'M',
    fixed(record.geoidSeparation, 2),
    record.geoidSeparation === undefined ? undefined : 'M',
    undefined,
    undefined,
  ],

  RMC: record => [
    formatTimeOfDay(record.timeOfDay),
    record.position && record.quality !== 'no-fix' ? 'A' : 'V',
    ...formatLatitude(record.position?.lat),
    ...formatLongitude(record.position?.lon),
    fixed(record.speedKnots, 2),
    fixed(record.courseDegrees, 2),
    formatDate(record.timestamp),
    undefined,
    undefined,
    record.quality === undefined ? undefined : MODE_LETTERS[record.quality],
  ],

  GSA: record => [
    'A',
    gsaFixType(record),
    ...new Array<undefined>(12).fill(undefined),
    fixed(record.pdop, 2),
    fixed(record.hdop, 2),
    fixed(record.vdop, 2),
  ],

  VTG: record => [
    fixed(record.courseDegrees, 2),
    'T',
    undefined,
    'M',
    fixed(record.speedKnots, 2),
    'N',
    record.speedKnots === undefined ? undefined : (record.speedKnots * KNOTS_TO_KMH).toFixed(2),
    'K',
    record.quality === undefined ? undefined : MODE_LETTERS[record.quality],
  ],
};

function gsaFixType(record: FixRecord): number {
  if (!record.position || record.quality === 'no-fix') {
    return 1;
  }
  return record.altitudeMsl === undefined ? 2 : 3;
}

/**
 * GGA sentence reporting `position` at `time`, as sent to NTRIP casters that
 * select a nearby base station. Quality, satellite count and HDOP are fixed
 * placeholders.
 */
export function formatGgaSentence(position: GeodeticCoordinate, time: Date = new Date()): string {
  const seconds =
    time.getUTCHours() * 3600 + time.getUTCMinutes() * 60 + time.getUTCSeconds() +
    Math.floor(time.getUTCMilliseconds() / 10) / 100;

  return encodeNmeaSentence('GP', 'GGA', [
    formatTimeOfDay(seconds),
    ...formatLatitude(position.lat),
    ...formatLongitude(position.lon),
    '1',
    '10',
    '1',
    position.alt.toFixed(2),
    'M',
    '',
    '',
    '0.0',
    '0000',
  ]);
}

// =============================================================================
// Field formatting
// =============================================================================

function fixed(value: number | undefined, digits: number): string | undefined {
  return value === undefined ? undefined : value.toFixed(digits);
}

/**
 * Seconds since midnight → `hhmmss.ss`
 */
export function formatTimeOfDay(seconds: number | undefined): string | undefined {
  if (seconds === undefined) {
    return undefined;
  }

  const centiseconds = Math.round(seconds * 100) % (24 * 360000);
  const hours = Math.floor(centiseconds / 360000);
  const minutes = Math.floor((centiseconds % 360000) / 6000);
  const rest = centiseconds % 6000;

  return (
    String(hours).padStart(2, '0') +
    String(minutes).padStart(2, '0') +
    String(Math.floor(rest / 100)).padStart(2, '0') +
    '.' +
    String(rest % 100).padStart(2, '0')
  );
}

function formatDate(timestamp: Date | undefined): string | undefined {
  if (!timestamp) {
    return undefined;
  }
  return (
    String(timestamp.getUTCDate()).padStart(2, '0') +
    String(timestamp.getUTCMonth() + 1).padStart(2, '0') +
    String(timestamp.getUTCFullYear() % 100).padStart(2, '0')
  );
}

export function formatLatitude(lat: number | undefined): [NmeaField, NmeaField] {
  if (lat === undefined) {
    return [undefined, undefined];
  }
  return [formatDegreesMinutes(lat, 2), lat < 0 ? 'S' : 'N'];
}

export function formatLongitude(lon: number | undefined): [NmeaField, NmeaField] {
  if (lon === undefined) {
    return [undefined, undefined];
  }
  return [formatDegreesMinutes(lon, 3), lon < 0 ? 'W' : 'E'];
}

// Rounded in units of 1e-4 minutes so that 59.99995' carries into the degrees
function formatDegreesMinutes(value: number, degreeDigits: number): string {
  const units = Math.round(Math.abs(value) * 600000);
  const degrees = Math.floor(units / 600000);
  const minutes = (units - degrees * 600000) / 10000;
  return String(degrees).padStart(degreeDigits, '0') + minutes.toFixed(4).padStart(7, '0');
}
