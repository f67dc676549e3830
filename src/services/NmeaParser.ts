import type {
  CalendarDate,
  FixQuality,
  GgaSentence,
  GllSentence,
  GsaSentence,
  GsvSentence,
  HorizontalPosition,
  KnownSentenceType,
  NmeaSentence,
  RmcSentence,
  SatelliteInView,
  SentenceBase,
  VtgSentence,
  ZdaSentence,
} from '../types/Nmea';
import { ChecksumError, ParseError, toError } from '../utils/errors';
import { createLogger } from '../utils/logger';

/**
 * NMEA-0183 sentence parser
 *
 * `parseNmeaSentence` handles one line at a time and throws on bad input.
 * `NmeaStreamParser` wraps it for byte streams and turns every line into an
 * outcome, so a corrupted line never stops the stream.
 */

// NMEA-0183 limit, including the leading marker and CR/LF
export const NMEA_MAX_LINE_LENGTH = 82;

/**
 * XOR of every character of the sentence body (between `$`/`!` and `*`)
 */
export function computeNmeaChecksum(body: string): number {
  let checksum = 0;
  for (let i = 0; i < body.length; i++) {
    checksum ^= body.charCodeAt(i);
  }
  return checksum;
}

/**
 * Parses and validates a single sentence
 *
 * @throws ParseError on framing or field errors
 * @throws ChecksumError when the checksum does not match the body
 */
export function parseNmeaSentence(input: string): NmeaSentence {
  const raw = input.replace(/[\r\n]+$/, '');

  if (!raw.startsWith('$') && !raw.startsWith('!')) {
    throw new ParseError(`Sentence must start with '$' or '!': ${JSON.stringify(raw)}`);
  }

  const star = raw.indexOf('*');
  if (star < 0 || raw.indexOf('*', star + 1) >= 0) {
    throw new ParseError(`Sentence must contain exactly one '*': ${JSON.stringify(raw)}`);
  }

  const checksumText = raw.slice(star + 1);
  if (!/^[0-9A-Fa-f]{2}$/.test(checksumText)) {
    throw new ParseError(`Invalid checksum field ${JSON.stringify(checksumText)}`);
  }

  const body = raw.slice(1, star);
  const expected = parseInt(checksumText, 16);
  const actual = computeNmeaChecksum(body);
  if (expected !== actual) {
    throw new ChecksumError(expected, actual);
  }

  const fields = body.split(',');
  const address = fields[0];
  let talker: string;
  let sentenceType: string;

  if (address.startsWith('P')) {
    talker = 'P';
    sentenceType = address.slice(1);
  } else if (/^[A-Z0-9]{5}$/.test(address)) {
    talker = address.slice(0, 2);
    sentenceType = address.slice(2);
  } else {
    throw new ParseError(`Invalid sentence address ${JSON.stringify(address)}`);
  }

  const base: SentenceBase = { talker, raw };

  if (isKnownSentenceType(sentenceType)) {
    return SENTENCE_EXTRACTORS[sentenceType](fields, base);
  }

  return { ...base, type: 'unknown', sentenceType, fields: fields.slice(1) };
}

// =============================================================================
// Extractors
// =============================================================================

type Extractor<T extends NmeaSentence> = (fields: string[], base: SentenceBase) => T;

const SENTENCE_EXTRACTORS: {
  [K in KnownSentenceType]: Extractor<Extract<NmeaSentence, { type: K }>>;
} = {
  GGA: extractGga,
  RMC: extractRmc,
  GSA: extractGsa,
  GSV: extractGsv,
  VTG: extractVtg,
  GLL: extractGll,
  ZDA: extractZda,
};

function isKnownSentenceType(type: string): type is KnownSentenceType {
  return Object.hasOwn(SENTENCE_EXTRACTORS, type);
}

// GGA fix quality indicator; 7 (manual input) and 8 (simulator) carry no fix
const GGA_QUALITY: ReadonlyMap<number, FixQuality | undefined> = new Map<number, FixQuality | undefined>([
  [0, 'no-fix'],
  [1, 'gps'],
  [2, 'dgps'],
  [3, 'gps'],
  [4, 'rtk-fixed'],
  [5, 'rtk-float'],
  [6, 'dead-reckoning'],
  [7, undefined],
  [8, undefined],
]);

function extractGga(fields: string[], base: SentenceBase): GgaSentence {
  const qualityCode = parseIntegerField(fields, 6, 'fix quality');
  if (qualityCode !== undefined && !GGA_QUALITY.has(qualityCode)) {
    throw new ParseError(`Unknown GGA fix quality ${qualityCode}`);
  }
  const stationId = field(fields, 14).trim();

  return {
    ...base,
    type: 'GGA',
    timeOfDay: parseTimeField(fields, 1),
    position: parsePositionFields(fields, 2),
    quality: qualityCode === undefined ? undefined : GGA_QUALITY.get(qualityCode),
    satelliteCount: parseIntegerField(fields, 7, 'satellite count'),
    hdop: parseNumberField(fields, 8, 'HDOP'),
    altitudeMsl: parseNumberField(fields, 9, 'altitude'),
    geoidSeparation: parseNumberField(fields, 11, 'geoid separation'),
    correctionAge: parseNumberField(fields, 13, 'correction age'),
    stationId: stationId === '' ? undefined : stationId,
  };
}

function extractRmc(fields: string[], base: SentenceBase): RmcSentence {
  const variation = parseNumberField(fields, 10, 'magnetic variation');

  return {
    ...base,
    type: 'RMC',
    timeOfDay: parseTimeField(fields, 1),
    status: optionalText(fields, 2),
    position: parsePositionFields(fields, 3),
    speedKnots: parseNumberField(fields, 7, 'speed'),
    courseDegrees: parseNumberField(fields, 8, 'course'),
    date: parseDateField(fields, 9),
    magneticVariation:
      variation !== undefined && field(fields, 11) === 'W' ? -variation : variation,
    mode: optionalText(fields, 12),
  };
}

function extractGsa(fields: string[], base: SentenceBase): GsaSentence {
  const satelliteIds: number[] = [];
  for (let i = 3; i <= 14; i++) {
    const id = parseIntegerField(fields, i, 'satellite id');
    if (id !== undefined) {
      satelliteIds.push(id);
    }
  }

  return {
    ...base,
    type: 'GSA',
    selectionMode: optionalText(fields, 1),
    fixType: parseIntegerField(fields, 2, 'fix type'),
    satelliteIds,
    pdop: parseNumberField(fields, 15, 'PDOP'),
    hdop: parseNumberField(fields, 16, 'HDOP'),
    vdop: parseNumberField(fields, 17, 'VDOP'),
  };
}

function extractGsv(fields: string[], base: SentenceBase): GsvSentence {
  const totalMessages = parseIntegerField(fields, 1, 'message count');
  const messageNumber = parseIntegerField(fields, 2, 'message number');
  if (totalMessages === undefined || messageNumber === undefined) {
    throw new ParseError('GSV sentence without message count or number');
  }

  // Blocks of PRN, elevation, azimuth, SNR; NMEA 4.1 may append a signal id
  const satellites: SatelliteInView[] = [];
  for (let i = 4; i + 3 < fields.length; i += 4) {
    const prn = parseIntegerField(fields, i, 'PRN');
    if (prn === undefined) {
      continue;
    }
    satellites.push({
      prn,
      elevation: parseNumberField(fields, i + 1, 'elevation'),
      azimuth: parseNumberField(fields, i + 2, 'azimuth'),
      snr: parseNumberField(fields, i + 3, 'SNR'),
    });
  }

  return {
    ...base,
    type: 'GSV',
    totalMessages,
    messageNumber,
    satellitesInView: parseIntegerField(fields, 3, 'satellites in view'),
    satellites,
  };
}

function extractVtg(fields: string[], base: SentenceBase): VtgSentence {
  return {
    ...base,
    type: 'VTG',
    courseTrue: parseNumberField(fields, 1, 'true course'),
    courseMagnetic: parseNumberField(fields, 3, 'magnetic course'),
    speedKnots: parseNumberField(fields, 5, 'speed (knots)'),
    speedKmh: parseNumberField(fields, 7, 'speed (km/h)'),
    mode: optionalText(fields, 9),
  };
}

function extractGll(fields: string[], base: SentenceBase): GllSentence {
  return {
    ...base,
    type: 'GLL',
    position: parsePositionFields(fields, 1),
    timeOfDay: parseTimeField(fields, 5),
    status: optionalText(fields, 6),
    mode: optionalText(fields, 7),
  };
}

function extractZda(fields: string[], base: SentenceBase): ZdaSentence {
  const day = parseIntegerField(fields, 2, 'day');
  const month = parseIntegerField(fields, 3, 'month');
  const year = parseIntegerField(fields, 4, 'year');

  let date: CalendarDate | undefined;
  if (day !== undefined && month !== undefined && year !== undefined) {
    date = validateDate({ year, month, day });
  }

  return {
    ...base,
    type: 'ZDA',
    timeOfDay: parseTimeField(fields, 1),
    date,
    localZoneHours: parseNumberField(fields, 5, 'local zone hours'),
    localZoneMinutes: parseNumberField(fields, 6, 'local zone minutes'),
  };
}

// =============================================================================
// Field helpers
// =============================================================================

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)$/;

function field(fields: string[], index: number): string {
  return fields[index] ?? '';
}

function optionalText(fields: string[], index: number): string | undefined {
  const text = field(fields, index).trim();
  return text === '' ? undefined : text;
}

function parseNumberField(fields: string[], index: number, name: string): number | undefined {
  const text = field(fields, index).trim();
  if (text === '') {
    return undefined;
  }
  if (!DECIMAL_PATTERN.test(text)) {
    throw new ParseError(`Invalid ${name}: ${JSON.stringify(text)}`);
  }
  return Number(text);
}

function parseIntegerField(fields: string[], index: number, name: string): number | undefined {
  const text = field(fields, index).trim();
  if (text === '') {
    return undefined;
  }
  if (!/^\d+$/.test(text)) {
    throw new ParseError(`Invalid ${name}: ${JSON.stringify(text)}`);
  }
  return parseInt(text, 10);
}

/**
 * `hhmmss` or `hhmmss.ss` → seconds since midnight
 */
function parseTimeField(fields: string[], index: number): number | undefined {
  const text = field(fields, index).trim();
  if (text === '') {
    return undefined;
  }

  const match = /^(\d{2})(\d{2})(\d{2}(?:\.\d*)?)$/.exec(text);
  if (!match) {
    throw new ParseError(`Invalid time ${JSON.stringify(text)}`);
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = Number(match[3]);
  if (hours > 23 || minutes > 59 || seconds >= 61) {
    throw new ParseError(`Time out of range ${JSON.stringify(text)}`);
  }

  return hours * 3600 + minutes * 60 + seconds;
}

/**
 * `ddmmyy` → calendar date; two-digit years below 80 are 20xx
 */
function parseDateField(fields: string[], index: number): CalendarDate | undefined {
  const text = field(fields, index).trim();
  if (text === '') {
    return undefined;
  }

  const match = /^(\d{2})(\d{2})(\d{2})$/.exec(text);
  if (!match) {
    throw new ParseError(`Invalid date ${JSON.stringify(text)}`);
  }

  const yy = Number(match[3]);
  return validateDate({
    year: yy < 80 ? 2000 + yy : 1900 + yy,
    month: Number(match[2]),
    day: Number(match[1]),
  });
}

function validateDate(date: CalendarDate): CalendarDate {
  if (date.month < 1 || date.month > 12 || date.day < 1 || date.day > 31) {
    throw new ParseError(`Invalid date ${date.year}-${date.month}-${date.day}`);
  }
  return date;
}

/**
 * Reads `ddmm.mmmm,N,dddmm.mmmm,E` starting at `index`. Returns undefined
 * when all four fields are empty (no fix).
 */
function parsePositionFields(fields: string[], index: number): HorizontalPosition | undefined {
  const lat = parseCoordinate(field(fields, index), field(fields, index + 1), 'N', 'S', 90);
  const lon = parseCoordinate(field(fields, index + 2), field(fields, index + 3), 'E', 'W', 180);

  if (lat === undefined && lon === undefined) {
    return undefined;
  }
  if (lat === undefined || lon === undefined) {
    throw new ParseError('Position has latitude or longitude but not both');
  }
  return { lat, lon };
}

function parseCoordinate(
  value: string,
  hemisphere: string,
  positive: string,
  negative: string,
  limit: number,
): number | undefined {
  const text = value.trim();
  const hemi = hemisphere.trim();
  if (text === '' && hemi === '') {
    return undefined;
  }

  // Degrees are everything before the two integer minute digits
  const dot = text.indexOf('.');
  const integerEnd = dot < 0 ? text.length : dot;
  const degreesText = text.slice(0, integerEnd - 2);
  const minutesText = text.slice(integerEnd - 2);

  if (integerEnd < 3 || !/^\d+$/.test(degreesText) || !/^\d{2}(\.\d*)?$/.test(minutesText)) {
    throw new ParseError(`Invalid coordinate ${JSON.stringify(text)}`);
  }

  const minutes = Number(minutesText);
  const degrees = Number(degreesText) + minutes / 60;
  if (minutes >= 60 || degrees > limit) {
    throw new ParseError(`Coordinate out of range ${JSON.stringify(text)}`);
  }

  if (hemi === positive) {
    return degrees;
  }
  if (hemi === negative) {
    return -degrees;
  }
  throw new ParseError(`Invalid hemisphere ${JSON.stringify(hemi)}`);
}

// =============================================================================
// Stream parser
// =============================================================================

export type NmeaLineOutcome =
  | { ok: true; sentence: NmeaSentence }
  | { ok: false; error: Error; line: string };

export interface NmeaStreamParserOptions {
  /** Longest unterminated line kept before it is dropped */
  maxLineLength?: number;
}

export interface NmeaStreamStats {
  accepted: number;
  rejected: number;
}

/**
 * Splits a text or byte stream into lines and parses each one.
 * Partial lines are buffered until the next chunk completes them.
 */
export class NmeaStreamParser {
  private readonly maxLineLength: number;
  private buffer = '';
  // Set after an overlong line; the rest of it is skipped up to the next newline
  private discarding = false;
  private stats: NmeaStreamStats = { accepted: 0, rejected: 0 };
  private readonly logger = createLogger({ component: 'NmeaStreamParser' });

  constructor(options: NmeaStreamParserOptions = {}) {
    this.maxLineLength = options.maxLineLength ?? NMEA_MAX_LINE_LENGTH;
  }

  feed(chunk: string | Uint8Array): NmeaLineOutcome[] {
    const text = typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('latin1');
    const outcomes: NmeaLineOutcome[] = [];
    let rest = text;

    while (rest.length > 0) {
      const newline = rest.indexOf('\n');

      if (newline < 0) {
        if (!this.discarding) {
          this.buffer += rest;
          if (this.buffer.length > this.maxLineLength) {
            outcomes.push(this.reject(
              this.buffer,
              new ParseError(`Line exceeds ${this.maxLineLength} characters without a terminator`),
            ));
            this.buffer = '';
            this.discarding = true;
          }
        }
        break;
      }

      const piece = rest.slice(0, newline);
      rest = rest.slice(newline + 1);

      if (this.discarding) {
        this.discarding = false;
        continue;
      }

      const line = (this.buffer + piece).replace(/\r$/, '');
      this.buffer = '';
      if (line.trim() === '') {
        continue;
      }
      outcomes.push(this.parseLine(line));
    }

    return outcomes;
  }

  getStats(): NmeaStreamStats {
    return { ...this.stats };
  }

  /** Drops any buffered partial line */
  reset(): void {
    this.buffer = '';
    this.discarding = false;
  }

  private parseLine(line: string): NmeaLineOutcome {
    try {
      const sentence = parseNmeaSentence(line);
      this.stats.accepted += 1;
      return { ok: true, sentence };
    } catch (error) {
      return this.reject(line, toError(error));
    }
  }

  private reject(line: string, error: Error): NmeaLineOutcome {
    this.stats.rejected += 1;
    this.logger.debug({ line, error: error.message }, 'Rejected NMEA line');
    return { ok: false, error, line };
  }
}
