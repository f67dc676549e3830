import type { GeodeticCoordinate } from './Coordinates';

/**
 * NMEA-0183 sentence and fix record types
 */

// ===== Fix quality =====

export type FixQuality = 'no-fix' | 'gps' | 'dgps' | 'rtk-fixed' | 'rtk-float' | 'dead-reckoning';

/** Latitude/longitude pair as reported by a sentence, degrees */
export interface HorizontalPosition {
  lat: number;
  lon: number;
}

export interface CalendarDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

export interface SatelliteInView {
  prn: number;
  elevation?: number;
  azimuth?: number;
  snr?: number;
}

// ===== Sentences =====

export interface SentenceBase {
  /** Two-letter talker id (`GP`, `GN`, ...) or `P` for proprietary sentences */
  talker: string;
  /** Sentence line without the trailing CR/LF */
  raw: string;
}

export interface GgaSentence extends SentenceBase {
  type: 'GGA';
  /** Seconds since UTC midnight */
  timeOfDay?: number;
  position?: HorizontalPosition;
  quality?: FixQuality;
  satelliteCount?: number;
  hdop?: number;
  /** Antenna altitude above mean sea level, metres */
  altitudeMsl?: number;
  /** Geoid height above the ellipsoid, metres */
  geoidSeparation?: number;
  correctionAge?: number;
  stationId?: string;
}

export interface RmcSentence extends SentenceBase {
  type: 'RMC';
  timeOfDay?: number;
  /** `A` = valid, `V` = warning */
  status?: string;
  position?: HorizontalPosition;
  speedKnots?: number;
  courseDegrees?: number;
  date?: CalendarDate;
  magneticVariation?: number;
  /** FAA mode indicator (NMEA 2.3+) */
  mode?: string;
}

export interface GsaSentence extends SentenceBase {
  type: 'GSA';
  /** `A` = automatic, `M` = manual */
  selectionMode?: string;
  /** 1 = no fix, 2 = 2D, 3 = 3D */
  fixType?: number;
  satelliteIds: number[];
  pdop?: number;
  hdop?: number;
  vdop?: number;
}

export interface GsvSentence extends SentenceBase {
  type: 'GSV';
  totalMessages: number;
  messageNumber: number;
  satellitesInView?: number;
  satellites: SatelliteInView[];
}

export interface VtgSentence extends SentenceBase {
  type: 'VTG';
  courseTrue?: number;
  courseMagnetic?: number;
  speedKnots?: number;
  speedKmh?: number;
  mode?: string;
}

export interface GllSentence extends SentenceBase {
  type: 'GLL';
  position?: HorizontalPosition;
  timeOfDay?: number;
  status?: string;
  mode?: string;
}

export interface ZdaSentence extends SentenceBase {
  type: 'ZDA';
  timeOfDay?: number;
  date?: CalendarDate;
  localZoneHours?: number;
  localZoneMinutes?: number;
}

/** Any sentence without a dedicated extractor, kept as raw fields */
export interface UnknownSentence extends SentenceBase {
  type: 'unknown';
  sentenceType: string;
  fields: string[];
}

export type NmeaSentence =
  | GgaSentence
  | RmcSentence
  | GsaSentence
  | GsvSentence
  | VtgSentence
  | GllSentence
  | ZdaSentence
  | UnknownSentence;

export type KnownSentenceType = Exclude<NmeaSentence['type'], 'unknown'>;

// ===== Fix records =====

export type FixValue = number | string | Date | GeodeticCoordinate;

/**
 * An incoming value that disagreed with one already in the record.
 * The record keeps `existing`; `incoming` is only reported here.
 */
export interface FixConflict {
  field: string;
  existing: FixValue;
  incoming: FixValue;
  /** Sentence type that carried the incoming value */
  sentence: string;
}

export interface FixRecord {
  talker: string;
  timeOfDay?: number;
  /** Full UTC time, only set once a sentence has supplied the date */
  timestamp?: Date;
  /** Ellipsoidal altitude; 0 when no sentence reported one (see `altitudeMsl`) */
  position?: GeodeticCoordinate;
  altitudeMsl?: number;
  geoidSeparation?: number;
  quality?: FixQuality;
  hdop?: number;
  vdop?: number;
  pdop?: number;
  satelliteCount?: number;
  speedKnots?: number;
  courseDegrees?: number;
  satellitesInView?: number;
  satellites: SatelliteInView[];
  conflicts: FixConflict[];
}
