import { GeodeticCoordinate } from '../types/Coordinates';
import type {
  CalendarDate,
  FixConflict,
  FixQuality,
  FixRecord,
  FixValue,
  HorizontalPosition,
  NmeaSentence,
  RmcSentence,
} from '../types/Nmea';
import { createLogger } from '../utils/logger';

/**
 * Folds parsed sentences into one fix record per talker.
 *
 * Sentences of one receiver epoch (GGA, RMC, GSA, ...) describe the same fix
 * and are merged. A sentence carrying a different time of day starts a new
 * cycle. Values never overwrite an incompatible value already in the record;
 * the disagreement is appended to `record.conflicts` instead.
 */

export interface FixUpdate {
  /** Snapshot of the talker's record after the sentence was applied */
  record: FixRecord;
  /** Previous cycle's record, when this sentence started a new cycle */
  completed?: FixRecord;
}

type MergeableField =
  | 'timeOfDay'
  | 'timestamp'
  | 'altitudeMsl'
  | 'geoidSeparation'
  | 'quality'
  | 'hdop'
  | 'vdop'
  | 'pdop'
  | 'satelliteCount'
  | 'speedKnots'
  | 'courseDegrees'
  | 'satellitesInView';

// RMC/GLL FAA mode indicator
const MODE_QUALITY: Readonly<Record<string, FixQuality>> = {
  N: 'no-fix',
  A: 'gps',
  D: 'dgps',
  R: 'rtk-fixed',
  F: 'rtk-float',
  E: 'dead-reckoning',
};

const NUMERIC_TOLERANCE = 1e-9;

export class FixAccumulator {
  private readonly records = new Map<string, FixRecord>();
  private readonly logger = createLogger({ component: 'FixAccumulator' });

  apply(sentence: NmeaSentence): FixUpdate {
    let record = this.records.get(sentence.talker);
    let completed: FixRecord | undefined;

    const timeOfDay = 'timeOfDay' in sentence ? sentence.timeOfDay : undefined;
    if (
      record &&
      timeOfDay !== undefined &&
      record.timeOfDay !== undefined &&
      timeOfDay !== record.timeOfDay
    ) {
      completed = cloneRecord(record);
      record = undefined;
    }

    if (!record) {
      record = { talker: sentence.talker, satellites: [], conflicts: [] };
      this.records.set(sentence.talker, record);
    }

    const conflictsBefore = record.conflicts.length;
    this.merge(record, sentence);

    if (record.conflicts.length > conflictsBefore) {
      this.logger.debug({
        talker: record.talker,
        conflicts: record.conflicts.slice(conflictsBefore).map(c => c.field),
      }, `${sentence.type} disagrees with the current fix`);
    }

    return { record: cloneRecord(record), completed };
  }

  getRecord(talker: string): FixRecord | undefined {
    const record = this.records.get(talker);
    return record ? cloneRecord(record) : undefined;
  }

  getRecords(): FixRecord[] {
    return Array.from(this.records.values(), cloneRecord);
  }

  reset(): void {
    this.records.clear();
  }

  private merge(record: FixRecord, sentence: NmeaSentence): void {
    const source = sentence.type;

    switch (sentence.type) {
      case 'GGA':
        setField(record, 'timeOfDay', sentence.timeOfDay, source);
        this.mergePosition(record, sentence.position, source, sentence.altitudeMsl, sentence.geoidSeparation);
        setField(record, 'quality', sentence.quality, source);
        setField(record, 'satelliteCount', sentence.satelliteCount, source);
        setField(record, 'hdop', sentence.hdop, source);
        break;

      case 'RMC':
        setField(record, 'timeOfDay', sentence.timeOfDay, source);
        setField(record, 'timestamp', toTimestamp(sentence.date, sentence.timeOfDay), source);
        this.mergePosition(record, sentence.position, source);
        setField(record, 'quality', rmcQuality(sentence), source);
        setField(record, 'speedKnots', sentence.speedKnots, source);
        setField(record, 'courseDegrees', sentence.courseDegrees, source);
        break;

      case 'GLL':
        setField(record, 'timeOfDay', sentence.timeOfDay, source);
        if (sentence.status !== 'V') {
          this.mergePosition(record, sentence.position, source);
        }
        break;

      case 'GSA':
        setField(record, 'pdop', sentence.pdop, source);
        setField(record, 'hdop', sentence.hdop, source);
        setField(record, 'vdop', sentence.vdop, source);
        break;

      case 'GSV':
        setField(record, 'satellitesInView', sentence.satellitesInView, source);
        for (const satellite of sentence.satellites) {
          const index = record.satellites.findIndex(s => s.prn === satellite.prn);
          if (index >= 0) {
            record.satellites[index] = satellite;
          } else {
            record.satellites.push(satellite);
          }
        }
        break;

      case 'VTG':
        setField(record, 'courseDegrees', sentence.courseTrue, source);
        setField(record, 'speedKnots', sentence.speedKnots, source);
        break;

      case 'ZDA':
        setField(record, 'timeOfDay', sentence.timeOfDay, source);
        setField(record, 'timestamp', toTimestamp(sentence.date, sentence.timeOfDay), source);
        break;

      case 'unknown':
        break;
    }
  }

  /**
   * Positions without altitude (RMC, GLL) are upgraded by a GGA reporting the
   * same horizontal position; any other disagreement is a conflict.
   */
  private mergePosition(
    record: FixRecord,
    incoming: HorizontalPosition | undefined,
    source: string,
    altitudeMsl?: number,
    geoidSeparation?: number,
  ): void {
    if (!incoming) {
      return;
    }

    const hasAltitude = altitudeMsl !== undefined;
    const candidate = new GeodeticCoordinate(
      incoming.lat,
      incoming.lon,
      hasAltitude ? altitudeMsl + (geoidSeparation ?? 0) : 0,
    );

    const existing = record.position;
    if (!existing) {
      record.position = candidate;
      if (hasAltitude) {
        record.altitudeMsl = altitudeMsl;
        record.geoidSeparation = geoidSeparation;
      }
      return;
    }

    const sameHorizontal =
      closeEnough(existing.lat, candidate.lat) && closeEnough(existing.lon, candidate.lon);
    if (!sameHorizontal) {
      record.conflicts.push({ field: 'position', existing, incoming: candidate, sentence: source });
      return;
    }

    if (!hasAltitude) {
      return;
    }

    if (record.altitudeMsl === undefined) {
      record.position = candidate;
      record.altitudeMsl = altitudeMsl;
      record.geoidSeparation = geoidSeparation;
    } else if (!closeEnough(existing.alt, candidate.alt)) {
      record.conflicts.push({ field: 'position', existing, incoming: candidate, sentence: source });
    }
  }
}

function setField<K extends MergeableField>(
  record: FixRecord,
  field: K,
  value: FixRecord[K],
  source: string,
): void {
  const incoming: FixValue | undefined = value;
  if (incoming === undefined) {
    return;
  }

  const existing: FixValue | undefined = record[field];
  if (existing === undefined) {
    record[field] = value;
    return;
  }

  if (!compatible(existing, incoming)) {
    const conflict: FixConflict = { field, existing, incoming, sentence: source };
    record.conflicts.push(conflict);
  }
}

function compatible(a: FixValue, b: FixValue): boolean {
  if (typeof a === 'number' && typeof b === 'number') {
    return closeEnough(a, b);
  }
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  if (a instanceof GeodeticCoordinate && b instanceof GeodeticCoordinate) {
    return a.equals(b);
  }
  return a === b;
}

function closeEnough(a: number, b: number): boolean {
  return Math.abs(a - b) <= NUMERIC_TOLERANCE * Math.max(1, Math.abs(a), Math.abs(b));
}

function rmcQuality(sentence: RmcSentence): FixQuality | undefined {
  if (sentence.status === 'V') {
    return 'no-fix';
  }
  if (sentence.mode !== undefined) {
    return MODE_QUALITY[sentence.mode];
  }
  return undefined;
}

function toTimestamp(date: CalendarDate | undefined, timeOfDay: number | undefined): Date | undefined {
  if (!date || timeOfDay === undefined) {
    return undefined;
  }
  return new Date(Date.UTC(date.year, date.month - 1, date.day) + Math.round(timeOfDay * 1000));
}

function cloneRecord(record: FixRecord): FixRecord {
  return {
    ...record,
    satellites: record.satellites.map(s => ({ ...s })),
    conflicts: [...record.conflicts],
  };
}
