import { describe, it, expect } from 'vitest';
import {
  encodeFixRecord,
  encodeNmeaSentence,
  formatGgaSentence,
  formatLatitude,
  formatLongitude,
  formatTimeOfDay,
} from '../NmeaEncoder';
import { FixAccumulator } from '../FixAccumulator';
import { parseNmeaSentence } from '../NmeaParser';
import { GeodeticCoordinate } from '../../types/Coordinates';
import type { FixRecord } from '../../types/Nmea';

function rtkRecord(): FixRecord {
  const accumulator = new FixAccumulator();
  accumulator.apply(parseNmeaSentence('$GNGGA,123519.00,4807.0380,N,01131.0000,E,4,12,0.7,545.4,M,46.9,M,,*77'));
  return accumulator.apply(
    parseNmeaSentence('$GNRMC,123519.00,A,4807.0380,N,01131.0000,E,0.02,31.66,230394,,,R*63'),
  ).record;
}

describe('encodeNmeaSentence', () => {
  it('should append the checksum and CR/LF', () => {
    expect(encodeNmeaSentence('GP', 'XTE', ['A', 'A', 0.67, 'L', 'N'])).toBe('$GPXTE,A,A,0.67,L,N*6F\r\n');
  });

  it('should leave undefined fields empty', () => {
    const encoded = encodeNmeaSentence('GP', 'XTE', ['A', undefined, 'B']);
    expect(encoded.startsWith('$GPXTE,A,,B*')).toBe(true);
  });

  it('should produce sentences the parser accepts', () => {
    const encoded = encodeNmeaSentence('GP', 'VTG', ['054.7', 'T', '034.4', 'M', '005.5', 'N', '010.2', 'K']);
    expect(encoded).toBe('$GPVTG,054.7,T,034.4,M,005.5,N,010.2,K*48\r\n');
    expect(parseNmeaSentence(encoded)).toMatchObject({ type: 'VTG', speedKnots: 5.5 });
  });
});

describe('encodeFixRecord', () => {
  it('should format GGA', () => {
    expect(encodeFixRecord(rtkRecord(), 'GGA')).toBe(
      '$GNGGA,123519.00,4807.0380,N,01131.0000,E,4,12,0.7,545.40,M,46.90,M,,*77\r\n',
    );
  });

  it('should format RMC', () => {
    expect(encodeFixRecord(rtkRecord(), 'RMC')).toBe(
      '$GNRMC,123519.00,A,4807.0380,N,01131.0000,E,0.02,31.66,230394,,,R*63\r\n',
    );
  });

  it('should format VTG', () => {
    expect(encodeFixRecord(rtkRecord(), 'VTG')).toBe('$GNVTG,31.66,T,,M,0.02,N,0.04,K,R*04\r\n');
  });

  it('should format GSA as a 3D fix when the altitude is known', () => {
    expect(encodeFixRecord(rtkRecord(), 'GSA')).toBe('$GNGSA,A,3,,,,,,,,,,,,,,0.70,*1B\r\n');
  });

  it('should round-trip a GGA through the parser', () => {
    const parsed = parseNmeaSentence(encodeFixRecord(rtkRecord(), 'GGA'));

    expect(parsed).toMatchObject({
      type: 'GGA',
      timeOfDay: 45319,
      quality: 'rtk-fixed',
      satelliteCount: 12,
      altitudeMsl: 545.4,
    });
  });

  it('should mark an RMC without position as void', () => {
    const encoded = encodeFixRecord({ talker: 'GP', satellites: [], conflicts: [] }, 'RMC');
    expect(encoded.startsWith('$GPRMC,,V,,,,,,,,,,*')).toBe(true);
  });
});

describe('formatGgaSentence', () => {
  it('should report the position with fixed quality placeholders', () => {
    const sentence = formatGgaSentence(
      new GeodeticCoordinate(47.4979, 19.0402, 120.5),
      new Date(Date.UTC(2024, 0, 15, 9, 5, 7, 250)),
    );

    expect(sentence).toBe('$GPGGA,090507.25,4729.8740,N,01902.4120,E,1,10,1,120.50,M,,,0.0,0000*3B\r\n');
  });
});

describe('field formatting', () => {
  it('should format southern and western coordinates', () => {
    expect(formatLatitude(-33.8688)).toEqual(['3352.1280', 'S']);
    expect(formatLongitude(-70.25)).toEqual(['07015.0000', 'W']);
  });

  it('should carry rounded minutes into the degrees', () => {
    expect(formatLatitude(10.99999999)).toEqual(['1100.0000', 'N']);
  });

  it('should format seconds since midnight', () => {
    expect(formatTimeOfDay(45319)).toBe('123519.00');
    expect(formatTimeOfDay(3723.5)).toBe('010203.50');
    expect(formatTimeOfDay(undefined)).toBeUndefined();
  });
});
