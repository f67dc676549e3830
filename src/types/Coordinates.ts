import { z } from 'zod';
import { normalizeLongitude } from '../utils/wgs84';

/**
 * Coordinate value types
 * Both classes are immutable; every operation returns a new instance.
 */

// =============================================================================
// JSON contract
// =============================================================================

export const geodeticJsonSchema = z.object({
  lat: z.number().finite().min(-90).max(90),
  lon: z.number().finite(),
  alt: z.number().finite().default(0),
});

export const ecefJsonSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
  z: z.number().int(),
});

export type GeodeticJSON = z.output<typeof geodeticJsonSchema>;

/** ECEF axes as integer millimetres */
export type ECEFJSON = z.output<typeof ecefJsonSchema>;

// =============================================================================
// Geodetic
// =============================================================================

export class GeodeticCoordinate {
  /** Latitude in degrees, [-90, 90] */
  readonly lat: number;
  /** Longitude in degrees, (-180, 180] */
  readonly lon: number;
  /** Height above the WGS84 ellipsoid in metres */
  readonly alt: number;

  constructor(lat: number, lon: number, alt = 0) {
    if (!Number.isFinite(lat) || !Number.isFinite(lon) || !Number.isFinite(alt)) {
      throw new RangeError(`Geodetic coordinate must be finite, got (${lat}, ${lon}, ${alt})`);
    }
    if (lat < -90 || lat > 90) {
      throw new RangeError(`Latitude out of range: ${lat}`);
    }

    this.lat = lat;
    this.lon = normalizeLongitude(lon);
    this.alt = alt;
    Object.freeze(this);
  }

  static fromJSON(data: unknown): GeodeticCoordinate {
    const { lat, lon, alt } = geodeticJsonSchema.parse(data);
    return new GeodeticCoordinate(lat, lon, alt);
  }

  toJSON(): GeodeticJSON {
    return { lat: this.lat, lon: this.lon, alt: this.alt };
  }

  withAltitude(alt: number): GeodeticCoordinate {
    return new GeodeticCoordinate(this.lat, this.lon, alt);
  }

  equals(other: GeodeticCoordinate): boolean {
    return this.lat === other.lat && this.lon === other.lon && this.alt === other.alt;
  }

  /** Stable key for use in maps and sets */
  hashKey(): string {
    return `${this.lat}|${this.lon}|${this.alt}`;
  }

  /** Human-readable form, e.g. `47.497900°N 19.040200°E 120.00m` */
  format(): string {
    const ns = this.lat < 0 ? 'S' : 'N';
    const ew = this.lon < 0 ? 'W' : 'E';
    return `${Math.abs(this.lat).toFixed(6)}°${ns} ${Math.abs(this.lon).toFixed(6)}°${ew} ${this.alt.toFixed(2)}m`;
  }

  toString(): string {
    return this.format();
  }
}

// =============================================================================
// ECEF
// =============================================================================

export class ECEFCoordinate {
  /** Metres */
  readonly x: number;
  readonly y: number;
  readonly z: number;

  constructor(x: number, y: number, z: number) {
    if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) {
      throw new RangeError(`ECEF coordinate must be finite, got (${x}, ${y}, ${z})`);
    }
    this.x = x;
    this.y = y;
    this.z = z;
    Object.freeze(this);
  }

  /**
   * Decodes the millimetre-scaled external form
   */
  static fromJSON(data: unknown): ECEFCoordinate {
    const { x, y, z } = ecefJsonSchema.parse(data);
    return new ECEFCoordinate(x / 1000, y / 1000, z / 1000);
  }

  /**
   * Encodes each axis as integer millimetres; sub-millimetre precision is lost
   */
  toJSON(): ECEFJSON {
    return {
      x: Math.round(this.x * 1000),
      y: Math.round(this.y * 1000),
      z: Math.round(this.z * 1000),
    };
  }

  distanceTo(other: ECEFCoordinate): number {
    return Math.hypot(this.x - other.x, this.y - other.y, this.z - other.z);
  }

  equals(other: ECEFCoordinate): boolean {
    return this.x === other.x && this.y === other.y && this.z === other.z;
  }

  hashKey(): string {
    return `${this.x}|${this.y}|${this.z}`;
  }

  toString(): string {
    return `ECEF(${this.x.toFixed(4)}, ${this.y.toFixed(4)}, ${this.z.toFixed(4)})`;
  }
}

// =============================================================================
// Local frames
// =============================================================================

/** Offsets in metres in the local east-north-up tangent plane */
export interface EnuVector {
  east: number;
  north: number;
  up: number;
}

export interface DistanceAndBearing {
  /** Great-circle distance in metres */
  distance: number;
  /** Initial bearing in degrees, [0, 360) */
  bearing: number;
}

/** Axis convention of a flat-earth frame: north, east/west, up/down */
export type FlatEarthAxes = 'neu' | 'nwu' | 'ned' | 'nwd';

/** Position in a local flat-earth frame, metres */
export interface FlatEarthCoordinate {
  x: number;
  y: number;
  z: number;
}
