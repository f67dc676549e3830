/**
 * Coordinate Transforms - conversions between geodetic, ECEF and local frames
 *
 * All functions are pure and operate on the WGS84 ellipsoid.
 */

import { ECEFCoordinate, GeodeticCoordinate } from '../types/Coordinates';
import type {
  DistanceAndBearing,
  EnuVector,
  FlatEarthAxes,
  FlatEarthCoordinate,
} from '../types/Coordinates';
import { ConvergenceError } from '../utils/errors';
import {
  DEG_TO_RAD,
  RAD_TO_DEG,
  WGS84_A,
  WGS84_B,
  WGS84_E2,
  WGS84_MEAN_RADIUS,
  normalizeBearing,
  normalizeLongitude,
  primeVerticalRadius,
} from '../utils/wgs84';

/** Latitude change (radians) below which the inverse transform has converged */
export const ECEF_TO_GEODETIC_TOLERANCE = 1e-11;
export const ECEF_TO_GEODETIC_MAX_ITERATIONS = 10;

// =============================================================================
// Geodetic <-> ECEF
// =============================================================================

export function geodeticToEcef(coord: GeodeticCoordinate): ECEFCoordinate {
  const lat = coord.lat * DEG_TO_RAD;
  const lon = coord.lon * DEG_TO_RAD;
  const n = primeVerticalRadius(lat);
  const cosLat = Math.cos(lat);

  return new ECEFCoordinate(
    (n + coord.alt) * cosLat * Math.cos(lon),
    (n + coord.alt) * cosLat * Math.sin(lon),
    (n * (1 - WGS84_E2) + coord.alt) * Math.sin(lat),
  );
}

/**
 * Converts ECEF to geodetic coordinates by successive approximation of the
 * latitude.
 *
 * @throws ConvergenceError when the latitude does not settle within
 * {@link ECEF_TO_GEODETIC_MAX_ITERATIONS} iterations (e.g. at the earth's centre)
 */
export function ecefToGeodetic(ecef: ECEFCoordinate): GeodeticCoordinate {
  const { x, y, z } = ecef;
  const p = Math.hypot(x, y);

  if (p === 0) {
    if (z === 0) {
      throw new ConvergenceError('Latitude is undefined at the centre of the earth', 0);
    }
    // On the polar axis the longitude is arbitrary
    return new GeodeticCoordinate(z > 0 ? 90 : -90, 0, Math.abs(z) - WGS84_B);
  }

  const lon = Math.atan2(y, x);
  let lat = Math.atan2(z, p * (1 - WGS84_E2));

  for (let iteration = 1; iteration <= ECEF_TO_GEODETIC_MAX_ITERATIONS; iteration++) {
    const n = primeVerticalRadius(lat);
    const height = ellipsoidalHeight(p, z, lat, n);
    const next = Math.atan2(z, p * (1 - (WGS84_E2 * n) / (n + height)));

    if (!Number.isFinite(next)) {
      throw new ConvergenceError(`Latitude estimate diverged at ${ecef.toString()}`, iteration);
    }

    if (Math.abs(next - lat) < ECEF_TO_GEODETIC_TOLERANCE) {
      const alt = ellipsoidalHeight(p, z, next, primeVerticalRadius(next));
      return new GeodeticCoordinate(next * RAD_TO_DEG, lon * RAD_TO_DEG, alt);
    }

    lat = next;
  }

  throw new ConvergenceError(
    `Latitude did not converge within ${ECEF_TO_GEODETIC_MAX_ITERATIONS} iterations at ${ecef.toString()}`,
    ECEF_TO_GEODETIC_MAX_ITERATIONS,
  );
}

// h = p cos(lat) + z sin(lat) - a^2 / N stays well-conditioned near the poles
function ellipsoidalHeight(p: number, z: number, lat: number, n: number): number {
  const sinLat = Math.sin(lat);
  return p * Math.cos(lat) + z * sinLat - n * (1 - WGS84_E2 * sinLat * sinLat);
}

// =============================================================================
// Local east-north-up frame
// =============================================================================

interface EnuRotation {
  sinLat: number;
  cosLat: number;
  sinLon: number;
  cosLon: number;
}

function enuRotation(origin: GeodeticCoordinate): EnuRotation {
  const lat = origin.lat * DEG_TO_RAD;
  const lon = origin.lon * DEG_TO_RAD;
  return {
    sinLat: Math.sin(lat),
    cosLat: Math.cos(lat),
    sinLon: Math.sin(lon),
    cosLon: Math.cos(lon),
  };
}

/**
 * Expresses an ECEF point as an offset from `origin` in the origin's tangent plane
 */
export function ecefToEnu(origin: GeodeticCoordinate, point: ECEFCoordinate): EnuVector {
  const originEcef = geodeticToEcef(origin);
  const dx = point.x - originEcef.x;
  const dy = point.y - originEcef.y;
  const dz = point.z - originEcef.z;
  const { sinLat, cosLat, sinLon, cosLon } = enuRotation(origin);

  return {
    east: -sinLon * dx + cosLon * dy,
    north: -sinLat * cosLon * dx - sinLat * sinLon * dy + cosLat * dz,
    up: cosLat * cosLon * dx + cosLat * sinLon * dy + sinLat * dz,
  };
}

export function geodeticToEnu(origin: GeodeticCoordinate, point: GeodeticCoordinate): EnuVector {
  return ecefToEnu(origin, geodeticToEcef(point));
}

export function enuToEcef(origin: GeodeticCoordinate, enu: EnuVector): ECEFCoordinate {
  const originEcef = geodeticToEcef(origin);
  const { sinLat, cosLat, sinLon, cosLon } = enuRotation(origin);
  const { east, north, up } = enu;

  // Transpose of the ECEF -> ENU rotation
  return new ECEFCoordinate(
    originEcef.x - sinLon * east - sinLat * cosLon * north + cosLat * cosLon * up,
    originEcef.y + cosLon * east - sinLat * sinLon * north + cosLat * sinLon * up,
    originEcef.z + cosLat * north + sinLat * up,
  );
}

export function enuToGeodetic(origin: GeodeticCoordinate, enu: EnuVector): GeodeticCoordinate {
  return ecefToGeodetic(enuToEcef(origin, enu));
}

// =============================================================================
// Great circle
// =============================================================================

/**
 * Haversine distance on the mean-radius sphere and initial bearing from `a`
 * towards `b`. Altitudes are ignored.
 */
export function greatCircleDistanceAndBearing(
  a: GeodeticCoordinate,
  b: GeodeticCoordinate,
): DistanceAndBearing {
  const lat1 = a.lat * DEG_TO_RAD;
  const lat2 = b.lat * DEG_TO_RAD;
  const dLat = lat2 - lat1;
  const dLon = (b.lon - a.lon) * DEG_TO_RAD;

  const h =
    Math.sin(dLat / 2) ** 2 + Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;
  const distance = 2 * WGS84_MEAN_RADIUS * Math.asin(Math.min(1, Math.sqrt(h)));

  const bearing = Math.atan2(
    Math.sin(dLon) * Math.cos(lat2),
    Math.cos(lat1) * Math.sin(lat2) - Math.sin(lat1) * Math.cos(lat2) * Math.cos(dLon),
  );

  return { distance, bearing: normalizeBearing(bearing * RAD_TO_DEG) };
}

/**
 * Degrees with hemisphere letters, e.g. `47.497900°N 19.040200°E 120.00m`
 */
export function formatGeodetic(coord: GeodeticCoordinate): string {
  return coord.format();
}

export function haversineDistance(a: GeodeticCoordinate, b: GeodeticCoordinate): number {
  return greatCircleDistanceAndBearing(a, b).distance;
}

// =============================================================================
// Flat earth
// =============================================================================

export interface FlatEarthTransformOptions {
  /** Origin of the frame; its altitude is ignored */
  origin: GeodeticCoordinate;
  /** Direction of the X axis in degrees, clockwise from north */
  orientation?: number;
  axes?: FlatEarthAxes;
}

/**
 * Local flat-earth approximation around an origin. Suitable for areas of a
 * few kilometres, e.g. a field around an RTK base station.
 */
export class FlatEarthTransform {
  readonly origin: GeodeticCoordinate;
  readonly orientation: number;
  readonly axes: FlatEarthAxes;

  private readonly meridionalRadius: number;
  private readonly parallelRadius: number;
  private readonly sinAlpha: number;
  private readonly cosAlpha: number;
  private readonly yMul: number;
  private readonly zMul: number;

  constructor(options: FlatEarthTransformOptions) {
    this.origin = options.origin;
    this.orientation = options.orientation ?? 0;
    this.axes = options.axes ?? 'nwu';

    const originLat = this.origin.lat * DEG_TO_RAD;
    const w = 1 - WGS84_E2 * Math.sin(originLat) ** 2;
    this.meridionalRadius = (WGS84_A * (1 - WGS84_E2)) / w ** 1.5;
    this.parallelRadius = (WGS84_A / Math.sqrt(w)) * Math.cos(originLat);

    this.sinAlpha = Math.sin(this.orientation * DEG_TO_RAD);
    this.cosAlpha = Math.cos(this.orientation * DEG_TO_RAD);
    this.yMul = this.axes[1] === 'e' ? 1 : -1;
    this.zMul = this.axes[2] === 'u' ? 1 : -1;
  }

  toFlatEarth(coord: GeodeticCoordinate): FlatEarthCoordinate {
    const north = (coord.lat - this.origin.lat) * DEG_TO_RAD * this.meridionalRadius;
    const east =
      normalizeLongitude(coord.lon - this.origin.lon) * DEG_TO_RAD * this.parallelRadius;

    const x = north * this.cosAlpha + east * this.sinAlpha;
    const y = -north * this.sinAlpha + east * this.cosAlpha;

    return { x, y: y * this.yMul, z: coord.alt * this.zMul };
  }

  toGeodetic(coord: FlatEarthCoordinate): GeodeticCoordinate {
    const x = coord.x;
    const y = coord.y * this.yMul;

    const north = x * this.cosAlpha - y * this.sinAlpha;
    const east = x * this.sinAlpha + y * this.cosAlpha;

    return new GeodeticCoordinate(
      this.origin.lat + (north / this.meridionalRadius) * RAD_TO_DEG,
      this.origin.lon + (east / this.parallelRadius) * RAD_TO_DEG,
      coord.z * this.zMul,
    );
  }
}
