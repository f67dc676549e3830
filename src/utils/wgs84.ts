// WGS84 reference ellipsoid.
// Units: meters.
export const WGS84_A = 6378137.0; // semi-major axis (equatorial radius)
export const WGS84_INVERSE_FLATTENING = 298.257223563;
export const WGS84_F = 1 / WGS84_INVERSE_FLATTENING; // flattening
export const WGS84_B = WGS84_A * (1 - WGS84_F); // semi-minor axis (polar radius)

export const WGS84_E2 = WGS84_F * (2 - WGS84_F); // first eccentricity squared

// Mean radius as defined by IUGG, used for spherical (haversine) distances
export const WGS84_MEAN_RADIUS = (2 * WGS84_A + WGS84_B) / 3;

export const DEG_TO_RAD = Math.PI / 180;
export const RAD_TO_DEG = 180 / Math.PI;

/**
 * Prime-vertical radius of curvature at the given latitude (radians)
 */
export function primeVerticalRadius(latRad: number): number {
  const sinLat = Math.sin(latRad);
  return WGS84_A / Math.sqrt(1 - WGS84_E2 * sinLat * sinLat);
}

/**
 * Wraps a longitude in degrees into (-180, 180]
 */
export function normalizeLongitude(lon: number): number {
  if (lon > -180 && lon <= 180) {
    return lon;
  }
  const wrapped = ((((lon + 180) % 360) + 360) % 360) - 180;
  return wrapped === -180 ? 180 : wrapped;
}

/**
 * Wraps an angle in degrees into [0, 360)
 */
export function normalizeBearing(deg: number): number {
  if (deg >= 0 && deg < 360) {
    return deg;
  }
  const wrapped = ((deg % 360) + 360) % 360;
  return wrapped === 360 ? 0 : wrapped;
}
