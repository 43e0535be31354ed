// Seismic Relocator - Spherical geometry

const DEG = Math.PI / 180;

export interface DistanceAzimuth {
  /** Great-circle distance in degrees */
  distance: number;
  /** Azimuth from the first to the second point, degrees clockwise from north */
  azimuth: number;
}

export function greatCircle(lat1: number, lon1: number, lat2: number, lon2: number): DistanceAzimuth {
  const phi1 = lat1 * DEG;
  const phi2 = lat2 * DEG;
  const dLambda = (lon2 - lon1) * DEG;

  const cosDelta = Math.sin(phi1) * Math.sin(phi2) + Math.cos(phi1) * Math.cos(phi2) * Math.cos(dLambda);
  const distance = Math.acos(Math.min(1, Math.max(-1, cosDelta))) / DEG;

  const y = Math.sin(dLambda) * Math.cos(phi2);
  const x = Math.cos(phi1) * Math.sin(phi2) - Math.sin(phi1) * Math.cos(phi2) * Math.cos(dLambda);
  const azimuth = (Math.atan2(y, x) / DEG + 360) % 360;

  return { distance, azimuth };
}
