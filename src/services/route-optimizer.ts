import { haversineDistanceKm, type Coordinates } from './geo-distance.js';

export interface OptimizedRoute<T extends Coordinates> {
  route: T[];
  totalDistanceKm: number;
}

/** Sum of haversine legs between consecutive stops. */
export function routeDistanceKm(route: readonly Coordinates[]): number {
  let total = 0;
  for (let i = 1; i < route.length; i++) {
    total += haversineDistanceKm(route[i - 1], route[i]);
  }
  return total;
}

/**
 * Greedy nearest-neighbour ordering. The first waypoint stays the start; each
 * next stop is the closest unvisited waypoint, ties going to the earlier one in
 * input order. O(n²) heuristic, not an optimal tour.
 *
 * Waypoints are returned as the same objects, so extra fields ride along untouched.
 */
export function optimizeRoute<T extends Coordinates>(waypoints: readonly T[]): OptimizedRoute<T> {
  if (waypoints.length < 2) {
    return { route: [...waypoints], totalDistanceKm: 0 };
  }

  const unvisited = waypoints.slice(1);
  const route: T[] = [waypoints[0]];

  while (unvisited.length > 0) {
    const last = route[route.length - 1];
    let nearestIndex = 0;
    let nearestDistance = Infinity;
    for (let i = 0; i < unvisited.length; i++) {
      const distance = haversineDistanceKm(last, unvisited[i]);
      if (distance < nearestDistance) {
        nearestDistance = distance;
        nearestIndex = i;
      }
    }
    route.push(...unvisited.splice(nearestIndex, 1));
  }

  return { route, totalDistanceKm: routeDistanceKm(route) };
}
