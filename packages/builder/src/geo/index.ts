export {
  EARTH_RADIUS_KM,
  DISTANCE_PRECISION,
  roundTo,
  haversineDistance,
  pointAtRatio,
  pointAtDistance,
  pathLength,
  roadMidpoint,
  samePosition,
} from "./geo-math.js";
