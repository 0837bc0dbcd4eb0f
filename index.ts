export * from './types';
export { CLEARANCE_CONFIG, SLACK_TABLE, ELECTRIFICATION_CLASSES, NEAREST_CORRECTION } from './constants';
export { ClearanceError, ValidationError, OutOfRangeError, DataIntegrityError } from './services/errors';
export type { ClearanceErrorCode } from './services/errors';
export {
  assertEnvelopeTable,
  mirrorEnvelope,
  heightSpan,
  toOutline,
  boundaryLateralAt,
  nearestOnBoundary,
} from './services/envelopeTable';
export {
  isStraight,
  calculateWidening,
  lookupSlack,
  cantAngle,
  innerSideOf,
  rotateBoundary,
  toRailFrame,
  curveEffects,
  transformedBoundary,
} from './services/trackGeometry';
export {
  sideOf,
  classify,
  roundByOutcome,
  roundMargin,
  correctNearestDistance,
  evaluate,
  evaluateBatch,
  clearanceProfile,
} from './services/clearanceEvaluator';
export { buildClearanceTraces } from './services/plotTraces';
export type { Trace } from './services/plotTraces';
export { convertBoundaryToCsv, exportFileName } from './services/exportCsv';
export type { ExportType } from './services/exportCsv';
export { useClearance, DEFAULT_PARAMS } from './hooks/useClearance';
export type { ClearanceParams } from './hooks/useClearance';
