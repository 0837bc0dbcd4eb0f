export interface EnvelopePoint {
  lateralMm: number; // distance from track centre, signed on a transformed side
  heightMm: number; // above rail top
}

export type EnvelopeTable = readonly EnvelopePoint[];

export type Side = 'left' | 'right';

export type Electrification = 'DC' | 'AC' | 'none';

// cw = right-hand curve (right side is inner), ccw = left-hand curve
export type CurveDirection = 'cw' | 'ccw';

export type Radius = number | 'straight';

export interface TrackGeometry {
  radius: Radius; // metres
  cantMm: number;
  electrification: Electrification;
  direction?: CurveDirection;
}

export interface MeasurementPoint {
  distanceMm: number; // signed, + = right of track centre
  heightMm: number;
}

export interface SlackBand {
  upToM: number;
  inclusive: boolean;
  slackMm: number;
}

export interface ElectrificationProfile {
  envelope: EnvelopeTable;
  upperBodyThresholdMm: number;
  upperWidening: boolean; // overhead catenary sections widen the upper body by W'
}

export interface ClearanceConfig {
  gaugeMm: number;
  generalWideningNumerator: number; // W = n / R
  upperWideningNumerator: number; // W' = n / R
  straightRadiusThresholdM: number; // radii above this widen nothing
  minimumRadiusM: number;
  slackTable: readonly SlackBand[];
  electrification: Record<Electrification, ElectrificationProfile>;
}

export interface TransformedBoundary {
  left: EnvelopePoint[];
  right: EnvelopePoint[];
}

export type ClearanceStatus = 'SAFE' | 'INTRUSION';

export interface CurveEffects {
  wideningMm: number;
  upperWideningMm: number;
  slackMm: number;
  cantAngleDeg: number;
  innerSide: Side;
}

export interface ClearanceResult {
  requiredClearanceMm: number;
  measuredClearanceMm: number;
  marginMm: number;
  status: ClearanceStatus;
  side: Side;
  raw: {
    requiredClearanceMm: number;
    marginMm: number;
  };
  measurementPoint: MeasurementPoint; // display coordinates, never moved by cant
  nearest: {
    point: EnvelopePoint;
    distanceMm: number;
    correctedMm: number; // corrected distance, rounded like the other reported figures
  };
  calculatedParams: CurveEffects & {
    electrification: Electrification;
  };
}

export type BatchOutcome =
  | { ok: true; result: ClearanceResult }
  | { ok: false; error: Error };

export interface ClearanceProfileData {
  heightMm: number[];
  requiredMm: number[];
}
