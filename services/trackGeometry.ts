import { CLEARANCE_CONFIG } from '../constants';
import type {
    ClearanceConfig,
    CurveDirection,
    CurveEffects,
    EnvelopePoint,
    EnvelopeTable,
    MeasurementPoint,
    Radius,
    Side,
    SlackBand,
    TrackGeometry,
    TransformedBoundary,
} from '../types';
import { assertEnvelopeTable } from './envelopeTable';
import { validateGeometry } from './validation';

const DEFAULT_DIRECTION: CurveDirection = 'cw';

function degrees(rad: number) { return rad * 180 / Math.PI; }

function getRotatedCoords(x: number, y: number, angleRad: number): { x: number; y: number } {
    const c = Math.cos(angleRad);
    const s = Math.sin(angleRad);
    return {
        x: x * c - y * s,
        y: x * s + y * c
    };
}

export function isStraight(radius: Radius, config: ClearanceConfig = CLEARANCE_CONFIG): boolean {
    return radius === 'straight' || radius > config.straightRadiusThresholdM;
}

/**
 * Curve widening in mm: W = 23100 / R for the body, W' = 11550 / R for the
 * upper body under overhead catenary. Both are zero on straight track.
 */
export function calculateWidening(radius: Radius, config: ClearanceConfig = CLEARANCE_CONFIG) {
    if (radius === 'straight' || isStraight(radius, config)) return { general: 0, upper: 0 };
    return {
        general: config.generalWideningNumerator / radius,
        upper: config.upperWideningNumerator / radius
    };
}

export function lookupSlack(radius: Radius, table: readonly SlackBand[] = CLEARANCE_CONFIG.slackTable): number {
    if (radius === 'straight') return 0;
    const band = table.find(b => (b.inclusive ? radius <= b.upToM : radius < b.upToM));
    return band ? band.slackMm : 0;
}

/** Cant angle in radians; negative cant gives a negative angle. */
export function cantAngle(cantMm: number, gaugeMm: number = CLEARANCE_CONFIG.gaugeMm): number {
    return Math.atan(cantMm / gaugeMm);
}

export function innerSideOf(direction: CurveDirection = DEFAULT_DIRECTION): Side {
    return direction === 'cw' ? 'right' : 'left';
}

// The envelope leans toward the low (inner) rail: clockwise for a right-hand curve.
function tiltAngle(cantMm: number, direction: CurveDirection, gaugeMm: number): number {
    const cantDir = direction === 'cw' ? -1 : 1;
    return cantAngle(cantMm, gaugeMm) * cantDir;
}

/**
 * Rotates boundary points about the track centre at rail top by the cant angle.
 * Each point (l, h) moves to
 *   L' = l - [l - l·cos a + h·sin a],  H' = h - [h - h·cos a - l·sin a]
 * where a = atan(C / g), negated for a right-hand curve. Returns new points.
 */
export function rotateBoundary(
    points: readonly EnvelopePoint[],
    cantMm: number,
    direction: CurveDirection = DEFAULT_DIRECTION,
    gaugeMm: number = CLEARANCE_CONFIG.gaugeMm
): EnvelopePoint[] {
    if (cantMm === 0) return points.map(p => ({ ...p }));

    const angle = tiltAngle(cantMm, direction, gaugeMm);
    return points.map(p => {
        const r = getRotatedCoords(p.lateralMm, p.heightMm, angle);
        return { lateralMm: r.x, heightMm: r.y };
    });
}

/**
 * Expresses a measurement point in the canted rail frame, i.e. undoes the
 * tilt. Evaluation never uses this; the point keeps its input coordinates.
 */
export function toRailFrame(
    point: MeasurementPoint,
    cantMm: number,
    direction: CurveDirection = DEFAULT_DIRECTION,
    gaugeMm: number = CLEARANCE_CONFIG.gaugeMm
): MeasurementPoint {
    const r = getRotatedCoords(point.distanceMm, point.heightMm, -tiltAngle(cantMm, direction, gaugeMm));
    return { distanceMm: r.x, heightMm: r.y };
}

export function curveEffects(geometry: TrackGeometry, config: ClearanceConfig = CLEARANCE_CONFIG): CurveEffects {
    const widening = calculateWidening(geometry.radius, config);
    return {
        wideningMm: widening.general,
        upperWideningMm: widening.upper,
        slackMm: lookupSlack(geometry.radius, config.slackTable),
        cantAngleDeg: degrees(cantAngle(geometry.cantMm, config.gaugeMm)),
        innerSide: innerSideOf(geometry.direction)
    };
}

function widenSide(
    table: EnvelopeTable,
    side: Side,
    effects: CurveEffects,
    upperBodyThresholdMm: number,
    upperWidening: boolean
): EnvelopePoint[] {
    const sign = side === 'right' ? 1 : -1;
    const slack = side === effects.innerSide ? effects.slackMm : 0;

    return table.map(p => {
        // Points on the centre line stay there
        if (p.lateralMm === 0) return { lateralMm: 0, heightMm: p.heightMm };
        const w = upperWidening && p.heightMm > upperBodyThresholdMm ? effects.upperWideningMm : effects.wideningMm;
        return { lateralMm: sign * (p.lateralMm + w + slack), heightMm: p.heightMm };
    });
}

/**
 * Effective boundary for a track geometry: the nominal table widened for the
 * curve, slack added on the inner side, then tilted by cant. Both sides are
 * walked base to top. The configured table is never modified.
 */
export function transformedBoundary(
    geometry: TrackGeometry,
    config: ClearanceConfig = CLEARANCE_CONFIG
): TransformedBoundary {
    validateGeometry(geometry, config);
    const profile = config.electrification[geometry.electrification];
    assertEnvelopeTable(profile.envelope);

    const effects = curveEffects(geometry, config);
    const direction = geometry.direction ?? DEFAULT_DIRECTION;

    const build = (side: Side) =>
        rotateBoundary(
            widenSide(profile.envelope, side, effects, profile.upperBodyThresholdMm, profile.upperWidening),
            geometry.cantMm,
            direction,
            config.gaugeMm
        );

    return { left: build('left'), right: build('right') };
}
