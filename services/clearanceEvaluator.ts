import { CLEARANCE_CONFIG, NEAREST_CORRECTION } from '../constants';
import type {
    BatchOutcome,
    ClearanceConfig,
    ClearanceProfileData,
    ClearanceResult,
    ClearanceStatus,
    MeasurementPoint,
    Side,
    TrackGeometry,
} from '../types';
import { ValidationError } from './errors';
import { boundaryLateralAt, heightSpan, nearestOnBoundary, toOutline } from './envelopeTable';
import { curveEffects, transformedBoundary } from './trackGeometry';
import { validateGeometry, validateMeasurement } from './validation';

export function sideOf(distanceMm: number): Side {
    return distanceMm >= 0 ? 'right' : 'left';
}

export function classify(marginMm: number): ClearanceStatus {
    return marginMm >= 0 ? 'SAFE' : 'INTRUSION';
}

/**
 * Rounds a magnitude toward the worse case for the given outcome:
 * up when the point intrudes, down when it clears.
 */
export function roundByOutcome(magnitudeMm: number, status: ClearanceStatus): number {
    return status === 'INTRUSION' ? Math.ceil(magnitudeMm) : Math.floor(magnitudeMm);
}

/** Margin rounded on its magnitude, sign kept. */
export function roundMargin(marginMm: number, status: ClearanceStatus): number {
    const rounded = roundByOutcome(Math.abs(marginMm), status);
    if (rounded === 0) return 0;
    return marginMm < 0 ? -rounded : rounded;
}

/**
 * Nearest-boundary distance as reported for the limit margin. Below
 * `zeroBelowMm` the point counts as on the boundary; below `blendBelowMm`
 * the distance is reduced to sqrt(d^2 - zeroBelowMm^2).
 */
export function correctNearestDistance(distanceMm: number): number {
    const { zeroBelowMm, blendBelowMm } = NEAREST_CORRECTION;
    if (distanceMm < zeroBelowMm) return 0;
    if (distanceMm < blendBelowMm) return Math.sqrt(distanceMm * distanceMm - zeroBelowMm * zeroBelowMm);
    return distanceMm;
}

/**
 * Evaluates one measurement point against the building clearance for a track
 * geometry. Classification uses the raw margin; rounding is applied afterwards
 * to the reported numbers only.
 */
export function evaluate(
    geometry: TrackGeometry,
    measurement: MeasurementPoint,
    config: ClearanceConfig = CLEARANCE_CONFIG
): ClearanceResult {
    validateGeometry(geometry, config);
    validateMeasurement(measurement);

    const outline = toOutline(transformedBoundary(geometry, config));
    const side = sideOf(measurement.distanceMm);

    const requiredRaw = boundaryLateralAt(outline, measurement.heightMm, side);
    const measured = Math.abs(measurement.distanceMm);
    const marginRaw = measured - requiredRaw;

    const status = classify(marginRaw);
    const nearest = nearestOnBoundary(outline, measurement.distanceMm, measurement.heightMm);

    return {
        requiredClearanceMm: roundByOutcome(requiredRaw, status),
        measuredClearanceMm: measured,
        marginMm: roundMargin(marginRaw, status),
        status,
        side,
        raw: {
            requiredClearanceMm: requiredRaw,
            marginMm: marginRaw
        },
        measurementPoint: { distanceMm: measurement.distanceMm, heightMm: measurement.heightMm },
        nearest: {
            ...nearest,
            correctedMm: roundByOutcome(correctNearestDistance(nearest.distanceMm), status)
        },
        calculatedParams: {
            ...curveEffects(geometry, config),
            electrification: geometry.electrification
        }
    };
}

/**
 * Evaluates several points against one geometry. A failing point yields an
 * error entry and does not affect the others.
 */
export function evaluateBatch(
    geometry: TrackGeometry,
    measurements: readonly MeasurementPoint[],
    config: ClearanceConfig = CLEARANCE_CONFIG
): BatchOutcome[] {
    return measurements.map((m): BatchOutcome => {
        try {
            return { ok: true, result: evaluate(geometry, m, config) };
        } catch (e) {
            return { ok: false, error: e instanceof Error ? e : new Error(String(e)) };
        }
    });
}

/**
 * Required clearance on one side sampled every `stepMm` over the height span
 * of the transformed outline, from rail top up.
 */
export function clearanceProfile(
    geometry: TrackGeometry,
    side: Side,
    stepMm: number = 10,
    config: ClearanceConfig = CLEARANCE_CONFIG
): ClearanceProfileData {
    if (!(stepMm > 0)) throw new ValidationError('stepMm', `Profile step must be positive, got ${stepMm}`);

    const points = toOutline(transformedBoundary(geometry, config));
    const [minY, maxY] = heightSpan(points);
    const result: ClearanceProfileData = { heightMm: [], requiredMm: [] };

    for (let y = Math.max(0, Math.ceil(minY / stepMm) * stepMm); y <= maxY; y += stepMm) {
        result.heightMm.push(y);
        result.requiredMm.push(boundaryLateralAt(points, y, side));
    }
    return result;
}
