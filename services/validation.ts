import { ELECTRIFICATION_CLASSES } from '../constants';
import type { ClearanceConfig, MeasurementPoint, TrackGeometry } from '../types';
import { ValidationError } from './errors';

export function validateGeometry(geometry: TrackGeometry, config: ClearanceConfig): void {
    const { radius, cantMm, electrification, direction } = geometry;

    if (radius !== 'straight' && radius !== Number.POSITIVE_INFINITY) {
        if (!Number.isFinite(radius) || radius <= 0) {
            throw new ValidationError('radius', `Radius must be a positive number of metres or 'straight', got ${radius}`);
        }
        if (radius < config.minimumRadiusM) {
            throw new ValidationError('radius', `Radius ${radius} m is below the minimum of ${config.minimumRadiusM} m`);
        }
    }
    if (!Number.isFinite(cantMm) || cantMm < 0) {
        throw new ValidationError('cantMm', `Cant must be a non-negative number of millimetres, got ${cantMm}`);
    }
    if (!ELECTRIFICATION_CLASSES.includes(electrification)) {
        throw new ValidationError('electrification', `Unknown electrification class: ${String(electrification)}`);
    }
    if (direction !== undefined && direction !== 'cw' && direction !== 'ccw') {
        throw new ValidationError('direction', `Curve direction must be 'cw' or 'ccw', got ${String(direction)}`);
    }
}

export function validateMeasurement(point: MeasurementPoint): void {
    if (!Number.isFinite(point.distanceMm)) {
        throw new ValidationError('distanceMm', `Measurement distance must be finite, got ${point.distanceMm}`);
    }
    if (!Number.isFinite(point.heightMm) || point.heightMm < 0) {
        throw new ValidationError('heightMm', `Measurement height must be a non-negative number, got ${point.heightMm}`);
    }
}
