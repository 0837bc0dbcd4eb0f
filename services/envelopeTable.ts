import type { EnvelopePoint, EnvelopeTable, Side, TransformedBoundary } from '../types';
import { DataIntegrityError, OutOfRangeError } from './errors';

const FLAT_EPSILON = 0.001; // mm, edges flatter than this are treated as horizontal

/**
 * Checks that a nominal table can be interpolated by height:
 * at least two finite points, non-negative laterals, heights never decreasing.
 */
export function assertEnvelopeTable(table: EnvelopeTable): void {
    if (table.length < 2) {
        throw new DataIntegrityError(table.length, `Envelope table needs at least 2 points, got ${table.length}`);
    }
    table.forEach((p, i) => {
        if (!Number.isFinite(p.lateralMm) || !Number.isFinite(p.heightMm)) {
            throw new DataIntegrityError(i, `Envelope point ${i} is not finite`);
        }
        if (p.lateralMm < 0) {
            throw new DataIntegrityError(i, `Envelope point ${i} has negative lateral ${p.lateralMm} mm`);
        }
        if (i > 0 && p.heightMm < table[i - 1].heightMm) {
            throw new DataIntegrityError(
                i,
                `Envelope heights must not decrease: point ${i} (${p.heightMm} mm) is below point ${i - 1} (${table[i - 1].heightMm} mm)`
            );
        }
    });
}

/** Left-hand side of a one-sided table. */
export function mirrorEnvelope(table: EnvelopeTable): EnvelopePoint[] {
    return table.map(p => ({ lateralMm: p.lateralMm === 0 ? 0 : -p.lateralMm, heightMm: p.heightMm }));
}

export function heightSpan(points: readonly EnvelopePoint[]): [number, number] {
    const hs = points.map(p => p.heightMm);
    return [Math.min(...hs), Math.max(...hs)];
}

/**
 * Closed outline of a two-sided boundary: right side base to top, then the
 * left side back down, ending on the first point.
 */
export function toOutline(boundary: TransformedBoundary): EnvelopePoint[] {
    const outline = [...boundary.right, ...[...boundary.left].reverse()];
    return outline.length > 0 ? [...outline, outline[0]] : outline;
}

/**
 * Required clearance of a boundary walk at `heightMm`, read outward on `side`.
 * Every edge crossing the height contributes; the rightmost crossing is the
 * right-side reading and the negated leftmost one the left-side reading, so a
 * horizontal step at exactly that height counts at its outer end.
 *
 * Pass the closed outline for a canted boundary: rotation lifts one side's
 * base and drops the other's top, so a single side no longer covers every
 * height the envelope does.
 */
export function boundaryLateralAt(points: readonly EnvelopePoint[], heightMm: number, side: Side): number {
    const span = heightSpan(points);
    if (!(heightMm >= span[0] && heightMm <= span[1])) {
        throw new OutOfRangeError(heightMm, span);
    }

    const intersections: number[] = [];
    for (let i = 0; i < points.length - 1; i++) {
        const { lateralMm: x1, heightMm: y1 } = points[i];
        const { lateralMm: x2, heightMm: y2 } = points[i + 1];

        if ((y1 <= heightMm && heightMm <= y2) || (y2 <= heightMm && heightMm <= y1)) {
            if (Math.abs(y1 - y2) < FLAT_EPSILON) intersections.push(x1, x2);
            else intersections.push(x1 + (heightMm - y1) * (x2 - x1) / (y2 - y1));
        }
    }
    if (intersections.length === 0) throw new OutOfRangeError(heightMm, span);

    return side === 'right' ? Math.max(...intersections) : -Math.min(...intersections);
}

/**
 * Closest point on the boundary walk to (x, y).
 */
export function nearestOnBoundary(
    points: readonly EnvelopePoint[],
    x: number,
    y: number
): { point: EnvelopePoint; distanceMm: number } {
    let best = { point: points[0], distanceSq: Number.MAX_VALUE };

    for (let i = 0; i < points.length - 1; i++) {
        const v = points[i];
        const w = points[i + 1];

        const l2 = Math.pow(v.lateralMm - w.lateralMm, 2) + Math.pow(v.heightMm - w.heightMm, 2);
        let t = 0;
        if (l2 !== 0) {
            t = ((x - v.lateralMm) * (w.lateralMm - v.lateralMm) + (y - v.heightMm) * (w.heightMm - v.heightMm)) / l2;
            t = Math.max(0, Math.min(1, t));
        }

        const px = v.lateralMm + t * (w.lateralMm - v.lateralMm);
        const py = v.heightMm + t * (w.heightMm - v.heightMm);
        const dSq = Math.pow(x - px, 2) + Math.pow(y - py, 2);
        if (dSq < best.distanceSq) best = { point: { lateralMm: px, heightMm: py }, distanceSq: dSq };
    }

    return { point: best.point, distanceMm: Math.sqrt(best.distanceSq) };
}
