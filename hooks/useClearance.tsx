import { useState, useMemo, useCallback } from 'react';
import type { ClearanceResult, Electrification, CurveDirection, Radius, TransformedBoundary } from '../types';
import { evaluate } from '../services/clearanceEvaluator';
import { transformedBoundary } from '../services/trackGeometry';

export interface ClearanceParams {
    radius: Radius; // m
    cantMm: number;
    electrification: Electrification;
    direction: CurveDirection;
    measurementDistanceMm: number;
    measurementHeightMm: number;
}

export const DEFAULT_PARAMS: ClearanceParams = {
    radius: 160,
    cantMm: 105,
    electrification: 'DC',
    direction: 'cw',
    measurementDistanceMm: 2110,
    measurementHeightMm: 3150
};

export const useClearance = (initial: ClearanceParams = DEFAULT_PARAMS) => {
    const [params, setParams] = useState<ClearanceParams>(initial);

    const updateParams = useCallback((updates: Partial<ClearanceParams>) => {
        setParams(prev => {
            const next = { ...prev, ...updates };
            // Straight track carries no cant
            if ('radius' in updates && updates.radius === 'straight') {
                next.cantMm = 0;
            }
            return next;
        });
    }, []);

    const geometry = useMemo(() => ({
        radius: params.radius,
        cantMm: params.cantMm,
        electrification: params.electrification,
        direction: params.direction
    }), [params.radius, params.cantMm, params.electrification, params.direction]);

    // Derived State: boundaries for plotting
    const boundaries = useMemo((): { nominal: TransformedBoundary; effective: TransformedBoundary } | null => {
        try {
            return {
                nominal: transformedBoundary({ ...geometry, radius: 'straight', cantMm: 0 }),
                effective: transformedBoundary(geometry)
            };
        } catch (e) {
            console.error("Boundary Calculation Error:", e);
            return null;
        }
    }, [geometry]);

    // Derived State: evaluation of the measurement point
    const evaluation = useMemo((): { result: ClearanceResult | null; error: Error | null } => {
        try {
            const result = evaluate(geometry, {
                distanceMm: params.measurementDistanceMm,
                heightMm: params.measurementHeightMm
            });
            return { result, error: null };
        } catch (e) {
            console.error("Clearance Calculation Error:", e);
            return { result: null, error: e instanceof Error ? e : new Error(String(e)) };
        }
    }, [geometry, params.measurementDistanceMm, params.measurementHeightMm]);

    return {
        params,
        updateParams,
        boundaries,
        result: evaluation.result,
        error: evaluation.error
    };
};
