import type { PlotData } from 'plotly.js';
import type { ClearanceResult, MeasurementPoint, TransformedBoundary } from '../types';
import { toOutline } from './envelopeTable';

export type Trace = Partial<PlotData>;

const statusColors = {
    SAFE: 'rgba(230, 249, 230, 0.6)',
    INTRUSION: 'rgba(254, 202, 202, 0.6)'
};

/**
 * Traces for the plotting layer. The measurement point is drawn at its input
 * coordinates whatever the cant; only the envelope moves.
 */
export function buildClearanceTraces(
    nominal: TransformedBoundary,
    transformed: TransformedBoundary,
    measurement: MeasurementPoint,
    result: ClearanceResult | null
): Trace[] {
    const traces: Trace[] = [];

    const nominalOutline = toOutline(nominal);
    traces.push({
        x: nominalOutline.map(p => p.lateralMm), y: nominalOutline.map(p => p.heightMm),
        line: { color: '#2563eb', width: 2 },
        name: 'Nominal Envelope',
        type: 'scatter', mode: 'lines',
        hovertemplate: '<b>Nominal Envelope</b><br>x: %{x:.1f}<br>y: %{y:.1f}<extra></extra>'
    });

    const outline = toOutline(transformed);
    traces.push({
        x: outline.map(p => p.lateralMm), y: outline.map(p => p.heightMm),
        fill: 'toself',
        fillcolor: result ? statusColors[result.status] : 'rgba(229, 231, 235, 0.4)',
        line: { color: '#FF6347', dash: 'dash', width: 2 },
        name: 'Effective Envelope',
        type: 'scatter', mode: 'lines',
        hoveron: 'points',
        hovertemplate: '<b>Effective Envelope</b><br>x: %{x:.1f}<br>y: %{y:.1f}<extra></extra>'
    });

    const color = result?.status === 'INTRUSION' ? '#dc2626' : '#059669';
    traces.push({
        x: [measurement.distanceMm], y: [measurement.heightMm],
        mode: 'markers',
        marker: { size: 10, color, symbol: 'circle' },
        name: 'Measurement Point',
        hovertemplate: '<b>Measurement Point</b><br>x: %{x:.0f} mm<br>y: %{y:.0f} mm<extra></extra>'
    });

    if (result) {
        const sign = result.side === 'right' ? 1 : -1;
        const envX = sign * result.raw.requiredClearanceMm;
        traces.push({
            x: [measurement.distanceMm, envX], y: [measurement.heightMm, measurement.heightMm],
            mode: 'lines',
            line: { color: '#800080', dash: 'dash', width: 1.5 },
            name: 'Margin',
            hoverinfo: 'text',
            text: `Margin: ${result.marginMm} mm`
        });
    }

    return traces;
}
