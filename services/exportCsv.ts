import type { EnvelopePoint } from '../types';

export type ExportType = 'Nominal' | 'Effective';

// One row per point, 2 decimals
export const convertBoundaryToCsv = (
    envelopeName: string,
    type: ExportType,
    points: readonly EnvelopePoint[]
): string => {
    let csv = "Envelope,Type,Lateral (mm),Height (mm)\n";
    for (const p of points) {
        csv += `${envelopeName},${type},${p.lateralMm.toFixed(2)},${p.heightMm.toFixed(2)}\n`;
    }
    return csv;
};

export const exportFileName = (envelopeName: string, type: ExportType, date: Date): string =>
    `${envelopeName}_${type.toLowerCase()}_envelope_${date.toISOString().slice(0, 10)}.csv`;
