import envelopes from './data/envelopes.json';
import type { ClearanceConfig, Electrification, SlackBand } from './types';

// Track slack by curve radius. Bands are checked in order; the first one
// whose bound admits the radius wins, anything wider gets no slack.
export const SLACK_TABLE: readonly SlackBand[] = [
  { upToM: 200, inclusive: false, slackMm: 20 },
  { upToM: 240, inclusive: false, slackMm: 15 },
  { upToM: 320, inclusive: false, slackMm: 10 },
  { upToM: 440, inclusive: true, slackMm: 5 },
];

// Nearest-boundary distance correction: readings closer than `zeroBelowMm`
// count as touching, and up to `blendBelowMm` the first `zeroBelowMm` is
// taken off in quadrature.
export const NEAREST_CORRECTION = { zeroBelowMm: 5, blendBelowMm: 13 } as const;

export const ELECTRIFICATION_CLASSES: readonly Electrification[] = ['DC', 'AC', 'none'];

export const CLEARANCE_CONFIG: ClearanceConfig = {
  gaugeMm: 1067,
  generalWideningNumerator: 23100,
  upperWideningNumerator: 11550,
  straightRadiusThresholdM: 10000,
  minimumRadiusM: 100,
  slackTable: SLACK_TABLE,
  electrification: {
    DC: { envelope: envelopes.dc, upperBodyThresholdMm: 3156, upperWidening: true },
    // AC catenary sits 1000 mm higher
    AC: { envelope: envelopes.ac, upperBodyThresholdMm: 3156, upperWidening: true },
    // No catenary: the general widening applies over the full height
    none: { envelope: envelopes.dc, upperBodyThresholdMm: 3156, upperWidening: false },
  },
};
