import {
  makeCounterProvider,
  makeHistogramProvider,
} from '@willsoto/nestjs-prometheus';

export const ORGANIZATIONS_PROCESSED_TOTAL = 'organizations_processed_total';
export const ORGANIZATION_PROCESSING_DURATION =
  'organization_processing_duration_seconds';
export const OUTREACH_SENDS_TOTAL = 'outreach_sends_total';

export const metricsProviders = [
  makeCounterProvider({
    name: ORGANIZATIONS_PROCESSED_TOTAL,
    help: 'Organizations processed, by outcome status',
    labelNames: ['status'],
  }),
  makeHistogramProvider({
    name: ORGANIZATION_PROCESSING_DURATION,
    help: 'Wall time spent discovering contacts for one organization',
    buckets: [0.5, 1, 2, 5, 10, 30, 60, 120],
  }),
  makeCounterProvider({
    name: OUTREACH_SENDS_TOTAL,
    help: 'Outreach send attempts, by result',
    labelNames: ['status'],
  }),
];
