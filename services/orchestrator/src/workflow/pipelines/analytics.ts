import { z } from 'zod';

import type { AnalyticsDataResult } from '../../clients/marketplace';
import { WORKFLOW_IDS } from '../catalog';
import { fail, ok } from '../result';
import { definePipeline } from '../runtime';

export const analyticsRequestSchema = z.object({
  requestId: z.string().min(1),
  analyticsType: z.string().min(1).default('market_trends'),
  timeRange: z.string().min(1).default('24h'),
  includeTokens: z.boolean().default(true),
  includeFees: z.boolean().default(true),
  includePricing: z.boolean().default(true),
  userId: z.string().default(''),
  timestamp: z.string().optional()
});

export type AnalyticsRequest = z.infer<typeof analyticsRequestSchema>;

interface AnalyticsState {
  listingData: AnalyticsDataResult | null;
  orderData: AnalyticsDataResult | null;
  trendData: unknown;
  aggregatedData: unknown;
  totalDataPoints: number;
  reportId: string | null;
}

// Read-only aggregation: no signature gate.
export const analyticsPipeline = definePipeline<AnalyticsRequest, AnalyticsState>({
  workflowId: WORKFLOW_IDS.analytics,
  inputKey: 'analyticsRequest',
  inputSchema: analyticsRequestSchema,
  createState: () => ({
    listingData: null,
    orderData: null,
    trendData: null,
    aggregatedData: null,
    totalDataPoints: 0,
    reportId: null
  }),
  steps: [
    {
      name: 'collect-listing-analytics',
      label: 'Collect listing analytics',
      fatal: true,
      async run({ input, state, services, signal }) {
        const data = await services.marketplace.getListingAnalytics(
          { requestId: input.requestId, analyticsType: input.analyticsType, timeRange: input.timeRange },
          signal
        );
        if (!data.success) {
          return fail('business', 'Listing analytics collection failed');
        }
        state.listingData = data;
        return ok({ message: `${data.recordCount} listing records` });
      }
    },
    {
      name: 'collect-order-analytics',
      label: 'Collect order analytics',
      fatal: true,
      async run({ input, state, services, signal }) {
        const data = await services.marketplace.getOrderAnalytics(
          { requestId: input.requestId, analyticsType: input.analyticsType, timeRange: input.timeRange },
          signal
        );
        if (!data.success) {
          return fail('business', 'Order analytics collection failed');
        }
        state.orderData = data;
        return ok({ message: `${data.recordCount} order records` });
      }
    },
    {
      name: 'calculate-trends',
      label: 'Calculate trends',
      fatal: true,
      async run({ input, state, services, signal }) {
        const trends = await services.marketplace.calculateTrends(
          {
            requestId: input.requestId,
            listingData: state.listingData?.data ?? null,
            orderData: state.orderData?.data ?? null,
            tokenData: {},
            timeRange: input.timeRange,
            includePricing: input.includePricing
          },
          signal
        );
        if (!trends.success) {
          return fail('business', 'Trend calculation failed');
        }
        state.trendData = trends.trendData ?? null;
        return ok({ message: 'Trends calculated' });
      }
    },
    {
      name: 'aggregate-analytics',
      label: 'Aggregate analytics',
      fatal: true,
      async run({ input, state, services, signal }) {
        const aggregation = await services.marketplace.aggregateAnalytics(
          {
            requestId: input.requestId,
            priceData: state.trendData,
            volumeData: {},
            liquidityData: {},
            feeData: {},
            analyticsType: input.analyticsType,
            timeRange: input.timeRange
          },
          signal
        );
        if (!aggregation.success) {
          return fail('business', 'Analytics aggregation failed');
        }
        state.aggregatedData = aggregation.aggregatedData ?? null;
        state.totalDataPoints = aggregation.totalDataPoints;
        return ok({ message: `${aggregation.totalDataPoints} data points aggregated` });
      }
    },
    {
      name: 'generate-report',
      label: 'Generate report',
      fatal: true,
      async run({ input, state, services, signal }) {
        const report = await services.marketplace.generateReport(
          {
            requestId: input.requestId,
            aggregatedData: state.aggregatedData,
            analyticsType: input.analyticsType,
            timeRange: input.timeRange,
            userId: input.userId,
            includeCharts: true,
            includeRawData: false
          },
          signal
        );
        if (!report.success) {
          return fail('business', 'Report generation failed');
        }
        state.reportId = report.reportId;
        return ok({
          results: {
            requestId: input.requestId,
            analyticsType: input.analyticsType,
            reportId: report.reportId,
            totalDataPoints: state.totalDataPoints
          },
          message: `Report ${report.reportId} generated`
        });
      }
    }
  ],
  finalize: (input, state) => ({
    eventType: 'analytics_report_generated',
    data: {
      requestId: input.requestId,
      analyticsType: input.analyticsType,
      timeRange: input.timeRange,
      reportId: state.reportId,
      totalDataPoints: state.totalDataPoints
    }
  })
});
