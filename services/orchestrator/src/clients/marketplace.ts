import { z } from 'zod';

import type { ServiceClient } from './serviceClient';

export interface ListingCreationRequest {
  tokenId: string;
  sellerId: string;
  quantity: number;
  basePrice: number;
  pricingModel: string;
  listingType: string;
  signatureValidationId: string;
}

export const listingCreationResultSchema = z.object({
  listingId: z.string().min(1),
  tokenId: z.string().default(''),
  status: z.string().default(''),
  createdAt: z.string().optional()
});

export type ListingCreationResult = z.infer<typeof listingCreationResultSchema>;

export interface ListingValidationRequest {
  quantity: number;
  buyerId: string;
  signatureValidationId: string;
}

export interface OrderCreationRequest {
  listingId: string;
  buyerId: string;
  sellerId: string;
  quantity: number;
  totalAmount: number;
  escrowRequired: boolean;
  signatureValidationId: string;
  listingValidationId: string;
}

export const orderCreationResultSchema = z.object({
  orderId: z.string().min(1),
  listingId: z.string().default(''),
  status: z.string().default(''),
  createdAt: z.string().optional()
});

export type OrderCreationResult = z.infer<typeof orderCreationResultSchema>;

export interface OrderVerificationRequest {
  escrowId: string;
  action: string;
  buyerId: string;
  sellerId: string;
  signatureValidationId: string;
}

export interface OrderStatusUpdateRequest {
  escrowId: string;
  newStatus: string;
  escrowAction: string;
  signatureValidationId: string;
}

export const orderStatusUpdateResultSchema = z.object({
  orderId: z.string().default(''),
  status: z.string().min(1),
  updatedAt: z.string().optional()
});

export type OrderStatusUpdateResult = z.infer<typeof orderStatusUpdateResultSchema>;

/** Shape shared by listing validation and order verification answers. */
export const checkResultSchema = z.object({
  isValid: z.boolean(),
  validationId: z.string().default(''),
  message: z.string().default('')
});

export type CheckResult = z.infer<typeof checkResultSchema>;

export interface AnalyticsDataRequest {
  requestId: string;
  analyticsType: string;
  timeRange: string;
}

export const analyticsDataResultSchema = z.object({
  success: z.boolean(),
  recordCount: z.number().int().default(0),
  data: z.unknown()
});

export type AnalyticsDataResult = z.infer<typeof analyticsDataResultSchema>;

export interface TrendCalculationRequest {
  requestId: string;
  listingData: unknown;
  orderData: unknown;
  tokenData: unknown;
  timeRange: string;
  includePricing: boolean;
}

export const trendCalculationResultSchema = z.object({
  success: z.boolean(),
  trendData: z.unknown(),
  calculatedAt: z.string().optional()
});

export type TrendCalculationResult = z.infer<typeof trendCalculationResultSchema>;

export interface AnalyticsAggregationRequest {
  requestId: string;
  priceData: unknown;
  volumeData: unknown;
  liquidityData: unknown;
  feeData: unknown;
  analyticsType: string;
  timeRange: string;
}

export const analyticsAggregationResultSchema = z.object({
  success: z.boolean(),
  aggregatedData: z.unknown(),
  totalDataPoints: z.number().int().nonnegative().default(0),
  aggregatedAt: z.string().optional()
});

export type AnalyticsAggregationResult = z.infer<typeof analyticsAggregationResultSchema>;

export interface ReportGenerationRequest {
  requestId: string;
  aggregatedData: unknown;
  analyticsType: string;
  timeRange: string;
  userId: string;
  includeCharts: boolean;
  includeRawData: boolean;
}

export const reportGenerationResultSchema = z.object({
  success: z.boolean(),
  reportId: z.string().default(''),
  reportData: z.unknown(),
  generatedAt: z.string().optional()
});

export type ReportGenerationResult = z.infer<typeof reportGenerationResultSchema>;

export interface MarketplaceServiceClient {
  createListing(request: ListingCreationRequest, signal?: AbortSignal): Promise<ListingCreationResult>;
  validateListing(listingId: string, request: ListingValidationRequest, signal?: AbortSignal): Promise<CheckResult>;
  createOrder(request: OrderCreationRequest, signal?: AbortSignal): Promise<OrderCreationResult>;
  verifyOrder(orderId: string, request: OrderVerificationRequest, signal?: AbortSignal): Promise<CheckResult>;
  updateOrderStatus(
    orderId: string,
    request: OrderStatusUpdateRequest,
    signal?: AbortSignal
  ): Promise<OrderStatusUpdateResult>;
  getListingAnalytics(request: AnalyticsDataRequest, signal?: AbortSignal): Promise<AnalyticsDataResult>;
  getOrderAnalytics(request: AnalyticsDataRequest, signal?: AbortSignal): Promise<AnalyticsDataResult>;
  calculateTrends(request: TrendCalculationRequest, signal?: AbortSignal): Promise<TrendCalculationResult>;
  aggregateAnalytics(request: AnalyticsAggregationRequest, signal?: AbortSignal): Promise<AnalyticsAggregationResult>;
  generateReport(request: ReportGenerationRequest, signal?: AbortSignal): Promise<ReportGenerationResult>;
}

const segment = (value: string) => encodeURIComponent(value);

export class HttpMarketplaceServiceClient implements MarketplaceServiceClient {
  constructor(private readonly http: ServiceClient) {}

  createListing(request: ListingCreationRequest, signal?: AbortSignal) {
    return this.http.post('/api/listings', { body: request, schema: listingCreationResultSchema, signal });
  }

  validateListing(listingId: string, request: ListingValidationRequest, signal?: AbortSignal) {
    return this.http.post(`/api/listings/${segment(listingId)}/validate`, {
      body: request,
      schema: checkResultSchema,
      signal
    });
  }

  createOrder(request: OrderCreationRequest, signal?: AbortSignal) {
    return this.http.post('/api/orders', { body: request, schema: orderCreationResultSchema, signal });
  }

  verifyOrder(orderId: string, request: OrderVerificationRequest, signal?: AbortSignal) {
    return this.http.post(`/api/orders/${segment(orderId)}/verify`, {
      body: request,
      schema: checkResultSchema,
      signal
    });
  }

  updateOrderStatus(orderId: string, request: OrderStatusUpdateRequest, signal?: AbortSignal) {
    return this.http.put(`/api/orders/${segment(orderId)}/status`, {
      body: request,
      schema: orderStatusUpdateResultSchema,
      signal
    });
  }

  getListingAnalytics(request: AnalyticsDataRequest, signal?: AbortSignal) {
    return this.http.post('/api/analytics/listings', { body: request, schema: analyticsDataResultSchema, signal });
  }

  getOrderAnalytics(request: AnalyticsDataRequest, signal?: AbortSignal) {
    return this.http.post('/api/analytics/orders', { body: request, schema: analyticsDataResultSchema, signal });
  }

  calculateTrends(request: TrendCalculationRequest, signal?: AbortSignal) {
    return this.http.post('/api/analytics/calculate-trends', {
      body: request,
      schema: trendCalculationResultSchema,
      signal
    });
  }

  aggregateAnalytics(request: AnalyticsAggregationRequest, signal?: AbortSignal) {
    return this.http.post('/api/analytics/aggregate', {
      body: request,
      schema: analyticsAggregationResultSchema,
      signal
    });
  }

  generateReport(request: ReportGenerationRequest, signal?: AbortSignal) {
    return this.http.post('/api/analytics/report', {
      body: request,
      schema: reportGenerationResultSchema,
      signal
    });
  }
}
