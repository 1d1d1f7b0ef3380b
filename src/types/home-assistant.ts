/**
 * Response shapes of the automation hub REST API. Unknown keys are kept.
 */
import { z } from 'zod';

export const EntityStateSchema = z
  .object({
    entity_id: z.string(),
    state: z.string(),
    attributes: z.record(z.unknown()).default({}),
    last_changed: z.string().optional(),
    last_updated: z.string().optional(),
    context: z.unknown().optional(),
  })
  .passthrough();

export type EntityState = z.output<typeof EntityStateSchema>;

/**
 * A state change in a history response. With minimal_response only the
 * first entry of each series carries entity_id and attributes.
 */
export const HistoryStateSchema = z
  .object({
    entity_id: z.string().optional(),
    state: z.string(),
    attributes: z.record(z.unknown()).optional(),
    last_changed: z.string().optional(),
    last_updated: z.string().optional(),
  })
  .passthrough();

export type HistoryState = z.output<typeof HistoryStateSchema>;

export const HistoryResponseSchema = z.array(z.array(HistoryStateSchema));

export const ServiceDomainSchema = z
  .object({
    domain: z.string(),
    services: z.record(z.unknown()),
  })
  .passthrough();

export type ServiceDomain = z.output<typeof ServiceDomainSchema>;

export const HubConfigSchema = z
  .object({
    location_name: z.string().optional(),
    version: z.string().optional(),
    state: z.string().optional(),
    time_zone: z.string().optional(),
    components: z.array(z.string()).optional(),
  })
  .passthrough();

export type HubConfig = z.output<typeof HubConfigSchema>;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryParams = Record<string, string>;

export interface RequestOptions {
  params?: QueryParams;
  /** Serialized as the JSON request body */
  json?: unknown;
}

export interface HistoryOptions {
  /** Entity id, or several joined with commas */
  entityId?: string;
  /** Defaults to 24 hours before the call */
  startTime?: Date;
  endTime?: Date;
  /** Only return state changes (default: true) */
  minimalResponse?: boolean;
}

export type StatisticsPeriod = '5minute' | 'hour' | 'day' | 'week' | 'month';

export interface StatisticsOptions {
  /** Defaults to 7 days before the call */
  startTime?: Date;
  endTime?: Date;
  /**
   * Aggregation period of the hub's statistics facility. The REST history
   * fallback returns raw state changes, so this is not applied.
   */
  period?: StatisticsPeriod;
}

export interface CallServiceOptions {
  entityId?: string;
  /** Service data merged into the request body */
  data?: Record<string, unknown>;
}
