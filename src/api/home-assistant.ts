import { z } from 'zod';
import { CredentialStore } from '../config/secrets.js';
import { ServerConfigResolver, serverUrl } from '../config/server-config.js';
import {
  EntityStateSchema,
  HistoryResponseSchema,
  HubConfigSchema,
  ServiceDomainSchema,
} from '../types/home-assistant.js';
import type {
  CallServiceOptions,
  EntityState,
  HistoryOptions,
  HistoryState,
  HttpMethod,
  HubConfig,
  QueryParams,
  RequestOptions,
  ServiceDomain,
  StatisticsOptions,
} from '../types/home-assistant.js';
import { HttpError, errorMessage } from '../utils/errors.js';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/** Substrings that mark an entity as energy related */
export const ENERGY_KEYWORDS = ['energy', 'power', 'watt', 'kwh', 'consumption'];

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export interface HomeAssistantClientOptions {
  /** Base URL; when omitted it comes from config.toml, then from secrets.toml */
  url?: string;
  /** Long-lived access token; when omitted it comes from secrets.toml */
  token?: string;
  /** Server to resolve url/token for (default server when omitted) */
  serverName?: string;
  resolver?: ServerConfigResolver;
  credentials?: CredentialStore;
  fetch?: typeof fetch;
  timeoutMs?: number;
}

/**
 * Client for the hub's REST API under <url>/api/
 */
export class HomeAssistantClient {
  readonly url: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(options: HomeAssistantClientOptions = {}) {
    let resolver = options.resolver;
    let store = options.credentials;
    const getResolver = (): ServerConfigResolver => (resolver ??= new ServerConfigResolver());
    const getStore = (): CredentialStore => (store ??= new CredentialStore(getResolver()));

    const url =
      options.url ??
      serverUrl(getResolver().serverConfig(options.serverName)) ??
      getStore().credentials(options.serverName).url;
    const token = options.token ?? getStore().credentials(options.serverName).token;

    this.url = url.replace(/\/+$/, '');
    this.headers = {
      Authorization: `Bearer ${token}`,
      'Content-Type': 'application/json',
    };
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  /**
   * Perform one API call. Resolves to the parsed JSON body, or null when the
   * body is empty; rejects with HttpError on a non-2xx status.
   */
  async request(method: HttpMethod, endpoint: string, options: RequestOptions = {}): Promise<unknown> {
    const url = new URL(`${this.url}/api/${endpoint}`);
    for (const [key, value] of Object.entries(options.params ?? {})) {
      url.searchParams.set(key, value);
    }

    const response = await this.fetchImpl(url, {
      method,
      headers: this.headers,
      body: options.json === undefined ? undefined : JSON.stringify(options.json),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const text = await response.text();
    if (!response.ok) {
      throw new HttpError(url.toString(), response.status, response.statusText, text);
    }
    return text ? JSON.parse(text) : null;
  }

  /**
   * Fetch the hub config and report where we connected to
   */
  async testConnection(): Promise<HubConfig> {
    try {
      const config = await this.getConfig();
      console.error(`[hass] Connected to ${this.url}`);
      console.error(`[hass]   Location: ${config.location_name ?? 'Unknown'}`);
      console.error(`[hass]   Version: ${config.version ?? 'Unknown'}`);
      return config;
    } catch (error) {
      console.error(`[hass] Connection to ${this.url} failed: ${errorMessage(error)}`);
      throw error;
    }
  }

  getConfig(): Promise<HubConfig> {
    return this.get('config', HubConfigSchema);
  }

  getStates(): Promise<EntityState[]> {
    return this.get('states', z.array(EntityStateSchema));
  }

  getState(entityId: string): Promise<EntityState> {
    return this.get(`states/${encodeURIComponent(entityId)}`, EntityStateSchema);
  }

  getServices(): Promise<ServiceDomain[]> {
    return this.get('services', z.array(ServiceDomainSchema));
  }

  /**
   * State history, one series per entity
   */
  getHistory(options: HistoryOptions = {}): Promise<HistoryState[][]> {
    const { entityId, endTime, minimalResponse = true } = options;
    const startTime = options.startTime ?? new Date(Date.now() - DAY_MS);

    const params: QueryParams = {};
    if (entityId) {
      params.filter_entity_id = entityId;
    }
    if (endTime) {
      params.end_time = endTime.toISOString();
    }
    if (minimalResponse) {
      params.minimal_response = 'true';
    }

    return this.get(`history/period/${startTime.toISOString()}`, HistoryResponseSchema, params);
  }

  /**
   * Best-effort statistics. The hub only serves long-term statistics over its
   * websocket API, so this returns the raw state history of the given
   * entities instead; no aggregated mean/min/max fields are present.
   */
  getStatistics(entityIds: string[], options: StatisticsOptions = {}): Promise<HistoryState[][]> {
    return this.getHistory({
      entityId: entityIds.join(','),
      startTime: options.startTime ?? new Date(Date.now() - 7 * DAY_MS),
      endTime: options.endTime,
    });
  }

  /**
   * All entities of one domain, e.g. 'light' or 'sensor'
   */
  async getEntitiesByDomain(domain: string): Promise<EntityState[]> {
    const prefix = `${domain}.`;
    const states = await this.getStates();
    return states.filter((state) => state.entity_id.startsWith(prefix));
  }

  async getEnergyEntities(): Promise<EntityState[]> {
    const states = await this.getStates();
    return states.filter((state) => {
      const entityId = state.entity_id.toLowerCase();
      const rawName = state.attributes.friendly_name;
      const friendlyName = typeof rawName === 'string' ? rawName.toLowerCase() : '';
      return ENERGY_KEYWORDS.some((keyword) => entityId.includes(keyword) || friendlyName.includes(keyword));
    });
  }

  async callService(domain: string, service: string, options: CallServiceOptions = {}): Promise<void> {
    const body: Record<string, unknown> = { ...options.data };
    if (options.entityId) {
      body.entity_id = options.entityId;
    }
    await this.request('POST', `services/${domain}/${service}`, { json: body });
  }

  private async get<S extends z.ZodTypeAny>(
    endpoint: string,
    schema: S,
    params?: QueryParams
  ): Promise<z.output<S>> {
    const data = await this.request('GET', endpoint, { params });
    return schema.parse(data);
  }
}
