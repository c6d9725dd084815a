import type { Logger } from 'pino';
import type { z } from 'zod';
import { systemClock, type Clock } from '../lib/clock.js';
import type { PlannerConfig, ServiceCredentials } from '../lib/config/planner.js';
import {
  BadGatewayError,
  ClientTransportError,
  transportErrorFor,
} from '../lib/errors.js';
import { silentLogger } from '../lib/logger.js';
import {
  currentUserResponseSchema,
  deleteResponseSchema,
  entityResponseSchema,
  ignoredResponseSchema,
  marketResponseSchema,
  marketStatsResponseSchema,
  resourceResponseSchema,
  versionResponseSchema,
} from '../schemas/analysis-service.schema.js';
import { isMarketState } from '../types/enums.js';
import type {
  CreateMarketOptions,
  CreateScenarioOptions,
  EntityDescription,
  MarketStatsPeriod,
  RemoteMarket,
  RemoteResource,
  RemoteService,
} from '../types/remote.js';
import type { WireDto } from '../types/settings.js';

const MAX_RETRIES = 3;
const BASE_DELAY_MS = 1000;
const VERSION_TOKEN = /\d+\.\d+(?:\.\d+)?/;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface AnalysisServiceClientOptions {
  /** Base URL of the REST API, e.g. `https://analysis.example.com/api/v2/`. */
  baseUrl: string;
  credentials?: ServiceCredentials | null;
  fetch?: FetchLike;
  clock?: Clock;
  logger?: Logger;
}

interface Transport {
  baseUrl: string;
  authorization: string | null;
  fetch: FetchLike;
  clock: Clock;
  logger: Logger;
}

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

interface RequestOptions {
  query?: Record<string, string>;
  body?: unknown;
}

function createTransport(options: AnalysisServiceClientOptions): Transport {
  const { credentials } = options;
  return {
    baseUrl: options.baseUrl.endsWith('/') ? options.baseUrl : `${options.baseUrl}/`,
    authorization: credentials
      ? `Basic ${Buffer.from(`${credentials.username}:${credentials.password}`).toString('base64')}`
      : null,
    fetch: options.fetch ?? ((input, init) => fetch(input, init)),
    clock: options.clock ?? systemClock,
    logger: options.logger ?? silentLogger,
  };
}

function parseBody(text: string): unknown {
  if (text.trim() === '') return null;
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new BadGatewayError('Analysis service returned a malformed response', { cause: error });
  }
}

/**
 * Make a request to the analysis service with 429 handling, and validate
 * the response body against `schema`.
 */
async function serviceFetch<T>(
  transport: Transport,
  method: HttpMethod,
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: RequestOptions = {},
  retryCount = 0
): Promise<T> {
  const url = new URL(path, transport.baseUrl);
  for (const [key, value] of Object.entries(options.query ?? {})) {
    url.searchParams.set(key, value);
  }

  const headers: Record<string, string> = { Accept: 'application/json' };
  if (transport.authorization) headers.Authorization = transport.authorization;
  if (options.body !== undefined) headers['Content-Type'] = 'application/json';

  let response: Response;
  try {
    response = await transport.fetch(url.toString(), {
      method,
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    });
  } catch (error) {
    throw new BadGatewayError(`Unable to reach analysis service: ${method} ${path}`, { cause: error });
  }

  // Handle 429 Too Many Requests
  if (response.status === 429) {
    if (retryCount >= MAX_RETRIES) {
      throw new ClientTransportError(429, `Analysis service rate limited after ${MAX_RETRIES} retries`);
    }

    const retryAfter = Number.parseInt(response.headers.get('Retry-After') ?? '', 10);
    const delayMs = Number.isFinite(retryAfter)
      ? retryAfter * 1000
      : BASE_DELAY_MS * Math.pow(2, retryCount);

    transport.logger.warn(
      { path, delayMs, attempt: retryCount + 1, maxRetries: MAX_RETRIES },
      'rate limited, retrying'
    );
    await transport.clock.sleep(delayMs);
    return serviceFetch(transport, method, path, schema, options, retryCount + 1);
  }

  const text = await response.text();

  if (!response.ok) {
    throw transportErrorFor(response.status, `Analysis service error (${response.status}) on ${method} ${path}: ${text}`);
  }

  const parsed = schema.safeParse(parseBody(text));
  if (!parsed.success) {
    throw new BadGatewayError(
      `Unexpected response from ${method} ${path}: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`,
      { cause: parsed.error }
    );
  }
  return parsed.data;
}

function toResource(response: { uuid: string; displayName: string }): RemoteResource {
  return { id: response.uuid, displayName: response.displayName };
}

/**
 * RemoteService over the analysis service REST API. Use connect(), which
 * reads the protocol version the service reports.
 */
export class AnalysisServiceClient implements RemoteService {
  private readonly transport: Transport;
  private readonly version: string;

  private constructor(transport: Transport, version: string) {
    this.transport = transport;
    this.version = version;
  }

  static async connect(options: AnalysisServiceClientOptions): Promise<AnalysisServiceClient> {
    const transport = createTransport(options);
    const { version } = await serviceFetch(transport, 'GET', 'admin/versions', versionResponseSchema);

    const token = VERSION_TOKEN.exec(version);
    if (!token) {
      throw new BadGatewayError(`Unrecognised service version '${version}'`);
    }

    transport.logger.info({ baseUrl: transport.baseUrl, version: token[0] }, 'connected to analysis service');
    return new AnalysisServiceClient(transport, token[0]);
  }

  static fromConfig(
    config: PlannerConfig,
    options: Omit<AnalysisServiceClientOptions, 'baseUrl' | 'credentials'> = {}
  ): Promise<AnalysisServiceClient> {
    return AnalysisServiceClient.connect({
      ...options,
      baseUrl: config.serviceUrl,
      credentials: config.credentials,
    });
  }

  reportedProtocolVersion(): string {
    return this.version;
  }

  async createScenario(dto: WireDto, options: CreateScenarioOptions = {}): Promise<RemoteResource> {
    const path = options.addressedName
      ? `scenarios/${encodeURIComponent(options.addressedName)}`
      : 'scenarios';
    return toResource(await serviceFetch(this.transport, 'POST', path, resourceResponseSchema, { body: dto }));
  }

  async createMarket(scenarioId: string, baseMarket: string, options: CreateMarketOptions): Promise<RemoteResource> {
    const query: Record<string, string> = { plan_market_name: options.marketName };
    if (options.ignoreConstraints) query.ignore_constraints = 'true';

    const path = `markets/${encodeURIComponent(baseMarket)}/scenarios/${encodeURIComponent(scenarioId)}`;
    return toResource(await serviceFetch(this.transport, 'POST', path, resourceResponseSchema, { query }));
  }

  async getMarketState(marketId: string): Promise<RemoteMarket> {
    const market = await serviceFetch(
      this.transport,
      'GET',
      `markets/${encodeURIComponent(marketId)}`,
      marketResponseSchema
    );
    return {
      id: market.uuid,
      displayName: market.displayName,
      state: isMarketState(market.state) ? market.state : null,
      runDate: market.runDate ?? null,
      completeDate: market.runCompleteDate ?? null,
      unplacedEntities: market.unplacedEntities ?? null,
    };
  }

  async stopMarket(marketId: string): Promise<void> {
    await serviceFetch(this.transport, 'PUT', `markets/${encodeURIComponent(marketId)}`, ignoredResponseSchema, {
      query: { operation: 'stop' },
    });
  }

  deleteMarket(marketId: string): Promise<boolean> {
    return serviceFetch(this.transport, 'DELETE', `markets/${encodeURIComponent(marketId)}`, deleteResponseSchema);
  }

  deleteScenario(scenarioId: string): Promise<boolean> {
    return serviceFetch(this.transport, 'DELETE', `scenarios/${encodeURIComponent(scenarioId)}`, deleteResponseSchema);
  }

  async currentUsername(): Promise<string> {
    const user = await serviceFetch(this.transport, 'GET', 'users/me', currentUserResponseSchema);
    return user.username;
  }

  describeEntity(uuid: string): Promise<EntityDescription> {
    return serviceFetch(this.transport, 'GET', `entities/${encodeURIComponent(uuid)}`, entityResponseSchema);
  }

  async getMarketStats(marketId: string): Promise<MarketStatsPeriod[]> {
    const periods = await serviceFetch(
      this.transport,
      'GET',
      `markets/${encodeURIComponent(marketId)}/stats`,
      marketStatsResponseSchema
    );
    return periods.map((period) => ({
      date: period.date ?? null,
      statistics: period.statistics.map((stat) => ({
        name: stat.name,
        value: stat.value ?? null,
        units: stat.units ?? null,
      })),
    }));
  }
}
