import type { MarketState } from './enums.js';
import type { WireDto } from './settings.js';

export interface RemoteResource {
  id: string;
  displayName: string;
}

export interface RemoteMarket extends RemoteResource {
  /** `null` when the service reports a state this library does not know. */
  state: MarketState | null;
  runDate: string | null;
  completeDate: string | null;
  unplacedEntities: boolean | null;
}

export interface EntityDescription {
  uuid: string;
  displayName: string;
  className: string;
}

export interface MarketStatistic {
  name: string;
  value: number | null;
  units: string | null;
}

export interface MarketStatsPeriod {
  date: string | null;
  statistics: MarketStatistic[];
}

export interface CreateScenarioOptions {
  /** Posts to the name-addressed scenario path used by early protocol versions. */
  addressedName?: string;
}

export interface CreateMarketOptions {
  marketName: string;
  ignoreConstraints?: boolean;
}

/**
 * Handle on the remote analysis service. Calls reject with a TransportError
 * subclass describing the HTTP status class.
 */
export interface RemoteService {
  reportedProtocolVersion(): string;
  createScenario(dto: WireDto, options?: CreateScenarioOptions): Promise<RemoteResource>;
  createMarket(scenarioId: string, baseMarket: string, options: CreateMarketOptions): Promise<RemoteResource>;
  getMarketState(marketId: string): Promise<RemoteMarket>;
  stopMarket(marketId: string): Promise<void>;
  deleteMarket(marketId: string): Promise<boolean>;
  deleteScenario(scenarioId: string): Promise<boolean>;
  currentUsername(): Promise<string>;
  describeEntity(uuid: string): Promise<EntityDescription>;
  getMarketStats(marketId: string): Promise<MarketStatsPeriod[]>;
}
