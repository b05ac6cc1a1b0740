// Endpoint callers
export { getAccountByRiotId, getAccountByPuuid, fetchAccountData, getRegionByPuuid } from './services/accountService';
export { getSummonerByPuuid } from './services/summonerService';
export { getMatchIdsByPuuid, getMatchById } from './services/matchService';
export type { RequestOptions } from './services/endpointCaller';

// Client facade and configuration
export { RiotTftClient, type MatchIdsQuery } from './client';
export { loadConfig, type RiotConfig, type LoadConfigOptions } from './utils/config';

// Transport and request plumbing
export { createAxiosTransport, type RiotRequest, type RiotResponse, type RiotTransport, type AxiosTransportOptions } from './service/api';
export { buildRiotRequest, describeRequest, type RiotEndpoint, type RiotEndpointKind } from './service/requestBuilder';
export { classifyResponse } from './service/responseClassifier';

// Normalization
export { mapRiotMatchToRows } from './mappers/MatchMapper';

// Errors and logging
export {
    RiotClientError,
    ValidationError,
    ApiRequestError,
    ResponseValidationError,
    ConfigError,
    type ValidationIssue
} from './helper/errors';
export { createLogger, type Logger, type LogLevel, type LogSink } from './helper/logger';

// Models
export {
    ROUTING_REGIONS,
    PLATFORM_REGIONS,
    GAMES,
    type RoutingRegion,
    type PlatformRegion,
    type Game
} from './models/riot/RiotRegionModels';
export type { RiotAccount, PlayerRegion } from './models/riot/RiotAccountModels';
export type { RiotSummoner } from './models/riot/RiotSummonerModels';
export type { RiotMatch, MatchIdList, Participant, Trait, Unit } from './models/riot/RiotMatchModels';
export type {
    MatchRow,
    ParticipantRow,
    TraitRow,
    UnitRow,
    NormalizedMatch,
    RawMatch,
    MatchResult
} from './models/table/MatchTableModels';
export type {
    AccountByRiotIdParams,
    AccountDataParams,
    AccountByPuuidParams,
    RegionByPuuidParams,
    SummonerByPuuidParams,
    MatchIdsByPuuidParams,
    MatchByIdParams
} from './models/request/RequestParamModels';
