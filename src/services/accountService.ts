import { callRiotEndpoint, type RequestOptions } from './endpointCaller';
import { validateParams } from '../helper/helper';
import { RiotAccountSchema, RiotActiveShardSchema, type PlayerRegion, type RiotAccount } from '../models/riot/RiotAccountModels';
import {
    AccountByPuuidParamsSchema,
    AccountByRiotIdParamsSchema,
    AccountDataParamsSchema,
    RegionByPuuidParamsSchema,
    type AccountByPuuidParams,
    type AccountByRiotIdParams,
    type AccountDataParams,
    type RegionByPuuidParams
} from '../models/request/RequestParamModels';
import { mapRiotActiveShardToPlayerRegion } from '../mappers/AccountMapper';

/**
 * Fetch a Riot account (PUUID, gameName, tagLine) by Riot ID
 * Riot IDs read "GameName#TagLine"; pass the two parts separately.
 * Account data is global, so every routing region returns the same record.
 *
 * @param params - gameName, tagLine, routingRegion, apiKey
 * @throws ValidationError before any request when an input is invalid
 * @throws ApiRequestError on a non-200 response
 */
export async function getAccountByRiotId(params: AccountByRiotIdParams, options: RequestOptions = {}): Promise<RiotAccount> {
    const { gameName, tagLine, routingRegion, apiKey } = validateParams(AccountByRiotIdParamsSchema, params);

    return callRiotEndpoint(
        { kind: 'accountByRiotId', routingRegion, gameName, tagLine },
        apiKey,
        RiotAccountSchema,
        options
    );
}

/**
 * Fetch a Riot account by Riot ID through the americas cluster
 * Same result as getAccountByRiotId() with routingRegion "americas".
 */
export async function fetchAccountData(params: AccountDataParams, options: RequestOptions = {}): Promise<RiotAccount> {
    const { gameName, tagLine, apiKey } = validateParams(AccountDataParamsSchema, params);

    return getAccountByRiotId({ gameName, tagLine, apiKey, routingRegion: 'americas' }, options);
}

/**
 * Fetch a Riot account (PUUID, gameName, tagLine) by PUUID
 *
 * @param params - puuid, routingRegion, apiKey
 */
export async function getAccountByPuuid(params: AccountByPuuidParams, options: RequestOptions = {}): Promise<RiotAccount> {
    const { puuid, routingRegion, apiKey } = validateParams(AccountByPuuidParamsSchema, params);

    return callRiotEndpoint(
        { kind: 'accountByPuuid', routingRegion, puuid },
        apiKey,
        RiotAccountSchema,
        options
    );
}

/**
 * Fetch the active shard (platform region) a player plays a game on
 * Valid games are "lol" and "tft".
 *
 * @param params - game, puuid, routingRegion, apiKey
 * @returns PlayerRegion, e.g. { puuid, game: 'tft', region: 'na1' }
 */
export async function getRegionByPuuid(params: RegionByPuuidParams, options: RequestOptions = {}): Promise<PlayerRegion> {
    const { game, puuid, routingRegion, apiKey } = validateParams(RegionByPuuidParamsSchema, params);

    const riot_shard = await callRiotEndpoint(
        { kind: 'regionByPuuid', routingRegion, game, puuid },
        apiKey,
        RiotActiveShardSchema,
        options
    );
    return mapRiotActiveShardToPlayerRegion(riot_shard);
}
