import { callRiotEndpoint, type RequestOptions } from './endpointCaller';
import { validateParams } from '../helper/helper';
import { MatchIdListSchema, RiotMatchSchema, type MatchIdList } from '../models/riot/RiotMatchModels';
import type { MatchResult, NormalizedMatch, RawMatch } from '../models/table/MatchTableModels';
import {
    MatchByIdParamsSchema,
    MatchIdsByPuuidParamsSchema,
    type MatchByIdParams,
    type MatchIdsByPuuidParams
} from '../models/request/RequestParamModels';
import { mapRiotMatchToRows } from '../mappers/MatchMapper';

/**
 * Fetch TFT match IDs for a player, most recent first
 *
 * Optional parameters (omitted from the query when not given):
 *   - start: index of the first ID, 0-999 (Riot keeps the 1,000 most recent matches)
 *   - count: number of IDs, 1-200 (Riot defaults to 20)
 *   - startTime / endTime: epoch seconds bounding the match time range
 *
 * @param params - puuid, routingRegion, apiKey and the optional filters
 * @returns Ordered list of match IDs
 */
export async function getMatchIdsByPuuid(params: MatchIdsByPuuidParams, options: RequestOptions = {}): Promise<MatchIdList> {
    const { puuid, routingRegion, apiKey, start, count, startTime, endTime } = validateParams(MatchIdsByPuuidParamsSchema, params);

    return callRiotEndpoint(
        { kind: 'matchIdsByPuuid', routingRegion, puuid, start, count, startTime, endTime },
        apiKey,
        MatchIdListSchema,
        options
    );
}

/**
 * Fetch one TFT match by ID
 * By default the nested document is normalized into matches, participants, traits and
 * units tables; with rawMode the validated document is returned as received.
 *
 * @param params - matchId, routingRegion, apiKey, rawMode (default false)
 * @throws ValidationError before any request when an input is invalid
 * @throws ApiRequestError on a non-200 response
 */
export async function getMatchById(params: MatchByIdParams & { rawMode: true }, options?: RequestOptions): Promise<RawMatch>;
export async function getMatchById(params: MatchByIdParams & { rawMode?: false }, options?: RequestOptions): Promise<NormalizedMatch>;
export async function getMatchById(params: MatchByIdParams, options?: RequestOptions): Promise<MatchResult>;
export async function getMatchById(params: MatchByIdParams, options: RequestOptions = {}): Promise<MatchResult> {
    const { matchId, routingRegion, apiKey, rawMode } = validateParams(MatchByIdParamsSchema, params);

    const match = await callRiotEndpoint(
        { kind: 'matchById', routingRegion, matchId },
        apiKey,
        RiotMatchSchema,
        options
    );

    if (rawMode) {
        return { kind: 'raw', document: match };
    }
    return mapRiotMatchToRows(match);
}
