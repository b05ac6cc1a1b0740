import { callRiotEndpoint, type RequestOptions } from './endpointCaller';
import { validateParams } from '../helper/helper';
import { RiotSummonerSchema, type RiotSummoner } from '../models/riot/RiotSummonerModels';
import { SummonerByPuuidParamsSchema, type SummonerByPuuidParams } from '../models/request/RequestParamModels';

/**
 * Fetch the TFT summoner record (profile icon, level, revision date) for a PUUID
 * Summoner data lives on a platform shard (na1, euw1, ...), not a routing cluster;
 * getRegionByPuuid() tells which one.
 *
 * @param params - puuid, platformRegion, apiKey
 * @throws ValidationError before any request when an input is invalid
 * @throws ApiRequestError on a non-200 response
 */
export async function getSummonerByPuuid(params: SummonerByPuuidParams, options: RequestOptions = {}): Promise<RiotSummoner> {
    const { puuid, platformRegion, apiKey } = validateParams(SummonerByPuuidParamsSchema, params);

    return callRiotEndpoint(
        { kind: 'summonerByPuuid', platformRegion, puuid },
        apiKey,
        RiotSummonerSchema,
        options
    );
}
