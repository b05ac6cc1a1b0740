import { createAxiosTransport, type RiotTransport } from './service/api';
import { createLogger, type Logger } from './helper/logger';
import { loadConfig, type RiotConfig } from './utils/config';
import type { RequestOptions } from './services/endpointCaller';
import { getAccountByPuuid, getAccountByRiotId, getRegionByPuuid } from './services/accountService';
import { getSummonerByPuuid } from './services/summonerService';
import { getMatchById, getMatchIdsByPuuid } from './services/matchService';
import type { RoutingRegion, Game } from './models/riot/RiotRegionModels';
import type { PlayerRegion, RiotAccount } from './models/riot/RiotAccountModels';
import type { RiotSummoner } from './models/riot/RiotSummonerModels';
import type { MatchIdList } from './models/riot/RiotMatchModels';
import type { NormalizedMatch, RawMatch } from './models/table/MatchTableModels';

export interface MatchIdsQuery {
    start?: number;
    count?: number;
    startTime?: number;
    endTime?: number;
}

/**
 * Riot TFT client bound to one API key
 * Fills in the key and the default routing region; holds no per-call state.
 */
export class RiotTftClient {
    private readonly apiKey: string;
    private readonly routingRegion: RoutingRegion;
    private readonly requestOptions: Required<RequestOptions>;

    constructor(config: RiotConfig, transport?: RiotTransport, logger?: Logger) {
        this.apiKey = config.apiKey;
        this.routingRegion = config.routingRegion;
        this.requestOptions = {
            transport: transport ?? createAxiosTransport({ timeoutMs: config.timeoutMs }),
            logger: logger ?? createLogger(config.logLevel)
        };
    }

    /**
     * Build a client from RIOT_* environment variables (and .env)
     */
    static fromEnv(): RiotTftClient {
        return new RiotTftClient(loadConfig());
    }

    getAccountByRiotId(gameName: string, tagLine: string, routingRegion: string = this.routingRegion): Promise<RiotAccount> {
        return getAccountByRiotId({ gameName, tagLine, routingRegion, apiKey: this.apiKey }, this.requestOptions);
    }

    /**
     * Resolve a "GameName#TagLine" Riot ID
     */
    getAccountByRiotIdString(riotId: string, routingRegion: string = this.routingRegion): Promise<RiotAccount> {
        const separator = riotId.lastIndexOf('#');
        const gameName = separator >= 0 ? riotId.substring(0, separator) : riotId;
        const tagLine = separator >= 0 ? riotId.substring(separator + 1) : '';
        return this.getAccountByRiotId(gameName, tagLine, routingRegion);
    }

    getAccountByPuuid(puuid: string, routingRegion: string = this.routingRegion): Promise<RiotAccount> {
        return getAccountByPuuid({ puuid, routingRegion, apiKey: this.apiKey }, this.requestOptions);
    }

    getRegionByPuuid(puuid: string, game: Game = 'tft', routingRegion: string = this.routingRegion): Promise<PlayerRegion> {
        return getRegionByPuuid({ puuid, game, routingRegion, apiKey: this.apiKey }, this.requestOptions);
    }

    getSummonerByPuuid(puuid: string, platformRegion: string): Promise<RiotSummoner> {
        return getSummonerByPuuid({ puuid, platformRegion, apiKey: this.apiKey }, this.requestOptions);
    }

    getMatchIdsByPuuid(puuid: string, query: MatchIdsQuery = {}, routingRegion: string = this.routingRegion): Promise<MatchIdList> {
        return getMatchIdsByPuuid({ ...query, puuid, routingRegion, apiKey: this.apiKey }, this.requestOptions);
    }

    getMatchById(matchId: string, routingRegion: string = this.routingRegion): Promise<NormalizedMatch> {
        return getMatchById({ matchId, routingRegion, apiKey: this.apiKey }, this.requestOptions);
    }

    getRawMatchById(matchId: string, routingRegion: string = this.routingRegion): Promise<RawMatch> {
        return getMatchById({ matchId, routingRegion, apiKey: this.apiKey, rawMode: true }, this.requestOptions);
    }
}
