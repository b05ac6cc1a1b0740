import type { RiotRequest } from './api';
import type { Game, PlatformRegion, RoutingRegion } from '../models/riot/RiotRegionModels';
import { RIOT_API_HOST_SUFFIX, RIOT_TOKEN_HEADER } from '../utils/constant';

/**
 * Validated parameters for one endpoint family, tagged by kind
 */
export type RiotEndpoint =
    | { kind: 'accountByRiotId'; routingRegion: RoutingRegion; gameName: string; tagLine: string }
    | { kind: 'accountByPuuid'; routingRegion: RoutingRegion; puuid: string }
    | { kind: 'regionByPuuid'; routingRegion: RoutingRegion; game: Game; puuid: string }
    | { kind: 'summonerByPuuid'; platformRegion: PlatformRegion; puuid: string }
    | {
        kind: 'matchIdsByPuuid';
        routingRegion: RoutingRegion;
        puuid: string;
        start?: number;
        count?: number;
        startTime?: number;
        endTime?: number;
    }
    | { kind: 'matchById'; routingRegion: RoutingRegion; matchId: string };

export type RiotEndpointKind = RiotEndpoint['kind'];

interface EndpointTarget {
    host: RoutingRegion | PlatformRegion;
    path: string[];
    query: Array<[string, number | undefined]>;
}

function resolveTarget(endpoint: RiotEndpoint): EndpointTarget {
    switch (endpoint.kind) {
        case 'accountByRiotId':
            return {
                host: endpoint.routingRegion,
                path: ['riot', 'account', 'v1', 'accounts', 'by-riot-id', endpoint.gameName, endpoint.tagLine],
                query: []
            };
        case 'accountByPuuid':
            return {
                host: endpoint.routingRegion,
                path: ['riot', 'account', 'v1', 'accounts', 'by-puuid', endpoint.puuid],
                query: []
            };
        case 'regionByPuuid':
            return {
                host: endpoint.routingRegion,
                path: ['riot', 'account', 'v1', 'region', 'by-game', endpoint.game, 'by-puuid', endpoint.puuid],
                query: []
            };
        case 'summonerByPuuid':
            return {
                host: endpoint.platformRegion,
                path: ['tft', 'summoner', 'v1', 'summoners', 'by-puuid', endpoint.puuid],
                query: []
            };
        case 'matchIdsByPuuid':
            return {
                host: endpoint.routingRegion,
                path: ['tft', 'match', 'v1', 'matches', 'by-puuid', endpoint.puuid, 'ids'],
                query: [
                    ['start', endpoint.start],
                    ['startTime', endpoint.startTime],
                    ['endTime', endpoint.endTime],
                    ['count', endpoint.count]
                ]
            };
        case 'matchById':
            return {
                host: endpoint.routingRegion,
                path: ['tft', 'match', 'v1', 'matches', endpoint.matchId],
                query: []
            };
    }
}

/**
 * Build the GET request for one endpoint
 * Path segments are percent-encoded; query parameters are only sent when supplied.
 *
 * @param endpoint - Validated endpoint parameters
 * @param api_key - Riot API key, sent as the X-Riot-Token header
 */
export function buildRiotRequest(endpoint: RiotEndpoint, api_key: string): RiotRequest {
    const target = resolveTarget(endpoint);
    const path = target.path.map((segment) => encodeURIComponent(segment)).join('/');

    const query = new URLSearchParams();
    for (const [name, value] of target.query) {
        if (value !== undefined) query.append(name, String(value));
    }
    const query_string = query.toString();
    const search = query_string ? `?${query_string}` : '';

    return {
        method: 'GET',
        url: `https://${target.host}.${RIOT_API_HOST_SUFFIX}/${path}${search}`,
        headers: { [RIOT_TOKEN_HEADER]: api_key }
    };
}

/**
 * Request line for logs; headers are left out so the API key never reaches a log
 */
export const describeRequest = (request: RiotRequest): string => `${request.method} ${request.url}`;
