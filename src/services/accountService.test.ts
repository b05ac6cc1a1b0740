import { describe, expect, it, vi } from 'vitest';
import { fetchAccountData, getAccountByPuuid, getAccountByRiotId, getRegionByPuuid } from './accountService';
import { ApiRequestError, ResponseValidationError, ValidationError } from '../helper/errors';
import { createLogger } from '../helper/logger';
import { FakeTransport, respondWith, respondWithText } from '../test-utils/fakeTransport';
import account_fixture from '../__fixtures__/account.json';
import region_fixture from '../__fixtures__/region.json';

const API_KEY = 'test-secret';
const PUUID = account_fixture.puuid;
const silent = createLogger('silent');

describe('getAccountByRiotId', () => {
    it('returns the account for a Riot ID', async () => {
        const transport = respondWith(200, account_fixture);

        const account = await getAccountByRiotId(
            { gameName: 'Wander', tagLine: 'HENRO', routingRegion: 'americas', apiKey: API_KEY },
            { transport, logger: silent }
        );

        expect(account.gameName).toBe('Wander');
        expect(account.puuid).toBe(PUUID);
        expect(transport.requests[0].url).toBe('https://americas.api.riotgames.com/riot/account/v1/accounts/by-riot-id/Wander/HENRO');
        expect(transport.requests[0].headers).toEqual({ 'X-Riot-Token': API_KEY });
    });

    it('validates before sending anything', async () => {
        const transport = respondWith(200, account_fixture);
        const untyped_params = JSON.parse('{"gameName": 123, "tagLine": "HENRO", "routingRegion": "americas", "apiKey": "test-secret"}');

        await expect(getAccountByRiotId(untyped_params, { transport, logger: silent })).rejects.toBeInstanceOf(ValidationError);
        await expect(getAccountByRiotId(
            { gameName: '123', tagLine: '123', routingRegion: 'atlantic ocean', apiKey: API_KEY },
            { transport, logger: silent }
        )).rejects.toBeInstanceOf(ValidationError);
        expect(transport.requests).toHaveLength(0);
    });

    it('raises ApiRequestError for an unknown player', async () => {
        const transport = respondWith(404, {
            status: { message: 'Data not found - No results found for player with riot id NonExistentName#XYZ', status_code: 404 }
        });

        await expect(getAccountByRiotId(
            { gameName: 'NonExistentName', tagLine: 'XYZ', routingRegion: 'americas', apiKey: API_KEY },
            { transport, logger: silent }
        )).rejects.toThrow('Riot API request failed (Status 404): Data not found - No results found for player with riot id NonExistentName#XYZ');
    });

    it('logs failures without the API key', async () => {
        const sink = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
        const transport = respondWith(403, { status: { message: 'Forbidden', status_code: 403 } });

        await expect(getAccountByRiotId(
            { gameName: 'Wander', tagLine: 'HENRO', routingRegion: 'americas', apiKey: API_KEY },
            { transport, logger: createLogger('debug', sink) }
        )).rejects.toBeInstanceOf(ApiRequestError);

        expect(sink.debug).toHaveBeenCalledWith('(DEBUG) GET https://americas.api.riotgames.com/riot/account/v1/accounts/by-riot-id/Wander/HENRO');
        expect(sink.warn).toHaveBeenCalledWith('(WARNING) API Error for accountByRiotId: 403 Forbidden');
    });

    it('propagates transport failures unchanged', async () => {
        const network_error = new Error('getaddrinfo ENOTFOUND americas.api.riotgames.com');
        const transport = new FakeTransport(() => {
            throw network_error;
        });

        await expect(getAccountByRiotId(
            { gameName: 'Wander', tagLine: 'HENRO', routingRegion: 'americas', apiKey: API_KEY },
            { transport, logger: silent }
        )).rejects.toBe(network_error);
    });
});

describe('fetchAccountData', () => {
    it('always asks the americas cluster', async () => {
        const transport = respondWith(200, account_fixture);

        const account = await fetchAccountData({ gameName: 'Wander', tagLine: 'HENRO', apiKey: API_KEY }, { transport, logger: silent });

        expect(account.tagLine).toBe('HENRO');
        expect(transport.requests[0].url).toBe('https://americas.api.riotgames.com/riot/account/v1/accounts/by-riot-id/Wander/HENRO');
    });
});

describe('getAccountByPuuid', () => {
    it('returns the account for a PUUID', async () => {
        const transport = respondWith(200, account_fixture);

        const account = await getAccountByPuuid({ puuid: PUUID, routingRegion: 'Europe', apiKey: API_KEY }, { transport, logger: silent });

        expect(account.gameName).toBe('Wander');
        expect(transport.requests[0].url).toBe(`https://europe.api.riotgames.com/riot/account/v1/accounts/by-puuid/${PUUID}`);
    });

    it('rejects a 200 body without a puuid', async () => {
        const transport = respondWith(200, { gameName: 'Wander' });

        await expect(getAccountByPuuid({ puuid: PUUID, routingRegion: 'americas', apiKey: API_KEY }, { transport, logger: silent }))
            .rejects.toBeInstanceOf(ResponseValidationError);
    });

    it('logs failures with a shortened PUUID', async () => {
        const sink = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
        const transport = respondWith(404, { status: { message: 'Data not found', status_code: 404 } });

        await expect(getAccountByPuuid(
            { puuid: PUUID, routingRegion: 'americas', apiKey: API_KEY },
            { transport, logger: createLogger('warn', sink) }
        )).rejects.toThrow('Riot API request failed (Status 404): Data not found');

        expect(sink.warn).toHaveBeenCalledWith('(WARNING) API Error for accountByPuuid test-puuid...: 404 Data not found');
    });

    it('reports a body that is not JSON', async () => {
        const transport = respondWithText(502, '<html>Bad Gateway</html>');

        await expect(getAccountByPuuid({ puuid: PUUID, routingRegion: 'americas', apiKey: API_KEY }, { transport, logger: silent }))
            .rejects.toThrow('Riot API request failed (Status 502): Could not parse error body, status=502');
    });
});

describe('getRegionByPuuid', () => {
    it('returns the active shard as region', async () => {
        const transport = respondWith(200, region_fixture);

        const region = await getRegionByPuuid(
            { game: 'tft', puuid: PUUID, routingRegion: 'americas', apiKey: API_KEY },
            { transport, logger: silent }
        );

        expect(region).toEqual({ puuid: PUUID, game: 'tft', region: 'na1' });
        expect(transport.requests[0].url).toBe(`https://americas.api.riotgames.com/riot/account/v1/region/by-game/tft/by-puuid/${PUUID}`);
    });

    it('maps the legacy activeShard field onto region', async () => {
        const transport = respondWith(200, { puuid: PUUID, game: 'lol', activeShard: 'euw1' });

        const region = await getRegionByPuuid(
            { game: 'lol', puuid: PUUID, routingRegion: 'europe', apiKey: API_KEY },
            { transport, logger: silent }
        );

        expect(region).toEqual({ puuid: PUUID, game: 'lol', region: 'euw1' });
    });

    it('rejects unsupported games and platform codes as routing regions', async () => {
        const transport = respondWith(200, region_fixture);
        const untyped_game = JSON.parse('{"game": "lor", "puuid": "p", "routingRegion": "americas", "apiKey": "test-secret"}');

        await expect(getRegionByPuuid(untyped_game, { transport, logger: silent })).rejects.toBeInstanceOf(ValidationError);
        await expect(getRegionByPuuid(
            { game: 'tft', puuid: 'p', routingRegion: 'na1', apiKey: API_KEY },
            { transport, logger: silent }
        )).rejects.toBeInstanceOf(ValidationError);
        expect(transport.requests).toHaveLength(0);
    });
});
