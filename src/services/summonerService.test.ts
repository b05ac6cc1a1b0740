import { describe, expect, it } from 'vitest';
import { getSummonerByPuuid } from './summonerService';
import { ApiRequestError, ValidationError } from '../helper/errors';
import { createLogger } from '../helper/logger';
import { respondWith } from '../test-utils/fakeTransport';
import summoner_fixture from '../__fixtures__/summoner.json';

const API_KEY = 'test-secret';
const PUUID = summoner_fixture.puuid;
const silent = createLogger('silent');

describe('getSummonerByPuuid', () => {
    it('returns the recorded summoner', async () => {
        const transport = respondWith(200, summoner_fixture);

        const summoner = await getSummonerByPuuid({ puuid: PUUID, platformRegion: 'NA1', apiKey: API_KEY }, { transport, logger: silent });

        expect(summoner.profileIconId).toBe(4270);
        expect(summoner.summonerLevel).toBe(312);
        expect(transport.requests[0].url).toBe(`https://na1.api.riotgames.com/tft/summoner/v1/summoners/by-puuid/${PUUID}`);
    });

    it('rejects unknown platforms and routing clusters before sending', async () => {
        const transport = respondWith(200, summoner_fixture);

        await expect(getSummonerByPuuid({ puuid: PUUID, platformRegion: 'xx9', apiKey: API_KEY }, { transport, logger: silent }))
            .rejects.toBeInstanceOf(ValidationError);
        await expect(getSummonerByPuuid({ puuid: PUUID, platformRegion: 'americas', apiKey: API_KEY }, { transport, logger: silent }))
            .rejects.toBeInstanceOf(ValidationError);
        expect(transport.requests).toHaveLength(0);
    });

    it('surfaces the status of a failed lookup', async () => {
        const transport = respondWith(404, { status: { message: 'Data not found - summoner not found', status_code: 404 } });

        const failure = getSummonerByPuuid({ puuid: 'NonExistentPuuid', platformRegion: 'na1', apiKey: API_KEY }, { transport, logger: silent });

        await expect(failure).rejects.toBeInstanceOf(ApiRequestError);
        await expect(failure).rejects.toMatchObject({ status: 404 });
    });
});
