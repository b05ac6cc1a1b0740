import { z } from 'zod';

/**
 * Riot TFT Summoner API Response Model
 * GET /tft/summoner/v1/summoners/by-puuid/{puuid}
 */
export const RiotSummonerSchema = z.object({
    puuid: z.string(),
    profileIconId: z.number(),
    revisionDate: z.number(),
    summonerLevel: z.number(),

    // Deprecated by Riot, still present on some shards
    id: z.string().optional(),
    accountId: z.string().optional()
}).passthrough();

export type RiotSummoner = z.infer<typeof RiotSummonerSchema>;
