import { z } from 'zod';
import { GameSchema } from './RiotRegionModels';

/**
 * Riot Account API Response Model
 * GET /riot/account/v1/accounts/by-puuid/{puuid}
 * GET /riot/account/v1/accounts/by-riot-id/{gameName}/{tagLine}
 */
export const RiotAccountSchema = z.object({
    puuid: z.string(),
    // Accounts without a Riot ID omit both fields
    gameName: z.string().optional(),
    tagLine: z.string().optional()
}).passthrough();

export type RiotAccount = z.infer<typeof RiotAccountSchema>;

/**
 * Riot Active Shard API Response Model
 * GET /riot/account/v1/region/by-game/{game}/by-puuid/{puuid}
 * Current responses name the shard "region"; older ones used "activeShard".
 */
export const RiotActiveShardSchema = z.union([
    z.object({
        puuid: z.string(),
        game: GameSchema,
        region: z.string()
    }),
    z.object({
        puuid: z.string(),
        game: GameSchema,
        activeShard: z.string()
    })
]);

export type RiotActiveShard = z.infer<typeof RiotActiveShardSchema>;

/**
 * Player region as exposed by this library ("region" is canonical)
 */
export const PlayerRegionSchema = z.object({
    puuid: z.string(),
    game: GameSchema,
    region: z.string()
});

export type PlayerRegion = z.infer<typeof PlayerRegionSchema>;
