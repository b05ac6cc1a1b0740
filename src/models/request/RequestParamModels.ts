import { z } from 'zod';
import { GameSchema, PlatformRegionInputSchema, RoutingRegionInputSchema } from '../riot/RiotRegionModels';
import {
    MATCH_IDS_COUNT_MAX,
    MATCH_IDS_COUNT_MIN,
    MATCH_IDS_START_MAX,
    MATCH_IDS_START_MIN
} from '../../utils/constant';

/**
 * Parameter schemas for every endpoint caller
 * Parsing lower-cases region values, so the parsed output only holds closed enumerations.
 */

// --- SHARED FIELDS ---
const IdentifierSchema = z.string().min(1);
const ApiKeySchema = z.string().min(1, 'API key must not be empty');
const EpochSecondsSchema = z.number().int().nonnegative();

// --- ACCOUNT ---
export const AccountByRiotIdParamsSchema = z.object({
    gameName: IdentifierSchema, // part of the Riot ID before "#"
    tagLine: IdentifierSchema, // part after "#"
    routingRegion: RoutingRegionInputSchema,
    apiKey: ApiKeySchema
});

export type AccountByRiotIdParams = z.input<typeof AccountByRiotIdParamsSchema>;

// Legacy account helper: americas cluster only
export const AccountDataParamsSchema = AccountByRiotIdParamsSchema.omit({ routingRegion: true });

export type AccountDataParams = z.input<typeof AccountDataParamsSchema>;

export const AccountByPuuidParamsSchema = z.object({
    puuid: IdentifierSchema,
    routingRegion: RoutingRegionInputSchema,
    apiKey: ApiKeySchema
});

export type AccountByPuuidParams = z.input<typeof AccountByPuuidParamsSchema>;

// --- ACTIVE SHARD ---
export const RegionByPuuidParamsSchema = z.object({
    game: GameSchema,
    puuid: IdentifierSchema,
    routingRegion: RoutingRegionInputSchema,
    apiKey: ApiKeySchema
});

export type RegionByPuuidParams = z.input<typeof RegionByPuuidParamsSchema>;

// --- SUMMONER ---
export const SummonerByPuuidParamsSchema = z.object({
    puuid: IdentifierSchema,
    platformRegion: PlatformRegionInputSchema,
    apiKey: ApiKeySchema
});

export type SummonerByPuuidParams = z.input<typeof SummonerByPuuidParamsSchema>;

// --- MATCH ---
export const MatchIdsByPuuidParamsSchema = z.object({
    puuid: IdentifierSchema,
    routingRegion: RoutingRegionInputSchema,
    apiKey: ApiKeySchema,
    start: z.number().int().min(MATCH_IDS_START_MIN).max(MATCH_IDS_START_MAX).optional(),
    count: z.number().int().min(MATCH_IDS_COUNT_MIN).max(MATCH_IDS_COUNT_MAX).optional(),
    startTime: EpochSecondsSchema.optional(),
    endTime: EpochSecondsSchema.optional()
});

export type MatchIdsByPuuidParams = z.input<typeof MatchIdsByPuuidParamsSchema>;

export const MatchByIdParamsSchema = z.object({
    matchId: IdentifierSchema,
    routingRegion: RoutingRegionInputSchema,
    apiKey: ApiKeySchema,
    rawMode: z.boolean().default(false)
});

export type MatchByIdParams = z.input<typeof MatchByIdParamsSchema>;
