import { z } from 'zod';

/**
 * Region and game enumerations used to route Riot API calls
 */

// --- ROUTING REGION ---
// Regional clusters for account and match endpoints. Account data is globally replicated,
// so any cluster answers with the same record; only latency differs.
export const RoutingRegionSchema = z.enum(['americas', 'asia', 'europe']);

// --- PLATFORM REGION ---
// Game server shards that own summoner data
export const PlatformRegionSchema = z.enum([
    'br1', 'eun1', 'euw1', 'jp1', 'kr', 'la1', 'la2', 'me1',
    'na1', 'oc1', 'ru', 'sg2', 'tr1', 'tw2', 'vn2'
]);

// --- GAME ---
// Titles supported by the active-shard endpoint
export const GameSchema = z.enum(['lol', 'tft']);

// --- TYPES ---
export type RoutingRegion = z.infer<typeof RoutingRegionSchema>;
export type PlatformRegion = z.infer<typeof PlatformRegionSchema>;
export type Game = z.infer<typeof GameSchema>;

// --- CONSTANTS ---
export const ROUTING_REGIONS = RoutingRegionSchema.options;
export const PLATFORM_REGIONS = PlatformRegionSchema.options;
export const GAMES = GameSchema.options;

// --- INPUT SCHEMAS ---
// Callers may pass "AMERICAS" or "NA1"; the value is lower-cased before the membership check
export const RoutingRegionInputSchema = z.string().transform((value) => value.toLowerCase()).pipe(RoutingRegionSchema);
export const PlatformRegionInputSchema = z.string().transform((value) => value.toLowerCase()).pipe(PlatformRegionSchema);
