import { z } from 'zod';

/**
 * Riot TFT Match API models
 * Based on Match V1 API response structure.
 * Every object level passes unknown fields through, so a parsed match is the document as received.
 */

// --- MATCH ID LIST ---
export const MatchIdListSchema = z.array(z.string());
export type MatchIdList = z.infer<typeof MatchIdListSchema>;

// --- COMPANION SCHEMA ---
const CompanionSchema = z.object({
    content_ID: z.string(),
    item_ID: z.number(),
    skin_ID: z.number(),
    species: z.string()
}).passthrough();

// --- TRAIT SCHEMA ---
export const TraitSchema = z.object({
    name: z.string(),
    num_units: z.number(),
    style: z.number(),
    tier_current: z.number(),
    tier_total: z.number()
}).passthrough();

export type Trait = z.infer<typeof TraitSchema>;

// --- UNIT SCHEMA ---
export const UnitSchema = z.object({
    character_id: z.string(),
    itemNames: z.array(z.string()).optional(),
    name: z.string().optional(),
    rarity: z.number(),
    tier: z.number()
}).passthrough();

export type Unit = z.infer<typeof UnitSchema>;

// --- PARTICIPANT SCHEMA ---
export const ParticipantSchema = z.object({
    companion: CompanionSchema.optional(),
    gold_left: z.number(),
    last_round: z.number(),
    level: z.number(),
    placement: z.number(),
    players_eliminated: z.number(),
    puuid: z.string(),
    time_eliminated: z.number(),
    total_damage_to_players: z.number(),

    // Optional fields (may not exist for all participants)
    riotIdGameName: z.string().optional(),
    riotIdTagline: z.string().optional(),

    // Missions (dynamic object with unknown values)
    missions: z.record(z.string(), z.unknown()).optional(),

    // Collections
    traits: z.array(TraitSchema),
    units: z.array(UnitSchema),

    // Win status
    win: z.boolean().optional()
}).passthrough();

export type Participant = z.infer<typeof ParticipantSchema>;

// --- METADATA SCHEMA ---
const MetadataSchema = z.object({
    data_version: z.string(),
    match_id: z.string(),
    participants: z.array(z.string()) // Array of PUUIDs
}).passthrough();

// --- INFO SCHEMA ---
const InfoSchema = z.object({
    endOfGameResult: z.string().optional(),
    gameCreation: z.number().optional(),
    gameId: z.number(),
    game_datetime: z.number(),
    game_length: z.number(),
    game_version: z.string(),
    mapId: z.number().optional(),
    queueId: z.number().optional(),
    queue_id: z.number(),
    tft_game_type: z.string(),
    tft_set_core_name: z.string(),
    tft_set_number: z.number(),
    participants: z.array(ParticipantSchema)
}).passthrough();

// --- FULL MATCH SCHEMA ---
export const RiotMatchSchema = z.object({
    metadata: MetadataSchema,
    info: InfoSchema
}).passthrough();

export type RiotMatch = z.infer<typeof RiotMatchSchema>;
