import { z } from 'zod';
import type { RiotMatch } from '../riot/RiotMatchModels';

/**
 * Flat table models produced from one TFT match document
 * Snake_case column names for the match-level table; participant, trait and unit rows
 * keep the provider's field names and gain the foreign keys match_id / puuid.
 */

// --- MATCHES TABLE ---
export const MatchRowSchema = z.object({
    match_id: z.string(),
    data_version: z.string(),
    game_id: z.number(),
    game_datetime: z.number(),
    game_length: z.number(),
    game_version: z.string(),
    tft_set_number: z.number(),
    tft_set_core_name: z.string(),
    tft_game_type: z.string(),
    queue_id: z.number()
});

export type MatchRow = z.infer<typeof MatchRowSchema>;

// --- PARTICIPANTS TABLE ---
// Every scalar participant field; companion, traits, units and missions are dropped
export const ParticipantRowSchema = z.object({
    match_id: z.string(),
    puuid: z.string(),
    placement: z.number(),
    level: z.number()
}).passthrough();

export type ParticipantRow = z.infer<typeof ParticipantRowSchema>;

// --- TRAITS TABLE ---
export const TraitRowSchema = z.object({
    match_id: z.string(),
    puuid: z.string(),
    name: z.string(),
    num_units: z.number(),
    style: z.number(),
    tier_current: z.number(),
    tier_total: z.number()
}).passthrough();

export type TraitRow = z.infer<typeof TraitRowSchema>;

// --- UNITS TABLE ---
export const UnitRowSchema = z.object({
    match_id: z.string(),
    puuid: z.string(),
    character_id: z.string(),
    itemNames: z.string(), // Item names joined with ","
    rarity: z.number(),
    tier: z.number()
}).passthrough();

export type UnitRow = z.infer<typeof UnitRowSchema>;

// --- OUTPUT VARIANTS ---
export interface NormalizedMatch {
    kind: 'normalized';
    matches: MatchRow[];
    participants: ParticipantRow[];
    traits: TraitRow[];
    units: UnitRow[];
}

export interface RawMatch {
    kind: 'raw';
    document: RiotMatch;
}

export type MatchResult = NormalizedMatch | RawMatch;
