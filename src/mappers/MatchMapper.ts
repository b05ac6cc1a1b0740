import type { Participant, RiotMatch, Trait, Unit } from '../models/riot/RiotMatchModels';
import {
    MatchRowSchema,
    ParticipantRowSchema,
    TraitRowSchema,
    UnitRowSchema,
    type MatchRow,
    type NormalizedMatch,
    type ParticipantRow,
    type TraitRow,
    type UnitRow
} from '../models/table/MatchTableModels';
import { ITEM_NAME_SEPARATOR, PARTICIPANT_NESTED_FIELDS } from '../utils/constant';

/**
 * Mapper for flattening a nested TFT match document into four related tables
 * Rows are linked only by match_id / puuid, never by position.
 */

/**
 * Map match metadata and the match-level subset of info to the single matches row
 */
export function mapRiotMatchToMatchRow(match: RiotMatch): MatchRow {
    const { metadata, info } = match;

    const row: MatchRow = {
        match_id: metadata.match_id,
        data_version: metadata.data_version,
        game_id: info.gameId,
        game_datetime: info.game_datetime,
        game_length: info.game_length,
        game_version: info.game_version,
        tft_set_number: info.tft_set_number,
        tft_set_core_name: info.tft_set_core_name,
        tft_game_type: info.tft_game_type,
        queue_id: info.queue_id
    };

    return MatchRowSchema.parse(row);
}

/**
 * Map one participant to a participants row
 * Keeps every field except the nested companion, traits, units and missions.
 */
export function mapParticipantToRow(participant: Participant, match_id: string): ParticipantRow {
    const scalar_fields = Object.fromEntries(
        Object.entries(participant).filter(([field]) => !PARTICIPANT_NESTED_FIELDS.has(field))
    );

    return ParticipantRowSchema.parse({ ...scalar_fields, match_id });
}

export function mapTraitToRow(trait: Trait, match_id: string, puuid: string): TraitRow {
    return TraitRowSchema.parse({ ...trait, match_id, puuid });
}

/**
 * Map one unit to a units row, collapsing its item names into a single string
 * A unit without items gets "" rather than a missing field.
 */
export function mapUnitToRow(unit: Unit, match_id: string, puuid: string): UnitRow {
    const item_names = (unit.itemNames ?? []).join(ITEM_NAME_SEPARATOR);

    return UnitRowSchema.parse({ ...unit, itemNames: item_names, match_id, puuid });
}

/**
 * Normalize a full match document into matches, participants, traits and units
 * Participants keep in-game order; a participant with no traits or units adds no rows there.
 *
 * @param match - Validated match document
 * @returns NormalizedMatch with exactly one matches row
 */
export function mapRiotMatchToRows(match: RiotMatch): NormalizedMatch {
    const match_id = match.metadata.match_id;
    const participants = match.info.participants;

    return {
        kind: 'normalized',
        matches: [mapRiotMatchToMatchRow(match)],
        participants: participants.map((participant) => mapParticipantToRow(participant, match_id)),
        traits: participants.flatMap((participant) =>
            participant.traits.map((trait) => mapTraitToRow(trait, match_id, participant.puuid))
        ),
        units: participants.flatMap((participant) =>
            participant.units.map((unit) => mapUnitToRow(unit, match_id, participant.puuid))
        )
    };
}
