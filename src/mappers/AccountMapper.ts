import { PlayerRegionSchema, type PlayerRegion, type RiotActiveShard } from '../models/riot/RiotAccountModels';

/**
 * Map an active-shard response to the player region record
 * "region" is the canonical field; "activeShard" from older responses is mapped onto it.
 *
 * @param riot_shard - Active shard response from the Account V1 API
 * @returns PlayerRegion with the shard under "region"
 */
export function mapRiotActiveShardToPlayerRegion(riot_shard: RiotActiveShard): PlayerRegion {
    const region = 'region' in riot_shard ? riot_shard.region : riot_shard.activeShard;

    const player_region: PlayerRegion = {
        puuid: riot_shard.puuid,
        game: riot_shard.game,
        region
    };

    return PlayerRegionSchema.parse(player_region);
}
