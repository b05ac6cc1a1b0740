export const RIOT_API_HOST_SUFFIX = 'api.riotgames.com';
export const RIOT_TOKEN_HEADER = 'X-Riot-Token';

// Riot keeps the 1,000 most recent match IDs and serves at most 200 per call
export const MATCH_IDS_START_MIN = 0;
export const MATCH_IDS_START_MAX = 999;
export const MATCH_IDS_COUNT_MIN = 1;
export const MATCH_IDS_COUNT_MAX = 200;

export const ITEM_NAME_SEPARATOR = ',';

// Nested participant collections that never land in the participants table
export const PARTICIPANT_NESTED_FIELDS: ReadonlySet<string> = new Set(['companion', 'traits', 'units', 'missions']);
