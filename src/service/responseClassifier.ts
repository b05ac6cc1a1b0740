import type { RiotResponse } from './api';
import { ApiRequestError } from '../helper/errors';
import { RiotErrorEnvelopeSchema } from '../models/riot/RiotErrorModels';

const UNKNOWN_API_ERROR = 'Unknown API error.';

/**
 * Resolve the message of a failed response from Riot's { status: { message } } envelope
 * A decoded JSON string is a decoded body like any other and has no envelope.
 */
function resolveErrorMessage(response: RiotResponse): string {
    if (!response.decoded) {
        return `Could not parse error body, status=${response.status}`;
    }
    const envelope = RiotErrorEnvelopeSchema.safeParse(response.data);
    return envelope.success ? envelope.data.status.message : UNKNOWN_API_ERROR;
}

/**
 * Pass a 200 body through unchanged, or fail with ApiRequestError
 *
 * @throws ApiRequestError for any status other than 200
 */
export function classifyResponse(response: RiotResponse): unknown {
    if (response.status === 200) {
        return response.data;
    }
    throw new ApiRequestError(response.status, resolveErrorMessage(response));
}
