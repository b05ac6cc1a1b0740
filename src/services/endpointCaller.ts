import type { z } from 'zod';
import { getDefaultTransport, type RiotResponse, type RiotTransport } from '../service/api';
import { buildRiotRequest, describeRequest, type RiotEndpoint } from '../service/requestBuilder';
import { classifyResponse } from '../service/responseClassifier';
import { ApiRequestError, ResponseValidationError, toValidationIssues } from '../helper/errors';
import { defaultLogger, type Logger } from '../helper/logger';
import { shortenPuuid } from '../helper/helper';

/**
 * Per-call collaborators; both default to the shared axios transport and the warn-level logger
 */
export interface RequestOptions {
    transport?: RiotTransport;
    logger?: Logger;
}

// Endpoint kind, plus the shortened PUUID when the call is about one player
function describeEndpoint(endpoint: RiotEndpoint): string {
    return 'puuid' in endpoint ? `${endpoint.kind} ${shortenPuuid(endpoint.puuid)}` : endpoint.kind;
}

function classifyAndLog(response: RiotResponse, endpoint: RiotEndpoint, logger: Logger): unknown {
    try {
        return classifyResponse(response);
    } catch (error) {
        if (error instanceof ApiRequestError) {
            logger.warn(`API Error for ${describeEndpoint(endpoint)}: ${error.status} ${error.apiMessage}`);
        }
        throw error;
    }
}

/**
 * Perform one endpoint call: build request, send, classify, validate the body
 * Single attempt, no retry. Transport errors propagate unchanged.
 *
 * @param endpoint - Validated endpoint parameters
 * @param api_key - Riot API key
 * @param response_schema - Expected shape of a 200 body
 * @throws ApiRequestError on any non-200 status
 * @throws ResponseValidationError when a 200 body does not match response_schema
 */
export async function callRiotEndpoint<S extends z.ZodTypeAny>(
    endpoint: RiotEndpoint,
    api_key: string,
    response_schema: S,
    options: RequestOptions = {}
): Promise<z.output<S>> {
    const transport = options.transport ?? getDefaultTransport();
    const logger = options.logger ?? defaultLogger;

    const request = buildRiotRequest(endpoint, api_key);
    logger.debug(describeRequest(request));

    const response = await transport.send(request);

    const data = classifyAndLog(response, endpoint, logger);

    const parsed = response_schema.safeParse(data);
    if (!parsed.success) {
        throw new ResponseValidationError(endpoint.kind, toValidationIssues(parsed.error));
    }
    return parsed.data;
}
