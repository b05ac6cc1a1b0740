import { describe, expect, it } from 'vitest';
import { classifyResponse } from './responseClassifier';
import { ApiRequestError } from '../helper/errors';

function classifyError(status: number, data: unknown, decoded = true): ApiRequestError {
    try {
        classifyResponse({ status, decoded, data });
    } catch (error) {
        if (error instanceof ApiRequestError) return error;
        throw error;
    }
    throw new Error('expected an ApiRequestError');
}

describe('classifyResponse', () => {
    it('returns a 200 body unchanged', () => {
        const body = { puuid: 'puuid-alpha', gameName: 'Wander', tagLine: 'HENRO' };

        expect(classifyResponse({ status: 200, decoded: true, data: body })).toBe(body);
    });

    it('uses the provider message from the error envelope', () => {
        const error = classifyError(404, { status: { message: 'Data not found - match file not found', status_code: 404 } });

        expect(error.status).toBe(404);
        expect(error.apiMessage).toBe('Data not found - match file not found');
        expect(error.message).toBe('Riot API request failed (Status 404): Data not found - match file not found');
    });

    it('treats rate limiting like any other failure', () => {
        const error = classifyError(429, { status: { message: 'Rate limit exceeded', status_code: 429 } });

        expect(error).toBeInstanceOf(ApiRequestError);
        expect(error.message).toBe('Riot API request failed (Status 429): Rate limit exceeded');
    });

    it('falls back when the body could not be decoded', () => {
        const error = classifyError(503, '<html><body>Service Unavailable</body></html>', false);

        expect(error.message).toBe('Riot API request failed (Status 503): Could not parse error body, status=503');
    });

    it('treats a JSON string body as decoded without an envelope', () => {
        const error = classifyError(403, 'Forbidden');

        expect(error.message).toBe('Riot API request failed (Status 403): Unknown API error.');
    });

    it('falls back when the envelope has no message', () => {
        expect(classifyError(500, {}).message).toBe('Riot API request failed (Status 500): Unknown API error.');
        expect(classifyError(401, { status: { status_code: 401 } }).message).toBe('Riot API request failed (Status 401): Unknown API error.');
    });

    it('fails on non-200 success codes too', () => {
        expect(classifyError(204, null).message).toBe('Riot API request failed (Status 204): Unknown API error.');
    });
});
