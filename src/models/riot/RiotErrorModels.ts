import { z } from 'zod';

/**
 * Error envelope returned by Riot on non-200 responses
 * e.g. { "status": { "message": "Data not found", "status_code": 404 } }
 */
export const RiotErrorEnvelopeSchema = z.object({
    status: z.object({
        message: z.string(),
        status_code: z.number().optional()
    })
});

export type RiotErrorEnvelope = z.infer<typeof RiotErrorEnvelopeSchema>;
