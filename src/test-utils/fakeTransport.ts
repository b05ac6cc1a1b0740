import type { RiotRequest, RiotResponse, RiotTransport } from '../service/api';

export type FakeHandler = (request: RiotRequest) => RiotResponse;

/**
 * In-process transport for tests; records every request and answers from a handler
 */
export class FakeTransport implements RiotTransport {
    readonly requests: RiotRequest[] = [];

    constructor(private readonly handler: FakeHandler) {}

    async send(request: RiotRequest): Promise<RiotResponse> {
        this.requests.push(request);
        return this.handler(request);
    }
}

/**
 * Transport that always answers with the same status and decoded JSON body
 */
export const respondWith = (status: number, data: unknown): FakeTransport =>
    new FakeTransport(() => ({ status, decoded: true, data }));

/**
 * Transport that always answers with a body that is not JSON
 */
export const respondWithText = (status: number, text: string): FakeTransport =>
    new FakeTransport(() => ({ status, decoded: false, data: text }));

/**
 * Serve a fixed, ordered list of match IDs honouring start/count like Riot does (count defaults to 20)
 */
export const matchIdListTransport = (match_ids: string[]): FakeTransport =>
    new FakeTransport((request) => {
        const query = new URL(request.url).searchParams;
        const start = Number(query.get('start') ?? '0');
        const count = Number(query.get('count') ?? '20');
        return { status: 200, decoded: true, data: match_ids.slice(start, start + count) };
    });
