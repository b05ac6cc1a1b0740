import axios, { isAxiosError, type AxiosInstance } from 'axios';
import { RIOT_TOKEN_HEADER } from '../utils/constant';

/**
 * One fully built Riot API call: method, absolute URL and headers (including the API key)
 */
export interface RiotRequest {
    method: 'GET';
    url: string;
    headers: Readonly<Record<string, string>>;
}

/**
 * Transport result. `decoded` tells whether the body was valid JSON; when it was not,
 * `data` holds the raw text.
 */
export interface RiotResponse {
    status: number;
    decoded: boolean;
    data: unknown;
}

/**
 * HTTP collaborator that performs a single request and never throws on 4xx/5xx
 * Network, DNS and TLS failures reject with the transport's own error.
 */
export interface RiotTransport {
    send(request: RiotRequest): Promise<RiotResponse>;
}

const REDACTED = '[REDACTED]';

/**
 * Decode a text body as JSON, keeping the text when it is not JSON
 */
function decodeBody(status: number, body: unknown): RiotResponse {
    if (typeof body !== 'string') {
        return { status, decoded: true, data: body };
    }
    try {
        return { status, decoded: true, data: JSON.parse(body) };
    } catch {
        return { status, decoded: false, data: body };
    }
}

export interface AxiosTransportOptions {
    timeoutMs?: number;
    instance?: AxiosInstance;
}

/**
 * Create the default transport backed by axios
 * Every status resolves so the response classifier sees 4xx/5xx bodies.
 * Bodies are decoded here so an undecodable body is flagged rather than guessed at.
 *
 * @param options - Optional request timeout, or a preconfigured axios instance
 */
export function createAxiosTransport(options: AxiosTransportOptions = {}): RiotTransport {
    const http: AxiosInstance = options.instance ?? axios.create({ timeout: options.timeoutMs });

    return {
        async send(request: RiotRequest): Promise<RiotResponse> {
            try {
                const response = await http.request<unknown>({
                    method: request.method,
                    url: request.url,
                    headers: { ...request.headers },
                    responseType: 'text',
                    transformResponse: [(data: unknown) => data],
                    validateStatus: () => true
                });
                return decodeBody(response.status, response.data);
            } catch (error) {
                // Network, DNS, TLS and timeout errors carry the request config; scrub the key before rethrowing
                if (isAxiosError(error)) {
                    error.config?.headers.set(RIOT_TOKEN_HEADER, REDACTED);
                    error.request = undefined;
                }
                throw error;
            }
        }
    };
}

let default_transport: RiotTransport | undefined;

/**
 * Shared axios transport used when a caller does not pass one
 */
export function getDefaultTransport(): RiotTransport {
    default_transport ??= createAxiosTransport();
    return default_transport;
}
