import type { ZodError } from 'zod';

export interface ValidationIssue {
    path: string;
    message: string;
}

/**
 * Flatten zod issues into "path: message" pairs
 * Issue messages describe the rule that failed, never the rejected value of a secret field.
 */
export function toValidationIssues(error: ZodError): ValidationIssue[] {
    return error.issues.map((issue) => ({
        path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
        message: issue.message
    }));
}

function formatIssues(issues: ValidationIssue[]): string {
    return issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
}

/**
 * Base class for every error raised by this library
 */
export class RiotClientError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * Caller input failed a shape or membership check; raised before any request is sent
 */
export class ValidationError extends RiotClientError {
    readonly issues: ValidationIssue[];

    constructor(issues: ValidationIssue[]) {
        super(`Invalid parameters: ${formatIssues(issues)}`);
        this.issues = issues;
    }
}

/**
 * Riot answered with a status other than 200
 * 404 and 429 surface the same way; inspect `status` to tell them apart.
 */
export class ApiRequestError extends RiotClientError {
    readonly status: number;
    readonly apiMessage: string;

    constructor(status: number, api_message: string) {
        super(`Riot API request failed (Status ${status}): ${api_message}`);
        this.status = status;
        this.apiMessage = api_message;
    }
}

/**
 * Riot answered 200 with a body that does not match the expected response model
 */
export class ResponseValidationError extends RiotClientError {
    readonly endpoint: string;
    readonly issues: ValidationIssue[];

    constructor(endpoint: string, issues: ValidationIssue[]) {
        super(`Unexpected response shape from ${endpoint}: ${formatIssues(issues)}`);
        this.endpoint = endpoint;
        this.issues = issues;
    }
}

/**
 * Environment configuration is missing or invalid
 */
export class ConfigError extends RiotClientError {
    readonly issues: ValidationIssue[];

    constructor(issues: ValidationIssue[]) {
        super(`Invalid configuration: ${formatIssues(issues)}`);
        this.issues = issues;
    }
}
