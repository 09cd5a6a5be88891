import type { ZodIssue } from 'zod';

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}

export class ConfigError extends Error {
    readonly issues: ZodIssue[];

    constructor(issues: ZodIssue[]) {
        super(`Invalid configuration: ${issues.map(i => `${i.path.join('.') || 'config'}: ${i.message}`).join('; ')}`);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}
