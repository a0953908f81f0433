import { ZodError } from 'zod';
import { envSchema, type Env } from './envSchema.js';

/** Blank assignments in .env files (`FOO=`) mean "use the default". */
export function withoutBlankValues(raw: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
    const next: NodeJS.ProcessEnv = {};
    for (const [key, value] of Object.entries(raw)) {
        if (value !== undefined && value.trim() !== '') next[key] = value;
    }
    return next;
}

export function formatEnvIssues(err: ZodError): string {
    const lines = err.issues.map((i) => {
        const key = i.path.join('.') || '(root)';
        return `- ${key}: ${i.message}`;
    });
    return 'Invalid environment variables:\n' + lines.join('\n');
}

let env: Env;
try {
    env = envSchema.parse(withoutBlankValues(process.env));
} catch (err) {
    if (err instanceof ZodError) {
        const e = new Error(formatEnvIssues(err));
        console.error(e.message);
        process.exit(1);
        throw e;
    }
    throw err;
}

export { env };
export type { Env };
