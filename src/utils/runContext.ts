import * as crypto from 'crypto';

export interface RunContext {
    runId: string;
    startedAt: string;
}

export function createRunContext(now: Date = new Date()): RunContext {
    return {
        runId: crypto.randomUUID(),
        startedAt: now.toISOString(),
    };
}
