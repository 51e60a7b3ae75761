import os from 'os';

export interface ScheduleConfig {
    workflow: string;
    schedule: string;
}

export interface EngineConfig {
    databaseUrl: string | undefined;
    maxConcurrentSteps: number;
    stepTimeoutMs: number;
    retryInitialMs: number;
    retryMaxMs: number;
    maxPayloadBytes: number;
    definitions: string[];
    schedules: ScheduleConfig[];
}

function intFrom(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
    const parsed = parseInt(env[name] || '', 10);
    if (Number.isNaN(parsed)) return fallback;
    if (parsed < min) {
        throw new Error(`${name} must be at least ${min}, got ${parsed}`);
    }
    return parsed;
}

// QUARRY_SCHEDULES="nightly-etl=0 2 * * *;refresh=every 15m"
export function parseSchedules(raw: string | undefined): ScheduleConfig[] {
    if (!raw) return [];
    return raw
        .split(';')
        .map(entry => entry.trim())
        .filter(Boolean)
        .map(entry => {
            const eq = entry.indexOf('=');
            if (eq <= 0) {
                throw new Error(`QUARRY_SCHEDULES entry "${entry}" must look like <workflow>=<schedule>`);
            }
            return { workflow: entry.slice(0, eq).trim(), schedule: entry.slice(eq + 1).trim() };
        });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    return {
        databaseUrl: env.DATABASE_URL,
        maxConcurrentSteps: intFrom(env, 'QUARRY_MAX_CONCURRENT_STEPS', Math.max(2, os.cpus().length - 1), 1),
        // 0 disables the step timeout.
        stepTimeoutMs: intFrom(env, 'QUARRY_STEP_TIMEOUT_MS', 30_000, 0),
        retryInitialMs: intFrom(env, 'QUARRY_RETRY_INITIAL_MS', 1000, 0),
        retryMaxMs: intFrom(env, 'QUARRY_RETRY_MAX_MS', 60_000, 0),
        maxPayloadBytes: intFrom(env, 'QUARRY_MAX_PAYLOAD_BYTES', 1024 * 1024, 1),
        definitions: (env.QUARRY_DEFINITIONS || '').split(',').map(p => p.trim()).filter(Boolean),
        schedules: parseSchedules(env.QUARRY_SCHEDULES),
    };
}
