import { plainToInstance } from 'class-transformer';
import { IsInt, IsOptional, IsString, Matches, Max, Min, validateSync } from 'class-validator';

export const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0 Safari/537.36';

export const FETCH_DEFAULTS = {
    timeoutMs: 10_000,
    maxBodyBytes: 10 * 1024 * 1024,
    minIntervalMs: 1_000,
    poolSize: 20,
    maxRedirects: 10,
} as const;

export const VIEW_DEFAULTS = {
    pageSize: 10,
    idleTimeoutMs: 300_000,
    maxOpen: 1_000,
} as const;

export const DEFAULT_DISCOVERY_STATUSES = '200,301,302,403';

/**
 * Environment schema. Every value has a default, so an empty environment is valid.
 */
export class EnvironmentVariables {
    @IsInt()
    @Min(1)
    @Max(65535)
    PORT: number = 3000;

    @IsString()
    CORS_ORIGIN: string = '*';

    @IsInt()
    @Min(1)
    FETCH_TIMEOUT_MS: number = FETCH_DEFAULTS.timeoutMs;

    @IsInt()
    @Min(1)
    FETCH_MAX_BODY_BYTES: number = FETCH_DEFAULTS.maxBodyBytes;

    @IsInt()
    @Min(0)
    FETCH_MIN_INTERVAL_MS: number = FETCH_DEFAULTS.minIntervalMs;

    @IsInt()
    @Min(1)
    FETCH_POOL_SIZE: number = FETCH_DEFAULTS.poolSize;

    @IsInt()
    @Min(0)
    FETCH_MAX_REDIRECTS: number = FETCH_DEFAULTS.maxRedirects;

    @IsString()
    FETCH_USER_AGENT: string = DEFAULT_USER_AGENT;

    @Matches(/^\d{3}(,\d{3})*$/, { message: 'DISCOVERY_STATUSES must be a comma-separated list of status codes' })
    DISCOVERY_STATUSES: string = DEFAULT_DISCOVERY_STATUSES;

    @IsInt()
    @Min(1)
    VIEW_PAGE_SIZE: number = VIEW_DEFAULTS.pageSize;

    @IsInt()
    @Min(1)
    VIEW_IDLE_TIMEOUT_MS: number = VIEW_DEFAULTS.idleTimeoutMs;

    @IsInt()
    @Min(1)
    VIEW_MAX_OPEN: number = VIEW_DEFAULTS.maxOpen;

    @IsInt()
    @Min(1)
    THROTTLE_TTL: number = 5_000;

    @IsInt()
    @Min(1)
    THROTTLE_LIMIT: number = 1;

    @IsOptional()
    @IsString()
    REDIS_HOST?: string;

    @IsInt()
    REDIS_PORT: number = 6379;
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
    const validated = plainToInstance(EnvironmentVariables, config, { enableImplicitConversion: true });
    const errors = validateSync(validated, { skipMissingProperties: false });

    if (errors.length > 0) {
        const details = errors.flatMap((error) => Object.values(error.constraints ?? {}));
        throw new Error(`Invalid environment configuration: ${details.join('; ')}`);
    }
    return validated;
}

/**
 * Parses the discovery whitelist ("200,301,302,403") into a set of status codes.
 */
export function parseStatusList(raw: string): Set<number> {
    return new Set(
        raw
            .split(',')
            .map((part) => parseInt(part.trim(), 10))
            .filter((status) => Number.isInteger(status)),
    );
}
