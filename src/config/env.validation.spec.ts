import { parseStatusList, validate } from './env.validation';

describe('validate', () => {
    it('should apply defaults to an empty environment', () => {
        const config = validate({});

        expect(config.PORT).toBe(3000);
        expect(config.FETCH_MIN_INTERVAL_MS).toBe(1000);
        expect(config.FETCH_MAX_BODY_BYTES).toBe(10485760);
        expect(config.DISCOVERY_STATUSES).toBe('200,301,302,403');
        expect(config.THROTTLE_TTL).toBe(5000);
        expect(config.REDIS_HOST).toBeUndefined();
    });

    it('should convert numeric strings', () => {
        const config = validate({ VIEW_PAGE_SIZE: '25', FETCH_TIMEOUT_MS: '2500' });

        expect(config.VIEW_PAGE_SIZE).toBe(25);
        expect(config.FETCH_TIMEOUT_MS).toBe(2500);
    });

    it('should reject out-of-range values', () => {
        expect(() => validate({ VIEW_PAGE_SIZE: '0' })).toThrow('Invalid environment configuration');
    });

    it('should reject a malformed status list', () => {
        expect(() => validate({ DISCOVERY_STATUSES: '200;404' })).toThrow(
            'DISCOVERY_STATUSES must be a comma-separated list of status codes',
        );
    });
});

describe('parseStatusList', () => {
    it('should parse comma-separated codes', () => {
        expect(parseStatusList('200, 301,403')).toEqual(new Set([200, 301, 403]));
    });

    it('should skip empty entries', () => {
        expect(parseStatusList('200,,404')).toEqual(new Set([200, 404]));
    });
});
