import { Injectable, ExecutionContext } from '@nestjs/common';
import { ThrottlerGuard, ThrottlerLimitDetail } from '@nestjs/throttler';

import * as crypto from 'crypto';
import { isRecord } from '../utils/type.util';

/**
 * Rate limits each caller by API key when one is sent, otherwise by client IP.
 */
@Injectable()
export class CallerThrottlerGuard extends ThrottlerGuard {
    async canActivate(context: ExecutionContext): Promise<boolean> {
        if (context.getType() !== 'http') {
            return true;
        }
        return super.canActivate(context);
    }

    protected async getTracker(req: Record<string, unknown>): Promise<string> {
        const apiKey = this.extractKey(req);
        if (apiKey) {
            // Raw keys never reach the throttler storage
            const hash = crypto.createHash('md5').update(apiKey).digest('hex');
            return `key-${hash}`;
        }

        if (typeof req.ip === 'string' && req.ip) {
            return req.ip;
        }
        if (Array.isArray(req.ips) && typeof req.ips[0] === 'string') {
            return req.ips[0];
        }
        return 'unknown';
    }

    private extractKey(request: unknown): string | null {
        if (!isRecord(request) || !isRecord(request.headers)) {
            return null;
        }
        const { headers } = request;

        const key = headers['x-api-key'];
        if (typeof key === 'string' && key) {
            return key;
        }

        if (typeof headers.authorization === 'string') {
            const [type, token] = headers.authorization.split(' ');
            if (type === 'Bearer' && token) {
                return token;
            }
        }

        return null;
    }

    protected async getErrorMessage(_context: ExecutionContext, throttlerLimitDetail: ThrottlerLimitDetail): Promise<string> {
        const { limit, ttl } = throttlerLimitDetail;
        const ttlSeconds = Math.ceil(ttl / 1000);
        return `Rate limit exceeded. You can make ${limit} requests per ${ttlSeconds} seconds. Please try again later.`;
    }
}
