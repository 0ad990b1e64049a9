import { Module } from '@nestjs/common';
import Redis from 'ioredis';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ThrottlerModule } from '@nestjs/throttler';
import { ThrottlerStorageRedisService } from '@nest-lab/throttler-storage-redis';
import { APP_GUARD } from '@nestjs/core';
import { validate } from './config/env.validation';
import { CallerThrottlerGuard } from './guards/caller-throttler.guard';
import { ReconModule } from './recon/recon.module';

@Module({
    imports: [
        ConfigModule.forRoot({ isGlobal: true, validate }),
        ThrottlerModule.forRootAsync({
            inject: [ConfigService],
            useFactory: (configService: ConfigService) => {
                const redisHost = configService.get<string>('REDIS_HOST');
                return {
                    throttlers: [
                        {
                            name: 'default',
                            ttl: configService.get<number>('THROTTLE_TTL', 5000), // one call per 5 seconds
                            limit: configService.get<number>('THROTTLE_LIMIT', 1),
                        },
                    ],
                    // In-memory unless a Redis host is configured
                    storage: redisHost
                        ? new ThrottlerStorageRedisService(
                            new Redis({
                                host: redisHost,
                                port: configService.get<number>('REDIS_PORT', 6379),
                            })
                        )
                        : undefined,
                };
            },
        }),
        ReconModule,
    ],
    providers: [
        {
            provide: APP_GUARD,
            useClass: CallerThrottlerGuard,
        },
    ],
})
export class AppModule { }
