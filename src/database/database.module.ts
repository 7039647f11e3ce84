import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { BILLING_ENTITIES } from './entities';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (cfg: ConfigService) => ({
        type: 'postgres' as const,
        url: cfg.getOrThrow<string>('DATABASE_URL'),
        entities: BILLING_ENTITIES,
        synchronize: cfg.get<boolean>('DB_SYNCHRONIZE') ?? false,
      }),
    }),
  ],
})
export class DatabaseModule {}
