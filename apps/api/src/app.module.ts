import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { pipelineConfig } from './config/pipeline.config';
import { HealthModule } from './health/health.module';
import { DocumentsModule } from './documents/documents.module';
import { StatusStreamModule } from './status-stream/status-stream.module';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    // pipelineConfig validates the environment and fails startup when
    // anything is invalid
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
      load: [pipelineConfig],
    }),

    // ── Database ──────────────────────────────────────────
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres' as const,
        host: configService.get<string>('POSTGRES_HOST', 'localhost'),
        port: configService.get<number>('POSTGRES_PORT', 5432),
        username: configService.get<string>('POSTGRES_USER', 'papertrail'),
        password: configService.get<string>(
          'POSTGRES_PASSWORD',
          'papertrail_secret',
        ),
        database: configService.get<string>('POSTGRES_DB', 'papertrail'),
        autoLoadEntities: true,
        synchronize: false,
        logging: configService.get<string>('NODE_ENV') !== 'production',
      }),
    }),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    DocumentsModule,
    StatusStreamModule,
  ],
})
export class AppModule {}
