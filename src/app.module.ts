import { Module } from '@nestjs/common';
import { LoggerModule } from 'nestjs-pino';
import { PrometheusModule } from '@willsoto/nestjs-prometheus';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import type { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { CommonModule } from './common/common.module';
import { configuration } from './config/configuration';
import type { AppConfig } from './config/configuration';
import { PipelineModule } from './pipeline/pipeline.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [() => configuration()],
    }),
    LoggerModule.forRootAsync({
      useFactory: (configService: ConfigService<AppConfig, true>) => {
        const app = configService.get('app', { infer: true });
        return {
          pinoHttp: {
            level: app.logLevel,
            transport:
              app.env === 'development'
                ? { target: 'pino-pretty', options: { colorize: true } }
                : undefined,
            redact: [
              'apiKey',
              'password',
              '*.apiKey',
              '*.password',
              '*.smtp.password',
              '*.geminiApiKey',
              '*.hunterApiKey',
              '*.braveApiKey',
            ],
          },
        };
      },
      inject: [ConfigService],
    }),
    PrometheusModule.register({
      defaultMetrics: { enabled: true },
    }),
    TypeOrmModule.forRootAsync({
      useFactory: (configService: ConfigService<AppConfig, true>): TypeOrmModuleOptions => {
        const database = configService.get('database', { infer: true });
        return database.type === 'postgres'
          ? {
              type: 'postgres',
              url: database.url,
              autoLoadEntities: true,
              synchronize: true,
            }
          : {
              type: 'better-sqlite3',
              database: database.path,
              autoLoadEntities: true,
              synchronize: true,
            };
      },
      inject: [ConfigService],
    }),
    CommonModule,
    PipelineModule,
  ],
})
export class AppModule {}
