import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Dialogue } from './entities';
import { validateEnv } from './config/env.validation';
import { ChatModule } from './logic/chat/chat.module';
import { HealthModule } from './logic/health/health.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => {
        const queryTimeout = configService.get<number>('DB_QUERY_TIMEOUT_MS', 10000);
        return {
          type: 'postgres' as const,
          host: configService.get<string>('DB_HOST', 'localhost'),
          port: configService.get<number>('DB_PORT', 5432),
          username: configService.get<string>('DB_USER', 'postgres'),
          password: configService.get<string>('DB_PASSWORD', ''),
          database: configService.get<string>('DB_NAME', 'rag_chatbot'),
          entities: [Dialogue],
          // the dialogues table belongs to the ingestion job
          synchronize: false,
          migrationsRun: false,
          // an unreachable database at startup is fatal
          retryAttempts: 0,
          extra: {
            statement_timeout: queryTimeout,
            query_timeout: queryTimeout,
          },
          logging: configService.get('NODE_ENV') === 'development',
        };
      },
      inject: [ConfigService],
    }),
    ChatModule,
    HealthModule,
  ],
})
export class AppModule {}
