import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PrometheusModule } from '@willsoto/nestjs-prometheus';
import { ScheduleModule } from '@nestjs/schedule';
import configuration from './config/configuration';
import { AppController } from './app.controller';
import { AuthModule } from './auth/auth.module';
import { PredictionModule } from './prediction/prediction.module';
import { HistoryModule } from './history/history.module';
import { KeepAliveModule } from './keep-alive/keep-alive.module';
import { RedisModule } from './redis/redis.module';
import { SmsModule } from './sms/sms.module';
import { CommonModule } from './common/common.module';
import { MetricsController } from './common/controllers/metrics.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    ScheduleModule.forRoot(),
    PrometheusModule.register({
      path: '/metrics',
      controller: MetricsController,
      defaultMetrics: {
        enabled: true,
      },
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        host: configService.get<string>('database.host'),
        port: configService.get<number>('database.port'),
        username: configService.get<string>('database.username'),
        password: configService.get<string>('database.password'),
        database: configService.get<string>('database.database'),
        entities: [__dirname + '/**/*.entity{.ts,.js}'],
        migrations: [__dirname + '/database/migrations/*{.ts,.js}'],
        migrationsRun: configService.get<boolean>('database.runMigrations'),
        synchronize: false,
        logging: configService.get<string>('nodeEnv') === 'development',
        extra: {
          max: configService.get<number>('database.poolSize'),
          connectionTimeoutMillis: configService.get<number>('database.connectionTimeoutMillis'),
        },
      }),
      inject: [ConfigService],
    }),
    RedisModule,
    CommonModule,
    SmsModule,
    AuthModule,
    PredictionModule,
    HistoryModule,
    KeepAliveModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
