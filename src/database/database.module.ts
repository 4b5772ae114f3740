import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';

export function typeOrmOptions(configService: ConfigService): TypeOrmModuleOptions {
  return {
    type: configService.get<'mysql' | 'mariadb'>('DB_TYPE', 'mysql'),
    host: configService.get<string>('DB_HOST', 'localhost'),
    port: configService.get<number>('DB_PORT', 3306),
    username: configService.get<string>('DB_USERNAME'),
    password: configService.get<string>('DB_PASSWORD'),
    database: configService.get<string>('DB_DATABASE'),
    // Entities are registered by the feature modules through forFeature().
    autoLoadEntities: true,
    synchronize: configService.get<boolean>('DB_SYNCHRONIZE', false),
    logging: ['error', 'warn'],
    retryAttempts: 10,
    retryDelay: 3000,
  };
}

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: typeOrmOptions,
      inject: [ConfigService],
    }),
  ],
})
export class DatabaseModule {}
