import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { join } from 'path';

import { AppController } from './app.controller';
import { originalityConfig } from './config/originality.config';
import { OriginalityModule } from './originality/originality.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [originalityConfig] }),
    TypeOrmModule.forRoot({
      type: 'postgres',
      url: process.env.DATABASE_URL,
      autoLoadEntities: true,
      migrations: [join(__dirname, 'database/migrations/*{.ts,.js}')],
      migrationsRun: true,
      synchronize: false,
      logging: process.env.NODE_ENV !== 'production',
    }),
    OriginalityModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
