import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CoreModule } from './infrastructure/nestjs/modules';

/**
 * Root module. Environment variables come from `.env` in the working
 * directory or its parent; ReviewConfig parses them once in CoreModule.
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      envFilePath: ['.env', '../.env'],
    }),
    CoreModule,
  ],
})
export class AppModule {}
