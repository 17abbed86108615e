import { DynamicModule, Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { BookingModule } from './booking/booking.module';
import { databaseConfig } from './config/database.config';
import { EngineConfig } from './config/engine.config';

@Module({})
export class AppModule {
  static forRoot(config: EngineConfig): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ...(config.storageDriver === 'postgres'
          ? [TypeOrmModule.forRoot(databaseConfig)]
          : []),
        BookingModule.register(config),
      ],
    };
  }
}
