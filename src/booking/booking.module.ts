import { DynamicModule, Module, Provider } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ENGINE_CONFIG, EngineConfig } from '../config/engine.config';
import { BookingController } from './booking.controller';
import {
  BOOKING_EVENT_SINK,
  BOOKING_STORE,
  CLOCK,
  ROOM_DIRECTORY,
  systemClock,
} from './booking.constants';
import { BookingOccurrenceEntity } from './entities/booking-occurrence.entity';
import { BookingEntity } from './entities/booking.entity';
import { InMemoryBookingEventSink } from './events/booking-events';
import { BookingRepository } from './repositories/booking.repository';
import { InMemoryBookingStore } from './repositories/in-memory-booking.store';
import { StaticRoomDirectory } from './rooms/room-directory';
import { AvailabilityService } from './services/availability.service';
import { BookingService } from './services/booking.service';
import { ConflictDetectionService } from './services/conflict-detection.service';
import { RecurrenceService } from './services/recurrence.service';
import { RoomLockService } from './services/room-lock.service';
import { SlotSuggestionService } from './services/slot-suggestion.service';

@Module({})
export class BookingModule {
  static register(config: EngineConfig): DynamicModule {
    const usePostgres = config.storageDriver === 'postgres';
    const storeProviders: Provider[] = usePostgres
      ? [BookingRepository, { provide: BOOKING_STORE, useExisting: BookingRepository }]
      : [{ provide: BOOKING_STORE, useClass: InMemoryBookingStore }];

    return {
      module: BookingModule,
      imports: usePostgres
        ? [TypeOrmModule.forFeature([BookingEntity, BookingOccurrenceEntity])]
        : [],
      controllers: [BookingController],
      providers: [
        { provide: ENGINE_CONFIG, useValue: config },
        { provide: CLOCK, useValue: systemClock },
        {
          provide: ROOM_DIRECTORY,
          useValue: new StaticRoomDirectory(config.knownRoomIds),
        },
        { provide: BOOKING_EVENT_SINK, useClass: InMemoryBookingEventSink },
        ...storeProviders,
        RecurrenceService,
        ConflictDetectionService,
        AvailabilityService,
        SlotSuggestionService,
        RoomLockService,
        BookingService,
      ],
      exports: [BookingService, BOOKING_EVENT_SINK],
    };
  }
}
