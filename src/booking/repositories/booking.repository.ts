import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, QueryRunner, Repository, SelectQueryBuilder } from 'typeorm';
import { RoomOccupiedError, StaleBookingError } from '../domain/booking.errors';
import { isActive } from '../domain/booking-state';
import { ACTIVE_STATES, Booking } from '../domain/booking.types';
import { BookingOccurrenceEntity } from '../entities/booking-occurrence.entity';
import { BookingEntity } from '../entities/booking.entity';
import type {
  BookingListFilter,
  BookingPage,
  BookingStore,
  BookingWriteSet,
  PageRequest,
  VersionedWrite,
} from './booking.store';
import {
  toBooking,
  toBookingEntity,
  toOccurrenceEntities,
} from './mappers/booking.mapper';

@Injectable()
export class BookingRepository implements BookingStore {
  private readonly logger = new Logger(BookingRepository.name);

  constructor(
    @InjectRepository(BookingEntity)
    private readonly bookingRepository: Repository<BookingEntity>,
    private readonly dataSource: DataSource,
  ) {}

  async findById(id: string): Promise<Booking | null> {
    const entity = await this.bookingRepository.findOne({
      where: { id },
      relations: ['occurrences'],
    });
    return entity ? toBooking(entity) : null;
  }

  async findActiveByRoom(roomId: string): Promise<Booking[]> {
    const entities = await this.withOccurrences()
      .where('booking.room_id = :roomId', { roomId })
      .andWhere('booking.state IN (:...states)', { states: ACTIVE_STATES })
      .orderBy('booking.start_time', 'ASC')
      .addOrderBy('occurrence.start_time', 'ASC')
      .getMany();

    return entities.map(toBooking);
  }

  async list(filter: BookingListFilter, { page, perPage }: PageRequest): Promise<BookingPage> {
    const query = this.withOccurrences().where('1 = 1');

    if (filter.roomId !== undefined) {
      query.andWhere('booking.room_id = :roomId', { roomId: filter.roomId });
    }
    if (filter.userId !== undefined) {
      query.andWhere('booking.user_id = :userId', { userId: filter.userId });
    }
    if (filter.state !== undefined) {
      query.andWhere('booking.state = :state', { state: filter.state });
    }
    if (filter.startsFrom !== undefined) {
      query.andWhere('booking.start_time >= :startsFrom', { startsFrom: filter.startsFrom });
    }
    if (filter.endsBy !== undefined) {
      query.andWhere('booking.end_time <= :endsBy', { endsBy: filter.endsBy });
    }

    const [entities, total] = await query
      .orderBy('booking.start_time', 'ASC')
      .addOrderBy('occurrence.start_time', 'ASC')
      .skip((page - 1) * perPage)
      .take(perPage)
      .getManyAndCount();

    return { bookings: entities.map(toBooking), total, page, perPage };
  }

  async commit(writeSet: BookingWriteSet): Promise<void> {
    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    const written = [
      ...(writeSet.created ?? []),
      ...(writeSet.updated ?? []).map((write) => write.booking),
    ];

    try {
      await this.lockRooms(queryRunner, written);

      for (const booking of writeSet.created ?? []) {
        await queryRunner.manager.insert(BookingEntity, toBookingEntity(booking));
        await this.insertOccurrences(queryRunner, booking);
      }

      for (const write of writeSet.updated ?? []) {
        await this.applyVersionedUpdate(queryRunner, write);
      }

      await this.assertNoOverlap(queryRunner, written);
      await queryRunner.commitTransaction();
    } catch (error) {
      await queryRunner.rollbackTransaction();
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  private async applyVersionedUpdate(
    queryRunner: QueryRunner,
    { booking, expectedVersion }: VersionedWrite,
  ): Promise<void> {
    const entity = toBookingEntity(booking);
    const result = await queryRunner.manager
      .createQueryBuilder()
      .update(BookingEntity)
      .set({
        start_time: entity.start_time,
        end_time: entity.end_time,
        recurrence: entity.recurrence,
        state: entity.state,
        version: entity.version,
        cancellation_reason: entity.cancellation_reason,
        cancelled_by: entity.cancelled_by,
        cancelled_at: entity.cancelled_at,
        superseded_by: entity.superseded_by,
      })
      .where('id = :id', { id: booking.id })
      .andWhere('version = :expectedVersion', { expectedVersion })
      .execute();

    if (!result.affected) {
      this.logger.warn(
        `Optimistic update rejected for booking ${booking.id} at version ${expectedVersion}`,
      );
      throw new StaleBookingError(booking.id, expectedVersion);
    }

    await queryRunner.manager.delete(BookingOccurrenceEntity, {
      booking_id: booking.id,
    });
    await this.insertOccurrences(queryRunner, booking);
  }

  /**
   * Transaction-scoped advisory locks, one per room, taken in room order.
   * Commits for a room are serialized across every engine instance.
   */
  private async lockRooms(queryRunner: QueryRunner, bookings: Booking[]): Promise<void> {
    const roomIds = [...new Set(bookings.map((booking) => booking.roomId))].sort();
    for (const roomId of roomIds) {
      await queryRunner.query('SELECT pg_advisory_xact_lock(hashtext($1))', [roomId]);
    }
  }

  /**
   * Runs after the writes, under the room locks: an active booking written
   * here must not overlap another active booking of its room.
   */
  private async assertNoOverlap(queryRunner: QueryRunner, bookings: Booking[]): Promise<void> {
    const active = bookings.filter(isActive);
    if (active.length === 0) {
      return;
    }

    const rows: Array<{ room_id: string; booking_id: string }> = await queryRunner.query(
      `SELECT DISTINCT other.room_id, other.booking_id
         FROM booking_occurrence mine
         JOIN booking_occurrence other
           ON other.room_id = mine.room_id
          AND other.start_time < mine.end_time
          AND other.end_time > mine.start_time
         JOIN booking b ON b.id = other.booking_id
        WHERE mine.booking_id = ANY($1::uuid[])
          AND other.booking_id <> ALL($1::uuid[])
          AND b.state::text = ANY($2::text[])`,
      [active.map((booking) => booking.id), ACTIVE_STATES],
    );

    if (rows.length > 0) {
      this.logger.warn(
        `Overlap with a concurrent writer in room ${rows[0].room_id}, rolling back`,
      );
      throw new RoomOccupiedError(
        rows[0].room_id,
        rows.map((row) => row.booking_id),
      );
    }
  }

  private async insertOccurrences(
    queryRunner: QueryRunner,
    booking: Booking,
  ): Promise<void> {
    const rows = toOccurrenceEntities(booking);
    if (rows.length > 0) {
      await queryRunner.manager.insert(BookingOccurrenceEntity, rows);
    }
  }

  private withOccurrences(): SelectQueryBuilder<BookingEntity> {
    return this.bookingRepository
      .createQueryBuilder('booking')
      .leftJoinAndSelect('booking.occurrences', 'occurrence');
  }
}
