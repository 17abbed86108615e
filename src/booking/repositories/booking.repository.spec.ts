import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { RoomOccupiedError, StaleBookingError } from '../domain/booking.errors';
import { BookingState } from '../domain/booking.types';
import { BookingOccurrenceEntity } from '../entities/booking-occurrence.entity';
import { BookingEntity } from '../entities/booking.entity';
import { bookingFixture } from '../testing/booking.fixtures';
import { BookingRepository } from './booking.repository';
import { toBookingEntity, toOccurrenceEntities } from './mappers/booking.mapper';

describe('BookingRepository', () => {
  let repository: BookingRepository;

  const booking = bookingFixture({
    id: '6f1c2b9e-0a4d-4c53-9f43-2b8f3e1d7a10',
    ranges: [
      ['2025-01-06T09:00:00Z', '2025-01-06T10:00:00Z'],
      ['2025-01-07T09:00:00Z', '2025-01-07T10:00:00Z'],
    ],
  });

  const selectQueryBuilder = {
    leftJoinAndSelect: jest.fn().mockReturnThis(),
    where: jest.fn().mockReturnThis(),
    andWhere: jest.fn().mockReturnThis(),
    orderBy: jest.fn().mockReturnThis(),
    addOrderBy: jest.fn().mockReturnThis(),
    skip: jest.fn().mockReturnThis(),
    take: jest.fn().mockReturnThis(),
    getMany: jest.fn(),
    getManyAndCount: jest.fn(),
  };

  const updateQueryBuilder = {
    update: jest.fn().mockReturnThis(),
    set: jest.fn().mockReturnThis(),
    where: jest.fn().mockReturnThis(),
    andWhere: jest.fn().mockReturnThis(),
    execute: jest.fn(),
  };

  const mockQueryRunner = {
    connect: jest.fn(),
    startTransaction: jest.fn(),
    commitTransaction: jest.fn(),
    rollbackTransaction: jest.fn(),
    release: jest.fn(),
    query: jest.fn(),
    manager: {
      insert: jest.fn(),
      delete: jest.fn(),
      createQueryBuilder: jest.fn(() => updateQueryBuilder),
    },
  };

  const mockBookingRepository = {
    findOne: jest.fn(),
    createQueryBuilder: jest.fn(() => selectQueryBuilder),
  };

  const mockDataSource = {
    createQueryRunner: jest.fn(() => mockQueryRunner),
  };

  const entityWithRows = () => {
    const entity = toBookingEntity(booking);
    entity.occurrences = toOccurrenceEntities(booking);
    return entity;
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        BookingRepository,
        {
          provide: getRepositoryToken(BookingEntity),
          useValue: mockBookingRepository,
        },
        {
          provide: DataSource,
          useValue: mockDataSource,
        },
      ],
    }).compile();

    repository = module.get<BookingRepository>(BookingRepository);
    mockQueryRunner.query.mockResolvedValue([]);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('findById', () => {
    it('should load the booking with its occurrences', async () => {
      mockBookingRepository.findOne.mockResolvedValue(entityWithRows());

      await expect(repository.findById(booking.id)).resolves.toEqual(booking);
      expect(mockBookingRepository.findOne).toHaveBeenCalledWith({
        where: { id: booking.id },
        relations: ['occurrences'],
      });
    });

    it('should return null when the booking does not exist', async () => {
      mockBookingRepository.findOne.mockResolvedValue(null);
      await expect(repository.findById('missing')).resolves.toBeNull();
    });
  });

  it('should query active bookings of a room', async () => {
    selectQueryBuilder.getMany.mockResolvedValue([entityWithRows()]);

    const active = await repository.findActiveByRoom('room-a');

    expect(active).toEqual([booking]);
    expect(selectQueryBuilder.where).toHaveBeenCalledWith('booking.room_id = :roomId', {
      roomId: 'room-a',
    });
    expect(selectQueryBuilder.andWhere).toHaveBeenCalledWith(
      'booking.state IN (:...states)',
      { states: [BookingState.Pending, BookingState.Confirmed] },
    );
  });

  it('should apply only the given list filters', async () => {
    selectQueryBuilder.getManyAndCount.mockResolvedValue([[], 0]);

    await repository.list({ userId: 'user-1' }, { page: 1, perPage: 20 });

    expect(selectQueryBuilder.andWhere).toHaveBeenCalledTimes(1);
    expect(selectQueryBuilder.andWhere).toHaveBeenCalledWith('booking.user_id = :userId', {
      userId: 'user-1',
    });
  });

  it('should bound by date and page the listing', async () => {
    selectQueryBuilder.getManyAndCount.mockResolvedValue([[entityWithRows()], 41]);
    const startsFrom = new Date('2025-01-01T00:00:00Z');
    const endsBy = new Date('2025-02-01T00:00:00Z');

    const page = await repository.list({ startsFrom, endsBy }, { page: 3, perPage: 20 });

    expect(selectQueryBuilder.andWhere).toHaveBeenCalledWith(
      'booking.start_time >= :startsFrom',
      { startsFrom },
    );
    expect(selectQueryBuilder.andWhere).toHaveBeenCalledWith('booking.end_time <= :endsBy', {
      endsBy,
    });
    expect(selectQueryBuilder.skip).toHaveBeenCalledWith(40);
    expect(selectQueryBuilder.take).toHaveBeenCalledWith(20);
    expect(page).toEqual({ bookings: [booking], total: 41, page: 3, perPage: 20 });
  });

  describe('commit', () => {
    it('should insert a new booking and its occurrences in one transaction', async () => {
      await repository.commit({ created: [booking] });

      expect(mockQueryRunner.startTransaction).toHaveBeenCalled();
      expect(mockQueryRunner.manager.insert).toHaveBeenNthCalledWith(
        1,
        BookingEntity,
        toBookingEntity(booking),
      );
      expect(mockQueryRunner.manager.insert).toHaveBeenNthCalledWith(
        2,
        BookingOccurrenceEntity,
        toOccurrenceEntities(booking),
      );
      expect(mockQueryRunner.commitTransaction).toHaveBeenCalled();
      expect(mockQueryRunner.release).toHaveBeenCalled();
    });

    it('should guard updates with the expected version and replace occurrences', async () => {
      updateQueryBuilder.execute.mockResolvedValue({ affected: 1 });
      const next = { ...booking, version: 3 };

      await repository.commit({ updated: [{ booking: next, expectedVersion: 2 }] });

      expect(updateQueryBuilder.where).toHaveBeenCalledWith('id = :id', { id: booking.id });
      expect(updateQueryBuilder.andWhere).toHaveBeenCalledWith(
        'version = :expectedVersion',
        { expectedVersion: 2 },
      );
      expect(updateQueryBuilder.set).toHaveBeenCalledWith(
        expect.objectContaining({ version: 3 }),
      );
      expect(mockQueryRunner.manager.delete).toHaveBeenCalledWith(BookingOccurrenceEntity, {
        booking_id: booking.id,
      });
      expect(mockQueryRunner.manager.insert).toHaveBeenCalledWith(
        BookingOccurrenceEntity,
        toOccurrenceEntities(next),
      );
      expect(mockQueryRunner.commitTransaction).toHaveBeenCalled();
    });

    it('should roll back and report a stale version', async () => {
      updateQueryBuilder.execute.mockResolvedValue({ affected: 0 });

      await expect(
        repository.commit({
          created: [bookingFixture({ id: 'other', ranges: [['2025-01-08T09:00:00Z', '2025-01-08T10:00:00Z']] })],
          updated: [{ booking: { ...booking, version: 3 }, expectedVersion: 2 }],
        }),
      ).rejects.toBeInstanceOf(StaleBookingError);

      expect(mockQueryRunner.rollbackTransaction).toHaveBeenCalled();
      expect(mockQueryRunner.commitTransaction).not.toHaveBeenCalled();
      expect(mockQueryRunner.manager.delete).not.toHaveBeenCalled();
      expect(mockQueryRunner.release).toHaveBeenCalled();
    });

    it('should take one advisory lock per room in room order', async () => {
      const elsewhere = bookingFixture({
        id: 'elsewhere',
        roomId: 'room-b',
        ranges: [['2025-01-08T09:00:00Z', '2025-01-08T10:00:00Z']],
      });

      await repository.commit({ created: [elsewhere, booking] });

      expect(mockQueryRunner.query).toHaveBeenNthCalledWith(
        1,
        'SELECT pg_advisory_xact_lock(hashtext($1))',
        ['room-a'],
      );
      expect(mockQueryRunner.query).toHaveBeenNthCalledWith(
        2,
        'SELECT pg_advisory_xact_lock(hashtext($1))',
        ['room-b'],
      );
      expect(mockQueryRunner.query).toHaveBeenNthCalledWith(3, expect.any(String), [
        ['elsewhere', booking.id],
        [BookingState.Pending, BookingState.Confirmed],
      ]);
      expect(mockQueryRunner.commitTransaction).toHaveBeenCalled();
    });

    it('should roll back when another writer holds an overlapping booking', async () => {
      mockQueryRunner.query
        .mockResolvedValueOnce([])
        .mockResolvedValueOnce([{ room_id: 'room-a', booking_id: 'concurrent' }]);

      const failure = repository.commit({ created: [booking] });

      await expect(failure).rejects.toBeInstanceOf(RoomOccupiedError);
      await expect(failure).rejects.toMatchObject({
        roomId: 'room-a',
        conflictingBookingIds: ['concurrent'],
      });
      expect(mockQueryRunner.rollbackTransaction).toHaveBeenCalled();
      expect(mockQueryRunner.commitTransaction).not.toHaveBeenCalled();
    });

    it('should skip the overlap check when nothing written is active', async () => {
      updateQueryBuilder.execute.mockResolvedValue({ affected: 1 });
      const cancelled = { ...booking, state: BookingState.Cancelled, version: 3 };

      await repository.commit({ updated: [{ booking: cancelled, expectedVersion: 2 }] });

      expect(mockQueryRunner.query).toHaveBeenCalledTimes(1);
      expect(mockQueryRunner.commitTransaction).toHaveBeenCalled();
    });

    it('should roll back and rethrow driver errors', async () => {
      mockQueryRunner.manager.insert.mockRejectedValueOnce(new Error('connection reset'));

      await expect(repository.commit({ created: [booking] })).rejects.toThrow(
        'connection reset',
      );
      expect(mockQueryRunner.rollbackTransaction).toHaveBeenCalled();
      expect(mockQueryRunner.release).toHaveBeenCalled();
    });
  });
});
