import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
  Index,
} from 'typeorm';
import { BookingState } from '../domain/booking.types';
import { BookingOccurrenceEntity } from './booking-occurrence.entity';

/** Serialized `RecurrencePattern`; dates as ISO strings. */
export interface RecurrenceColumn {
  frequency: string;
  interval: number;
  endDate: string | null;
  count: number | null;
  daysOfWeek: string[];
}

@Entity('booking')
@Index(['room_id', 'state'])
@Index(['user_id'])
export class BookingEntity {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  room_id!: string;

  @Column({ type: 'varchar', length: 255 })
  user_id!: string;

  @Column({ type: 'varchar', length: 200 })
  title!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'integer', nullable: true })
  attendees!: number | null;

  @Column({ type: 'timestamptz' })
  start_time!: Date;

  @Column({ type: 'timestamptz' })
  end_time!: Date;

  @Column({ type: 'jsonb', nullable: true })
  recurrence!: RecurrenceColumn | null;

  @Column({ type: 'enum', enum: BookingState, default: BookingState.Pending })
  state!: BookingState;

  @Column({ type: 'integer', default: 1 })
  version!: number;

  @Column({ type: 'text', nullable: true })
  cancellation_reason!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  cancelled_by!: string | null;

  @Column({ type: 'timestamptz', nullable: true })
  cancelled_at!: Date | null;

  @Column({ type: 'uuid', nullable: true })
  superseded_by!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;

  @OneToMany(() => BookingOccurrenceEntity, (occurrence) => occurrence.booking, {
    cascade: true,
  })
  occurrences!: BookingOccurrenceEntity[];
}
