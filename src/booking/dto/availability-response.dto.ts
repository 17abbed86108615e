import type { AvailabilityWindow } from '../domain/booking.types';
import { TimeSlot, toTimeSlot } from './booking-response.dto';

export class AvailabilityResponseDto {
  room_id!: string;
  start_date!: string;
  end_date!: string;
  busy_slots!: TimeSlot[];
  available_slots!: TimeSlot[];
}

export function toAvailabilityResponse(
  window: AvailabilityWindow,
): AvailabilityResponseDto {
  return {
    room_id: window.roomId,
    start_date: window.queryRange.start.toISOString(),
    end_date: window.queryRange.end.toISOString(),
    busy_slots: window.busy.map(toTimeSlot),
    available_slots: window.free.map(toTimeSlot),
  };
}
