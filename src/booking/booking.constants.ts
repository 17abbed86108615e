export const BOOKING_STORE = Symbol('BOOKING_STORE');
export const ROOM_DIRECTORY = Symbol('ROOM_DIRECTORY');
export const BOOKING_EVENT_SINK = Symbol('BOOKING_EVENT_SINK');
export const CLOCK = Symbol('CLOCK');

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
