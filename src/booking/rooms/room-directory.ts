export interface RoomDirectory {
  roomExists(roomId: string): Promise<boolean>;
}

/**
 * Room inventory lives in another service; this directory only knows the
 * ids it was configured with. An empty list admits every room id.
 */
export class StaticRoomDirectory implements RoomDirectory {
  private readonly roomIds: ReadonlySet<string>;

  constructor(roomIds: readonly string[]) {
    this.roomIds = new Set(roomIds);
  }

  async roomExists(roomId: string): Promise<boolean> {
    return this.roomIds.size === 0 || this.roomIds.has(roomId);
  }
}
