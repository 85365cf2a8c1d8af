/**
 * Room Directory - named multicast groups of connection ids
 *
 * Membership is many-to-many. Empty rooms are kept until a sweep; they never
 * count towards roomCount().
 */

export interface RoomDirectoryOptions {
  /** Liveness check against the owning registry */
  isLive: (connectionId: string) => boolean;
  /** Tracked room count above which a join triggers a sweep of empty rooms */
  sweepThreshold?: number;
}

export class RoomDirectory {
  private rooms: Map<string, Set<string>> = new Map();
  private memberships: Map<string, Set<string>> = new Map();
  private readonly isLive: (connectionId: string) => boolean;
  private readonly sweepThreshold: number;

  constructor(options: RoomDirectoryOptions) {
    this.isLive = options.isLive;
    this.sweepThreshold = options.sweepThreshold ?? 64;
  }

  /**
   * Add a live connection to a room. Returns false when the connection is
   * not live and nothing changed.
   */
  join(connectionId: string, room: string): boolean {
    if (!this.isLive(connectionId)) {
      return false;
    }

    let members = this.rooms.get(room);
    if (!members) {
      if (this.rooms.size >= this.sweepThreshold) {
        this.sweepEmptyRooms();
      }
      members = new Set();
      this.rooms.set(room, members);
    }
    members.add(connectionId);

    let joined = this.memberships.get(connectionId);
    if (!joined) {
      joined = new Set();
      this.memberships.set(connectionId, joined);
    }
    joined.add(room);
    return true;
  }

  /**
   * Remove a connection from a room. Returns false when it was not a member.
   */
  leave(connectionId: string, room: string): boolean {
    const members = this.rooms.get(room);
    if (!members || !members.delete(connectionId)) {
      return false;
    }

    const joined = this.memberships.get(connectionId);
    if (joined) {
      joined.delete(room);
      if (joined.size === 0) {
        this.memberships.delete(connectionId);
      }
    }
    return true;
  }

  /**
   * Remove a connection from every room it belongs to
   * @returns the rooms it was removed from
   */
  purge(connectionId: string): string[] {
    const joined = this.memberships.get(connectionId);
    if (!joined) return [];

    const rooms = Array.from(joined);
    for (const room of rooms) {
      this.rooms.get(room)?.delete(connectionId);
    }
    this.memberships.delete(connectionId);
    return rooms;
  }

  /**
   * Snapshot of the current members of a room
   */
  members(room: string): string[] {
    const members = this.rooms.get(room);
    return members ? Array.from(members) : [];
  }

  roomsOf(connectionId: string): string[] {
    const joined = this.memberships.get(connectionId);
    return joined ? Array.from(joined) : [];
  }

  isMember(connectionId: string, room: string): boolean {
    return this.rooms.get(room)?.has(connectionId) ?? false;
  }

  /**
   * Number of rooms with at least one member
   */
  roomCount(): number {
    let count = 0;
    for (const members of this.rooms.values()) {
      if (members.size > 0) count++;
    }
    return count;
  }

  /**
   * Number of rooms held in memory, empty ones included
   */
  trackedRoomCount(): number {
    return this.rooms.size;
  }

  /**
   * Drop rooms that have no members
   * @returns number of rooms removed
   */
  sweepEmptyRooms(): number {
    let removed = 0;
    for (const [room, members] of this.rooms) {
      if (members.size === 0) {
        this.rooms.delete(room);
        removed++;
      }
    }
    return removed;
  }
}
