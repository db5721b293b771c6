/**
 * Directory watch registrations.
 *
 * A registration records interest in a directory; no watcher thread is
 * started and no events are ever buffered, so a poll always reports an
 * empty event list. Clients use it to confirm a directory is still being
 * tracked and re-list the directory themselves.
 */

export const WATCH_EVENT_TYPES = ['CREATE', 'MODIFY', 'DELETE'] as const;

export type WatchEventType = (typeof WATCH_EVENT_TYPES)[number];

export interface WatchEvent {
  type: WatchEventType;
  path: string;
  timestamp: number;
}

export interface WatchRegistration {
  path: string;
  eventTypes: WatchEventType[];
  registeredAt: number;
  watching: true;
}

export interface WatchPoll {
  path: string;
  watching: boolean;
  events: WatchEvent[];
}

export class WatchRegistry {
  private readonly registrations = new Map<string, WatchRegistration>();

  /** Register (or replace) interest in a directory */
  register(path: string, eventTypes: readonly WatchEventType[], now: number = Date.now()): WatchRegistration {
    const unique = WATCH_EVENT_TYPES.filter((type) => eventTypes.includes(type));
    const registration: WatchRegistration = { path, eventTypes: unique, registeredAt: now, watching: true };
    this.registrations.set(path, registration);
    return registration;
  }

  /** Never blocks */
  poll(path: string): WatchPoll {
    return { path, watching: this.registrations.has(path), events: [] };
  }

  get size(): number {
    return this.registrations.size;
  }
}
