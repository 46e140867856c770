/** In-process change notification source: owner-scoped handler registrations. */

import type {
  AssetHandle,
  ChangeEventClass,
  ChangeHandler,
  ChangeNotificationSource,
} from '../models/collaborators.js';

interface Registration {
  eventClass: ChangeEventClass;
  owner: object;
  handler: ChangeHandler;
}

export class NotificationHub implements ChangeNotificationSource {
  private registrations: Registration[] = [];

  subscribe(eventClass: ChangeEventClass, owner: object, handler: ChangeHandler): void {
    this.registrations.push({ eventClass, owner, handler });
  }

  unsubscribeAll(owner: object): void {
    this.registrations = this.registrations.filter((r) => r.owner !== owner);
  }

  /** Number of live registrations, optionally for one owner. */
  subscriptionCount(owner?: object): number {
    if (owner === undefined) return this.registrations.length;
    return this.registrations.filter((r) => r.owner === owner).length;
  }

  /** Deliver an event to every handler registered for its class, in registration order. */
  publish(eventClass: ChangeEventClass, handle: AssetHandle, assetKind: string): void {
    // Snapshot: handlers may unsubscribe while the event is being delivered.
    for (const registration of [...this.registrations]) {
      if (registration.eventClass === eventClass) {
        registration.handler(handle, assetKind);
      }
    }
  }
}
