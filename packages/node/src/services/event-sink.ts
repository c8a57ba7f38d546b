/**
 * NotificationSink that records transfers in an EventStore, one stream
 * per ledger instance.
 *
 * Notifications are held until `commit()`. The service commits after the
 * mutation's snapshot is saved and discards them when the save fails, so
 * the stream never reports a transfer the persisted state does not hold.
 */

import type { DomainEvent, TransferNotification } from "@tokenledger/types";
import type { NotificationSink } from "@tokenledger/ledger";
import type { EventStore } from "@tokenledger/event-store";
import { createTransferEvent } from "@tokenledger/event-store";

export class EventStoreSink implements NotificationSink {
  private readonly _store: EventStore;
  private readonly _ledgerId: string;
  private _pending: DomainEvent[] = [];

  constructor(store: EventStore, ledgerId: string) {
    this._store = store;
    this._ledgerId = ledgerId;
  }

  emit(notification: TransferNotification): void {
    this._pending.push(createTransferEvent(notification, { ledgerId: this._ledgerId }));
  }

  commit(): void {
    const batch = this._pending;
    this._pending = [];
    if (batch.length > 0) {
      this._store.append(this._ledgerId, batch);
    }
  }

  discard(): void {
    this._pending = [];
  }
}
