/**
 * @tokenledger/event-store - Ledger event definitions.
 *
 * Transfer notifications are the only events a ledger announces. The host
 * stores them as `token.transfer` DomainEvents, one stream per ledger
 * instance, so they can be indexed and replayed.
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, TransferNotification } from "@tokenledger/types";
import { isAccountId } from "@tokenledger/types";

export const LEDGER_EVENTS = {
  TRANSFER: "token.transfer",
} as const;

export type LedgerEventType = (typeof LEDGER_EVENTS)[keyof typeof LEDGER_EVENTS];

/**
 * Payload of a `token.transfer` event. `value` is a decimal string so the
 * event survives JSON and canonical hashing.
 */
export interface TransferEventPayload {
  readonly from: string;
  readonly to: string;
  readonly value: string;
}

export interface CreateTransferEventOptions {
  /** Ledger instance the notification came from (correlationId) */
  readonly ledgerId: string;
  readonly eventId?: string;
  readonly timestamp?: string;
}

/**
 * Wrap a transfer notification in a DomainEvent.
 * The sender is recorded as the actor.
 */
export function createTransferEvent(
  notification: TransferNotification,
  options: CreateTransferEventOptions,
): DomainEvent {
  const payload: TransferEventPayload = {
    from: notification.from,
    to: notification.to,
    value: notification.value.toString(),
  };

  return {
    type: LEDGER_EVENTS.TRANSFER,
    metadata: {
      eventId: options.eventId ?? randomUUID(),
      timestamp: options.timestamp ?? new Date().toISOString(),
      actor: notification.from,
      correlationId: options.ledgerId,
      source: "ledger",
    },
    payload: { ...payload },
  };
}

export function isTransferEventPayload(value: unknown): value is TransferEventPayload {
  if (typeof value !== "object" || value === null) return false;
  const v = value as Record<string, unknown>;
  return (
    isAccountId(v["from"]) &&
    isAccountId(v["to"]) &&
    typeof v["value"] === "string" &&
    /^\d+$/.test(v["value"])
  );
}
