import { describe, it, expect } from "vitest";
import { accountIdFromByte } from "@tokenledger/types";
import {
  LEDGER_EVENTS,
  createTransferEvent,
  isTransferEventPayload,
} from "../src/ledger-events.js";
import { InMemoryEventStore } from "../src/in-memory-store.js";

const A = accountIdFromByte(1);
const B = accountIdFromByte(2);

describe("createTransferEvent", () => {
  it("wraps a notification with string value and ledger correlation", () => {
    const event = createTransferEvent(
      { from: A, to: B, value: 100n },
      { ledgerId: "main", eventId: "evt-1", timestamp: "2026-01-01T00:00:00.000Z" },
    );

    expect(event).toEqual({
      type: "token.transfer",
      metadata: {
        eventId: "evt-1",
        timestamp: "2026-01-01T00:00:00.000Z",
        actor: A,
        correlationId: "main",
        source: "ledger",
      },
      payload: { from: A, to: B, value: "100" },
    });
  });

  it("generates an event id when none is given", () => {
    const event = createTransferEvent({ from: A, to: B, value: 1n }, { ledgerId: "main" });

    expect(event.metadata.eventId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("keeps values above the float range exact", () => {
    const value = (1n << 128n) - 1n;
    const event = createTransferEvent({ from: A, to: B, value }, { ledgerId: "main" });

    expect(event.payload["value"]).toBe("340282366920938463463374607431768211455");
  });

  it("is accepted by the event store", () => {
    const store = new InMemoryEventStore();
    store.append("main", [createTransferEvent({ from: A, to: B, value: 5n }, { ledgerId: "main" })]);

    const [stored] = store.read("main");
    expect(stored?.event.type).toBe(LEDGER_EVENTS.TRANSFER);
    expect(isTransferEventPayload(stored?.event.payload)).toBe(true);
  });
});

describe("isTransferEventPayload", () => {
  it("rejects malformed payloads", () => {
    expect(isTransferEventPayload({ from: A, to: B, value: 5 })).toBe(false);
    expect(isTransferEventPayload({ from: "a", to: B, value: "5" })).toBe(false);
    expect(isTransferEventPayload({ from: A, to: B, value: "-5" })).toBe(false);
    expect(isTransferEventPayload(undefined)).toBe(false);
  });
});
