/**
 * Ledger routes.
 *
 * POST /api/v1/ledgers                                   - Create a ledger
 * GET  /api/v1/ledgers/:ledgerId                         - Supply summary
 * GET  /api/v1/ledgers/:ledgerId/balances/:account       - balanceOf
 * GET  /api/v1/ledgers/:ledgerId/allowances/:owner/:spender - allowance
 * POST /api/v1/ledgers/:ledgerId/transfer                - transfer
 * POST /api/v1/ledgers/:ledgerId/transfer-from           - transferFrom
 * POST /api/v1/ledgers/:ledgerId/approve                 - approve
 * POST /api/v1/ledgers/:ledgerId/burn                    - burn
 * POST /api/v1/ledgers/:ledgerId/issue                   - issue
 * GET  /api/v1/ledgers/:ledgerId/snapshot                - Latest persisted snapshot
 *
 * Mutations run as the authenticated caller. Business failures
 * (insufficient balance, overflow) surface as 422.
 */

import { Hono } from "hono";
import { LedgerError } from "@tokenledger/ledger";
import type { LedgerResult } from "@tokenledger/ledger";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateLedgerSchema,
  TransferSchema,
  TransferFromSchema,
  ApproveSchema,
  BurnSchema,
  IssueSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requireCaller, requirePermission } from "../middleware/auth.js";
import type { LedgerRegistry } from "../services/ledger-registry.js";

/**
 * Throw the failure carried by a result so the error handler maps it.
 */
function unwrap(result: LedgerResult): void {
  if (!result.ok) {
    throw new LedgerError(result.error.code, result.error.message);
  }
}

export function createLedgerRoutes(registry: LedgerRegistry): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/ledgers - Create
  routes.post(
    "/",
    requirePermission("write"),
    requireCaller(),
    validateBody(CreateLedgerSchema),
    (c) => {
      const body = c.get("validatedBody");
      const service = registry.create(body.id, c.get("caller"), body.initialSupply);
      return c.json({ data: service.summary() }, 201);
    },
  );

  // GET /api/v1/ledgers/:ledgerId - Summary
  routes.get("/:ledgerId", requirePermission("read"), (c) => {
    const service = registry.get(c.req.param("ledgerId"));
    return c.json({ data: service.summary() });
  });

  // GET /api/v1/ledgers/:ledgerId/balances/:account
  routes.get("/:ledgerId/balances/:account", requirePermission("read"), (c) => {
    const service = registry.get(c.req.param("ledgerId"));
    const account = c.req.param("account");
    return c.json({
      data: { account, balance: service.balanceOf(account).toString() },
    });
  });

  // GET /api/v1/ledgers/:ledgerId/allowances/:owner/:spender
  routes.get(
    "/:ledgerId/allowances/:owner/:spender",
    requirePermission("read"),
    (c) => {
      const service = registry.get(c.req.param("ledgerId"));
      const owner = c.req.param("owner");
      const spender = c.req.param("spender");
      return c.json({
        data: { owner, spender, value: service.allowance(owner, spender).toString() },
      });
    },
  );

  // POST /api/v1/ledgers/:ledgerId/transfer
  routes.post(
    "/:ledgerId/transfer",
    requirePermission("write"),
    requireCaller(),
    validateBody(TransferSchema),
    (c) => {
      const service = registry.get(c.req.param("ledgerId"));
      const caller = c.get("caller");
      const { to, value } = c.get("validatedBody");

      unwrap(service.transfer(caller, to, value));

      return c.json({
        data: {
          from: caller,
          to,
          value: value.toString(),
          fromBalance: service.balanceOf(caller).toString(),
          toBalance: service.balanceOf(to).toString(),
        },
      });
    },
  );

  // POST /api/v1/ledgers/:ledgerId/transfer-from
  routes.post(
    "/:ledgerId/transfer-from",
    requirePermission("write"),
    requireCaller(),
    validateBody(TransferFromSchema),
    (c) => {
      const service = registry.get(c.req.param("ledgerId"));
      const caller = c.get("caller");
      const { from, value } = c.get("validatedBody");

      unwrap(service.transferFrom(caller, from, value));

      return c.json({
        data: {
          from,
          to: caller,
          value: value.toString(),
          fromBalance: service.balanceOf(from).toString(),
          toBalance: service.balanceOf(caller).toString(),
        },
      });
    },
  );

  // POST /api/v1/ledgers/:ledgerId/approve
  routes.post(
    "/:ledgerId/approve",
    requirePermission("write"),
    requireCaller(),
    validateBody(ApproveSchema),
    (c) => {
      const service = registry.get(c.req.param("ledgerId"));
      const caller = c.get("caller");
      const { spender, value } = c.get("validatedBody");

      service.approve(caller, spender, value);

      return c.json({
        data: { owner: caller, spender, value: value.toString() },
      });
    },
  );

  // POST /api/v1/ledgers/:ledgerId/burn
  routes.post(
    "/:ledgerId/burn",
    requirePermission("write"),
    requireCaller(),
    validateBody(BurnSchema),
    (c) => {
      const service = registry.get(c.req.param("ledgerId"));
      const caller = c.get("caller");
      const { value } = c.get("validatedBody");

      service.burn(caller, value);

      return c.json({
        data: {
          account: caller,
          value: value.toString(),
          balance: service.balanceOf(caller).toString(),
        },
      });
    },
  );

  // POST /api/v1/ledgers/:ledgerId/issue
  routes.post(
    "/:ledgerId/issue",
    requirePermission("write"),
    validateBody(IssueSchema),
    (c) => {
      const service = registry.get(c.req.param("ledgerId"));
      const { to, value } = c.get("validatedBody");

      unwrap(service.issue(to, value));

      return c.json({
        data: { to, value: value.toString(), balance: service.balanceOf(to).toString() },
      });
    },
  );

  // GET /api/v1/ledgers/:ledgerId/snapshot
  routes.get("/:ledgerId/snapshot", requirePermission("admin"), (c) => {
    const service = registry.get(c.req.param("ledgerId"));
    const snapshot = service.storedSnapshot();
    if (snapshot === undefined) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Ledger "${service.ledgerId}" has no persisted snapshot`,
      );
    }
    return c.json({ data: snapshot });
  });

  return routes;
}
