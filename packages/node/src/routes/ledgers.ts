/**
 * Ledger routes.
 *
 * POST   /api/v1/ledgers                          — Initialize a ledger
 * GET    /api/v1/ledgers                          — List ledger ids
 * GET    /api/v1/ledgers/:id                      — Ledger view
 * GET    /api/v1/ledgers/:id/health               — Collateralization report
 * POST   /api/v1/ledgers/:id/issue                — Pledge collateral, create units
 * POST   /api/v1/ledgers/:id/redeem               — Burn the caller's units
 * POST   /api/v1/ledgers/:id/pause                — Governance halt
 * POST   /api/v1/ledgers/:id/resume               — Governance release
 * POST   /api/v1/ledgers/:id/transfers            — Move the caller's units
 * POST   /api/v1/ledgers/:id/valuation            — Governance oracle update
 * GET    /api/v1/ledgers/:id/balances/:address    — Holder balance
 * GET    /api/v1/ledgers/:id/snapshot             — Snapshot with state hash
 * GET    /api/v1/ledgers/:id/events               — Audit trail
 *
 * Routes that act on behalf of someone read the caller from the
 * configured caller header. Domain failures are thrown as LedgerError
 * and mapped by the global error handler.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  InitializeLedgerSchema,
  IssueSchema,
  ListEventsQuerySchema,
  RedeemSchema,
  TransferSchema,
  ValuationSchema,
} from "../types/dto.js";
import { validateBody, formatZodErrors } from "../middleware/validate.js";
import { DEFAULT_CALLER_HEADER, requireCaller } from "../middleware/caller.js";
import { createErrorEnvelope } from "../types/error.js";
import {
  toHealthView,
  toIssueView,
  toLedgerView,
  toRedeemView,
} from "../types/views.js";
import type { AuditLog } from "../services/audit-log.js";
import type { LedgerRegistry } from "../services/ledger-registry.js";
import { hashLedgerSnapshot } from "../services/state-hash.js";

export interface LedgerRouteDeps {
  readonly registry: LedgerRegistry;
  readonly auditLog: AuditLog;
  readonly oracleMaxAgeMs: number;
  readonly callerHeader?: string | undefined;
}

function notFound<E extends AppEnv>(c: Context<E>, id: string): Response {
  return c.json(createErrorEnvelope("NOT_FOUND", `Ledger '${id}' not found`), 404);
}

export function createLedgerRoutes(deps: LedgerRouteDeps): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const { registry, auditLog, oracleMaxAgeMs } = deps;
  const callerHeader = deps.callerHeader ?? DEFAULT_CALLER_HEADER;
  const caller = requireCaller(callerHeader);

  // POST /api/v1/ledgers — Initialize
  routes.post("/", validateBody(InitializeLedgerSchema), (c) => {
    const { collateral, collateralColumns, ...params } = c.get("validatedBody");

    const { ledgerId, ledger } =
      collateralColumns !== undefined
        ? registry.initializeFromColumns(collateralColumns, params)
        : registry.initialize({ ...params, collateral: collateral ?? [] });

    return c.json({ data: toLedgerView(ledgerId, ledger) }, 201);
  });

  // GET /api/v1/ledgers — List
  routes.get("/", (c) => {
    return c.json({ data: registry.ledgerIds() });
  });

  // GET /api/v1/ledgers/:id — Get one
  routes.get("/:id", (c) => {
    const id = c.req.param("id");
    const ledger = registry.get(id);
    if (ledger === undefined) return notFound(c, id);

    return c.json({ data: toLedgerView(id, ledger) });
  });

  // GET /api/v1/ledgers/:id/health
  routes.get("/:id/health", (c) => {
    const id = c.req.param("id");
    const ledger = registry.get(id);
    if (ledger === undefined) return notFound(c, id);

    const view = toHealthView(ledger.healthReport(), ledger.isOracleStale(oracleMaxAgeMs));
    return c.json({ data: view });
  });

  // POST /api/v1/ledgers/:id/issue
  routes.post("/:id/issue", validateBody(IssueSchema), (c) => {
    const id = c.req.param("id");
    const ledger = registry.get(id);
    if (ledger === undefined) return notFound(c, id);

    const body = c.get("validatedBody");
    const result = ledger.issue(body.additionalCollateralValue, body.amount, body.recipient, {
      assetId: body.assetId,
      description: body.description,
      // Recorded as the event actor when present; issuance is not restricted.
      caller: c.req.header(callerHeader),
    });

    return c.json({ data: toIssueView(result) });
  });

  // POST /api/v1/ledgers/:id/redeem
  routes.post("/:id/redeem", caller, validateBody(RedeemSchema), (c) => {
    const id = c.req.param("id");
    const ledger = registry.get(id);
    if (ledger === undefined) return notFound(c, id);

    const body = c.get("validatedBody");
    const result = ledger.redeem(c.get("caller"), body.burnAmount, body.collateralValueReduction);

    return c.json({ data: toRedeemView(result) });
  });

  // POST /api/v1/ledgers/:id/pause
  routes.post("/:id/pause", caller, (c) => {
    const id = c.req.param("id");
    const ledger = registry.get(id);
    if (ledger === undefined) return notFound(c, id);

    ledger.pause(c.get("caller"));
    return c.json({ data: toLedgerView(id, ledger) });
  });

  // POST /api/v1/ledgers/:id/resume
  routes.post("/:id/resume", caller, (c) => {
    const id = c.req.param("id");
    const ledger = registry.get(id);
    if (ledger === undefined) return notFound(c, id);

    ledger.resume(c.get("caller"));
    return c.json({ data: toLedgerView(id, ledger) });
  });

  // POST /api/v1/ledgers/:id/transfers
  routes.post("/:id/transfers", caller, validateBody(TransferSchema), (c) => {
    const id = c.req.param("id");
    const ledger = registry.get(id);
    if (ledger === undefined) return notFound(c, id);

    const from = c.get("caller");
    const body = c.get("validatedBody");
    ledger.transferUnits(from, body.to, body.amount);

    return c.json({
      data: {
        from,
        to: body.to,
        amount: body.amount.toString(),
        fromBalance: ledger.balanceOf(from).toString(),
        toBalance: ledger.balanceOf(body.to).toString(),
      },
    });
  });

  // POST /api/v1/ledgers/:id/valuation
  routes.post("/:id/valuation", caller, validateBody(ValuationSchema), (c) => {
    const id = c.req.param("id");
    const ledger = registry.get(id);
    if (ledger === undefined) return notFound(c, id);

    const body = c.get("validatedBody");
    const reading = ledger.updateValuation(c.get("caller"), body.value, body.timestamp);

    return c.json({
      data: { latestValue: reading.latestValue.toString(), lastUpdated: reading.lastUpdated },
    });
  });

  // GET /api/v1/ledgers/:id/balances/:address
  routes.get("/:id/balances/:address", (c) => {
    const id = c.req.param("id");
    const ledger = registry.get(id);
    if (ledger === undefined) return notFound(c, id);

    const address = c.req.param("address");
    return c.json({ data: { address, balance: ledger.balanceOf(address).toString() } });
  });

  // GET /api/v1/ledgers/:id/snapshot
  routes.get("/:id/snapshot", (c) => {
    const id = c.req.param("id");
    const ledger = registry.get(id);
    if (ledger === undefined) return notFound(c, id);

    const snapshot = ledger.snapshot();
    return c.json({ data: { snapshot, stateHash: hashLedgerSnapshot(snapshot) } });
  });

  // GET /api/v1/ledgers/:id/events
  routes.get("/:id/events", (c) => {
    const id = c.req.param("id");
    if (!registry.has(id)) return notFound(c, id);

    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const { type, limit } = queryResult.data;
    return c.json({ data: auditLog.query({ ledgerId: id, action: type, limit }) });
  });

  return routes;
}
