/**
 * Tests for ledger routes.
 *
 * Covers: initialize, list, get, health, issue, redeem, pause, resume,
 * transfers, valuation, balances, snapshot, events.
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  INITIALIZE_BODY,
  NOW,
  T0,
  asCaller,
  createLedger,
  createTestApp,
  jsonRequest,
} from "../setup.js";
import type { AppInstance } from "../../src/app.js";
import { hashLedgerSnapshot } from "../../src/services/state-hash.js";

interface ErrorBody {
  error: { code: string; message: string; details?: { issues: { path: string; message: string }[] } };
}

let instance: AppInstance;
let id: string;

beforeEach(async () => {
  instance = createTestApp();
  id = await createLedger(instance);
});

async function errorOf(res: Response): Promise<ErrorBody["error"]> {
  return ((await res.json()) as ErrorBody).error;
}

// =============================================================================
// POST /api/v1/ledgers — Initialize
// =============================================================================

describe("POST /api/v1/ledgers", () => {
  it("initializes a ledger and returns 201 with its view", async () => {
    const res = await instance.app.request(jsonRequest("/api/v1/ledgers", "POST", INITIALIZE_BODY));

    expect(res.status).toBe(201);
    const body = (await res.json()) as { data: Record<string, unknown> };
    expect(body.data).toEqual({
      ledgerId: expect.any(String),
      governanceAddress: "gov",
      paused: false,
      circulatingSupply: "10000",
      totalCollateral: "15000",
      entries: [
        { assetId: "bond-1", description: "treasury bond", value: "10000" },
        { assetId: "gold-1", description: "gold bar", value: "5000" },
      ],
      oracle: { latestValue: "15000", lastUpdated: T0 },
    });
  });

  it("accepts collateral as parallel columns", async () => {
    const { collateral: _collateral, ...rest } = INITIALIZE_BODY;
    const res = await instance.app.request(
      jsonRequest("/api/v1/ledgers", "POST", {
        ...rest,
        collateralColumns: {
          assetIds: ["bond-1", "gold-1"],
          descriptions: ["treasury bond", "gold bar"],
          values: ["10000", "5000"],
        },
      }),
    );

    expect(res.status).toBe(201);
    const body = (await res.json()) as { data: { totalCollateral: string } };
    expect(body.data.totalCollateral).toBe("15000");
  });

  it("rejects columns of different lengths with 400", async () => {
    const { collateral: _collateral, ...rest } = INITIALIZE_BODY;
    const res = await instance.app.request(
      jsonRequest("/api/v1/ledgers", "POST", {
        ...rest,
        collateralColumns: { assetIds: ["bond-1"], descriptions: [], values: ["15000"] },
      }),
    );

    expect(res.status).toBe(400);
    expect((await errorOf(res)).code).toBe("INVALID_COLLATERAL");
  });

  it("rejects both collateral forms at once", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/ledgers", "POST", {
        ...INITIALIZE_BODY,
        collateralColumns: { assetIds: [], descriptions: [], values: [] },
      }),
    );

    expect(res.status).toBe(400);
    const error = await errorOf(res);
    expect(error.code).toBe("VALIDATION_ERROR");
    expect(error.details?.issues[0]?.path).toBe("collateral");
  });

  it("returns 422 when collateral is one unit short", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/ledgers", "POST", {
        ...INITIALIZE_BODY,
        collateral: [{ assetId: "bond-1", description: "treasury bond", value: "14999" }],
      }),
    );

    expect(res.status).toBe(422);
    expect((await errorOf(res)).code).toBe("INSUFFICIENT_COLLATERAL");
    expect(instance.registry.size).toBe(1);
  });

  it("rejects amounts that are not u64 digit strings", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/ledgers", "POST", { ...INITIALIZE_BODY, initialSupply: "18446744073709551616" }),
    );

    expect(res.status).toBe(400);
    const error = await errorOf(res);
    expect(error.code).toBe("VALIDATION_ERROR");
    expect(error.details?.issues).toEqual([
      { path: "initialSupply", message: "Must be an unsigned 64-bit integer string" },
    ]);
  });

  it("rejects malformed JSON", async () => {
    const res = await instance.app.request(
      new Request("http://localhost/api/v1/ledgers", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{",
      }),
    );

    expect(res.status).toBe(400);
    expect(await errorOf(res)).toEqual({ code: "VALIDATION_ERROR", message: "Invalid JSON in request body" });
  });
});

// =============================================================================
// GET /api/v1/ledgers, /:id, /:id/health
// =============================================================================

describe("GET /api/v1/ledgers", () => {
  it("lists ledger ids", async () => {
    const res = await instance.app.request("/api/v1/ledgers");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: [id] });
  });

  it("returns one ledger", async () => {
    const res = await instance.app.request(`/api/v1/ledgers/${id}`);
    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { ledgerId: string; circulatingSupply: string } };
    expect(body.data.ledgerId).toBe(id);
    expect(body.data.circulatingSupply).toBe("10000");
  });

  it("returns 404 for unknown ledgers", async () => {
    const res = await instance.app.request("/api/v1/ledgers/nope");
    expect(res.status).toBe(404);
    expect(await errorOf(res)).toEqual({ code: "NOT_FOUND", message: "Ledger 'nope' not found" });
  });
});

describe("GET /api/v1/ledgers/:id/health", () => {
  it("reports collateralization", async () => {
    const res = await instance.app.request(`/api/v1/ledgers/${id}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: {
        healthy: true,
        totalCollateral: "15000",
        circulatingSupply: "10000",
        requiredCollateral: "15000",
        ratioPercent: "150",
        paused: false,
        oracle: { latestValue: "15000", lastUpdated: T0, ageMs: 86400000 },
        oracleStale: false,
      },
    });
  });

  it("flags a stale oracle past the configured age", async () => {
    const strict = createTestApp({ oracleMaxAgeMs: 1000 });
    const strictId = await createLedger(strict);
    const res = await strict.app.request(`/api/v1/ledgers/${strictId}/health`);
    const body = (await res.json()) as { data: { oracleStale: boolean } };
    expect(body.data.oracleStale).toBe(true);
  });

  it("treats an oracle exactly at the configured age as fresh", async () => {
    const atLimit = createTestApp({ oracleMaxAgeMs: 86_400_000 });
    const atLimitId = await createLedger(atLimit);
    const fresh = (await (await atLimit.app.request(`/api/v1/ledgers/${atLimitId}/health`)).json()) as {
      data: { oracleStale: boolean };
    };
    expect(fresh.data.oracleStale).toBe(false);

    const pastLimit = createTestApp({ oracleMaxAgeMs: 86_399_999 });
    const pastLimitId = await createLedger(pastLimit);
    const stale = (await (await pastLimit.app.request(`/api/v1/ledgers/${pastLimitId}/health`)).json()) as {
      data: { oracleStale: boolean };
    };
    expect(stale.data.oracleStale).toBe(true);
  });
});

// =============================================================================
// POST /api/v1/ledgers/:id/issue
// =============================================================================

describe("POST /api/v1/ledgers/:id/issue", () => {
  it("issues against exactly enough collateral", async () => {
    const res = await instance.app.request(
      jsonRequest(`/api/v1/ledgers/${id}/issue`, "POST", {
        additionalCollateralValue: "1500",
        amount: "1000",
        recipient: "bob",
      }),
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: {
        entry: { assetId: "pledge-2", description: "collateral pledge", value: "1500" },
        circulatingSupply: "11000",
        totalCollateral: "16500",
      },
    });
  });

  it("returns 422 one unit short", async () => {
    const res = await instance.app.request(
      jsonRequest(`/api/v1/ledgers/${id}/issue`, "POST", {
        additionalCollateralValue: "1499",
        amount: "1000",
        recipient: "bob",
      }),
    );

    expect(res.status).toBe(422);
    expect(await errorOf(res)).toEqual({
      code: "INSUFFICIENT_COLLATERAL",
      message: "Issuing 1000 needs 16500 collateral, only 16499 pledged",
    });
  });

  it("returns 409 for a reused asset id", async () => {
    const res = await instance.app.request(
      jsonRequest(`/api/v1/ledgers/${id}/issue`, "POST", {
        additionalCollateralValue: "1500",
        amount: "1000",
        recipient: "bob",
        assetId: "gold-1",
      }),
    );

    expect(res.status).toBe(409);
    expect((await errorOf(res)).code).toBe("DUPLICATE_ASSET_ID");
  });

  it("records the caller header as the event actor", async () => {
    await instance.app.request(
      asCaller("dave", `/api/v1/ledgers/${id}/issue`, {
        additionalCollateralValue: "1500",
        amount: "1000",
        recipient: "bob",
      }),
    );

    const [latest] = instance.auditLog.query({ ledgerId: id, limit: 1 });
    expect(latest?.action).toBe("units.issued");
    expect(latest?.actor).toBe("dave");
  });

  it("rejects negative amounts", async () => {
    const res = await instance.app.request(
      jsonRequest(`/api/v1/ledgers/${id}/issue`, "POST", {
        additionalCollateralValue: "1500",
        amount: "-1",
        recipient: "bob",
      }),
    );

    expect(res.status).toBe(400);
    expect((await errorOf(res)).details?.issues[0]?.path).toBe("amount");
  });

  it("returns 404 for unknown ledgers", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/ledgers/nope/issue", "POST", {
        additionalCollateralValue: "1",
        amount: "0",
        recipient: "bob",
      }),
    );
    expect(res.status).toBe(404);
  });
});

// =============================================================================
// POST /api/v1/ledgers/:id/redeem
// =============================================================================

describe("POST /api/v1/ledgers/:id/redeem", () => {
  it("requires a caller", async () => {
    const res = await instance.app.request(
      jsonRequest(`/api/v1/ledgers/${id}/redeem`, "POST", { burnAmount: "1", collateralValueReduction: "1" }),
    );

    expect(res.status).toBe(401);
    expect(await errorOf(res)).toEqual({ code: "UNAUTHORIZED", message: "Missing X-Caller-Address header" });
  });

  it("burns the caller's units and reduces the last entry", async () => {
    const res = await instance.app.request(
      asCaller("alice", `/api/v1/ledgers/${id}/redeem`, { burnAmount: "1000", collateralValueReduction: "1500" }),
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: {
        reducedEntry: { assetId: "gold-1", description: "gold bar", value: "3500" },
        circulatingSupply: "9000",
        totalCollateral: "13500",
        healthy: true,
      },
    });
  });

  it("succeeds even when it leaves the ledger under-collateralized", async () => {
    const res = await instance.app.request(
      asCaller("alice", `/api/v1/ledgers/${id}/redeem`, { burnAmount: "0", collateralValueReduction: "5000" }),
    );
    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { healthy: boolean } };
    expect(body.data.healthy).toBe(false);

    const health = await instance.app.request(`/api/v1/ledgers/${id}/health`);
    const report = (await health.json()) as { data: { healthy: boolean; ratioPercent: string } };
    expect(report.data.healthy).toBe(false);
    expect(report.data.ratioPercent).toBe("100");
  });

  it("returns 422 when the caller holds too little", async () => {
    const res = await instance.app.request(
      asCaller("bob", `/api/v1/ledgers/${id}/redeem`, { burnAmount: "1", collateralValueReduction: "0" }),
    );
    expect(res.status).toBe(422);
    expect((await errorOf(res)).code).toBe("INSUFFICIENT_BALANCE");
  });

  it("returns 422 for an excessive reduction", async () => {
    const res = await instance.app.request(
      asCaller("alice", `/api/v1/ledgers/${id}/redeem`, { burnAmount: "1", collateralValueReduction: "5001" }),
    );
    expect(res.status).toBe(422);
    expect((await errorOf(res)).code).toBe("EXCESSIVE_REDUCTION");
  });
});

// =============================================================================
// POST /api/v1/ledgers/:id/pause, /resume
// =============================================================================

describe("pause / resume", () => {
  it("rejects non-governance callers with 403", async () => {
    const res = await instance.app.request(asCaller("alice", `/api/v1/ledgers/${id}/pause`));
    expect(res.status).toBe(403);
    expect(await errorOf(res)).toEqual({ code: "UNAUTHORIZED", message: "'alice' is not authorized to pause" });
  });

  it("halts issuance and redemption while paused", async () => {
    const paused = await instance.app.request(asCaller("gov", `/api/v1/ledgers/${id}/pause`));
    expect(paused.status).toBe(200);
    expect(((await paused.json()) as { data: { paused: boolean } }).data.paused).toBe(true);
    const before = instance.registry.get(id)?.snapshot();

    const issue = await instance.app.request(
      jsonRequest(`/api/v1/ledgers/${id}/issue`, "POST", {
        additionalCollateralValue: "1500",
        amount: "1000",
        recipient: "bob",
      }),
    );
    expect(issue.status).toBe(423);
    expect((await errorOf(issue)).code).toBe("PAUSED");

    const redeem = await instance.app.request(
      asCaller("alice", `/api/v1/ledgers/${id}/redeem`, { burnAmount: "1", collateralValueReduction: "1" }),
    );
    expect(redeem.status).toBe(423);

    const ledger = instance.registry.get(id);
    expect(ledger?.snapshot()).toEqual(before);
    expect(ledger?.paused).toBe(true);
    expect(ledger?.circulatingSupply).toBe(10000n);
  });

  it("resumes", async () => {
    await instance.app.request(asCaller("gov", `/api/v1/ledgers/${id}/pause`));
    const res = await instance.app.request(asCaller("gov", `/api/v1/ledgers/${id}/resume`));
    expect(res.status).toBe(200);
    expect(((await res.json()) as { data: { paused: boolean } }).data.paused).toBe(false);
  });

  it("reads the caller from a configured header", async () => {
    const custom = createTestApp({ callerHeader: "X-Actor" });
    const customId = await createLedger(custom);
    const res = await custom.app.request(
      jsonRequest(`/api/v1/ledgers/${customId}/pause`, "POST", undefined, { "X-Actor": "gov" }),
    );
    expect(res.status).toBe(200);
  });
});

// =============================================================================
// Transfers and balances
// =============================================================================

describe("POST /api/v1/ledgers/:id/transfers", () => {
  it("moves the caller's units", async () => {
    const res = await instance.app.request(
      asCaller("alice", `/api/v1/ledgers/${id}/transfers`, { to: "bob", amount: "2500" }),
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: { from: "alice", to: "bob", amount: "2500", fromBalance: "7500", toBalance: "2500" },
    });

    const balance = await instance.app.request(`/api/v1/ledgers/${id}/balances/bob`);
    expect(await balance.json()).toEqual({ data: { address: "bob", balance: "2500" } });
  });

  it("returns 422 on overdraft", async () => {
    const res = await instance.app.request(
      asCaller("bob", `/api/v1/ledgers/${id}/transfers`, { to: "alice", amount: "1" }),
    );
    expect(res.status).toBe(422);
    expect((await errorOf(res)).code).toBe("INSUFFICIENT_BALANCE");
  });

  it("works while paused", async () => {
    await instance.app.request(asCaller("gov", `/api/v1/ledgers/${id}/pause`));
    const res = await instance.app.request(
      asCaller("alice", `/api/v1/ledgers/${id}/transfers`, { to: "bob", amount: "1" }),
    );
    expect(res.status).toBe(200);
  });
});

// =============================================================================
// POST /api/v1/ledgers/:id/valuation
// =============================================================================

describe("POST /api/v1/ledgers/:id/valuation", () => {
  it("records a governance valuation", async () => {
    const res = await instance.app.request(
      asCaller("gov", `/api/v1/ledgers/${id}/valuation`, { value: "12000", timestamp: NOW }),
    );
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: { latestValue: "12000", lastUpdated: NOW } });
  });

  it("stamps the ledger clock when no timestamp is given", async () => {
    const res = await instance.app.request(asCaller("gov", `/api/v1/ledgers/${id}/valuation`, { value: "1" }));
    const body = (await res.json()) as { data: { lastUpdated: string } };
    expect(body.data.lastUpdated).toBe(NOW);
  });

  it("rejects other callers", async () => {
    const res = await instance.app.request(asCaller("alice", `/api/v1/ledgers/${id}/valuation`, { value: "1" }));
    expect(res.status).toBe(403);
  });

  it("rejects a malformed timestamp", async () => {
    const res = await instance.app.request(
      asCaller("gov", `/api/v1/ledgers/${id}/valuation`, { value: "1", timestamp: "yesterday" }),
    );
    expect(res.status).toBe(400);
    expect((await errorOf(res)).code).toBe("VALIDATION_ERROR");
  });
});

// =============================================================================
// Snapshot and events
// =============================================================================

describe("GET /api/v1/ledgers/:id/snapshot", () => {
  it("returns the snapshot and its state hash", async () => {
    const res = await instance.app.request(`/api/v1/ledgers/${id}/snapshot`);
    expect(res.status).toBe(200);

    const body = (await res.json()) as {
      data: { snapshot: { pool: { circulatingSupply: string }; sequence: number }; stateHash: string };
    };
    expect(body.data.snapshot.pool.circulatingSupply).toBe("10000");
    expect(body.data.snapshot.sequence).toBe(1);

    const ledger = instance.registry.get(id);
    expect(ledger).toBeDefined();
    if (ledger !== undefined) {
      expect(body.data.stateHash).toBe(hashLedgerSnapshot(ledger.snapshot()));
    }
  });
});

describe("GET /api/v1/ledgers/:id/events", () => {
  beforeEach(async () => {
    await instance.app.request(
      jsonRequest(`/api/v1/ledgers/${id}/issue`, "POST", {
        additionalCollateralValue: "1500",
        amount: "1000",
        recipient: "bob",
      }),
    );
    await instance.app.request(asCaller("bob", `/api/v1/ledgers/${id}/transfers`, { to: "carol", amount: "10" }));
  });

  it("lists events newest-first", async () => {
    const res = await instance.app.request(`/api/v1/ledgers/${id}/events`);
    const body = (await res.json()) as { data: { action: string; eventId: string }[] };
    expect(body.data.map((e) => e.action)).toEqual([
      "units.transferred",
      "units.issued",
      "ledger.initialized",
    ]);
    expect(body.data.map((e) => e.eventId)).toEqual([`${id}:3`, `${id}:2`, `${id}:1`]);
  });

  it("filters by type and limit", async () => {
    const byType = await instance.app.request(`/api/v1/ledgers/${id}/events?type=units.issued`);
    const typed = (await byType.json()) as { data: { action: string; detail: { amount: string } }[] };
    expect(typed.data).toHaveLength(1);
    expect(typed.data[0]?.detail.amount).toBe("1000");

    const limited = await instance.app.request(`/api/v1/ledgers/${id}/events?limit=1`);
    expect(((await limited.json()) as { data: unknown[] }).data).toHaveLength(1);
  });

  it("rejects unknown event types", async () => {
    const res = await instance.app.request(`/api/v1/ledgers/${id}/events?type=units.minted`);
    expect(res.status).toBe(400);
  });

  it("records nothing for failed calls", async () => {
    await instance.app.request(asCaller("alice", `/api/v1/ledgers/${id}/pause`));
    const res = await instance.app.request(`/api/v1/ledgers/${id}/events`);
    expect(((await res.json()) as { data: unknown[] }).data).toHaveLength(3);
  });
});
