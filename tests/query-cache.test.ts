import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { DashboardSession, SessionRegistry } from "../server/dashboard-session";
import { StructuredLogger } from "../server/observability/logger";
import { QueryCache, serializeQueryKey, type QueryKey } from "../server/query-cache";
import { FakeErp } from "./helpers/fake-erp";

const silentLogger = new StructuredLogger({}, () => {});

const baseKey: QueryKey = {
  companies: ["Acme"],
  start: "2024-01-01",
  end: "2024-01-31",
  includeDrafts: false,
  identity: "alice",
};

describe("QueryCache", () => {
  it("serializes the whole parameter tuple", () => {
    assert.equal(serializeQueryKey(baseKey), '[["Acme"],"2024-01-01","2024-01-31",false,"alice"]');
  });

  it("loads once per key and shares the result", async () => {
    const cache = new QueryCache<string[]>("test");
    let loads = 0;
    const loader = async () => {
      loads += 1;
      return ["row"];
    };

    const [first, second] = await Promise.all([cache.getOrLoad(baseKey, loader), cache.getOrLoad(baseKey, loader)]);

    assert.equal(loads, 1);
    assert.equal(first, second);
    assert.equal(cache.size, 1);
  });

  it("treats any differing parameter as a different entry", async () => {
    const cache = new QueryCache<number>("test");
    let loads = 0;
    const loader = async () => {
      loads += 1;
      return loads;
    };

    await cache.getOrLoad(baseKey, loader);
    await cache.getOrLoad({ ...baseKey, includeDrafts: true }, loader);
    await cache.getOrLoad({ ...baseKey, identity: "bob" }, loader);
    await cache.getOrLoad({ ...baseKey, companies: ["Acme", "Beta"] }, loader);

    assert.equal(loads, 4);
    assert.equal(cache.size, 4);
  });

  it("evicts a failed load so the next call retries", async () => {
    const cache = new QueryCache<number>("test");

    await assert.rejects(cache.getOrLoad(baseKey, async () => {
      throw new Error("ERP down");
    }), /ERP down/);
    assert.equal(cache.has(baseKey), false);

    const value = await cache.getOrLoad(baseKey, async () => 42);
    assert.equal(value, 42);
    assert.equal(cache.has(baseKey), true);
  });
});

describe("DashboardSession", () => {
  const filters = { companies: ["Acme"], start: "2024-01-01", end: "2024-01-31", includeDrafts: false };

  it("flushes every cache only when the filters change", async () => {
    const session = new DashboardSession("alice", new FakeErp(), silentLogger);

    assert.equal(session.applyFilters(filters), false);
    await session.caches.customers.getOrLoad({ ...baseKey, companies: [] }, async () => []);
    await session.caches.salesInvoices.getOrLoad(baseKey, async () => []);

    assert.equal(session.applyFilters({ ...filters }), false);
    assert.equal(session.caches.salesInvoices.size, 1);

    assert.equal(session.applyFilters({ ...filters, end: "2024-02-29" }), true);
    assert.equal(session.caches.salesInvoices.size, 0);
    assert.equal(session.caches.customers.size, 0);
  });

  it("logs out of the ERP and drops cached data on close", async () => {
    const erp = new FakeErp();
    const session = new DashboardSession("alice", erp, silentLogger);
    await session.caches.companies.getOrLoad(baseKey, async () => []);

    await session.close();

    assert.equal(erp.logoutCount, 1);
    assert.equal(session.caches.companies.size, 0);
    assert.equal(session.identity, "alice");
  });
});

describe("SessionRegistry", () => {
  it("discards sessions without logging out of the ERP", async () => {
    const erp = new FakeErp();
    const registry = new SessionRegistry();
    const session = new DashboardSession("alice", erp, silentLogger);
    registry.set("sid-1", session);
    await session.caches.companies.getOrLoad(baseKey, async () => []);

    registry.discard("sid-1");

    assert.equal(registry.get("sid-1"), undefined);
    assert.equal(registry.size, 0);
    assert.equal(session.caches.companies.size, 0);
    assert.equal(erp.logoutCount, 0);
  });

  it("hands a session back on take without logging it out", async () => {
    const erp = new FakeErp();
    const registry = new SessionRegistry();
    const session = new DashboardSession("alice", erp, silentLogger);
    registry.set("sid-1", session);

    assert.equal(registry.take("sid-1"), session);
    assert.equal(registry.take("sid-1"), undefined);
    assert.equal(registry.size, 0);
    assert.equal(erp.logoutCount, 0);
  });
});
