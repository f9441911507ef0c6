import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import sqlite3 from "sqlite3";
import { SqliteStore } from "./sqlite.js";
import { buildAssignment, buildHouse, buildWorker } from "../core/engine.js";
import { ConstraintError, NotFoundError } from "../core/errors.js";

describe("SqliteStore", () => {
  let store: SqliteStore;

  beforeEach(async () => {
    store = new SqliteStore(":memory:");
    await store.init();
  });

  afterEach(async () => {
    await store.close();
  });

  it("is safe to initialise twice", async () => {
    await store.init();
    assert.deepStrictEqual(await store.listWorkers(), []);
  });

  it("creates, reads, updates and lists workers by name", async () => {
    const zoe = buildWorker({ name: "zoe", email: "zoe@example.com" });
    const adam = buildWorker({ name: "Adam", email: "adam@example.com", phone: "555-0100" });
    await store.createWorker(zoe);
    await store.createWorker(adam);

    assert.deepStrictEqual((await store.listWorkers()).map(w => w.name), ["Adam", "zoe"]);
    assert.deepStrictEqual(await store.getWorker(adam.id), adam);

    await store.updateWorker({ ...zoe, email: "zoe@example.org" });
    assert.strictEqual((await store.getWorker(zoe.id))?.email, "zoe@example.org");
  });

  it("throws NotFoundError when updating or deleting a missing id", async () => {
    const ghost = buildWorker({ name: "Ghost", email: "ghost@example.com" });
    await assert.rejects(store.updateWorker(ghost), NotFoundError);
    await assert.rejects(store.deleteWorker("nope"), NotFoundError);
    await assert.rejects(store.updateHouse(buildHouse({ name: "Nowhere" })), NotFoundError);
    await assert.rejects(store.deleteHouse("nope"), NotFoundError);
    await assert.rejects(
      store.updateAssignmentStatus("nope", "pending", { status: "sent", sentAt: "2024-01-01T00:00:00.000Z", failureReason: null }),
      NotFoundError
    );
  });

  it("deletes a house with no history", async () => {
    const h = buildHouse({ name: "Elm Cottage" });
    await store.createHouse(h);
    await store.deleteHouse(h.id);
    assert.strictEqual(await store.getHouse(h.id), null);
  });

  it("blocks deleting a house or worker that has assignment history", async () => {
    const w = buildWorker({ name: "Ana", email: "ana@example.com" });
    const h = buildHouse({ name: "Elm Cottage" });
    await store.createWorker(w);
    await store.createHouse(h);
    await store.insertAssignment(buildAssignment({ workerId: w.id, houseId: h.id, date: "2024-05-03", quantity: 2 }));

    await assert.rejects(store.deleteHouse(h.id), ConstraintError);
    await assert.rejects(store.deleteWorker(w.id), ConstraintError);
    assert.ok(await store.getHouse(h.id));
    assert.ok(await store.getWorker(w.id));
  });

  it("filters houses by a case-insensitive name search", async () => {
    await store.createHouse(buildHouse({ name: "Birch Lodge" }));
    await store.createHouse(buildHouse({ name: "Elm Cottage" }));
    await store.createHouse(buildHouse({ name: "Old Birchwood" }));

    const found = await store.listHouses({ search: "BIRCH" });
    assert.deepStrictEqual(found.map(h => h.name), ["Birch Lodge", "Old Birchwood"]);
  });

  it("reports only pending and sent assignments as taken", async () => {
    const w = buildWorker({ name: "Ana", email: "ana@example.com" });
    const [h1, h2, h3] = [buildHouse({ name: "A" }), buildHouse({ name: "B" }), buildHouse({ name: "C" })];
    await store.createWorker(w);
    for (const h of [h1, h2, h3]) await store.createHouse(h);

    const sent = buildAssignment({ workerId: w.id, houseId: h1.id, date: "2024-05-03", quantity: 1 });
    const failed = buildAssignment({ workerId: w.id, houseId: h2.id, date: "2024-05-03", quantity: 1 });
    const otherDay = buildAssignment({ workerId: w.id, houseId: h3.id, date: "2024-05-04", quantity: 1 });
    for (const a of [sent, failed, otherDay]) await store.insertAssignment(a);
    await store.updateAssignmentStatus(sent.id, "pending", { status: "sent", sentAt: "2024-05-02T09:00:00.000Z", failureReason: null });
    await store.updateAssignmentStatus(failed.id, "pending", { status: "failed", sentAt: null, failureReason: "timeout" });

    assert.deepStrictEqual([...await store.assignedHouseIds("2024-05-03")], [h1.id]);
  });

  it("changes a status only while the stored one matches", async () => {
    const w = buildWorker({ name: "Ana", email: "ana@example.com" });
    const h = buildHouse({ name: "Birch Lodge" });
    await store.createWorker(w);
    await store.createHouse(h);
    const a = buildAssignment({ workerId: w.id, houseId: h.id, date: "2024-05-03", quantity: 1 });
    await store.insertAssignment(a);
    await store.updateAssignmentStatus(a.id, "pending", { status: "sent", sentAt: "2024-05-02T09:00:00.000Z", failureReason: null });

    await assert.rejects(
      store.updateAssignmentStatus(a.id, "pending", { status: "failed", sentAt: null, failureReason: "timeout" }),
      (e: unknown) => e instanceof ConstraintError && e.message === `assignment ${a.id} is sent, not pending`
    );
    const stored = await store.getAssignment(a.id);
    assert.strictEqual(stored?.status, "sent");
    assert.strictEqual(stored?.sentAt, "2024-05-02T09:00:00.000Z");
  });

  it("inserts a batch as a whole or not at all", async () => {
    const w = buildWorker({ name: "Ana", email: "ana@example.com" });
    const h = buildHouse({ name: "Birch Lodge" });
    await store.createWorker(w);
    await store.createHouse(h);

    const batch = [
      buildAssignment({ workerId: w.id, houseId: h.id, date: "2024-05-03", quantity: 1 }),
      buildAssignment({ workerId: w.id, houseId: "gone", date: "2024-05-03", quantity: 2 })
    ];
    await assert.rejects(
      store.insertAssignments(batch),
      (e: unknown) => e instanceof NotFoundError && e.entity === "house" && e.id === "gone"
    );
    assert.deepStrictEqual(await store.queryAssignments({}), []);

    await store.insertAssignments([batch[0]]);
    assert.strictEqual((await store.queryAssignments({})).length, 1);
  });

  describe("queryAssignments", () => {
    let ana: ReturnType<typeof buildWorker>;
    let ben: ReturnType<typeof buildWorker>;
    let birch: ReturnType<typeof buildHouse>;
    let elm: ReturnType<typeof buildHouse>;

    beforeEach(async () => {
      ana = buildWorker({ name: "Ana", email: "ana@example.com" });
      ben = buildWorker({ name: "Ben", email: "ben@example.com" });
      birch = buildHouse({ name: "Birch Lodge" });
      elm = buildHouse({ name: "Elm Cottage" });
      await store.createWorker(ana);
      await store.createWorker(ben);
      await store.createHouse(birch);
      await store.createHouse(elm);

      await store.insertAssignment(buildAssignment({ workerId: ana.id, houseId: birch.id, date: "2024-05-01", quantity: 1, comment: "first" }));
      await store.insertAssignment(buildAssignment({ workerId: ben.id, houseId: elm.id, date: "2024-05-03", quantity: 2, comment: "Roof Leak reported" }));
      await store.insertAssignment(buildAssignment({ workerId: ana.id, houseId: birch.id, date: "2024-05-03", quantity: 3 }));
      await store.insertAssignment(buildAssignment({ workerId: ben.id, houseId: birch.id, date: "2024-05-02", quantity: 4, comment: "LEAKY tap" }));
    });

    it("orders by date descending, then newest first within a day", async () => {
      const rows = await store.queryAssignments({});
      assert.deepStrictEqual(rows.map(r => [r.date, r.quantity]), [
        ["2024-05-03", 3],
        ["2024-05-03", 2],
        ["2024-05-02", 4],
        ["2024-05-01", 1]
      ]);
      assert.strictEqual(rows[0].workerName, "Ana");
      assert.strictEqual(rows[0].houseName, "Birch Lodge");
      assert.strictEqual(rows[1].workerEmail, "ben@example.com");
    });

    it("combines worker, house and inclusive date range filters", async () => {
      const rows = await store.queryAssignments({ houseId: birch.id, dateFrom: "2024-05-02", dateTo: "2024-05-03" });
      assert.deepStrictEqual(rows.map(r => r.quantity), [3, 4]);

      const anaRows = await store.queryAssignments({ workerId: ana.id });
      assert.deepStrictEqual(anaRows.map(r => r.quantity), [3, 1]);
    });

    it("matches comment text regardless of case", async () => {
      const rows = await store.queryAssignments({ text: "leak" });
      assert.deepStrictEqual(rows.map(r => r.comment), ["Roof Leak reported", "LEAKY tap"]);
    });

    it("filters by status", async () => {
      assert.strictEqual((await store.queryAssignments({ status: "pending" })).length, 4);
      assert.strictEqual((await store.queryAssignments({ status: "sent" })).length, 0);
    });
  });
});

describe("SqliteStore schema migration", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "assign-store-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function exec(db: sqlite3.Database, sql: string) {
    return new Promise<void>((resolve, reject) => db.exec(sql, (err) => (err ? reject(err) : resolve())));
  }

  it("adds columns missing from an older database file", async () => {
    const dbPath = path.join(dir, "old.sqlite");
    const old = new sqlite3.Database(dbPath);
    await exec(old, `
      create table workers (id text primary key, name text not null, email text not null, createdAt text not null);
      create table houses (id text primary key, name text not null, createdAt text not null);
      create table assignments (
        id text primary key, workerId text not null, houseId text not null, date text not null,
        quantity integer not null, comment text, status text not null, createdAt text not null
      );
      insert into workers values ('w1', 'Ana', 'ana@example.com', '2023-01-01T00:00:00.000Z');
    `);
    await new Promise<void>((resolve, reject) => old.close((err) => (err ? reject(err) : resolve())));

    const store = new SqliteStore(dbPath);
    await store.init();
    try {
      const w = await store.getWorker("w1");
      assert.deepStrictEqual(w, { id: "w1", name: "Ana", email: "ana@example.com", phone: undefined, createdAt: "2023-01-01T00:00:00.000Z" });

      const h = buildHouse({ name: "Birch Lodge", comment: "blue door" });
      await store.createHouse(h);
      const a = buildAssignment({ workerId: "w1", houseId: h.id, date: "2024-05-03", quantity: 1 });
      await store.insertAssignment(a);
      await store.updateAssignmentStatus(a.id, "pending", { status: "failed", sentAt: null, failureReason: "auth" });

      assert.strictEqual((await store.getHouse(h.id))?.comment, "blue door");
      assert.strictEqual((await store.getAssignment(a.id))?.failureReason, "auth");
    } finally {
      await store.close();
    }
  });

  it("creates the directory of a new database file", async () => {
    const dbPath = path.join(dir, "nested", "deeper", "db.sqlite");
    const store = new SqliteStore(dbPath);
    await store.init();
    await store.close();
    assert.ok(fs.existsSync(dbPath));
  });
});
