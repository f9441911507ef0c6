import fs from "node:fs";
import path from "node:path";
import sqlite3 from "sqlite3";
import { Store, StatusPatch } from "./store.js";
import { Assignment, AssignmentStatus, HistoryEntry, HistoryFilters, House, Worker } from "../types/contracts.js";
import { ConstraintError, NotFoundError } from "../core/errors.js";

type Param = string | number | null;

function run(db: sqlite3.Database, sql: string, params: Param[] = []) {
  return new Promise<sqlite3.RunResult>((resolve, reject) => {
    db.run(sql, params, function (this: sqlite3.RunResult, err: Error | null) {
      if (err) reject(err);
      else resolve(this);
    });
  });
}
function get<T>(db: sqlite3.Database, sql: string, params: Param[] = []) {
  return new Promise<T | undefined>((resolve, reject) => {
    db.get(sql, params, (err, row) => (err ? reject(err) : resolve(row as T | undefined)));
  });
}
function all<T>(db: sqlite3.Database, sql: string, params: Param[] = []) {
  return new Promise<T[]>((resolve, reject) => {
    db.all(sql, params, (err, rows) => (err ? reject(err) : resolve(rows as T[])));
  });
}

type WorkerRow = { id: string; name: string; email: string; phone: string | null; createdAt: string };
type HouseRow = { id: string; name: string; comment: string | null; createdAt: string };
type AssignmentRow = {
  id: string;
  workerId: string;
  houseId: string;
  date: string;
  quantity: number;
  comment: string | null;
  status: AssignmentStatus;
  createdAt: string;
  sentAt: string | null;
  failureReason: string | null;
};
type HistoryRow = AssignmentRow & { workerName: string; workerEmail: string; houseName: string };

// Columns introduced after the first release; added in place when an older file is opened.
const LATER_COLUMNS: Record<string, Array<[string, string]>> = {
  workers: [["phone", "text"]],
  houses: [["comment", "text"]],
  assignments: [["sentAt", "text"], ["failureReason", "text"]]
};

export class SqliteStore implements Store {
  private db: sqlite3.Database | null = null;

  constructor(private dbPath: string) {}

  private conn(): sqlite3.Database {
    if (!this.db) throw new Error("SqliteStore used before init()");
    return this.db;
  }

  async init(): Promise<void> {
    const db = this.db ?? await this.open();
    this.db = db;

    await run(db, `pragma foreign_keys = on;`);
    if (this.dbPath !== ":memory:") await run(db, `pragma journal_mode = wal;`);

    await run(db, `
      create table if not exists workers (
        id text primary key,
        name text not null,
        email text not null,
        phone text,
        createdAt text not null
      );
    `);
    await run(db, `
      create table if not exists houses (
        id text primary key,
        name text not null,
        comment text,
        createdAt text not null
      );
    `);
    await run(db, `
      create table if not exists assignments (
        id text primary key,
        workerId text not null references workers(id),
        houseId text not null references houses(id),
        date text not null,
        quantity integer not null check (quantity >= 1),
        comment text,
        status text not null,
        createdAt text not null,
        sentAt text,
        failureReason text
      );
    `);
    await this.migrate(db);

    await run(db, `create index if not exists idx_assignments_date_house on assignments(date, houseId);`);
    await run(db, `create index if not exists idx_assignments_worker on assignments(workerId);`);
  }

  private open(): Promise<sqlite3.Database> {
    if (this.dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(path.resolve(this.dbPath)), { recursive: true });
    }
    return new Promise<sqlite3.Database>((resolve, reject) => {
      const db = new sqlite3.Database(this.dbPath, (err) => (err ? reject(err) : resolve(db)));
    });
  }

  private async migrate(db: sqlite3.Database) {
    for (const [table, columns] of Object.entries(LATER_COLUMNS)) {
      const info = await all<{ name: string }>(db, `pragma table_info(${table})`);
      const have = new Set(info.map(c => c.name));
      for (const [name, type] of columns) {
        if (!have.has(name)) await run(db, `alter table ${table} add column ${name} ${type}`);
      }
    }
  }

  async close(): Promise<void> {
    const db = this.db;
    if (!db) return;
    this.db = null;
    await new Promise<void>((resolve, reject) => db.close((err) => (err ? reject(err) : resolve())));
  }

  // workers

  async createWorker(w: Worker): Promise<void> {
    await run(this.conn(), `insert into workers (id, name, email, phone, createdAt) values (?,?,?,?,?)`,
      [w.id, w.name, w.email, w.phone ?? null, w.createdAt]);
  }

  async getWorker(id: string): Promise<Worker | null> {
    const row = await get<WorkerRow>(this.conn(), `select * from workers where id=?`, [id]);
    return row ? rowToWorker(row) : null;
  }

  async listWorkers(): Promise<Worker[]> {
    const rows = await all<WorkerRow>(this.conn(), `select * from workers order by name collate nocase asc, createdAt asc`);
    return rows.map(rowToWorker);
  }

  async updateWorker(w: Worker): Promise<void> {
    const res = await run(this.conn(), `update workers set name=?, email=?, phone=? where id=?`,
      [w.name, w.email, w.phone ?? null, w.id]);
    if (res.changes === 0) throw new NotFoundError("worker", w.id);
  }

  async deleteWorker(id: string): Promise<void> {
    const ref = await get<{ n: number }>(this.conn(), `select count(*) as n from assignments where workerId=?`, [id]);
    if (ref && ref.n > 0) {
      throw new ConstraintError(`worker ${id} has ${ref.n} assignment(s) in history`, { workerId: id, assignments: ref.n });
    }
    const res = await run(this.conn(), `delete from workers where id=?`, [id]);
    if (res.changes === 0) throw new NotFoundError("worker", id);
  }

  // houses

  async createHouse(h: House): Promise<void> {
    await run(this.conn(), `insert into houses (id, name, comment, createdAt) values (?,?,?,?)`,
      [h.id, h.name, h.comment ?? null, h.createdAt]);
  }

  async getHouse(id: string): Promise<House | null> {
    const row = await get<HouseRow>(this.conn(), `select * from houses where id=?`, [id]);
    return row ? rowToHouse(row) : null;
  }

  async listHouses(q: { search?: string } = {}): Promise<House[]> {
    const rows = await all<HouseRow>(this.conn(), `select * from houses order by name collate nocase asc, createdAt asc`);
    const search = (q.search ?? "").trim().toLowerCase();
    const houses = rows.map(rowToHouse);
    return search ? houses.filter(h => h.name.toLowerCase().includes(search)) : houses;
  }

  async updateHouse(h: House): Promise<void> {
    const res = await run(this.conn(), `update houses set name=?, comment=? where id=?`, [h.name, h.comment ?? null, h.id]);
    if (res.changes === 0) throw new NotFoundError("house", h.id);
  }

  async deleteHouse(id: string): Promise<void> {
    const ref = await get<{ n: number }>(this.conn(), `select count(*) as n from assignments where houseId=?`, [id]);
    if (ref && ref.n > 0) {
      throw new ConstraintError(`house ${id} has ${ref.n} assignment(s) in history`, { houseId: id, assignments: ref.n });
    }
    const res = await run(this.conn(), `delete from houses where id=?`, [id]);
    if (res.changes === 0) throw new NotFoundError("house", id);
  }

  // assignments

  async insertAssignment(a: Assignment): Promise<void> {
    await this.insertAssignments([a]);
  }

  async insertAssignments(list: Assignment[]): Promise<void> {
    if (list.length === 0) return;
    const params: Param[] = [];
    for (const a of list) {
      params.push(
        a.id, a.workerId, a.houseId, a.date, a.quantity, a.comment ?? null,
        a.status, a.createdAt, a.sentAt ?? null, a.failureReason ?? null
      );
    }
    try {
      await run(this.conn(), `
        insert into assignments (
          id, workerId, houseId, date, quantity, comment, status, createdAt, sentAt, failureReason
        ) values ${list.map(() => "(?,?,?,?,?,?,?,?,?,?)").join(",")}
      `, params);
    } catch (err) {
      if (isForeignKeyError(err)) await this.throwMissingReference(list);
      throw err;
    }
  }

  // a worker or house removed after the caller checked it
  private async throwMissingReference(list: Assignment[]): Promise<void> {
    for (const a of list) {
      if (!(await this.getWorker(a.workerId))) throw new NotFoundError("worker", a.workerId);
      if (!(await this.getHouse(a.houseId))) throw new NotFoundError("house", a.houseId);
    }
  }

  async getAssignment(id: string): Promise<Assignment | null> {
    const row = await get<AssignmentRow>(this.conn(), `select * from assignments where id=?`, [id]);
    return row ? rowToAssignment(row) : null;
  }

  async updateAssignmentStatus(id: string, from: AssignmentStatus, patch: StatusPatch): Promise<void> {
    const res = await run(this.conn(), `update assignments set status=?, sentAt=?, failureReason=? where id=? and status=?`,
      [patch.status, patch.sentAt, patch.failureReason, id, from]);
    if (res.changes > 0) return;

    const row = await get<{ status: AssignmentStatus }>(this.conn(), `select status from assignments where id=?`, [id]);
    if (!row) throw new NotFoundError("assignment", id);
    throw new ConstraintError(`assignment ${id} is ${row.status}, not ${from}`, { assignmentId: id, expected: from, actual: row.status });
  }

  async assignedHouseIds(date: string): Promise<Set<string>> {
    const rows = await all<{ houseId: string }>(this.conn(),
      `select distinct houseId from assignments where date=? and status != 'failed'`, [date]);
    return new Set(rows.map(r => r.houseId));
  }

  async queryAssignments(f: HistoryFilters): Promise<HistoryEntry[]> {
    const where: string[] = [];
    const params: Param[] = [];

    if (f.workerId) { where.push(`a.workerId = ?`); params.push(f.workerId); }
    if (f.houseId) { where.push(`a.houseId = ?`); params.push(f.houseId); }
    if (f.dateFrom) { where.push(`a.date >= ?`); params.push(f.dateFrom); }
    if (f.dateTo) { where.push(`a.date <= ?`); params.push(f.dateTo); }
    if (f.status) { where.push(`a.status = ?`); params.push(f.status); }

    const sql = `
      select a.*, w.name as workerName, w.email as workerEmail, h.name as houseName
      from assignments a
      join workers w on w.id = a.workerId
      join houses h on h.id = a.houseId
      ${where.length ? `where ${where.join(" and ")}` : ""}
      order by a.date desc, a.rowid desc
    `;
    const rows = await all<HistoryRow>(this.conn(), sql, params);
    const entries = rows.map(r => ({
      ...rowToAssignment(r),
      workerName: r.workerName,
      workerEmail: r.workerEmail,
      houseName: r.houseName
    }));

    // lower() in SQLite folds ASCII only, so the comment match runs here
    const text = (f.text ?? "").toLowerCase();
    if (!text) return entries;
    return entries.filter(e => (e.comment ?? "").toLowerCase().includes(text));
  }
}

function isForeignKeyError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "SQLITE_CONSTRAINT" && /FOREIGN KEY/i.test(err.message);
}

function rowToWorker(r: WorkerRow): Worker {
  return { id: r.id, name: r.name, email: r.email, phone: r.phone ?? undefined, createdAt: r.createdAt };
}

function rowToHouse(r: HouseRow): House {
  return { id: r.id, name: r.name, comment: r.comment ?? undefined, createdAt: r.createdAt };
}

function rowToAssignment(r: AssignmentRow): Assignment {
  return {
    id: r.id,
    workerId: r.workerId,
    houseId: r.houseId,
    date: r.date,
    quantity: r.quantity,
    comment: r.comment ?? undefined,
    status: r.status,
    createdAt: r.createdAt,
    sentAt: r.sentAt ?? undefined,
    failureReason: r.failureReason ?? undefined
  };
}
