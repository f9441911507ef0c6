import { Router } from "express";
import { z } from "zod";
import type { Logger } from "pino";
import { Store } from "../store/store.js";
import { Dispatcher } from "../plugin/createDispatcher.js";
import { History } from "../history/history.js";
import { buildHouse, buildWorker } from "../core/engine.js";
import { HouseInputSchema, WorkerInputSchema, parseOrThrow } from "../core/validate.js";
import { NotFoundError } from "../core/errors.js";
import { asyncRoute } from "./errors.js";

const HistoryQuery = z.object({
  workerId: z.string().optional(),
  houseId: z.string().optional(),
  from: z.string().optional(),
  to: z.string().optional(),
  status: z.enum(["pending", "sent", "failed"]).optional(),
  q: z.string().optional()
});

const SubmitBody = z.object({
  workerId: z.string().min(1),
  date: z.string().min(1),
  selections: z.array(z.unknown())
});

export function makeRoutes(args: {
  store: Store;
  dispatcher: Dispatcher;
  history: History;
  logger: Logger;
}) {
  const { store, dispatcher, history, logger: log } = args;
  const r = Router();

  r.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  // workers

  r.get("/workers", asyncRoute(async (_req, res) => {
    res.json({ ok: true, workers: await store.listWorkers() });
  }));

  r.post("/workers", asyncRoute(async (req, res) => {
    const input = parseOrThrow(WorkerInputSchema, req.body);
    const worker = buildWorker(input);
    await store.createWorker(worker);
    log.info({ workerId: worker.id }, "worker: created");
    res.status(201).json({ ok: true, worker });
  }));

  r.get("/workers/:id", asyncRoute(async (req, res) => {
    const worker = await store.getWorker(req.params.id);
    if (!worker) throw new NotFoundError("worker", req.params.id);
    res.json({ ok: true, worker });
  }));

  r.put("/workers/:id", asyncRoute(async (req, res) => {
    const input = parseOrThrow(WorkerInputSchema, req.body);
    const current = await store.getWorker(req.params.id);
    if (!current) throw new NotFoundError("worker", req.params.id);
    const worker = { ...buildWorker(input), id: current.id, createdAt: current.createdAt };
    await store.updateWorker(worker);
    res.json({ ok: true, worker });
  }));

  r.delete("/workers/:id", asyncRoute(async (req, res) => {
    await store.deleteWorker(req.params.id);
    log.info({ workerId: req.params.id }, "worker: deleted");
    res.json({ ok: true });
  }));

  // houses

  r.get("/houses", asyncRoute(async (req, res) => {
    const search = z.string().optional().parse(req.query.q);
    res.json({ ok: true, houses: await store.listHouses({ search }) });
  }));

  r.get("/houses/eligible", asyncRoute(async (req, res) => {
    const date = z.string().min(1).parse(req.query.date);
    res.json({ ok: true, date, houses: await dispatcher.computeEligibleHouses(date) });
  }));

  r.post("/houses", asyncRoute(async (req, res) => {
    const input = parseOrThrow(HouseInputSchema, req.body);
    const house = buildHouse(input);
    await store.createHouse(house);
    log.info({ houseId: house.id }, "house: created");
    res.status(201).json({ ok: true, house });
  }));

  r.get("/houses/:id", asyncRoute(async (req, res) => {
    const house = await store.getHouse(req.params.id);
    if (!house) throw new NotFoundError("house", req.params.id);
    res.json({ ok: true, house });
  }));

  r.put("/houses/:id", asyncRoute(async (req, res) => {
    const input = parseOrThrow(HouseInputSchema, req.body);
    const current = await store.getHouse(req.params.id);
    if (!current) throw new NotFoundError("house", req.params.id);
    const house = { ...buildHouse(input), id: current.id, createdAt: current.createdAt };
    await store.updateHouse(house);
    res.json({ ok: true, house });
  }));

  r.delete("/houses/:id", asyncRoute(async (req, res) => {
    await store.deleteHouse(req.params.id);
    log.info({ houseId: req.params.id }, "house: deleted");
    res.json({ ok: true });
  }));

  // assignments

  r.post("/assignments", asyncRoute(async (req, res) => {
    const body = SubmitBody.parse(req.body);
    const out = await dispatcher.submit(body);
    res.status(201).json({ ok: true, ...out });
  }));

  r.get("/assignments/:id", asyncRoute(async (req, res) => {
    const assignment = await store.getAssignment(req.params.id);
    if (!assignment) throw new NotFoundError("assignment", req.params.id);
    res.json({ ok: true, assignment });
  }));

  r.post("/assignments/:id/send", asyncRoute(async (req, res) => {
    const out = await dispatcher.send(req.params.id);
    res.json({ ok: true, ...out });
  }));

  // history

  r.get("/history", asyncRoute(async (req, res) => {
    const q = HistoryQuery.parse(req.query);
    const entries = await history.list({
      workerId: q.workerId, houseId: q.houseId, dateFrom: q.from, dateTo: q.to, status: q.status, text: q.q
    });
    res.json({ ok: true, entries });
  }));

  r.get("/history/export.csv", asyncRoute(async (req, res) => {
    const q = HistoryQuery.parse(req.query);
    const csv = await history.exportCsv({
      workerId: q.workerId, houseId: q.houseId, dateFrom: q.from, dateTo: q.to, status: q.status, text: q.q
    });
    res.setHeader("Content-Type", "text/csv; charset=utf-8");
    res.setHeader("Content-Disposition", `attachment; filename="assignment-history.csv"`);
    res.send(csv);
  }));

  return r;
}
