import { z } from "zod";
import { Store } from "../store/store.js";
import { Assignment, House, HouseSelection } from "../types/contracts.js";
import { AlreadyAssignedError, ConstraintError, NotFoundError, ValidationError } from "./errors.js";
import { buildAssignment } from "./engine.js";
import { IsoDate, SelectionSchema, parseOrThrow } from "./validate.js";

const CreateAssignmentSchema = SelectionSchema.extend({
  workerId: z.string().min(1),
  date: IsoDate
});

/**
 * Runs tasks one at a time in submission order. Every check-then-insert on
 * assignments goes through here, so an eligibility check always sees the
 * inserts of the tasks queued before it.
 */
export function createWriteQueue() {
  let tail: Promise<unknown> = Promise.resolve();

  return function enqueue<T>(task: () => Promise<T>): Promise<T> {
    const next = tail.then(task, task);
    tail = next.catch(() => undefined);
    return next;
  };
}

export function createRules(args: { store: Store }) {
  const { store } = args;
  const enqueue = createWriteQueue();
  // assignments whose notice is being sent right now
  const inFlight = new Set<string>();

  async function computeEligibleHouses(date: string): Promise<House[]> {
    const day = parseOrThrow(IsoDate, date);
    const [houses, taken] = await Promise.all([store.listHouses(), store.assignedHouseIds(day)]);
    return houses.filter(h => !taken.has(h.id));
  }

  async function requireWorker(workerId: string) {
    const worker = await store.getWorker(workerId);
    if (!worker) throw new NotFoundError("worker", workerId);
    return worker;
  }

  async function requireHouse(houseId: string) {
    const house = await store.getHouse(houseId);
    if (!house) throw new NotFoundError("house", houseId);
    return house;
  }

  async function createAssignment(raw: {
    workerId: string;
    houseId: string;
    date: string;
    quantity: number;
    comment?: string;
  }): Promise<Assignment> {
    const input = parseOrThrow(CreateAssignmentSchema, raw);
    const [created] = await createAssignments(input.workerId, input.date, [input]);
    return created;
  }

  /**
   * Validates the whole batch before inserting any of it. Eligibility is
   * checked inside the write queue, right before the insert. With `claim` the
   * new rows stay reserved for the caller's send until `release`.
   */
  async function createAssignments(
    workerId: string,
    date: string,
    rawSelections: unknown,
    opts: { claim?: boolean } = {}
  ): Promise<Assignment[]> {
    const day = parseOrThrow(IsoDate, date);
    const selections: HouseSelection[] = parseOrThrow(z.array(SelectionSchema), rawSelections);
    if (selections.length === 0) throw new ValidationError("select at least one house");

    const seen = new Set<string>();
    for (const s of selections) {
      if (seen.has(s.houseId)) throw new ValidationError(`house ${s.houseId} selected twice`, { houseId: s.houseId });
      seen.add(s.houseId);
    }

    return enqueue(async () => {
      await requireWorker(workerId);
      for (const s of selections) await requireHouse(s.houseId);

      const taken = await store.assignedHouseIds(day);
      for (const s of selections) {
        if (taken.has(s.houseId)) throw new AlreadyAssignedError(s.houseId, day);
      }

      const now = new Date();
      const created = selections.map(s => buildAssignment({ workerId, date: day, ...s }, now));
      await store.insertAssignments(created);
      if (opts.claim) for (const a of created) inFlight.add(a.id);
      return created;
    });
  }

  /**
   * Claims a stored assignment for a manual resend. A failed one goes back to
   * pending, which takes its house again; refused when another assignment got
   * the house for that day meanwhile. Refused as well while a send for the
   * same assignment is still running, or once it was sent.
   */
  async function claim(assignmentId: string): Promise<Assignment> {
    return enqueue(async () => {
      const a = await store.getAssignment(assignmentId);
      if (!a) throw new NotFoundError("assignment", assignmentId);
      if (a.status === "sent") {
        throw new ValidationError(`assignment ${a.id} was already sent`, { assignmentId: a.id, sentAt: a.sentAt });
      }
      if (inFlight.has(a.id)) {
        throw new ConstraintError(`assignment ${a.id} is being sent`, { assignmentId: a.id });
      }
      if (a.status === "pending") {
        inFlight.add(a.id);
        return a;
      }

      const taken = await store.assignedHouseIds(a.date);
      if (taken.has(a.houseId)) throw new AlreadyAssignedError(a.houseId, a.date);
      await store.updateAssignmentStatus(a.id, "failed", { status: "pending", sentAt: null, failureReason: null });
      inFlight.add(a.id);
      return { ...a, status: "pending" as const, sentAt: undefined, failureReason: undefined };
    });
  }

  function release(assignmentIds: string[]) {
    for (const id of assignmentIds) inFlight.delete(id);
  }

  return { computeEligibleHouses, createAssignment, createAssignments, claim, release };
}
