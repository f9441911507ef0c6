import pino from "pino";
import type { Logger } from "pino";
import { Store } from "../store/store.js";
import { Assignment, AssignmentStatus, House, Worker } from "../types/contracts.js";
import { createRules } from "../core/rules.js";
import { canTransition } from "../core/transitions.js";
import { NotFoundError, ValidationError } from "../core/errors.js";
import { NotificationGateway, SendResult } from "../notify/gateway.js";
import { AssignmentNotice } from "../notify/message.js";

export type DispatchOutcome = {
  assignments: Assignment[];
  delivery: { ok: true; mode: "smtp" | "outbox" } | { ok: false; error: string; reason: string };
};

export type Dispatcher = ReturnType<typeof createDispatcher>;

export function createDispatcher(args: {
  store: Store;
  gateway: NotificationGateway;
  logger?: Logger;
}) {
  const { store, gateway } = args;
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  const rules = createRules({ store });

  async function setStatus(a: Assignment, next: AssignmentStatus, sentAt: string | null, failureReason: string | null) {
    if (!canTransition(a.status, next)) {
      throw new ValidationError(`cannot move assignment from ${a.status} to ${next}`, { from: a.status, to: next });
    }
    await store.updateAssignmentStatus(a.id, a.status, { status: next, sentAt, failureReason });
    return { ...a, status: next, sentAt: sentAt ?? undefined, failureReason: failureReason ?? undefined };
  }

  /** Sends one notice covering `items` and records the outcome on each of them. */
  async function deliver(worker: Worker, date: string, items: Array<{ assignment: Assignment; house: House }>): Promise<DispatchOutcome> {
    const notice: AssignmentNotice = {
      to: worker.email,
      workerName: worker.name,
      date,
      lines: items.map(({ assignment, house }) => ({
        houseName: house.name,
        quantity: assignment.quantity,
        comment: assignment.comment
      }))
    };

    const result: SendResult = await gateway.send(notice);
    const updated: Assignment[] = [];

    if (result.ok) {
      const sentAt = new Date().toISOString();
      for (const { assignment } of items) updated.push(await setStatus(assignment, "sent", sentAt, null));
      log.info({ workerId: worker.id, date, count: items.length, mode: result.mode, messageId: result.messageId }, "assignment: sent");
      return { assignments: updated, delivery: { ok: true, mode: result.mode } };
    }

    for (const { assignment } of items) updated.push(await setStatus(assignment, "failed", null, result.error.message));
    log.warn({ workerId: worker.id, date, count: items.length, reason: result.error.reason, err: result.error.message }, "assignment: send_failed");
    return {
      assignments: updated,
      delivery: { ok: false, error: result.error.message, reason: result.error.reason }
    };
  }

  async function submit(input: { workerId: string; date: string; selections: unknown }): Promise<DispatchOutcome> {
    const created = await rules.createAssignments(input.workerId, input.date, input.selections, { claim: true });
    log.info({ workerId: input.workerId, date: input.date, ids: created.map(a => a.id) }, "assignment: created");

    try {
      const worker = await store.getWorker(input.workerId);
      if (!worker) throw new NotFoundError("worker", input.workerId);

      const items: Array<{ assignment: Assignment; house: House }> = [];
      for (const assignment of created) {
        const house = await store.getHouse(assignment.houseId);
        if (!house) throw new NotFoundError("house", assignment.houseId);
        items.push({ assignment, house });
      }
      return await deliver(worker, created[0].date, items);
    } finally {
      rules.release(created.map(a => a.id));
    }
  }

  /** Manual resend of one pending or failed assignment. Updates the row in place. */
  async function send(assignmentId: string): Promise<DispatchOutcome> {
    const assignment = await rules.claim(assignmentId);
    try {
      const worker = await store.getWorker(assignment.workerId);
      if (!worker) throw new NotFoundError("worker", assignment.workerId);
      const house = await store.getHouse(assignment.houseId);
      if (!house) throw new NotFoundError("house", assignment.houseId);

      log.info({ assignmentId }, "assignment: resend");
      return await deliver(worker, assignment.date, [{ assignment, house }]);
    } finally {
      rules.release([assignmentId]);
    }
  }

  return {
    submit,
    send,
    computeEligibleHouses: rules.computeEligibleHouses,
    createAssignment: rules.createAssignment
  };
}
