import { nanoid } from "nanoid";
import { Assignment, House, HouseInput, Worker, WorkerInput } from "../types/contracts.js";

function cleanOptional(s: string | undefined): string | undefined {
  const v = (s ?? "").trim();
  return v ? v : undefined;
}

export function buildWorker(input: WorkerInput, now = new Date()): Worker {
  return {
    id: nanoid(),
    name: input.name.trim(),
    email: input.email.trim(),
    phone: cleanOptional(input.phone),
    createdAt: now.toISOString()
  };
}

export function buildHouse(input: HouseInput, now = new Date()): House {
  return {
    id: nanoid(),
    name: input.name.trim(),
    comment: cleanOptional(input.comment),
    createdAt: now.toISOString()
  };
}

export function buildAssignment(args: {
  workerId: string;
  houseId: string;
  date: string;
  quantity: number;
  comment?: string;
}, now = new Date()): Assignment {
  return {
    id: nanoid(),
    workerId: args.workerId,
    houseId: args.houseId,
    date: args.date,
    quantity: args.quantity,
    comment: cleanOptional(args.comment),
    status: "pending",
    createdAt: now.toISOString(),
    sentAt: undefined,
    failureReason: undefined
  };
}
