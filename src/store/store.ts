import { Assignment, AssignmentStatus, HistoryEntry, HistoryFilters, House, Worker } from "../types/contracts.js";

export interface StatusPatch {
  status: AssignmentStatus;
  sentAt: string | null;
  failureReason: string | null;
}

export interface Store {
  init(): Promise<void>;
  close(): Promise<void>;

  createWorker(worker: Worker): Promise<void>;
  getWorker(id: string): Promise<Worker | null>;
  listWorkers(): Promise<Worker[]>;
  updateWorker(worker: Worker): Promise<void>;
  deleteWorker(id: string): Promise<void>;

  createHouse(house: House): Promise<void>;
  getHouse(id: string): Promise<House | null>;
  listHouses(q?: { search?: string }): Promise<House[]>;
  updateHouse(house: House): Promise<void>;
  deleteHouse(id: string): Promise<void>;

  insertAssignment(a: Assignment): Promise<void>;
  /** Inserts the whole batch in one statement: all rows or none. */
  insertAssignments(list: Assignment[]): Promise<void>;
  getAssignment(id: string): Promise<Assignment | null>;
  /** Applies `patch` only while the stored status is still `from`; otherwise `ConstraintError`. */
  updateAssignmentStatus(id: string, from: AssignmentStatus, patch: StatusPatch): Promise<void>;
  /** Houses holding a pending or sent assignment on `date`. */
  assignedHouseIds(date: string): Promise<Set<string>>;
  queryAssignments(filters: HistoryFilters): Promise<HistoryEntry[]>;
}
