export type AssignmentStatus = "pending" | "sent" | "failed";

export interface Worker {
  id: string;
  name: string;
  email: string;
  phone?: string;
  createdAt: string; // ISO
}

export interface House {
  id: string;
  name: string;
  comment?: string;
  createdAt: string; // ISO
}

export interface Assignment {
  id: string;
  workerId: string;
  houseId: string;
  date: string; // YYYY-MM-DD
  quantity: number;
  comment?: string;
  status: AssignmentStatus;
  createdAt: string; // ISO
  sentAt?: string; // ISO
  failureReason?: string;
}

export interface HistoryEntry extends Assignment {
  workerName: string;
  workerEmail: string;
  houseName: string;
}

export interface HistoryFilters {
  workerId?: string;
  houseId?: string;
  dateFrom?: string;
  dateTo?: string;
  status?: AssignmentStatus;
  text?: string;
}

export interface WorkerInput {
  name: string;
  email: string;
  phone?: string;
}

export interface HouseInput {
  name: string;
  comment?: string;
}

export interface HouseSelection {
  houseId: string;
  quantity: number;
  comment?: string;
}
