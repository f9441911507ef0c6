import { HistoryEntry } from "../types/contracts.js";

export const CSV_HEADER = ["date", "worker", "house", "quantity", "comment", "status", "sent_at"] as const;

const STATUS_LABEL = { pending: "Pending", sent: "Sent", failed: "Failed" } as const;

export function csvEscape(v: string | number | undefined | null): string {
  const s = String(v ?? "");
  if (/[",\r\n]/.test(s)) return `"${s.replace(/"/g, '""')}"`;
  return s;
}

export function entriesToCsv(rows: HistoryEntry[]): string {
  const lines = rows.map((e) => [
    e.date,
    e.workerName,
    e.houseName,
    e.quantity,
    e.comment,
    STATUS_LABEL[e.status],
    e.sentAt
  ].map(csvEscape).join(","));
  return [CSV_HEADER.join(","), ...lines].join("\r\n") + "\r\n";
}
