import { z } from "zod";
import { Store } from "../store/store.js";
import { HistoryEntry, HistoryFilters } from "../types/contracts.js";
import { IsoDate, parseOrThrow } from "../core/validate.js";
import { ValidationError } from "../core/errors.js";
import { entriesToCsv } from "./csv.js";

const FiltersSchema = z.object({
  workerId: z.string().min(1).optional(),
  houseId: z.string().min(1).optional(),
  dateFrom: IsoDate.optional(),
  dateTo: IsoDate.optional(),
  status: z.enum(["pending", "sent", "failed"]).optional(),
  text: z.string().optional()
}).strict();

export type History = ReturnType<typeof createHistory>;

export function createHistory(args: { store: Store }) {
  function filtersOf(raw: HistoryFilters): HistoryFilters {
    const f = parseOrThrow(FiltersSchema, raw);
    if (f.dateFrom && f.dateTo && f.dateFrom > f.dateTo) {
      throw new ValidationError("dateFrom must not be after dateTo", { dateFrom: f.dateFrom, dateTo: f.dateTo });
    }
    const text = (f.text ?? "").trim();
    return { ...f, text: text || undefined };
  }

  /** Newest date first; same-day entries newest first. */
  async function list(filters: HistoryFilters = {}): Promise<HistoryEntry[]> {
    return args.store.queryAssignments(filtersOf(filters));
  }

  async function exportCsv(filters: HistoryFilters = {}): Promise<string> {
    return entriesToCsv(await list(filters));
  }

  return { list, exportCsv };
}
