import { AssignmentStatus } from "../types/contracts.js";

// failed -> pending is a manual resend reclaiming the house
const allowed: Record<AssignmentStatus, AssignmentStatus[]> = {
  pending: ["sent", "failed"],
  failed: ["pending"],
  sent: []
};

export function canTransition(from: AssignmentStatus, to: AssignmentStatus): boolean {
  return allowed[from].includes(to);
}
