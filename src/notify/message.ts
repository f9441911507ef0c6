import { formatDisplayDate } from "../core/dates.js";

export type NoticeLine = {
  houseName: string;
  quantity: number;
  comment?: string;
};

export type AssignmentNotice = {
  to: string;
  workerName: string;
  date: string; // YYYY-MM-DD
  lines: NoticeLine[];
};

export type FormattedMessage = {
  subject: string;
  text: string;
};

export function formatMessage(notice: AssignmentNotice): FormattedMessage {
  const date = formatDisplayDate(notice.date);
  const lines = notice.lines.map((l) => {
    const line = `- ${l.houseName} → ${l.quantity} bedding sets`;
    return l.comment ? `${line} | Note: ${l.comment}` : line;
  });

  const text = [
    `Hello ${notice.workerName},`,
    "",
    `Date: ${date}`,
    "You have been assigned to the following houses:",
    "",
    ...lines,
    "",
    "Good luck with your work!"
  ].join("\n");

  return { subject: `Work Assignment - ${date}`, text };
}
