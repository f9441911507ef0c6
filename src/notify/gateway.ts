import fs from "node:fs";
import path from "node:path";
import nodemailer from "nodemailer";
import { nanoid } from "nanoid";
import { TransportError } from "../core/errors.js";
import type { SmtpConfig } from "../config.js";
import { AssignmentNotice, formatMessage } from "./message.js";

export type OutgoingMail = {
  from: string;
  to: string;
  subject: string;
  text: string;
};

/** The part of a nodemailer transporter the gateway calls. */
export interface MailTransport {
  sendMail(mail: OutgoingMail): Promise<{ messageId?: string }>;
}

export type SendResult =
  | { ok: true; mode: "smtp" | "outbox"; messageId?: string }
  | { ok: false; error: TransportError };

export class NotificationGateway {
  private transport?: MailTransport;
  private from: string;
  private outboxDir: string;
  private timeoutMs: number;

  constructor(args: {
    smtp?: SmtpConfig;
    from: string;
    outboxDir: string;
    timeoutMs: number;
    transport?: MailTransport;
  }) {
    this.from = args.from;
    this.outboxDir = args.outboxDir;
    this.timeoutMs = args.timeoutMs;
    this.transport = args.transport ?? (args.smtp ? smtpTransport(args.smtp, args.timeoutMs) : undefined);
  }

  get mode(): "smtp" | "outbox" {
    return this.transport ? "smtp" : "outbox";
  }

  async send(notice: AssignmentNotice): Promise<SendResult> {
    const msg = formatMessage(notice);
    const mail: OutgoingMail = { from: this.from, to: notice.to, subject: msg.subject, text: msg.text };

    if (!this.transport) {
      try {
        return { ok: true, mode: "outbox", messageId: this.writeOutbox(mail) };
      } catch (e) {
        return { ok: false, error: toTransportError(e) };
      }
    }

    try {
      const info = await withTimeout(this.transport.sendMail(mail), this.timeoutMs);
      return { ok: true, mode: "smtp", messageId: info.messageId };
    } catch (e) {
      return { ok: false, error: toTransportError(e) };
    }
  }

  private writeOutbox(mail: OutgoingMail): string {
    fs.mkdirSync(this.outboxDir, { recursive: true });
    const stamp = new Date().toISOString().replace(/[:.]/g, "-");
    const id = `email_${stamp}_${nanoid(6)}`;
    fs.writeFileSync(
      path.join(this.outboxDir, `${id}.txt`),
      `FROM: ${mail.from}\nTO: ${mail.to}\nSUBJECT: ${mail.subject}\n\n${mail.text}\n`,
      "utf8"
    );
    return id;
  }
}

function smtpTransport(smtp: SmtpConfig, timeoutMs: number): MailTransport {
  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.secure,
    auth: smtp.user ? { user: smtp.user, pass: smtp.pass } : undefined,
    connectionTimeout: timeoutMs,
    greetingTimeout: timeoutMs,
    socketTimeout: timeoutMs
  });
}

class TimeoutError extends Error {
  readonly code = "ETIMEDOUT";
}

function withTimeout<T>(p: Promise<T>, ms: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(`send timed out after ${ms}ms`)), ms);
    p.then(
      (v) => { clearTimeout(timer); resolve(v); },
      (e: unknown) => { clearTimeout(timer); reject(e); }
    );
  });
}

function errorCode(e: unknown): string {
  if (typeof e === "object" && e !== null && "code" in e && typeof e.code === "string") return e.code;
  return "";
}

export function toTransportError(e: unknown): TransportError {
  if (e instanceof TransportError) return e;
  const message = e instanceof Error ? e.message : String(e);
  switch (errorCode(e)) {
    case "ETIMEDOUT":
      return new TransportError(message, "timeout");
    case "EAUTH":
      return new TransportError(message, "auth");
    case "ECONNECTION":
    case "ESOCKET":
    case "EDNS":
    case "ECONNREFUSED":
      return new TransportError(message, "connection");
    case "EENVELOPE":
    case "EMESSAGE":
      return new TransportError(message, "rejected");
    default:
      return new TransportError(message, "unknown");
  }
}
