import path from "node:path";
import { z } from "zod";

const numberString = (defaultValue: number) =>
  z.string().default(String(defaultValue)).transform((v, ctx) => {
    const n = Number(v);
    if (!Number.isInteger(n) || n <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a positive integer, got "${v}"` });
      return z.NEVER;
    }
    return n;
  });

const optionalString = z.string().trim().optional().transform((v) => (v ? v : undefined));

export const envSchema = z.object({
  PORT: numberString(7090),
  DATA_DIR: z.string().default("./data"),
  DB_PATH: optionalString,
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

  SMTP_HOST: optionalString,
  SMTP_PORT: numberString(587),
  SMTP_SECURE: z.enum(["true", "false"]).optional(),
  SMTP_USER: optionalString,
  SMTP_PASS: optionalString,
  SMTP_TIMEOUT_MS: numberString(15000),
  EMAIL_FROM: z.string().default("Assignments <no-reply@localhost>")
});

export type SmtpConfig = {
  host: string;
  port: number;
  secure: boolean;
  user?: string;
  pass?: string;
};

export type AppConfig = {
  port: number;
  dataDir: string;
  dbPath: string;
  logLevel: z.output<typeof envSchema>["LOG_LEVEL"];
  mail: {
    smtp?: SmtpConfig;
    from: string;
    outboxDir: string;
    timeoutMs: number;
  };
};

/** Reads configuration once at startup; throws a ZodError on bad values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = envSchema.parse(env);
  const dataDir = path.resolve(e.DATA_DIR);

  const smtp: SmtpConfig | undefined = e.SMTP_HOST
    ? {
        host: e.SMTP_HOST,
        port: e.SMTP_PORT,
        secure: e.SMTP_SECURE ? e.SMTP_SECURE === "true" : e.SMTP_PORT === 465,
        user: e.SMTP_USER,
        pass: e.SMTP_PASS
      }
    : undefined;

  return {
    port: e.PORT,
    dataDir,
    dbPath: e.DB_PATH ? path.resolve(e.DB_PATH) : path.join(dataDir, "assignments.sqlite"),
    logLevel: e.LOG_LEVEL,
    mail: {
      smtp,
      from: e.EMAIL_FROM,
      outboxDir: path.join(dataDir, "outbox"),
      timeoutMs: e.SMTP_TIMEOUT_MS
    }
  };
}
