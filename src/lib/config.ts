import { createInterface } from "node:readline";
import { ConfigError } from "./errors";
import { DEFAULT_SOURCE_URL } from "./scraper";
import type { DeliveryMode, ReportFormat } from "./types";

export interface SmtpConfig {
  host: string;
  port: number;
  user: string;
  password: string;
}

export interface AppConfig {
  sourceUrl: string;
  format: ReportFormat;
  delivery: DeliveryMode;
  subject: string;
  senderEmail: string;
  recipients: string[];
  smtp: SmtpConfig;
}

export type Prompt = (question: string) => Promise<string>;

const DEFAULT_SMTP_HOST = "smtp.gmail.com";
const DEFAULT_SMTP_PORT = 587;
const DEFAULT_SUBJECT = "Daily IPO GMP Summary";

/**
 * Asks one question on stdin/stdout. Rejects with ConfigError when the input
 * ends before a line arrives (e.g. a cron job with stdin closed).
 */
export function promptStdin(
  question: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<string> {
  return new Promise((resolve, reject) => {
    const rl = createInterface({ input, output });
    let answered = false;

    rl.once("close", () => {
      if (!answered) {
        reject(new ConfigError(`promptStdin: input closed before an answer to "${question.trim()}"`));
      }
    });

    rl.question(question, (answer) => {
      answered = true;
      rl.close();
      resolve(answer);
    });
  });
}

/** "a@x.com, ,b@x.com " → ["a@x.com", "b@x.com"] */
export function parseRecipients(raw: string): string[] {
  return raw
    .split(",")
    .map((r) => r.trim())
    .filter((r) => r.length > 0);
}

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

async function envOrPrompt(
  env: NodeJS.ProcessEnv,
  key: string,
  question: string,
  prompt: Prompt
): Promise<string> {
  return envValue(env, key) ?? (await prompt(question)).trim();
}

function parseFormat(raw: string | undefined): ReportFormat {
  if (raw === undefined || raw === "text") return "text";
  if (raw === "html") return "html";
  throw new ConfigError(`REPORT_FORMAT must be "text" or "html", got "${raw}"`);
}

function parseDelivery(raw: string | undefined): DeliveryMode {
  if (raw === undefined || raw === "email") return "email";
  if (raw === "console") return "console";
  throw new ConfigError(`REPORT_DELIVERY must be "email" or "console", got "${raw}"`);
}

function parsePort(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_SMTP_PORT;
  const port = Number(raw);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new ConfigError(`SMTP_PORT must be a port number, got "${raw}"`);
  }
  return port;
}

function parseSourceUrl(raw: string | undefined): string {
  if (raw === undefined) return DEFAULT_SOURCE_URL;
  try {
    return new URL(raw).toString();
  } catch {
    throw new ConfigError(`GMP_SOURCE_URL is not a valid URL: "${raw}"`);
  }
}

/**
 * Builds the run configuration once at startup. Credentials missing from the
 * environment are asked for interactively, and only when the report is going
 * out by email.
 */
export async function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  prompt: Prompt = promptStdin
): Promise<AppConfig> {
  const format = parseFormat(envValue(env, "REPORT_FORMAT"));
  const delivery = parseDelivery(envValue(env, "REPORT_DELIVERY"));
  const sourceUrl = parseSourceUrl(envValue(env, "GMP_SOURCE_URL"));
  const subject = envValue(env, "REPORT_SUBJECT") ?? DEFAULT_SUBJECT;
  const host = envValue(env, "SMTP_HOST") ?? DEFAULT_SMTP_HOST;
  const port = parsePort(envValue(env, "SMTP_PORT"));

  if (delivery === "console") {
    return {
      sourceUrl,
      format,
      delivery,
      subject,
      senderEmail: envValue(env, "SENDER_EMAIL") ?? "",
      recipients: parseRecipients(envValue(env, "RECIPIENT_EMAILS") ?? ""),
      smtp: { host, port, user: "", password: "" },
    };
  }

  const senderEmail = await envOrPrompt(env, "SENDER_EMAIL", "Sender email: ", prompt);
  const password = await envOrPrompt(
    env,
    "SENDER_PASSWORD",
    "Email password/App Password: ",
    prompt
  );
  const recipients = parseRecipients(
    await envOrPrompt(env, "RECIPIENT_EMAILS", "Recipient emails (comma separated): ", prompt)
  );

  if (!senderEmail) throw new ConfigError("SENDER_EMAIL is required for email delivery");
  if (!password) throw new ConfigError("SENDER_PASSWORD is required for email delivery");
  if (recipients.length === 0) {
    throw new ConfigError("RECIPIENT_EMAILS must name at least one recipient");
  }

  return {
    sourceUrl,
    format,
    delivery,
    subject,
    senderEmail,
    recipients,
    smtp: { host, port, user: senderEmail, password },
  };
}
