import nodemailer from "nodemailer";
import type { MailProviderConfig } from "../../config/types.providers.js";
import type { DeliveryResult, MailMessage, MailNotifier } from "../types.js";

export type MailEnvelope = {
  from: string;
  to: string;
  subject: string;
  text: string;
};

export type MailTransport = {
  sendMail: (mail: MailEnvelope) => Promise<unknown>;
};

type ResolvedMailSettings = {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  pass: string;
  from: string;
  to: string[];
};

export function resolveMailSettings(
  cfg: MailProviderConfig,
  env: NodeJS.ProcessEnv,
): { ok: true; settings: ResolvedMailSettings } | { ok: false; reason: string } {
  if (cfg.enabled === false) {
    return { ok: false, reason: "disabled" };
  }
  const user = cfg.user ?? env.SMTP_USER?.trim() ?? "";
  const pass = env[cfg.passwordEnv ?? "SMTP_PASS"]?.trim() ?? "";
  const to =
    cfg.to ??
    (env.SMTP_TO ?? "")
      .split(",")
      .map((entry) => entry.trim())
      .filter(Boolean);
  const missing = [
    user ? null : "user",
    pass ? null : "password",
    to.length > 0 ? null : "recipients",
  ].filter((entry): entry is string => entry !== null);
  if (missing.length > 0) {
    return { ok: false, reason: `mail not configured: missing ${missing.join(", ")}` };
  }
  const port = cfg.port ?? 587;
  return {
    ok: true,
    settings: {
      host: cfg.host ?? env.SMTP_HOST?.trim() ?? "smtp.gmail.com",
      port,
      secure: cfg.secure ?? port === 465,
      user,
      pass,
      from: cfg.from ?? user,
      to,
    },
  };
}

export function formatNotification(message: MailMessage): { subject: string; text: string } {
  return {
    subject: `[scoreloop] ${message.ticker}: buy ${message.buyScore} / short ${message.shortScore}`,
    text: [
      `Ticker: ${message.ticker}`,
      `Buy score: ${message.buyScore}`,
      `Short score: ${message.shortScore}`,
      `Risk: ${message.risk}`,
      "",
      message.rationale,
      "",
      `Run: ${message.runId}`,
    ].join("\n"),
  };
}

export function createSmtpMailNotifier(
  cfg: MailProviderConfig = {},
  deps: { transport?: MailTransport; env?: NodeJS.ProcessEnv } = {},
): MailNotifier {
  const resolved = resolveMailSettings(cfg, deps.env ?? process.env);
  let transport = deps.transport ?? null;

  const send = async (subject: string, text: string): Promise<DeliveryResult> => {
    if (!resolved.ok) {
      return { ok: false, reason: resolved.reason };
    }
    const { settings } = resolved;
    if (!transport) {
      transport = nodemailer.createTransport({
        host: settings.host,
        port: settings.port,
        secure: settings.secure,
        auth: { user: settings.user, pass: settings.pass },
      });
    }
    try {
      await transport.sendMail({
        from: settings.from,
        to: settings.to.join(", "),
        subject,
        text,
      });
      return { ok: true };
    } catch (err) {
      return { ok: false, reason: err instanceof Error ? err.message : String(err) };
    }
  };

  return {
    async sendNotification(message) {
      const { subject, text } = formatNotification(message);
      return await send(subject, text);
    },
    async sendText(subject, body) {
      return await send(`[scoreloop] ${subject}`, body);
    },
  };
}
