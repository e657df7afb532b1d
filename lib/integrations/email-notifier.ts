import type { NotificationArticle } from "@/lib/domain/models";
import type { Notifier } from "@/lib/domain/ports";
import type { Logger } from "@/lib/infra/logger";
import { createSilentLogger } from "@/lib/infra/logger";
import { escapeHtml } from "@/lib/output/markdown-html";

export type EmailProvider = "resend" | "sendgrid";

export interface EmailNotifierOptions {
  provider?: string;
  apiKey?: string;
  from?: string;
  to?: string;
  timeoutSeconds?: number;
  logger?: Logger;
}

const RESEND_ENDPOINT = "https://api.resend.com/emails";
const SENDGRID_ENDPOINT = "https://api.sendgrid.com/v3/mail/send";

function parseProvider(raw: string | undefined): EmailProvider | null {
  const value = String(raw || "").trim().toLowerCase();
  if (value === "resend" || value === "sendgrid") return value;
  return null;
}

export function buildNotificationSubject(articles: NotificationArticle[]): string {
  return articles.length === 1 ? "1 new article found" : `${articles.length} new articles found`;
}

export function buildNotificationText(articles: NotificationArticle[]): string {
  const lines = ["New articles found", "", `The monitor found ${articles.length} new article(s).`, ""];
  articles.forEach((article, index) => {
    lines.push(`${index + 1}. ${article.title}`);
    lines.push(`   Source: ${article.source}`);
    lines.push(`   URL: ${article.url}`);
    lines.push("");
  });
  return lines.join("\n");
}

export function buildNotificationHtml(articles: NotificationArticle[]): string {
  const items = articles
    .map((article) => {
      const url = escapeHtml(article.url);
      return [
        '<div style="margin-bottom:1.5rem;padding:1rem;background:#f5f5f5;border-left:3px solid #667eea;">',
        `<h3 style="margin:0 0 0.5rem 0;"><a href="${url}">${escapeHtml(article.title)}</a></h3>`,
        `<div style="color:#6b7280;"><strong>Source:</strong> ${escapeHtml(article.source)}</div>`,
        "</div>",
      ].join("");
    })
    .join("\n");

  return [
    "<!DOCTYPE html>",
    '<html><head><meta charset="UTF-8"></head><body>',
    '<div style="max-width:600px;margin:0 auto;padding:2rem;font-family:sans-serif;">',
    "<h1>New articles found</h1>",
    `<p>The monitor found <strong>${articles.length}</strong> new article(s).</p>`,
    items,
    "</div></body></html>",
  ].join("\n");
}

export class EmailNotifier implements Notifier {
  readonly provider: EmailProvider | null;

  readonly enabled: boolean;

  private readonly apiKey: string;

  private readonly from: string;

  private readonly to: string;

  private readonly timeoutMs: number;

  private readonly logger: Logger;

  constructor(options: EmailNotifierOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
    this.provider = parseProvider(options.provider);
    this.apiKey = String(options.apiKey || "").trim();
    this.from = String(options.from || "").trim() || "noreply@example.com";
    this.to = String(options.to || "").trim();
    this.timeoutMs = Math.max(1_000, Math.trunc((options.timeoutSeconds ?? 10) * 1_000));
    this.enabled = Boolean(this.provider && this.apiKey && this.to);

    if (options.provider && !this.provider) {
      this.logger.warn(`unsupported email provider: ${options.provider}`);
    }
  }

  private payload(subject: string, html: string, text: string): Record<string, unknown> {
    if (this.provider === "sendgrid") {
      return {
        personalizations: [{ to: [{ email: this.to }] }],
        from: { email: this.from },
        subject,
        content: [
          { type: "text/plain", value: text },
          { type: "text/html", value: html },
        ],
      };
    }
    return { from: this.from, to: [this.to], subject, html, text };
  }

  async sendNewArticlesNotification(articles: NotificationArticle[]): Promise<boolean> {
    if (!this.enabled || !articles.length) {
      return false;
    }

    const endpoint = this.provider === "sendgrid" ? SENDGRID_ENDPOINT : RESEND_ENDPOINT;
    const body = this.payload(
      buildNotificationSubject(articles),
      buildNotificationHtml(articles),
      buildNotificationText(articles),
    );

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await fetch(endpoint, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      if (!response.ok) {
        const text = await response.text();
        this.logger.error(`email via ${this.provider} failed (${response.status}): ${text.slice(0, 200)}`);
        return false;
      }
      this.logger.info(`email sent via ${this.provider} to ${this.to}`);
      return true;
    } catch (error) {
      this.logger.error(`email via ${this.provider} failed`, error);
      return false;
    } finally {
      clearTimeout(timer);
    }
  }
}
