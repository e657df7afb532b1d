import { afterEach, describe, expect, it } from "vitest";
import type { NotificationArticle } from "@/lib/domain/models";
import {
  buildNotificationHtml,
  buildNotificationSubject,
  buildNotificationText,
  EmailNotifier,
} from "@/lib/integrations/email-notifier";

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
});

const ARTICLES: NotificationArticle[] = [
  { url: "https://example.com/1", title: "One <b>bold</b>", source: "Example News" },
  { url: "https://example.com/2", title: "Two", source: "Other" },
];

interface SentMail {
  url: string;
  auth: string | null;
  body: unknown;
}

function stubMail(status = 200): SentMail[] {
  const sent: SentMail[] = [];
  globalThis.fetch = async (input: RequestInfo | URL, init?: RequestInit) => {
    sent.push({
      url: String(input),
      auth: new Headers(init?.headers).get("authorization"),
      body: JSON.parse(String(init?.body)),
    });
    return new Response(status === 200 ? "{}" : "rejected", { status });
  };
  return sent;
}

describe("notification content", () => {
  it("subject counts the articles", () => {
    expect(buildNotificationSubject(ARTICLES.slice(0, 1))).toBe("1 new article found");
    expect(buildNotificationSubject(ARTICLES)).toBe("2 new articles found");
  });

  it("text lists every article", () => {
    expect(buildNotificationText(ARTICLES.slice(1))).toBe(
      [
        "New articles found",
        "",
        "The monitor found 1 new article(s).",
        "",
        "1. Two",
        "   Source: Other",
        "   URL: https://example.com/2",
        "",
      ].join("\n"),
    );
  });

  it("html escapes titles", () => {
    const html = buildNotificationHtml(ARTICLES);
    expect(html).toContain('<a href="https://example.com/1">One &lt;b&gt;bold&lt;/b&gt;</a>');
    expect(html).toContain("<p>The monitor found <strong>2</strong> new article(s).</p>");
  });
});

describe("EmailNotifier", () => {
  it("is disabled without provider, key or recipient", async () => {
    const sent = stubMail();
    const notifier = new EmailNotifier({ provider: "resend", apiKey: "test-secret" });
    expect(notifier.enabled).toBe(false);
    expect(await notifier.sendNewArticlesNotification(ARTICLES)).toBe(false);
    expect(new EmailNotifier({ provider: "carrier-pigeon", apiKey: "test-secret", to: "ops@example.com" }).enabled).toBe(
      false,
    );
    expect(sent).toEqual([]);
  });

  it("sends through Resend", async () => {
    const sent = stubMail();
    const notifier = new EmailNotifier({ provider: "Resend", apiKey: "test-secret", to: "ops@example.com" });

    expect(await notifier.sendNewArticlesNotification(ARTICLES)).toBe(true);
    expect(sent).toHaveLength(1);
    expect(sent[0].url).toBe("https://api.resend.com/emails");
    expect(sent[0].auth).toBe("Bearer test-secret");
    expect(sent[0].body).toMatchObject({
      from: "noreply@example.com",
      to: ["ops@example.com"],
      subject: "2 new articles found",
      text: buildNotificationText(ARTICLES),
    });
  });

  it("sends through SendGrid", async () => {
    const sent = stubMail();
    const notifier = new EmailNotifier({
      provider: "sendgrid",
      apiKey: "test-secret",
      from: "feeds@example.com",
      to: "ops@example.com",
    });

    expect(await notifier.sendNewArticlesNotification(ARTICLES.slice(0, 1))).toBe(true);
    expect(sent[0].url).toBe("https://api.sendgrid.com/v3/mail/send");
    expect(sent[0].body).toMatchObject({
      personalizations: [{ to: [{ email: "ops@example.com" }] }],
      from: { email: "feeds@example.com" },
      subject: "1 new article found",
    });
  });

  it("returns false when the provider rejects the mail or there is nothing to send", async () => {
    const sent = stubMail(422);
    const notifier = new EmailNotifier({ provider: "resend", apiKey: "test-secret", to: "ops@example.com" });
    expect(await notifier.sendNewArticlesNotification(ARTICLES)).toBe(false);
    expect(await notifier.sendNewArticlesNotification([])).toBe(false);
    expect(sent).toHaveLength(1);
  });
});
