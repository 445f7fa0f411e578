/**
 * Operational notifications: every event is logged at its severity. Events at
 * or above `forwardMinSeverity` (default warning) are also forwarded to the
 * Telegram log bot in the background when one is configured.
 */

import { logger } from "../logger";
import type { Notifier, Severity } from "../types";

interface TelegramSendResult {
  ok: boolean;
  result?: {
    message_id: number;
  };
  description?: string;
}

export interface TelegramNotifierOptions {
  botToken: string;
  chatId: string;
  dryRun: boolean;
  forwardMinSeverity?: Severity;
  fetchFn?: typeof fetch;
}

export interface SendResult {
  success: boolean;
  messageId?: number;
  error?: string;
}

const SEVERITY_ICONS: Record<Severity, string> = {
  info: "ℹ️",
  warning: "⚠️",
  critical: "🚨",
};

const SEVERITY_RANK: Record<Severity, number> = {
  info: 0,
  warning: 1,
  critical: 2,
};

const MAX_DETAIL_LENGTH = 500;

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function isTelegramSendResult(value: unknown): value is TelegramSendResult {
  return (
    typeof value === "object" &&
    value !== null &&
    "ok" in value &&
    typeof value.ok === "boolean"
  );
}

function formatDetailValue(value: unknown): string {
  const text = typeof value === "string" ? value : JSON.stringify(value);
  const safe = text ?? String(value);
  return safe.length > MAX_DETAIL_LENGTH
    ? `${safe.slice(0, MAX_DETAIL_LENGTH)}...`
    : safe;
}

export function formatNotification(
  errorType: string,
  message: string,
  details: Record<string, unknown> | undefined,
  severity: Severity,
): string {
  const lines = [
    `${SEVERITY_ICONS[severity]} <b>${escapeHtml(errorType)}</b> (${severity})`,
    escapeHtml(message),
  ];

  for (const [key, value] of Object.entries(details ?? {})) {
    if (value === undefined) continue;
    lines.push(
      `<b>${escapeHtml(key)}:</b> ${escapeHtml(formatDetailValue(value))}`,
    );
  }

  return lines.join("\n");
}

export class TelegramNotifier implements Notifier {
  private readonly pending = new Set<Promise<SendResult>>();
  private readonly fetchFn: typeof fetch;
  private readonly forwardMinSeverity: Severity;

  constructor(private readonly options: TelegramNotifierOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.forwardMinSeverity = options.forwardMinSeverity ?? "warning";
  }

  get configured(): boolean {
    return Boolean(this.options.botToken && this.options.chatId);
  }

  notify(
    errorType: string,
    message: string,
    details?: Record<string, unknown>,
    severity: Severity = "warning",
  ): void {
    const line = `[${errorType}] ${message}`;
    if (severity === "critical") {
      logger.error(line, details ?? {});
    } else if (severity === "warning") {
      logger.warn(line, details ?? {});
    } else {
      logger.info(line, details ?? {});
    }

    if (!this.configured) return;
    if (SEVERITY_RANK[severity] < SEVERITY_RANK[this.forwardMinSeverity]) return;

    const text = formatNotification(errorType, message, details, severity);
    const delivery = this.sendMessage(text);
    this.pending.add(delivery);
    delivery
      .finally(() => this.pending.delete(delivery))
      .catch((error: unknown) =>
        logger.error(`Notification bookkeeping failed: ${String(error)}`),
      );
  }

  /** Wait for in-flight deliveries. */
  async flush(): Promise<void> {
    await Promise.allSettled([...this.pending]);
  }

  async sendMessage(text: string): Promise<SendResult> {
    if (this.options.dryRun) {
      logger.info(`[DRY RUN] Would send to log bot:`);
      logger.info(text.substring(0, 200) + (text.length > 200 ? "..." : ""));
      return { success: true, messageId: 0 };
    }

    try {
      const response = await this.fetchFn(
        `https://api.telegram.org/bot${this.options.botToken}/sendMessage`,
        {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({
            chat_id: this.options.chatId,
            text,
            parse_mode: "HTML",
            disable_web_page_preview: true,
          }),
        },
      );

      const result: unknown = await response.json();

      if (!isTelegramSendResult(result) || !result.ok) {
        throw new Error(
          (isTelegramSendResult(result) && result.description) ||
            `Telegram API error (HTTP ${response.status})`,
        );
      }

      return { success: true, messageId: result.result?.message_id };
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      logger.error(`Telegram log send failed: ${errorMsg}`);
      return { success: false, error: errorMsg };
    }
  }
}
