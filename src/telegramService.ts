import TelegramBot from "node-telegram-bot-api";
import { errorMessage } from "./errors";
import { logger } from "./logger";
import { ChangeReport } from "./scheduleDiffer";
import {
  CanonicalEvent,
  ComparedField,
  EVENT_TYPE_LABELS,
  EventType,
  ModifiedEvent,
} from "./types";

const log = logger.child("telegram");

export interface NotificationContext {
  venue: string;
  windowDays: number;
  detectedAt: string;
}

export interface ChangeNotifier {
  notify(report: ChangeReport, context: NotificationContext): Promise<boolean>;
}

/** The slice of the bot API used here; lets tests stand in for Telegram. */
export interface MessageSender {
  sendMessage(
    chatId: string,
    text: string,
    options?: TelegramBot.SendMessageOptions
  ): Promise<unknown>;
}

export interface TelegramServiceOptions {
  /** Log the message instead of sending it. */
  dryRun?: boolean;
  sender?: MessageSender;
}

/** Telegram rejects `sendMessage` text longer than this. */
export const MAX_MESSAGE_LENGTH = 4096;

const FIELD_LABELS: Record<ComparedField, string> = {
  title: "Team",
  endTime: "End",
  eventType: "Type",
  venue: "Venue",
};

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function typeLabel(type: EventType): string {
  return EVENT_TYPE_LABELS[type];
}

function eventLine(event: CanonicalEvent): string {
  const league = event.league ? ` (${escapeHtml(event.league)})` : "";
  return `• ${event.date} ${event.startTime}-${event.endTime} · ${typeLabel(event.eventType)} · ${escapeHtml(event.title)}${league}`;
}

function fieldValue(field: ComparedField, event: CanonicalEvent): string {
  return field === "eventType" ? typeLabel(event.eventType) : escapeHtml(event[field]);
}

function modifiedLines(change: ModifiedEvent): string[] {
  return [
    eventLine(change.current),
    ...change.changedFields.map(
      (field) =>
        `   ${FIELD_LABELS[field]}: ${fieldValue(field, change.previous)} → ${fieldValue(field, change.current)}`
    ),
  ];
}

/**
 * Packs lines into as few messages as fit the length limit, never splitting a
 * line. A single line longer than the limit is cut.
 */
export function splitMessage(lines: readonly string[], limit = MAX_MESSAGE_LENGTH): string[] {
  const chunks: string[] = [];
  let current = "";

  for (const raw of lines) {
    const line = raw.length > limit ? `${raw.slice(0, limit - 1)}…` : raw;
    if (current.length === 0) {
      current = line;
    } else if (current.length + 1 + line.length <= limit) {
      current += `\n${line}`;
    } else {
      chunks.push(current);
      current = line.replace(/^\n+/, "");
    }
  }

  if (current.length > 0) {
    chunks.push(current);
  }
  return chunks;
}

export class TelegramService implements ChangeNotifier {
  private readonly sender: MessageSender;
  private readonly chatId: string;
  private readonly dryRun: boolean;

  constructor(botToken: string, chatId: string, options: TelegramServiceOptions = {}) {
    if (!botToken || !chatId) {
      throw new Error("TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID are required");
    }
    this.chatId = chatId;
    this.dryRun = options.dryRun ?? false;
    this.sender = options.sender ?? new TelegramBot(botToken, { polling: false });
    log.info(`TelegramService initialized${this.dryRun ? " (dry run)" : ""}`);
  }

  /**
   * Formats a change report into a Telegram HTML message
   */
  formatReport(report: ChangeReport, context: NotificationContext): string {
    return this.reportLines(report, context).join("\n");
  }

  /**
   * Same report cut into messages that each fit Telegram's length limit
   */
  formatMessages(report: ChangeReport, context: NotificationContext): string[] {
    return splitMessage(this.reportLines(report, context));
  }

  private reportLines(report: ChangeReport, context: NotificationContext): string[] {
    const lines: string[] = [];

    lines.push(`🏒 <b>Schedule changes at ${escapeHtml(context.venue)}</b>`);
    lines.push(`📅 Next ${context.windowDays} days, checked ${escapeHtml(context.detectedAt)}`);

    if (report.added.length > 0) {
      lines.push("\n➕ <b>Added</b>");
      report.added.forEach((event) => lines.push(eventLine(event)));
    }

    if (report.removed.length > 0) {
      lines.push("\n➖ <b>Removed</b>");
      report.removed.forEach((event) => lines.push(eventLine(event)));
    }

    if (report.modified.length > 0) {
      lines.push("\n🔄 <b>Modified</b>");
      report.modified.forEach((change) => lines.push(...modifiedLines(change)));
    }

    lines.push(`\n<b>Summary:</b> ${report.summary()}`);

    return lines;
  }

  async notify(report: ChangeReport, context: NotificationContext): Promise<boolean> {
    const messages = this.formatMessages(report, context);

    if (this.dryRun) {
      log.info(`Dry run, message for chat ${this.chatId}:\n${messages.join("\n")}`);
      return true;
    }

    try {
      for (const message of messages) {
        await this.sender.sendMessage(this.chatId, message, {
          parse_mode: "HTML",
          disable_web_page_preview: true,
        });
      }

      log.info(
        `Successfully sent change report to Telegram chat ${this.chatId} in ${messages.length} message(s)`
      );
      return true;
    } catch (error) {
      log.error(`Failed to send message to Telegram: ${errorMessage(error)}`, error);
      return false;
    }
  }
}
