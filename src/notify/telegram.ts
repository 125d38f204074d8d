/**
 * Telegram notification channel.
 *
 * Uses the Telegram Bot API directly (no dependencies). Approval prompts
 * carry inline Approve / Reject buttons whose callback data is
 * `approve:<id>` / `reject:<id>`; the listener service handles the taps.
 */

import { z } from 'zod';
import { config } from '../config.js';
import { formatApprovalPrompt } from '../engine/format.js';
import type { NotificationChannel } from '../engine/notifier.js';
import type { Issue, RemediationPlan } from '../engine/types.js';

export interface TelegramSendResult {
  ok: boolean;
  messageId?: number;
  error?: string;
}

interface InlineKeyboardButton {
  text: string;
  callback_data: string;
}

interface SendOptions {
  chatId?: string | number;
  parseMode?: 'HTML' | 'Markdown' | '';
  buttons?: InlineKeyboardButton[][];
}

const sendResponseSchema = z.object({
  ok: z.boolean(),
  result: z.object({ message_id: z.number() }).optional(),
  description: z.string().optional(),
});

/**
 * Send a message via Telegram Bot API.
 * Exported so the listener service can reply to commands.
 */
export async function sendTelegramMessage(text: string, opts: SendOptions = {}): Promise<TelegramSendResult> {
  const token = config.telegramBotToken;
  if (!token) {
    return { ok: false, error: 'TELEGRAM_BOT_TOKEN not configured' };
  }

  const targetChatId = opts.chatId || config.telegramChatId;
  if (!targetChatId) {
    return { ok: false, error: 'No chat ID provided and TELEGRAM_CHAT_ID not configured' };
  }

  try {
    const body: Record<string, unknown> = {
      chat_id: targetChatId,
      text,
    };
    if (opts.parseMode) {
      body.parse_mode = opts.parseMode;
    }
    if (opts.buttons) {
      body.reply_markup = { inline_keyboard: opts.buttons };
    }

    const response = await fetch(`https://api.telegram.org/bot${token}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(10000),
    });

    const parsed = sendResponseSchema.safeParse(await response.json());
    if (!parsed.success || !parsed.data.ok) {
      return { ok: false, error: (parsed.success && parsed.data.description) || 'Telegram API error' };
    }
    const result = parsed.data;

    return { ok: true, messageId: result.result?.message_id };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[Telegram] Send failed: ${message}`);
    return { ok: false, error: message };
  }
}

export class TelegramNotifier implements NotificationChannel {
  readonly name = 'telegram';

  get enabled(): boolean {
    return Boolean(config.telegramBotToken && config.telegramChatId);
  }

  async notify(text: string): Promise<void> {
    if (!this.enabled) return;
    const result = await sendTelegramMessage(text);
    if (!result.ok) {
      throw new Error(result.error ?? 'Telegram send failed');
    }
  }

  async requestApproval(issue: Issue, approvalId: string, plan: RemediationPlan): Promise<void> {
    if (!this.enabled) return;
    const result = await sendTelegramMessage(formatApprovalPrompt(issue, approvalId, plan), {
      buttons: [[
        { text: '✅ Approve', callback_data: `approve:${approvalId}` },
        { text: '❌ Reject', callback_data: `reject:${approvalId}` },
      ]],
    });
    if (!result.ok) {
      throw new Error(result.error ?? 'Telegram send failed');
    }
  }
}
