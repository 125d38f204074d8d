/**
 * Telegram polling listener service.
 *
 * Polls the Telegram Bot API `getUpdates` endpoint for operator commands and
 * inline-button taps, runs them against the remediation engine and replies
 * in the same chat. Only the configured TELEGRAM_CHAT_ID is served.
 *
 * Commands: /issues, /stats, /actions [n], /ack <id>, /silence <id> [minutes],
 * /approve <id>, /reject <id>, /predictions, /report, /help
 * Callbacks: approve:<id>, reject:<id>
 */

import { z } from 'zod';
import { config } from '../config.js';
import type { RemediationEngine } from '../engine/engine.js';
import { errorMessage } from '../engine/errors.js';
import {
  formatHealthReport,
  formatIssueList,
  formatPredictionReport,
  formatStats,
} from '../engine/format.js';
import { shortId } from '../engine/lookup.js';
import { sendTelegramMessage } from '../notify/telegram.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

const userSchema = z.object({
  id: z.number(),
  first_name: z.string().default('User'),
  username: z.string().optional(),
});

const messageSchema = z.object({
  message_id: z.number(),
  from: userSchema.optional(),
  chat: z.object({ id: z.number(), type: z.string() }),
  text: z.string().optional(),
});

const updateSchema = z.object({
  update_id: z.number(),
  message: messageSchema.optional(),
  callback_query: z
    .object({
      id: z.string(),
      from: userSchema,
      message: messageSchema.optional(),
      data: z.string().optional(),
    })
    .optional(),
});

type TelegramUpdate = z.infer<typeof updateSchema>;

const getUpdatesSchema = z.object({
  ok: z.boolean(),
  result: z.array(z.unknown()).optional(),
  description: z.string().optional(),
});

export type CommandHandler = (text: string, actor: string) => Promise<string>;
export type CallbackHandler = (data: string, actor: string) => string;

// ---------------------------------------------------------------------------
// Bot command handlers
// ---------------------------------------------------------------------------

const HELP_TEXT = [
  '🛠️ Remediation bot',
  '',
  'Commands:',
  '/issues - List active issues',
  '/stats - Issue and remediation statistics',
  '/actions [n] - Last n remediation actions (default 10)',
  '/ack <id> - Acknowledge an issue',
  '/silence <id> [minutes] - Silence an issue (default 60 minutes)',
  '/approve <id> - Approve a pending remediation',
  '/reject <id> - Reject a pending remediation',
  '/predictions - Predicted issues',
  '/report - Health report',
  '/help - Show this help',
  '',
  'Ids can be shortened to any unambiguous prefix.',
].join('\n');

const DEFAULT_SILENCE_MINUTES = 60;
const MAX_ACTIONS_LISTED = 50;

function usage(command: string): string {
  return `Usage: ${command} <id>`;
}

/**
 * Build the command dispatcher for an engine. Returns the reply text for any
 * input, including a hint for unknown commands.
 */
export function createCommandHandler(engine: RemediationEngine): CommandHandler {
  return async (text: string, actor: string): Promise<string> => {
    const [cmd = '', ...args] = text.trim().split(/\s+/);
    const command = cmd.toLowerCase().replace(/@\w+$/, ''); // strip @botname suffix
    const id = args[0];

    switch (command) {
      case '/start':
      case '/help':
        return HELP_TEXT;

      case '/issues':
        return formatIssueList(engine.getActiveIssues());

      case '/stats': {
        const stats = engine.getStats();
        return formatStats(stats.issues, stats.remediation, stats.remediation.requireApproval);
      }

      case '/actions': {
        const requested = args[0] ? parseInt(args[0], 10) : 10;
        const limit = Number.isInteger(requested) && requested > 0 ? Math.min(requested, MAX_ACTIONS_LISTED) : 10;
        const actions = engine.getRecentActions(limit);
        if (actions.length === 0) return 'No remediation actions recorded.';
        return actions
          .map((a) => {
            const detail = a.error ?? a.result;
            return `${shortId(a.actionId)} ${a.actionType} ${a.target} [${a.status}]${detail ? ` - ${detail}` : ''}`;
          })
          .join('\n');
      }

      case '/ack': {
        if (!id) return usage('/ack');
        const found = engine.dedup.find(id);
        if (found.kind === 'not_found') return `No active issue matches "${id}"`;
        if (found.kind === 'ambiguous') return `"${id}" matches ${found.matches.length} issues; use a longer id`;
        const issue = await engine.acknowledge(id, actor);
        return issue
          ? `👀 Acknowledged ${issue.name} on ${issue.component}`
          : `Issue ${shortId(found.id)} is not firing (status ${found.value.status})`;
      }

      case '/silence': {
        if (!id) return `${usage('/silence')} [minutes]`;
        const minutes = args[1] ? parseInt(args[1], 10) : DEFAULT_SILENCE_MINUTES;
        if (!Number.isInteger(minutes) || minutes <= 0) return 'Minutes must be a positive whole number';
        const found = engine.dedup.find(id);
        if (found.kind === 'not_found') return `No active issue matches "${id}"`;
        if (found.kind === 'ambiguous') return `"${id}" matches ${found.matches.length} issues; use a longer id`;
        const issue = await engine.silence(id, minutes);
        return issue ? `🔕 Silenced ${issue.name} on ${issue.component} for ${minutes}m` : `Could not silence ${shortId(found.id)}`;
      }

      case '/approve':
      case '/reject':
        if (!id) return usage(command);
        return engine.resolveApproval(id, command === '/approve', actor).message;

      case '/predictions':
        return formatPredictionReport(engine.getPredictions());

      case '/report':
        return formatHealthReport(engine.getHealthReport());

      default:
        return `Unknown command ${command}. Type /help for the list.`;
    }
  };
}

/** Inline-button taps: `approve:<id>` or `reject:<id>`. */
export function createCallbackHandler(engine: RemediationEngine): CallbackHandler {
  return (data: string, actor: string): string => {
    const [verb, id] = data.split(':', 2);
    if (!id || (verb !== 'approve' && verb !== 'reject')) {
      return 'Unknown action';
    }
    return engine.resolveApproval(id, verb === 'approve', actor).message;
  };
}

// ---------------------------------------------------------------------------
// Telegram API helpers
// ---------------------------------------------------------------------------

async function callTelegram(method: string, body: Record<string, unknown>, timeoutMs: number): Promise<unknown> {
  const res = await fetch(`https://api.telegram.org/bot${config.telegramBotToken}/${method}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
    signal: AbortSignal.timeout(timeoutMs),
  });
  return res.json();
}

async function getUpdates(offset: number): Promise<TelegramUpdate[]> {
  try {
    const raw = await callTelegram(
      'getUpdates',
      {
        offset,
        timeout: 25, // long poll: Telegram holds the connection up to 25s
        allowed_updates: ['message', 'callback_query'],
      },
      35_000, // 25s Telegram timeout + 10s buffer
    );
    const data = getUpdatesSchema.safeParse(raw);
    if (!data.success || !data.data.ok) {
      console.error(`[TelegramListener] getUpdates error: ${data.success ? data.data.description : 'malformed response'}`);
      return [];
    }
    return (data.data.result ?? []).flatMap((item) => {
      const update = updateSchema.safeParse(item);
      return update.success ? [update.data] : [];
    });
  } catch (err) {
    console.error(`[TelegramListener] getUpdates fetch failed: ${errorMessage(err)}`);
    return [];
  }
}

async function answerCallbackQuery(callbackId: string, text: string): Promise<void> {
  await callTelegram('answerCallbackQuery', { callback_query_id: callbackId, text: text.slice(0, 200) }, 5_000);
}

export function splitMessage(text: string, maxLen: number): string[] {
  if (text.length <= maxLen) return [text];
  const chunks: string[] = [];
  let remaining = text;
  while (remaining.length > 0) {
    if (remaining.length <= maxLen) {
      chunks.push(remaining);
      break;
    }
    // Try to split at a newline
    let splitIdx = remaining.lastIndexOf('\n', maxLen);
    if (splitIdx < maxLen * 0.5) {
      // No good newline, split at space
      splitIdx = remaining.lastIndexOf(' ', maxLen);
    }
    if (splitIdx < maxLen * 0.3) {
      // No good split point, force split
      splitIdx = maxLen;
    }
    chunks.push(remaining.substring(0, splitIdx));
    remaining = remaining.substring(splitIdx).trimStart();
  }
  return chunks;
}

function isAuthorizedChat(chatId: number): boolean {
  return String(chatId) === config.telegramChatId;
}

// ---------------------------------------------------------------------------
// Listener
// ---------------------------------------------------------------------------

export class TelegramListener {
  private pollTimer: ReturnType<typeof setTimeout> | null = null;
  private offset = 0;
  private running = false;
  private readonly handleCommand: CommandHandler;
  private readonly handleCallback: CallbackHandler;

  constructor(engine: RemediationEngine) {
    this.handleCommand = createCommandHandler(engine);
    this.handleCallback = createCallbackHandler(engine);
  }

  start(): void {
    if (!config.telegramListenerEnabled) {
      console.log('[TelegramListener] Disabled via TELEGRAM_LISTENER_ENABLED=false');
      return;
    }

    if (!config.telegramBotToken || !config.telegramChatId) {
      console.log('[TelegramListener] TELEGRAM_BOT_TOKEN or TELEGRAM_CHAT_ID not configured, skipping');
      return;
    }

    if (this.running) {
      console.log('[TelegramListener] Already running');
      return;
    }

    this.running = true;
    this.offset = 0;
    console.log(`[TelegramListener] Starting (poll gap: ${config.telegramPollingInterval}ms)`);
    this.schedule(0);
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
      this.pollTimer = null;
    }
    console.log('[TelegramListener] Stopped');
  }

  private schedule(delayMs: number): void {
    this.pollTimer = setTimeout(() => {
      this.poll().catch((err) => console.error('[TelegramListener] Poll error:', errorMessage(err)));
    }, delayMs);
  }

  private async poll(): Promise<void> {
    if (!this.running) return;

    const updates = await getUpdates(this.offset);
    for (const update of updates) {
      // Advance offset past this update (even if processing fails)
      this.offset = update.update_id + 1;
      this.handleUpdate(update).catch((err) =>
        console.error('[TelegramListener] Unhandled error in handleUpdate:', errorMessage(err)),
      );
    }

    // Telegram holds the connection, so only a small gap between polls
    if (this.running) {
      this.schedule(config.telegramPollingInterval);
    }
  }

  private async handleUpdate(update: TelegramUpdate): Promise<void> {
    const callback = update.callback_query;
    if (callback) {
      const chatId = callback.message?.chat.id;
      if (chatId === undefined || !isAuthorizedChat(chatId) || !callback.data) return;
      const actor = callback.from.username ?? callback.from.first_name;
      const reply = this.handleCallback(callback.data, actor);
      console.log(`[TelegramListener] Callback ${callback.data} from ${actor}: ${reply}`);
      await answerCallbackQuery(callback.id, reply);
      await sendTelegramMessage(reply, { chatId });
      return;
    }

    const msg = update.message;
    if (!msg?.text || !isAuthorizedChat(msg.chat.id)) return;

    const text = msg.text.trim();
    if (!text.startsWith('/')) return;

    const actor = msg.from?.username ?? msg.from?.first_name ?? 'operator';
    console.log(`[TelegramListener] Command from ${actor}: "${text.substring(0, 80)}"`);

    let reply: string;
    try {
      reply = await this.handleCommand(text, actor);
    } catch (err) {
      console.error(`[TelegramListener] Error handling "${text}": ${errorMessage(err)}`);
      reply = 'Sorry, that command failed. Please try again.';
    }

    // Telegram has a 4096 character limit per message; split if needed
    for (const chunk of splitMessage(reply, 4000)) {
      await sendTelegramMessage(chunk, { chatId: msg.chat.id });
    }
  }
}
