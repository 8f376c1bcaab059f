// ===========================================
// MODULE 5: TELEGRAM NOTIFIER
// Alert formatting, delivery and optional chat commands
// ===========================================

import TelegramBot from 'node-telegram-bot-api';
import { componentLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { Notifier } from './notification-queue.js';
import type { AlertRecord, BotStatus, ScanSummary, ThresholdConfig } from '../types/index.js';

const log = componentLogger('telegram');

// ============ FORMATTING ============

/**
 * Escape the characters legacy Markdown treats as entity delimiters
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, '\\$1');
}

export function formatUsd(value: number): string {
  return `$${value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

export function formatSignedPct(value: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(2)}%`;
}

export function formatRatio(value: number): string {
  return Number.isFinite(value) ? value.toFixed(2) : '∞';
}

function formatTimestamp(iso: string): string {
  return `${iso.replace('T', ' ').slice(0, 19)} UTC`;
}

export function formatTokenAlert(alert: AlertRecord): string {
  const { candidate, safetyScore, isValid } = alert;

  const priceEmoji = candidate.priceChangePct24h > 50 ? '🚀' : candidate.priceChangePct24h > 0 ? '📈' : '📉';
  const volumeEmoji = candidate.volume24hUsd > 1_000_000 ? '💹' : '📊';
  const safetyEmoji = safetyScore >= 80 ? '🔒' : safetyScore >= 50 ? '⚠️' : '🔴';
  const verifiedEmoji = isValid ? '✅' : '❌';

  return [
    '🚨 *New Solana Token Alert* 🚨',
    '',
    `*${escapeMarkdown(candidate.name)} (${escapeMarkdown(candidate.symbol)})*`,
    '',
    `💰 Market Cap: ${formatUsd(candidate.marketCapUsd)}`,
    `${volumeEmoji} 24h Volume: ${formatUsd(candidate.volume24hUsd)}`,
    `${priceEmoji} Price Change: ${formatSignedPct(candidate.priceChangePct24h)}`,
    `💧 Liquidity: ${formatUsd(candidate.liquidityUsd)}`,
    `🔄 Buy/Sell Ratio: ${formatRatio(candidate.buySellRatio)}`,
    `${safetyEmoji} Safety Score: ${safetyScore}/100`,
    `${verifiedEmoji} *Solana Verified*: ${isValid}`,
    '',
    `📝 Contract: \`${candidate.address}\``,
    `🔗 [View on DexScreener](${candidate.sourceUrl})`,
    '',
    `_Alert time: ${formatTimestamp(alert.timestamp)}_`,
  ].join('\n');
}

export function formatThresholdsMessage(thresholds: ThresholdConfig): string {
  return [
    '⚙️ *Current Thresholds*',
    '',
    `💰 Min Market Cap: ${formatUsd(thresholds.minMarketCap)}`,
    `📊 Min 24h Volume: ${formatUsd(thresholds.minVolume)}`,
    `📈 Min Price Change: ${thresholds.minPriceChangePct.toFixed(2)}%`,
    `💧 Min Liquidity: ${formatUsd(thresholds.minLiquidity)}`,
    `🔄 Min Buy/Sell Ratio: ${thresholds.minBuySellRatio.toFixed(2)}`,
    `🔒 Min Safety Score: ${thresholds.minSafetyScore}/100`,
  ].join('\n');
}

export function formatStatusMessage(status: BotStatus): string {
  return [
    '🤖 *Bot Status*',
    '',
    `▶️ Status: ${status.enabled ? 'Enabled' : 'Disabled'}`,
    `🧪 Test Mode: ${status.testMode ? 'On' : 'Off'}`,
    `⏱️ Check Interval: ${status.checkIntervalMinutes} minutes`,
    `✅ Processed Tokens: ${status.processedCount}`,
    `📬 Queued Alerts: ${status.queueDepth}`,
    `🕒 Last Scan: ${status.lastRunAt ? formatTimestamp(status.lastRunAt) : 'Never'}`,
  ].join('\n');
}

export function formatStartupMessage(info: {
  startedAt: string;
  enabled: boolean;
  checkIntervalMinutes: number;
  processedCount: number;
}): string {
  return [
    '🚀 *Solana Token Bot Started*',
    '',
    `🕒 *Time*: ${formatTimestamp(info.startedAt)}`,
    `▶️ *Status*: ${info.enabled ? 'Enabled' : 'Disabled'}`,
    `⏱️ *Check Interval*: ${info.checkIntervalMinutes} minutes`,
    `✅ *Total Processed Tokens*: ${info.processedCount}`,
  ].join('\n');
}

export function formatIntervalChangeMessage(minutes: number): string {
  return `⚙️ The Solana Token Bot check interval has been updated to ${minutes} minutes`;
}

export const INTEGRATION_TEST_MESSAGE =
  '🧪 *API Integration Test*\n\nThis is a test message to verify Telegram API integration is working.';

export function formatIntegrationsWorkingMessage(verifiedAt: string): string {
  return [
    '🟢 *All API Integrations Working!*',
    '',
    '✅ DexScreener: Working',
    '✅ RugCheck: Working',
    '✅ Solana Verification: Working',
    '✅ Telegram: Working',
    '',
    `_Verified at ${formatTimestamp(verifiedAt)}_`,
  ].join('\n');
}

export function formatScanReply(summary: ScanSummary): string {
  return `🔍 Scan complete: ${summary.alerted} alert(s) from ${summary.candidates} candidates`;
}

// ============ COMMANDS ============

export type BotCommand = 'status' | 'thresholds' | 'scan';

export interface CommandHandlers {
  getStatus(): BotStatus;
  getThresholds(): ThresholdConfig;
  runScan(): Promise<ScanSummary>;
}

export async function handleCommand(command: BotCommand, handlers: CommandHandlers): Promise<string> {
  switch (command) {
    case 'status':
      return formatStatusMessage(handlers.getStatus());
    case 'thresholds':
      return formatThresholdsMessage(handlers.getThresholds());
    case 'scan':
      return formatScanReply(await handlers.runScan());
  }
}

// ============ NOTIFIER ============

export interface TelegramTransport {
  sendMessage(chatId: string, text: string, options?: TelegramBot.SendMessageOptions): Promise<unknown>;
}

export interface TelegramNotifierOptions {
  token: string;
  chatId: string;
  transport?: TelegramTransport;
}

const MESSAGE_OPTIONS: TelegramBot.SendMessageOptions = {
  parse_mode: 'Markdown',
  disable_web_page_preview: true,
};

export class TelegramNotifier implements Notifier {
  private readonly chatId: string;
  private readonly bot: TelegramBot | null;
  private readonly transport: TelegramTransport | null;
  private polling = false;

  constructor(options: TelegramNotifierOptions) {
    this.chatId = options.chatId;
    this.bot = options.token ? new TelegramBot(options.token, { polling: false }) : null;
    this.transport = options.transport ?? this.bot;

    if (!this.transport || !this.chatId) {
      log.warn('Telegram bot token or chat id not configured - alerts will be logged only');
    }
  }

  get isConfigured(): boolean {
    return this.transport !== null && this.chatId !== '';
  }

  async sendMessage(text: string): Promise<boolean> {
    if (!this.transport || !this.chatId) {
      log.info({ text }, 'Telegram not configured, message logged only');
      return true;
    }

    try {
      await this.transport.sendMessage(this.chatId, text, MESSAGE_OPTIONS);
      return true;
    } catch (error) {
      log.error({ error: errorMessage(error) }, 'Failed to send Telegram message');
      return false;
    }
  }

  async sendTokenAlert(alert: AlertRecord): Promise<boolean> {
    const delivered = await this.sendMessage(formatTokenAlert(alert));
    if (delivered) {
      log.info({ symbol: alert.candidate.symbol, address: alert.candidate.address }, 'Token alert sent');
    }
    return delivered;
  }

  /**
   * Answer /status, /thresholds and /scan from the configured chat
   */
  startCommands(handlers: CommandHandlers): void {
    const bot = this.bot;
    if (!bot) {
      log.warn('Telegram commands requested without a bot token');
      return;
    }

    const commands: BotCommand[] = ['status', 'thresholds', 'scan'];
    for (const command of commands) {
      bot.onText(new RegExp(`^/${command}(@\\w+)?$`), (msg) => {
        if (String(msg.chat.id) !== this.chatId) return;
        this.reply(command, handlers).catch((error: unknown) => {
          log.error({ command, error: errorMessage(error) }, 'Telegram command failed');
        });
      });
    }

    bot.on('polling_error', (error: Error) => {
      log.error({ error: error.message }, 'Telegram polling error');
    });

    bot.startPolling().then(
      () => {
        this.polling = true;
        log.info('Telegram command polling started');
      },
      (error: unknown) => log.error({ error: errorMessage(error) }, 'Failed to start Telegram polling')
    );
  }

  async stop(): Promise<void> {
    if (this.bot && this.polling) {
      await this.bot.stopPolling();
      this.polling = false;
    }
  }

  private async reply(command: BotCommand, handlers: CommandHandlers): Promise<void> {
    const text = await handleCommand(command, handlers);
    await this.sendMessage(text);
  }
}
