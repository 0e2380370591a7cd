/**
 * Telegram operator alerts.
 *
 * Delivery errors are logged, never thrown, and a send gives up after
 * ALERT_TIMEOUT_MS. With no bot token or chat id configured, alerts are only
 * logged.
 */
import type { TelegramConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';

export type AlertLevel = 'info' | 'warning' | 'critical';

export const ALERT_TIMEOUT_MS = 5_000;

export interface Alerts {
  alert(message: string, level?: AlertLevel): Promise<void>;
}

const PREFIX: Record<AlertLevel, string> = {
  info:     'ℹ️',
  warning:  '⚠️',
  critical: '🚨',
};

function escapeHtml(s: string): string {
  return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function formatAlert(message: string, level: AlertLevel): string {
  return `${PREFIX[level]} <b>${level.toUpperCase()}</b>\n${escapeHtml(message)}`;
}

export function createTelegramAlerts(cfg: TelegramConfig): Alerts {
  const { botToken, chatId } = cfg;

  if (!botToken || !chatId) {
    return {
      async alert(message, level = 'info') {
        logger.debug('Telegram: alerts disabled — not sent', { level, message });
      },
    };
  }

  return {
    async alert(message, level = 'info') {
      try {
        const res = await fetch(`https://api.telegram.org/bot${botToken}/sendMessage`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({
            chat_id:    chatId,
            text:       formatAlert(message, level),
            parse_mode: 'HTML',
          }),
          signal: AbortSignal.timeout(ALERT_TIMEOUT_MS),
        });
        if (!res.ok) {
          logger.warn('Telegram: sendMessage failed', { status: res.status });
        }
      } catch (err) {
        logger.warn('Telegram: unreachable', { error: errorMessage(err) });
      }
    },
  };
}
