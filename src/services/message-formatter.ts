/**
 * Notification text builders (Telegram HTML parse mode)
 */

import { AlertEvent, AlertState, LastObservation, SettingsSnapshot } from '../types';

export interface ReportContext {
  symbol: string;
  settings: SettingsSnapshot;
  alertState: AlertState;
  observation: LastObservation;
  startedAt: number;
  now: number;
}

const USD_WHOLE = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

const USD_CENTS = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatUsd(value: number): string {
  return `$${USD_WHOLE.format(value)}`;
}

export function formatPrice(value: number): string {
  return `$${USD_CENTS.format(value)}`;
}

export function formatUptime(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${hours}h ${minutes}m`;
}

/**
 * Human-readable age of the last alert, "None" when nothing has fired
 */
export function formatLastAlert(state: AlertState, now: number): string {
  if (state.alertCount + state.whaleCount === 0) {
    return 'None';
  }

  const delta = Math.max(0, now - state.lastAlertTimestamp);
  if (delta < 60) {
    return `${Math.floor(delta)}s ago`;
  }
  if (delta < 3600) {
    return `${Math.floor(delta / 60)}m ago`;
  }
  return `${Math.floor(delta / 3600)}h ago`;
}

export function formatTimestamp(epochSeconds: number): string {
  return `${new Date(epochSeconds * 1000).toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function buildAlertMessage(event: AlertEvent, symbol: string): string {
  const { metrics, settings } = event;
  const label = escapeHtml(symbol);

  if (event.kind === 'HighVolume') {
    return [
      `🚨 <b>HIGH VOLUME ALERT #${event.sequence}</b>`,
      '',
      `📊 <b>${label}</b>: ${formatPrice(metrics.price)}`,
      `📈 <b>Volume (3 trades)</b>: ${formatUsd(metrics.recentVolume)}`,
      `📉 <b>Avg (60 trades)</b>: ${formatUsd(metrics.baselineAverage)}`,
      `⚡ <b>Ratio</b>: ${event.volumeRatio.toFixed(1)}x`,
      `📐 <b>Z-Score</b>: ${metrics.zScore.toFixed(2)}`,
      '',
      `⚙️ Settings: Z≥${settings.zThreshold} Vol≥${settings.volumeRatioThreshold}x`,
    ].join('\n');
  }

  return [
    `🐋 <b>WHALE DETECTED #${event.sequence}</b>`,
    '',
    `💰 <b>Large Volume</b>: ${formatUsd(metrics.recentVolume)}`,
    `📊 <b>${label}</b>: ${formatPrice(metrics.price)}`,
    `📐 <b>Z-Score</b>: ${metrics.zScore.toFixed(2)}`,
    `🎯 <b>Threshold</b>: ${formatUsd(settings.whaleThreshold)}`,
  ].join('\n');
}

export function buildStatusReport(context: ReportContext): string {
  const { settings, alertState } = context;

  return [
    `📊 <b>${escapeHtml(context.symbol)} Tracker Status</b>`,
    '',
    '<b>Settings:</b>',
    `• Z-Score Threshold: ${settings.zThreshold}`,
    `• Volume Multiplier: ${settings.volumeRatioThreshold}x`,
    `• Cooldown: ${settings.cooldownSeconds}s`,
    `• Whale Threshold: ${formatUsd(settings.whaleThreshold)}`,
    `• Status: ${settings.paused ? '⏸️ Paused' : '▶️ Active'}`,
    '',
    '<b>Statistics:</b>',
    `• Alerts sent: ${alertState.alertCount}`,
    `• Whale detections: ${alertState.whaleCount}`,
    `• Uptime: ${formatUptime(context.now - context.startedAt)}`,
    `• Last alert: ${formatLastAlert(alertState, context.now)}`,
    '',
    '<b>Last Values:</b>',
    `• Price: ${formatPrice(context.observation.price)}`,
    `• Volume (3 trades): ${formatUsd(context.observation.recentVolume)}`,
    `• Z-Score: ${context.observation.zScore.toFixed(2)}`,
    '',
    '<b>Commands:</b>',
    '/help - Show all commands',
    '/stats - Show statistics',
  ].join('\n');
}

export function buildStatsReport(context: ReportContext): string {
  const { settings, alertState, observation } = context;

  return [
    '📈 <b>Tracker Statistics</b>',
    '',
    '<b>Performance:</b>',
    `• Total alerts: ${alertState.alertCount}`,
    `• Whale detections: ${alertState.whaleCount}`,
    `• Uptime: ${formatUptime(context.now - context.startedAt)}`,
    `• Start time: ${formatTimestamp(context.startedAt)}`,
    `• Last alert: ${formatLastAlert(alertState, context.now)}`,
    '',
    '<b>Last Values:</b>',
    `• Price: ${formatPrice(observation.price)}`,
    `• Volume (3 trades): ${formatUsd(observation.recentVolume)}`,
    `• Z-Score: ${observation.zScore.toFixed(2)}`,
    '',
    '<b>Current Settings:</b>',
    `• Z-threshold: ${settings.zThreshold}`,
    `• Vol multiplier: ${settings.volumeRatioThreshold}x`,
    `• Cooldown: ${settings.cooldownSeconds}s`,
    `• Whale threshold: ${formatUsd(settings.whaleThreshold)}`,
    `• Status: ${settings.paused ? '⏸️ Paused' : '▶️ Active'}`,
  ].join('\n');
}

export function buildHelpMessage(): string {
  return [
    '📖 <b>Available Commands</b>',
    '',
    '<b>View Settings:</b>',
    '/status - Show current settings',
    '/stats - Show statistics',
    '',
    '<b>Modify Settings:</b>',
    '/z &lt;value&gt; - Set Z-score (0.5-20)',
    '  Example: /z 3.5',
    '',
    '/vol &lt;value&gt; - Set volume multiplier (1-100)',
    '  Example: /vol 2.5',
    '',
    '/cooldown &lt;seconds&gt; - Set cooldown (10-3600)',
    '  Example: /cooldown 60',
    '',
    '/whale &lt;amount&gt; - Set whale threshold (min 10000)',
    '  Example: /whale 100000',
    '',
    '<b>Control:</b>',
    '/pause - Pause alerts',
    '/resume - Resume alerts',
    '/test - Send test notification',
  ].join('\n');
}

export function buildTestMessage(now: number): string {
  return [
    '🧪 <b>Test Alert</b>',
    '',
    'If you see this, notifications are working!',
    `Time: ${formatTimestamp(now)}`,
  ].join('\n');
}

export function buildStartupMessage(symbol: string, settings: SettingsSnapshot): string {
  return [
    '🟢 <b>Volume Tracker Started</b>',
    '',
    `<b>Monitoring:</b> ${escapeHtml(symbol)}`,
    '<b>Settings:</b>',
    `• Z-Score: ≥${settings.zThreshold}`,
    `• Volume: ≥${settings.volumeRatioThreshold}x average`,
    `• Cooldown: ${settings.cooldownSeconds}s`,
    `• Whale: >${formatUsd(settings.whaleThreshold)}`,
    `• Status: ${settings.paused ? '⏸️ Paused' : '▶️ Active'}`,
    '',
    '<b>Commands:</b>',
    '/status - View settings',
    '/help - Show all commands',
    '',
    '<i>You can modify settings anytime!</i>',
  ].join('\n');
}
