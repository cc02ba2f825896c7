import { config } from '../config.js';
import type { SetupEventSink } from '../pipeline/tick-pipeline.js';
import type { Analysis } from '../types/analysis.js';
import type { SetupEvent, SetupStats, TradeSetup } from '../types/trade.js';

const TELEGRAM_API = 'https://api.telegram.org';
/** Bot API hard limit on message text */
const MAX_MESSAGE_LENGTH = 4096;

/** Cut an over-long message on a line boundary and mark the cut. */
export function truncateMessage(text: string, limit = MAX_MESSAGE_LENGTH): string {
  if (text.length <= limit) return text;
  const marker = '\n…';
  const head = text.slice(0, limit - marker.length);
  const lastBreak = head.lastIndexOf('\n');
  return (lastBreak > 0 ? head.slice(0, lastBreak) : head) + marker;
}

/** HTML message to the configured chat. Resolves false when unconfigured or undelivered. */
async function sendMessage(html: string): Promise<boolean> {
  const { TELEGRAM_BOT_TOKEN: token, TELEGRAM_CHAT_ID: chatId } = config;
  if (!token || !chatId) return false;

  try {
    const res = await fetch(`${TELEGRAM_API}/bot${token}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        chat_id: chatId,
        text: truncateMessage(html),
        parse_mode: 'HTML',
        disable_web_page_preview: true,
      }),
    });
    if (res.ok) return true;
    console.error(`[Telegram] sendMessage ${res.status}:`, await res.text());
  } catch (err) {
    console.error('[Telegram] sendMessage failed:', err instanceof Error ? err.message : err);
  }
  return false;
}

// ── Helpers ────────────────────────────────────────────────────────────────────

function fmt(n: number | null, dp = 2): string {
  return n !== null && Number.isFinite(n) ? n.toFixed(dp) : 'n/a';
}

function fmtSigned(n: number | null, dp = 1): string {
  if (n === null || !Number.isFinite(n)) return 'n/a';
  return (n >= 0 ? '+' : '') + n.toFixed(dp);
}

/** OI counts in lakhs (1 L = 100,000 contracts) */
function fmtLakh(n: number): string {
  return `${fmtSigned(n / 100_000)}L`;
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function verdictIcon(analysis: Analysis): string {
  if (analysis.direction === 'bullish') return '🟢';
  if (analysis.direction === 'bearish') return '🔴';
  return '⚪';
}

// ── Formatters ─────────────────────────────────────────────────────────────────

export function formatAnalysisSummary(a: Analysis): string {
  const lines = [
    `${verdictIcon(a)} <b>${escapeHtml(a.verdict)}</b> (${a.signalStrength})`,
    `Spot ${fmt(a.spotPrice)} | ATM ${a.atmStrike} | Expiry ${escapeHtml(a.expiry)}`,
    `Score ${fmtSigned(a.combinedScore)} | Confidence ${fmt(a.confidence, 0)}%`,
    `Call OI ${fmtLakh(a.callOiChange)} | Put OI ${fmtLakh(a.putOiChange)} | PCR ${fmt(a.pcr)}`,
    `Max pain ${a.maxPain} | Regime ${a.marketRegime.regime} | ${a.confirmationStatus}`,
  ];
  const { strongestSupport, strongestResistance } = a.oiClusters;
  if (strongestSupport !== null || strongestResistance !== null) {
    lines.push(`Support ${strongestSupport ?? 'n/a'} | Resistance ${strongestResistance ?? 'n/a'}`);
  }
  if (a.trapWarning) lines.push(`⚠️ ${escapeHtml(a.trapWarning.message)}`);
  return lines.join('\n');
}

function setupLine(s: TradeSetup): string {
  return `${s.direction} ${s.strike} ${s.optionType} (${s.moneyness})`;
}

export function formatSetupEvent(event: SetupEvent): string {
  const s = event.setup;
  switch (event.kind) {
    case 'SETUP_CREATED':
      return (
        `📋 <b>New setup</b>: ${setupLine(s)}\n` +
        `Entry ${fmt(s.entryPremium)} | SL ${fmt(s.slPremium)} | T1 ${fmt(s.target1Premium)} | T2 ${fmt(s.target2Premium)}\n` +
        `Risk ${fmt(s.riskPct, 0)}% | Quality ${s.qualityScore}/9\n` +
        `<i>${escapeHtml(s.reasoning)}</i>`
      );
    case 'SETUP_ACTIVATED':
      return (
        `▶️ <b>Setup active</b>: ${setupLine(s)}\n` +
        `Filled at ${fmt(s.activationPremium)} (entry ${fmt(s.entryPremium)})`
      );
    case 'SETUP_RESOLVED': {
      const icon = s.status === 'WON' ? '✅' : s.status === 'LOST' ? '❌' : '⏹';
      const pnl = s.profitLossPct !== null ? ` | P&L ${fmtSigned(s.profitLossPct, 2)}%` : '';
      const reason = s.resolutionReason ? `\n${escapeHtml(s.resolutionReason)}` : '';
      return `${icon} <b>Setup ${s.status}</b> (was ${event.previousStatus}): ${setupLine(s)}${pnl}${reason}`;
    }
  }
}

export function formatDailySummary(date: string, stats: SetupStats): string {
  const b = stats.byStatus;
  return (
    `📊 <b>Daily summary ${escapeHtml(date)}</b>\n` +
    `Setups: ${stats.total} (won ${b.WON}, lost ${b.LOST}, cancelled ${b.CANCELLED}, expired ${b.EXPIRED})\n` +
    `Win rate: ${fmt(stats.winRate, 1)}% over ${stats.resolved} resolved\n` +
    `Avg win ${fmtSigned(stats.avgWinPct, 2)}% | Avg loss ${fmtSigned(stats.avgLossPct, 2)}%\n` +
    `Total P&L: <b>${fmtSigned(stats.totalPnlPct, 2)}%</b>`
  );
}

// ── Senders ────────────────────────────────────────────────────────────────────

export async function notifySetupEvent(event: SetupEvent): Promise<void> {
  if (await sendMessage(formatSetupEvent(event))) {
    console.log(`[Telegram] ${event.kind} sent for setup ${event.setup.id}`);
  }
}

export async function notifyAnalysis(analysis: Analysis): Promise<void> {
  await sendMessage(formatAnalysisSummary(analysis));
}

export async function notifyAlert(text: string): Promise<void> {
  await sendMessage(`⚠️ <b>Alert</b>\n${escapeHtml(text)}`);
}

export async function notifyDailySummary(date: string, stats: SetupStats): Promise<void> {
  await sendMessage(formatDailySummary(date, stats));
}

export async function notifyStartup(): Promise<void> {
  await sendMessage(
    `🚀 <b>OI Tug-of-War engine started</b>\n` +
    `Processing snapshots every ${config.FETCH_INTERVAL_MIN} min, ` +
    `setups ${config.SETUP_START}–${config.SETUP_END} ${escapeHtml(config.MARKET_TIMEZONE)}`,
  );
}

export const telegramEventSink: SetupEventSink = {
  publish: notifySetupEvent,
};
