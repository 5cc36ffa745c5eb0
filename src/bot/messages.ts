/**
 * Chat message texts
 */

import { formatSummary } from '../core/report.js';
import { MODES, estimateCount, scanConfigForMode } from '../core/modes.js';
import type { Domain, Mode, ScanReport } from '../core/types.js';

/** Telegram rejects longer text messages */
export const MESSAGE_LIMIT = 4096;

const MODE_LABELS: Record<Mode, string> = {
  normal: '🟢 Normal',
  medium: '🟡 Medium',
  ultimate: '🔴 Ultimate',
};

const MODE_BLURBS: Record<Mode, string> = {
  normal: 'Quick scan',
  medium: 'Balanced scan',
  ultimate: 'Comprehensive scan',
};

export function modeLabel(mode: Mode): string {
  return MODE_LABELS[mode];
}

export const WELCOME = [
  '🔍 Subdomain Enumeration Bot',
  '',
  'I discover live subdomains by generating likely names and checking each one in DNS and over HTTPS.',
  '',
  'Press Start Scan to begin.',
].join('\n');

export const HELP = [
  '📚 Commands',
  '',
  '/start - Show the main menu',
  '/help - Show this help message',
  '/cancel - Cancel the current operation or running scan',
  '',
  'How to use:',
  '1. Press Start Scan',
  '2. Send a domain (e.g. example.com)',
  '3. Pick a scan mode',
  '4. Confirm and wait for the results file',
].join('\n');

export const ASK_DOMAIN = 'Send the domain you want to scan (e.g. example.com):';

export const INVALID_DOMAIN = '❌ Invalid domain format. Send a root domain such as example.com:';

export const BUSY = '⏳ A scan is already running. Send /cancel to stop it.';

export const CANCELLED = 'Operation cancelled.';

export const CANCELLING = '🛑 Stopping the scan, partial results will follow...';

export const NOTHING_TO_CANCEL = 'Nothing to cancel.';

export function modeMenu(domain: Domain): string {
  const lines = [`Domain: ${domain}`, '', 'Select scan mode:'];
  for (const mode of MODES) {
    lines.push(`• ${MODE_LABELS[mode]}: ${MODE_BLURBS[mode]} (~${estimateCount(mode)} candidates)`);
  }
  return lines.join('\n');
}

export function confirmation(domain: Domain, mode: Mode): string {
  const { concurrency, timeout } = scanConfigForMode(mode);
  return [
    '📋 Scan Configuration',
    '',
    `• Domain: ${domain}`,
    `• Mode: ${MODE_LABELS[mode]}`,
    `• Estimated candidates: ${estimateCount(mode)}`,
    `• Concurrency: ${concurrency}, timeout ${timeout / 1000}s`,
    '',
    'Start the scan?',
  ].join('\n');
}

export function scanning(domain: Domain, mode: Mode, done: number, total: number): string {
  const percentage = total === 0 ? 100 : Math.floor((done / total) * 100);
  return [
    '🎯 Scanning...',
    '',
    `• Domain: ${domain}`,
    `• Mode: ${MODE_LABELS[mode]}`,
    `• Checked: ${done}/${total} (${percentage}%)`,
  ].join('\n');
}

export function scanFinished(report: ScanReport): string {
  const heading = report.metadata.aborted ? '🛑 Scan stopped' : '✅ Scan finished';
  return `${heading}: ${report.domain} (${MODE_LABELS[report.mode]}), ${report.candidates} candidates`;
}

export function scanFailed(error: unknown): string {
  const reason = error instanceof Error ? error.message : String(error);
  return `❌ An error occurred during scanning:\n${reason}\n\nPlease try again or use a different domain.`;
}

/**
 * Summary cut to fit a single message
 */
export function results(report: ScanReport): string {
  const summary = formatSummary(report);
  if (summary.length <= MESSAGE_LIMIT) {
    return summary;
  }
  const notice = '\n… (truncated, see the attached file)';
  const cut = summary.lastIndexOf('\n', MESSAGE_LIMIT - notice.length);
  return summary.slice(0, cut) + notice;
}
