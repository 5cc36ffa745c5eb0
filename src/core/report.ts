/**
 * Scan report rendering and export
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { Domain, ScanReport } from './types.js';

const HEAVY_RULE = '═'.repeat(50);
const LIGHT_RULE = '─'.repeat(30);

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local-time stamp as YYYYMMDD_HHMMSS
 */
export function timestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}_` +
    `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`
  );
}

export function reportFileName(domain: Domain, date: Date): string {
  return `subdomain_scan_${domain}_${timestamp(date)}.txt`;
}

/**
 * Hosts that resolved but did not answer HTTPS, sorted
 */
export function dnsOnly(report: ScanReport): string[] {
  const alive = new Set(report.httpsAlive);
  return report.dnsResolved.filter((host) => !alive.has(host));
}

/**
 * Short plain-text summary for chat messages and terminals
 */
export function formatSummary(report: ScanReport): string {
  const lines = [
    `Scan results for ${report.domain} (${report.mode})`,
    `Candidates checked: ${report.candidates}`,
    `HTTPS alive: ${report.httpsAlive.length}`,
    `DNS resolved: ${report.dnsResolved.length}`,
  ];

  if (report.metadata.aborted) {
    lines.push('Scan was cancelled; results are partial.');
  }

  if (report.httpsAlive.length > 0) {
    lines.push('', 'HTTPS alive:');
    for (const host of report.httpsAlive) {
      lines.push(`  https://${host}`);
    }
  }

  const resolvedOnly = dnsOnly(report);
  if (resolvedOnly.length > 0) {
    lines.push('', 'DNS only:');
    for (const host of resolvedOnly) {
      lines.push(`  ${host}`);
    }
  }

  return lines.join('\n');
}

/**
 * Full text report, the format written to export files
 */
export function formatText(report: ScanReport): string {
  const lines = [
    `Subdomain Enumeration Results for ${report.domain}`,
    `Generated: ${report.metadata.endTime.toISOString()}`,
    `Mode: ${report.mode} (concurrency ${report.metadata.concurrency}, timeout ${report.metadata.timeout}ms)`,
    `Candidates: ${report.candidates}`,
  ];

  if (report.metadata.aborted) {
    lines.push('Status: cancelled (partial results)');
  }

  lines.push(HEAVY_RULE, '', `HTTPS Alive (${report.httpsAlive.length}):`, LIGHT_RULE);
  for (const host of report.httpsAlive) {
    lines.push(`https://${host}`);
  }

  lines.push('', `DNS Resolved (${report.dnsResolved.length}):`, LIGHT_RULE);
  for (const host of report.dnsResolved) {
    lines.push(host);
  }

  return lines.join('\n') + '\n';
}

export function formatJSON(report: ScanReport): string {
  return JSON.stringify(report, null, 2);
}

/**
 * Write a rendered report, creating parent directories
 */
export async function exportReport(path: string, contents: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, contents, 'utf-8');
}
