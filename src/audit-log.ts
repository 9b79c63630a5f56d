import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { EventSink, InventoryEvent } from './events';
import { hasUpdate } from './record';

export type AuditLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

export interface AuditEntry {
  timestamp: string;
  level: AuditLevel;
  event: string;
  message: string;
}

const COLUMNS = ['timestamp', 'level', 'event', 'message'];
const LEVELS: readonly AuditLevel[] = ['DEBUG', 'INFO', 'WARNING', 'ERROR'];
export const LOG_FILE_PREFIX = 'update-checker_';

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

export function sessionStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** Turns one event into the log lines that record it. */
export function describeEvent(event: InventoryEvent): Array<Omit<AuditEntry, 'timestamp'>> {
  const line = (level: AuditLevel, message: string) => ({ level, event: event.type, message });

  switch (event.type) {
    case 'scan_completed':
      return [
        line('INFO', `Detected ${event.records.length} installed packages`),
        ...event.records.map((r) => line('DEBUG', `${r.name} | ${r.id} | v${r.installedVersion}`)),
      ];
    case 'updates_found': {
      const updatable = event.records.filter(hasUpdate);
      return [
        line('INFO', `Updates available: ${updatable.length}`),
        ...updatable.map((r) =>
          line('INFO', `UPDATE: ${r.name} (${r.id}) ${r.installedVersion} -> ${r.availableVersion}`),
        ),
      ];
    }
    case 'update_started':
      if (event.isBulk) {
        return [line('INFO', `Starting update: ALL PACKAGES (${event.ids.length})`)];
      }
      return [
        line('INFO', `Starting update: ${event.ids.length} packages`),
        ...event.ids.map((id) => line('INFO', `- ${id}`)),
      ];
    case 'update_result':
      return event.success
        ? [line('INFO', `SUCCESS: ${event.id}`)]
        : [line('ERROR', `FAILED: ${event.id}${event.errorText ? `: ${event.errorText}` : ''}`)];
    case 'bulk_update_result':
      return event.success
        ? [line('INFO', `All ${event.ids.length} updates completed successfully`)]
        : [
            line(
              'WARNING',
              `Bulk update failed for ${event.ids.length} packages${event.errorText ? `: ${event.errorText}` : ''}`,
            ),
          ];
    case 'cycle_failed':
      return [line('ERROR', `${event.cycle} failed: ${event.message}`)];
    case 'session_summary':
      return [
        line(
          'INFO',
          `Session summary: total=${event.total} updatable=${event.updatableCount} applied=${event.appliedCount}`,
        ),
      ];
  }
}

/**
 * Audit trail for one session: a CSV file in the log directory, appended to
 * as events arrive.
 */
export class AuditLog implements EventSink {
  readonly filePath: string;
  private headerWritten: boolean;

  constructor(
    readonly logDir: string,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.filePath = path.join(logDir, `${LOG_FILE_PREFIX}${sessionStamp(clock())}.csv`);
    this.headerWritten = fs.existsSync(this.filePath);
  }

  emit(event: InventoryEvent): void {
    this.append(describeEvent(event));
  }

  write(level: AuditLevel, event: string, message: string): void {
    this.append([{ level, event, message }]);
  }

  private append(lines: Array<Omit<AuditEntry, 'timestamp'>>): void {
    if (lines.length === 0) return;
    const timestamp = this.clock().toISOString();
    const rows = lines.map((l) => ({ timestamp, ...l }));
    fs.mkdirSync(this.logDir, { recursive: true });
    fs.appendFileSync(this.filePath, stringify(rows, { header: !this.headerWritten, columns: COLUMNS }), 'utf8');
    this.headerWritten = true;
  }
}

function toLevel(value: string): AuditLevel {
  return LEVELS.find((level) => level === value) ?? 'INFO';
}

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(row: Record<string, unknown>, key: string): string {
  const value = row[key];
  return typeof value === 'string' ? value : '';
}

export function readAuditLog(filePath: string): AuditEntry[] {
  const raw = fs.readFileSync(filePath, 'utf8');
  const rows: unknown = parse(raw, {
    columns: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  if (!Array.isArray(rows)) return [];
  return rows.filter(isRow).map((row) => ({
    timestamp: field(row, 'timestamp'),
    level: toLevel(field(row, 'level')),
    event: field(row, 'event'),
    message: field(row, 'message'),
  }));
}

/** Newest session log in the directory, or null when there is none. */
export function latestLogFile(logDir: string): string | null {
  if (!fs.existsSync(logDir)) return null;
  const files = fs
    .readdirSync(logDir)
    .filter((file) => file.startsWith(LOG_FILE_PREFIX) && file.endsWith('.csv'))
    .sort();
  const latest = files[files.length - 1];
  return latest ? path.join(logDir, latest) : null;
}
