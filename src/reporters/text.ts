import Table = require('cli-table3');
import { AuditEntry } from '../audit-log';
import { UpdateReport } from '../coordinator';
import { countUpdates, updateStatus } from '../record';
import { PackageRecord, UpdateStatus } from '../types';
import { plainStyle, ReportStyle } from './style';

const STATUS_LABELS: Record<UpdateStatus, string> = {
  updatable: 'update available',
  'up-to-date': 'up to date',
  unknown: 'unknown',
};

function paintStatus(status: UpdateStatus, c: ReportStyle): string {
  const label = STATUS_LABELS[status];
  if (status === 'updatable') return c.green(label);
  if (status === 'unknown') return c.dim(label);
  return label;
}

export function report(records: readonly PackageRecord[], style: ReportStyle = plainStyle): string {
  const c = style;
  if (records.length === 0) {
    return c.yellow('No packages found.') + '\n';
  }

  const table = new Table({
    head: [c.bold('Name'), c.bold('Id'), c.bold('Installed'), c.bold('Available'), c.bold('Status')],
    // Cells arrive painted by the report style.
    style: { head: [], border: [] },
  });

  for (const record of records) {
    const status = updateStatus(record);
    table.push([
      record.name,
      c.cyan(record.id),
      record.installedVersion,
      status === 'updatable' ? c.green(record.availableVersion ?? '-') : (record.availableVersion ?? '-'),
      paintStatus(status, c),
    ]);
  }

  const updates = countUpdates(records);
  let output = table.toString() + '\n';
  output += c.bold(`${records.length} packages, ${updates} update${updates === 1 ? '' : 's'} available`) + '\n';
  return output;
}

export function reportUpdate(result: UpdateReport, style: ReportStyle = plainStyle): string {
  const c = style;
  let output = '';

  if (result.bulk) {
    output += result.successCount === result.total
      ? c.green(`✔ Bulk update succeeded (${result.total} packages)`) + '\n'
      : c.red(`✖ Bulk update failed${result.errorText ? `: ${result.errorText}` : ''}`) + '\n';
  } else {
    for (const item of result.results) {
      output += item.success
        ? c.green(`✔ ${item.id}`) + '\n'
        : c.red(`✖ ${item.id}${item.errorText ? `: ${item.errorText}` : ''}`) + '\n';
    }
  }

  const summary = `Succeeded: ${result.successCount}/${result.total}`;
  output += (result.successCount === result.total ? c.green(summary) : c.yellow(summary)) + '\n';
  return output;
}

export function reportHistory(entries: readonly AuditEntry[], style: ReportStyle = plainStyle): string {
  const c = style;
  return entries
    .map((entry) => {
      const level = entry.level.padEnd(7);
      const paintLevel = entry.level === 'ERROR' ? c.red : entry.level === 'WARNING' ? c.yellow : c.dim;
      return `${c.dim(entry.timestamp)} ${paintLevel(level)} ${entry.message}\n`;
    })
    .join('');
}
