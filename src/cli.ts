import { Command, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import boxen from 'boxen';
import gradient from 'gradient-string';
import { AuditLog, latestLogFile, readAuditLog } from './audit-log';
import { loadConfig, UpdateCheckerConfig } from './config';
import { Failed, InventoryCoordinator, UpdateOutcome } from './coordinator';
import { EventSink, fanOut } from './events';
import { filterRecords, selectUpdatable, StatusFilter, STATUS_FILTERS } from './filter';
import { createWingetBackend } from './package-managers/winget';
import { createProcessRunner } from './runner';
import { CommandRunner, PackageRecord } from './types';
import * as csvReporter from './reporters/csv';
import * as jsonReporter from './reporters/json';
import * as textReporter from './reporters/text';
import { plainStyle, ReportStyle } from './reporters/style';
import pkg from '../package.json';

export type OutputFormat = 'text' | 'json' | 'csv';

export interface CliDeps {
  runner?: CommandRunner;
  config?: UpdateCheckerConfig;
  /** Spinners, banner and colours. Defaults to whether stdout is a terminal. */
  interactive?: boolean;
  print?: (text: string) => void;
  printError?: (text: string) => void;
  setExitCode?: (code: number) => void;
}

type GlobalOptions = {
  debug?: boolean;
};

interface ListOptions {
  format: OutputFormat;
  filter: StatusFilter;
  search?: string;
  check: boolean;
}

interface UpdateOptions {
  all?: boolean;
  bulk?: boolean;
  dryRun?: boolean;
}

interface HistoryOptions {
  limit: string;
}

interface Spinner {
  text: string;
  succeed(text?: string): void;
  fail(text?: string): void;
  warn(text?: string): void;
  stop(): void;
}

const silentSpinner: Spinner = {
  text: '',
  succeed() {},
  fail() {},
  warn() {},
  stop() {},
};

const colourStyle: ReportStyle = {
  bold: (s) => chalk.bold(s),
  dim: (s) => chalk.dim(s),
  green: (s) => chalk.green(s),
  yellow: (s) => chalk.yellow(s),
  red: (s) => chalk.red(s),
  cyan: (s) => chalk.cyan(s),
};

function formatRecords(format: OutputFormat, records: readonly PackageRecord[], style: ReportStyle): string {
  if (format === 'json') return jsonReporter.report(records) + '\n';
  if (format === 'csv') return csvReporter.report(records);
  return textReporter.report(records, style);
}

function hintFor(failure: Failed, config: UpdateCheckerConfig): string | null {
  if (failure.toolUnavailable) {
    return `Hint: '${config.command}' could not be started. Install App Installer from the Microsoft Store, or set "command" in your .updatecheckerrc.`;
  }
  if (failure.timedOut) {
    return 'Hint: Raise "timeoutMs" in your .updatecheckerrc if the package manager is slow to respond.';
  }
  return null;
}

export function createProgram(deps: CliDeps = {}): Command {
  const print = deps.print ?? ((text: string) => process.stdout.write(text));
  const printError = deps.printError ?? ((text: string) => process.stderr.write(text));
  const setExitCode = deps.setExitCode ?? ((code: number) => (process.exitCode = code));
  const interactive = deps.interactive ?? Boolean(process.stdout.isTTY);
  const style = interactive ? colourStyle : plainStyle;

  const program = new Command();
  program.configureOutput({ writeOut: print, writeErr: printError });

  const debug = (msg: string) => {
    if (program.opts<GlobalOptions>().debug) printError(style.dim(`[DEBUG] ${msg}`) + '\n');
  };

  const spinner = (text: string, enabled: boolean): Spinner => (enabled ? ora(text).start() : silentSpinner);

  function banner(): void {
    if (!interactive) return;
    const title = gradient(['#7aa2f7', '#9ece6a'])('UPDATE CHECKER\nInstalled software updates');
    print(
      boxen(title, {
        padding: 1,
        borderStyle: 'round',
        borderColor: 'blue',
        title: 'v' + pkg.version,
        titleAlignment: 'right',
      }) + '\n',
    );
  }

  function openSession(config: UpdateCheckerConfig, progress?: EventSink) {
    const audit = new AuditLog(config.logDir);
    debug(`Audit log: ${audit.filePath}`);
    const runner = deps.runner ?? createProcessRunner({ timeoutMs: config.timeoutMs, debug });
    const backend = createWingetBackend({
      command: config.command,
      source: config.source,
      headerTokens: config.headerTokens,
      bannerTokens: config.upgradeBannerTokens,
    });
    const events = progress ? fanOut(audit, progress) : audit;
    const coordinator = new InventoryCoordinator({ backend, runner, events, debug });
    return { audit, coordinator };
  }

  function reportFailure(what: string, failure: Failed, config: UpdateCheckerConfig): void {
    printError(style.red(`Error: ${what} failed: ${failure.error}`) + '\n');
    const hint = hintFor(failure, config);
    if (hint) printError(style.dim(hint) + '\n');
    setExitCode(2);
  }

  async function inventory(
    config: UpdateCheckerConfig,
    coordinator: InventoryCoordinator,
    withCheck: boolean,
    text: boolean,
  ): Promise<boolean> {
    const s = spinner('Scanning installed software...', interactive && text);
    const scan = await coordinator.scan();
    if (scan.status === 'failed') {
      s.fail('Scan failed');
      reportFailure('Scan', scan, config);
      return false;
    }
    if (scan.status !== 'ok') {
      s.stop();
      return false;
    }
    s.succeed(`Scan complete - ${scan.records.length} packages detected`);
    if (!withCheck) return true;

    const c = spinner('Checking for updates...', interactive && text);
    const check = await coordinator.check();
    if (check.status === 'failed') {
      c.fail('Update check failed');
      reportFailure('Update check', check, config);
      return false;
    }
    if (check.status !== 'ok') {
      c.stop();
      return false;
    }
    if (check.updateCount > 0) c.warn(`${check.updateCount} updates available`);
    else c.succeed('All software is up to date');
    return true;
  }

  async function listAction(options: ListOptions): Promise<void> {
    const config = deps.config ?? loadConfig();
    const text = options.format === 'text';
    if (text) banner();

    const { coordinator } = openSession(config);
    try {
      if (!(await inventory(config, coordinator, options.check, text))) return;
      const records = filterRecords(coordinator.snapshot().records, {
        search: options.search,
        status: options.filter,
      });
      print(formatRecords(options.format, records, style));
    } finally {
      coordinator.shutdown();
    }
  }

  function reportOutcome(outcome: UpdateOutcome): void {
    if (outcome.status === 'nothing-to-update') {
      print(style.yellow('No updatable software selected.') + '\n');
      return;
    }
    if (outcome.status !== 'ok') {
      printError(style.red(`Update was not started (${outcome.status}).`) + '\n');
      setExitCode(2);
      return;
    }
    print(textReporter.reportUpdate(outcome, style));
    if (outcome.successCount < outcome.total) {
      printError(style.dim('Hint: The audit log has the full error text for each failed package.') + '\n');
      setExitCode(1);
    }
    if (outcome.rescan.status === 'ok') {
      print(style.dim(`Rescanned: ${outcome.rescan.records.length} packages installed.`) + '\n');
    } else if (outcome.rescan.status === 'failed') {
      printError(style.yellow(`Warning: Rescan after update failed: ${outcome.rescan.error}`) + '\n');
    }
  }

  async function updateAction(ids: string[], options: UpdateOptions): Promise<void> {
    const config = deps.config ?? loadConfig();
    if (options.bulk && !options.all) {
      printError(style.red('Error: --bulk can only be combined with --all.') + '\n');
      setExitCode(2);
      return;
    }
    if (!options.all && ids.length === 0) {
      printError(style.red('Error: Specify one or more package ids, or use --all.') + '\n');
      setExitCode(2);
      return;
    }

    banner();
    let progress: Spinner = silentSpinner;
    const progressSink: EventSink = {
      emit(event) {
        if (event.type === 'update_result') {
          progress.text = `Updated ${event.id}${event.success ? '' : ' (failed)'}`;
        }
      },
    };
    const { coordinator, audit } = openSession(config, progressSink);

    try {
      if (!(await inventory(config, coordinator, true, true))) return;

      let targets: string[];
      if (options.all) {
        targets = coordinator.updatableIds();
      } else {
        const selection = selectUpdatable(coordinator.snapshot().records, ids);
        for (const id of selection.skipped) {
          printError(style.yellow(`Skipping ${id}: no update available`) + '\n');
        }
        targets = selection.targets;
      }

      if (options.dryRun) {
        print(style.bold(`Would update ${targets.length} package(s)${options.bulk ? ' in one bulk run' : ''}:`) + '\n');
        for (const id of targets) print(`  - ${id}\n`);
        return;
      }

      audit.write('INFO', 'cli', `Requested update of ${targets.length} package(s)`);
      progress = spinner(`Updating ${targets.length} package(s)...`, interactive);
      const outcome = options.bulk ? await coordinator.updateAll() : await coordinator.update(targets);
      progress.stop();
      reportOutcome(outcome);
    } finally {
      coordinator.shutdown();
    }
  }

  function historyAction(options: HistoryOptions): void {
    const config = deps.config ?? loadConfig();
    const file = latestLogFile(config.logDir);
    if (!file) {
      print(style.yellow(`No audit log found in ${config.logDir}`) + '\n');
      return;
    }
    const limit = Number.parseInt(options.limit, 10);
    const entries = readAuditLog(file).filter((entry) => entry.level !== 'DEBUG');
    const shown = Number.isNaN(limit) || limit <= 0 ? entries : entries.slice(-limit);
    print(style.dim(`Log file: ${file}`) + '\n');
    print(textReporter.reportHistory(shown, style));
  }

  const formatOption = () =>
    new Option('--format <format>', 'Output format').choices(['text', 'json', 'csv']).default('text');

  program
    .name('update-checker')
    .description('Detect installed software, check it against the package manager and apply updates.')
    .version(pkg.version)
    .option('--debug', 'Enable debug logging');

  program
    .command('list', { isDefault: true })
    .description('Scan installed software and show its update status')
    .addOption(formatOption())
    .addOption(new Option('--filter <filter>', 'Show only some records').choices([...STATUS_FILTERS]).default('all'))
    .option('-s, --search <text>', 'Case-insensitive search over name and id')
    .option('--no-check', 'Skip the update check')
    .action((options: ListOptions) => listAction(options));

  program
    .command('check')
    .description('Scan and list only software with an update available')
    .addOption(formatOption())
    .option('-s, --search <text>', 'Case-insensitive search over name and id')
    .action((options: Omit<ListOptions, 'filter' | 'check'>) =>
      listAction({ ...options, filter: 'updates', check: true }),
    );

  program
    .command('update')
    .description('Update the given package ids, or every updatable package with --all')
    .argument('[ids...]', 'Package ids to update')
    .option('-a, --all', 'Update every package that has an update available')
    .option('--bulk', 'With --all, run a single bulk upgrade instead of one per package')
    .option('--dry-run', 'Show what would be updated without running anything')
    .action((ids: string[], options: UpdateOptions) => updateAction(ids, options));

  program
    .command('history')
    .description('Show the newest audit log')
    .option('-n, --limit <count>', 'Number of entries to show', '50')
    .action((options: HistoryOptions) => historyAction(options));

  return program;
}
