import wingetBackend, { createWingetBackend } from '../src/package-managers/winget';
import { InvalidPackageIdError } from '../src/errors';

const WRITE_FLAGS = ['--silent', '--accept-package-agreements', '--accept-source-agreements', '--disable-interactivity'];

describe('winget backend', () => {
  test('builds the read commands', () => {
    expect(wingetBackend.listCommand()).toEqual([
      'winget',
      'list',
      '--disable-interactivity',
      '--accept-source-agreements',
    ]);
    expect(wingetBackend.upgradableCommand()).toEqual([
      'winget',
      'upgrade',
      '--disable-interactivity',
      '--accept-source-agreements',
    ]);
  });

  test('builds the write commands', () => {
    expect(wingetBackend.upgradeCommand('Git.Git')).toEqual([
      'winget',
      'upgrade',
      '--id',
      'Git.Git',
      '--exact',
      ...WRITE_FLAGS,
    ]);
    expect(wingetBackend.upgradeAllCommand()).toEqual(['winget', 'upgrade', '--all', ...WRITE_FLAGS]);
  });

  test('refuses an id that looks like an option', () => {
    expect(() => wingetBackend.upgradeCommand('--all')).toThrow(InvalidPackageIdError);
  });

  test('uses the configured executable and source', () => {
    const backend = createWingetBackend({ command: 'C:\\tools\\winget.exe', source: 'msstore' });
    expect(backend.listCommand()[0]).toBe('C:\\tools\\winget.exe');
    expect(backend.parseInventory('Name Id Version\n---\nGit Git.Git 2.40.0')).toEqual([
      { name: 'Git', id: 'Git.Git', installedVersion: '2.40.0', source: 'msstore' },
    ]);
  });

  test('passes custom tokens to the parsers', () => {
    const backend = createWingetBackend({ headerTokens: ['Paket'], bannerTokens: ['aktualisierung'] });
    const stdout = 'Paket Kennung Version Verfügbar\n---\nGit Git.Git 2.40.0 2.42.0\nAktualisierung Foo.Bar 1.0 1.1';
    expect(Object.fromEntries(backend.parseUpgrades(stdout))).toEqual({ 'Git.Git': '2.42.0' });
  });
});
