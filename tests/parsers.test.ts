import * as fs from 'fs';
import * as path from 'path';
import { extractDataLines, tokenize } from '../src/parsers/table';
import { looksLikeVersion } from '../src/parsers/version';
import { parseInventory, parseInventoryLine } from '../src/parsers/inventory';
import { parseUpgradeLine, parseUpgrades } from '../src/parsers/upgrades';

const FIXTURES_DIR = path.join(__dirname, 'fixtures');
const fixture = (name: string) => fs.readFileSync(path.join(FIXTURES_DIR, name), 'utf8');

describe('looksLikeVersion', () => {
  test('classifies version tokens', () => {
    expect(looksLikeVersion('1.2')).toBe(true);
    expect(looksLikeVersion('10.0.19045.3693')).toBe(true);
    expect(looksLikeVersion('v1.2')).toBe(false);
  });

  test('accepts anything after a numeric dotted prefix', () => {
    expect(looksLikeVersion('1.0.0-beta')).toBe(true);
    expect(looksLikeVersion('2.42.0.windows.2')).toBe(true);
  });

  test('rejects bare numbers, ids and placeholders', () => {
    expect(looksLikeVersion('23')).toBe(false);
    expect(looksLikeVersion('Git.Git')).toBe(false);
    expect(looksLikeVersion('7-Zip.7zip')).toBe(false);
    expect(looksLikeVersion('Unknown')).toBe(false);
    expect(looksLikeVersion('<')).toBe(false);
    expect(looksLikeVersion('')).toBe(false);
  });
});

describe('extractDataLines', () => {
  test('returns nothing when there is no header', () => {
    expect(extractDataLines('No installed package found matching input criteria.\n')).toEqual([]);
    expect(extractDataLines('')).toEqual([]);
  });

  test('skips the ruler, blank lines and separator lines', () => {
    const text = 'Name Id Version\n----------\nGit Git.Git 2.40.0\n\n   \n-- footer\nFoo Foo.Bar 1.0\n';
    expect(extractDataLines(text)).toEqual(['Git Git.Git 2.40.0', 'Foo Foo.Bar 1.0']);
  });

  test('ignores everything above the header', () => {
    const text = 'Failed when searching source; results will not be included: msstore\nName Id Version\n---\nGit Git.Git 2.40.0';
    expect(extractDataLines(text)).toEqual(['Git Git.Git 2.40.0']);
  });

  test('handles CRLF line endings', () => {
    expect(extractDataLines('Name Id Version\r\n-----\r\nGit Git.Git 2.40.0\r\n')).toEqual(['Git Git.Git 2.40.0']);
  });

  test('drops spinner frames redrawn before the header', () => {
    const text = '   -\r   \\\r   |\rName  Id  Version\n---\nGit Git.Git 2.40.0';
    expect(extractDataLines(text)).toEqual(['Git Git.Git 2.40.0']);
  });

  test('detects the localized header', () => {
    expect(extractDataLines(fixture('winget-upgrade-ja.txt'))).toHaveLength(3);
  });

  test('uses custom header tokens', () => {
    const text = 'Paket Kennung Version\n---\nGit Git.Git 2.40.0';
    expect(extractDataLines(text)).toEqual([]);
    expect(extractDataLines(text, { headerTokens: ['Paket'] })).toEqual(['Git Git.Git 2.40.0']);
  });
});

describe('tokenize', () => {
  test('splits on any run of whitespace', () => {
    expect(tokenize('  Microsoft Edge   Microsoft.Edge\t118.0  ')).toEqual([
      'Microsoft',
      'Edge',
      'Microsoft.Edge',
      '118.0',
    ]);
  });
});

describe('Inventory parser', () => {
  test('parses a single row', () => {
    expect(parseInventoryLine('7-Zip 7-Zip.7zip 23.01')).toEqual({
      name: '7-Zip',
      id: '7-Zip.7zip',
      installedVersion: '23.01',
      source: 'winget',
    });
  });

  test('joins multi-word names', () => {
    const record = parseInventoryLine('Notepad++ (64-bit x64)   Notepad++.Notepad++   8.5.8   winget');
    expect(record?.name).toBe('Notepad++ (64-bit x64)');
    expect(record?.id).toBe('Notepad++.Notepad++');
    expect(record?.installedVersion).toBe('8.5.8');
  });

  test('takes the first version when the row also lists an available one', () => {
    const record = parseInventoryLine('Git Git.Git 2.40.0 2.42.0 winget');
    expect(record?.installedVersion).toBe('2.40.0');
    expect(record?.availableVersion).toBeUndefined();
  });

  test('drops rows without a version token', () => {
    expect(parseInventoryLine('Contoso Printer Driver ARP\\Machine\\X64\\ContosoDriver Unknown')).toBeNull();
  });

  test('drops rows without a name', () => {
    expect(parseInventoryLine('1.0')).toBeNull();
    expect(parseInventoryLine('Git.Git 2.40.0')).toBeNull();
    expect(parseInventoryLine('2.40.0 Git.Git')).toBeNull();
  });

  test('tags records with the configured source', () => {
    expect(parseInventoryLine('Git Git.Git 2.40.0', 'scoop')?.source).toBe('scoop');
  });

  test('parses a full listing and skips malformed rows', () => {
    const records = parseInventory(fixture('winget-list.txt'));
    expect(records.map((r) => [r.name, r.id, r.installedVersion])).toEqual([
      ['Git', 'Git.Git', '2.40.0'],
      ['Microsoft Edge', 'Microsoft.Edge', '118.0.2088.76'],
      ['Notepad++ (64-bit x64)', 'Notepad++.Notepad++', '8.5.8'],
      ['Visual Studio Code', 'Microsoft.VisualStudioCode', '1.83.1'],
    ]);
    expect(records.every((r) => r.availableVersion === undefined)).toBe(true);
  });

  test('returns no records for output without a table', () => {
    expect(parseInventory('No installed package found matching input criteria.')).toEqual([]);
  });
});

describe('Upgrade parser', () => {
  test('maps the id to the second version', () => {
    const stdout = 'Name Id Version Available Source\n---\nGit Git.Git 2.40.0 2.42.0 winget';
    expect(Object.fromEntries(parseUpgrades(stdout))).toEqual({ 'Git.Git': '2.42.0' });
  });

  test('needs two version tokens and a token before the first', () => {
    expect(parseUpgradeLine('Foo Foo.Bar 1.0 winget')).toBeNull();
    expect(parseUpgradeLine('1.0 2.0 winget')).toBeNull();
    expect(parseUpgradeLine('A 1.0')).toBeNull();
    expect(parseUpgradeLine('Git Git.Git 2.40.0 2.42.0 winget')).toEqual({
      id: 'Git.Git',
      availableVersion: '2.42.0',
    });
  });

  test('skips banner lines inside the table', () => {
    const stdout = 'Name Id Version Available Source\n---\nUpgrade Helper Contoso.UpgradeHelper 1.0 1.1 winget';
    expect(parseUpgrades(stdout).size).toBe(0);
  });

  test('keeps the last value for a repeated id', () => {
    const stdout = 'Name Id Version Available\n---\nGit Git.Git 2.40.0 2.41.0\nGit Git.Git 2.40.0 2.42.0';
    expect(parseUpgrades(stdout).get('Git.Git')).toBe('2.42.0');
  });

  test('parses an English listing', () => {
    expect(Object.fromEntries(parseUpgrades(fixture('winget-upgrade.txt')))).toEqual({
      'Git.Git': '2.42.0',
      'Microsoft.VisualStudioCode': '1.84.0',
    });
  });

  test('parses a Japanese listing', () => {
    expect(Object.fromEntries(parseUpgrades(fixture('winget-upgrade-ja.txt')))).toEqual({
      'Git.Git': '2.42.0',
      'Mozilla.Firefox.ja': '119.0',
    });
  });

  test('returns an empty map without a header', () => {
    expect(parseUpgrades('No installed package found matching input criteria.').size).toBe(0);
  });
});
