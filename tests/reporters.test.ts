import * as textReporter from '../src/reporters/text';
import * as jsonReporter from '../src/reporters/json';
import * as csvReporter from '../src/reporters/csv';
import { plainStyle } from '../src/reporters/style';
import { UpdateReport } from '../src/coordinator';
import { PackageRecord } from '../src/types';

describe('Reporters', () => {
  const records: PackageRecord[] = [
    { name: 'Git', id: 'Git.Git', installedVersion: '2.40.0', availableVersion: '2.42.0', source: 'winget' },
    { name: 'Microsoft Edge', id: 'Microsoft.Edge', installedVersion: '118.0.2088.76', source: 'winget' },
  ];

  const baseReport: UpdateReport = {
    status: 'ok',
    bulk: false,
    ids: ['A', 'B'],
    successCount: 1,
    total: 2,
    results: [
      { id: 'A', success: true },
      { id: 'B', success: false, errorText: 'exit code 1' },
    ],
    rescan: { status: 'ok', records: [] },
  };

  describe('JSON Reporter', () => {
    it('should output records with their derived status', () => {
      expect(JSON.parse(jsonReporter.report(records))).toEqual({
        total: 2,
        updateCount: 1,
        records: [
          {
            name: 'Git',
            id: 'Git.Git',
            installedVersion: '2.40.0',
            availableVersion: '2.42.0',
            source: 'winget',
            hasUpdate: true,
            status: 'updatable',
          },
          {
            name: 'Microsoft Edge',
            id: 'Microsoft.Edge',
            installedVersion: '118.0.2088.76',
            availableVersion: null,
            source: 'winget',
            hasUpdate: false,
            status: 'unknown',
          },
        ],
      });
    });
  });

  describe('CSV Reporter', () => {
    it('should output one row per record', () => {
      expect(csvReporter.report(records)).toBe(
        'name,id,installed,available,source,status\n' +
          'Git,Git.Git,2.40.0,2.42.0,winget,updatable\n' +
          'Microsoft Edge,Microsoft.Edge,118.0.2088.76,,winget,unknown\n',
      );
    });
  });

  describe('Text Reporter', () => {
    it('should show each record with its status', () => {
      const lines = textReporter.report(records, plainStyle).split('\n');
      const gitRow = lines.find((line) => line.includes('Git.Git'));
      const edgeRow = lines.find((line) => line.includes('Microsoft.Edge'));

      expect(gitRow).toContain('2.42.0');
      expect(gitRow).toContain('update available');
      expect(edgeRow).toContain('unknown');
      expect(lines[lines.length - 2]).toBe('2 packages, 1 update available');
    });

    it('should pluralise the summary', () => {
      const output = textReporter.report([{ ...records[0], availableVersion: '2.40.0' }], plainStyle);
      expect(output.endsWith('1 packages, 0 updates available\n')).toBe(true);
      expect(output).toContain('up to date');
    });

    it('should report an empty inventory', () => {
      expect(textReporter.report([], plainStyle)).toBe('No packages found.\n');
    });

    it('should list per-item update results', () => {
      expect(textReporter.reportUpdate(baseReport, plainStyle)).toBe(
        '✔ A\n✖ B: exit code 1\nSucceeded: 1/2\n',
      );
    });

    it('should summarise a bulk run', () => {
      expect(
        textReporter.reportUpdate({ ...baseReport, bulk: true, successCount: 2, results: [] }, plainStyle),
      ).toBe('✔ Bulk update succeeded (2 packages)\nSucceeded: 2/2\n');
      expect(
        textReporter.reportUpdate(
          { ...baseReport, bulk: true, successCount: 0, results: [], errorText: 'exit code 1' },
          plainStyle,
        ),
      ).toBe('✖ Bulk update failed: exit code 1\nSucceeded: 0/2\n');
    });

    it('should format history entries', () => {
      expect(
        textReporter.reportHistory(
          [
            { timestamp: '2024-01-02T03:04:05.000Z', level: 'INFO', event: 'cli', message: 'Requested update' },
            { timestamp: '2024-01-02T03:04:06.000Z', level: 'ERROR', event: 'update_result', message: 'FAILED: B' },
          ],
          plainStyle,
        ),
      ).toBe(
        '2024-01-02T03:04:05.000Z INFO    Requested update\n' + '2024-01-02T03:04:06.000Z ERROR   FAILED: B\n',
      );
    });
  });
});
