import * as core from '@actions/core';

import { QueryResult } from '../src/query-engine';
import { logLatestVersions, renderRecords, serializeRecord, writeQueryResult } from '../src/query-outputs';
import { ArtifactRecord } from '../src/types';

jest.mock('@actions/core', () => ({
  info: jest.fn(),
}));

const FIRST_RECORD: ArtifactRecord = {
  toolName: 'x',
  versionString: '2.0',
  variantString: 'h1_1',
  buildNumber: 1,
  variantLabel: 'h1',
  sizeBytes: 1536,
  modifiedAt: new Date(2024, 0, 4, 5, 6, 7),
  path: '/images/x:2.0--h1_1',
};

const SECOND_RECORD: ArtifactRecord = {
  toolName: 'y',
  versionString: '0.1',
  variantString: '',
  buildNumber: 0,
  variantLabel: '',
  sizeBytes: 12,
  modifiedAt: new Date(2023, 11, 31, 23, 59, 59),
  path: '/images/y:0.1',
};

describe('query-outputs', () => {
  const mockCoreInfo = core.info as jest.Mock;

  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('serializeRecord', () => {
    it('should convert a record into its JSON form', () => {
      expect(serializeRecord(FIRST_RECORD)).toEqual({
        path: '/images/x:2.0--h1_1',
        tool: 'x',
        version: '2.0',
        variant: 'h1_1',
        build: 1,
        variantLabel: 'h1',
        sizeBytes: 1536,
        modified: '2024-01-04T05:06:07',
      });
    });
  });

  describe('renderRecords', () => {
    it('should render one path per line', () => {
      expect(renderRecords([FIRST_RECORD, SECOND_RECORD], 'paths')).toEqual(['/images/x:2.0--h1_1', '/images/y:0.1']);
    });

    it('should render modification time and size in the long format', () => {
      expect(renderRecords([FIRST_RECORD, SECOND_RECORD], 'long')).toEqual([
        '2024-01-04 05:06:07\t1.5 KB\t/images/x:2.0--h1_1',
        '2023-12-31 23:59:59\t12 Bytes\t/images/y:0.1',
      ]);
    });

    it('should render a single JSON array', () => {
      const outputLines = renderRecords([FIRST_RECORD, SECOND_RECORD], 'json');

      expect(outputLines).toHaveLength(1);
      expect(JSON.parse(outputLines[0] ?? '')).toEqual([serializeRecord(FIRST_RECORD), serializeRecord(SECOND_RECORD)]);
    });

    it('should render an empty JSON array when nothing matched', () => {
      expect(renderRecords([], 'json')).toEqual(['[]']);
      expect(renderRecords([], 'paths')).toEqual([]);
    });
  });

  describe('logLatestVersions', () => {
    it('should log the latest version of each tool in name order', () => {
      logLatestVersions(
        new Map([
          ['y', ''],
          ['x', '2.0'],
        ])
      );

      expect(mockCoreInfo.mock.calls).toEqual([['Latest version of x: 2.0'], ['Latest version of y: unknown']]);
    });
  });

  describe('writeQueryResult', () => {
    const queryResult: QueryResult = {
      records: [FIRST_RECORD],
      latestVersions: new Map([['x', '2.0']]),
    };

    it('should report statistics before the records', () => {
      writeQueryResult(queryResult, 'paths', false);

      expect(mockCoreInfo.mock.calls).toEqual([
        ['Latest version of x: 2.0'],
        ['1 images found'],
        ['/images/x:2.0--h1_1'],
      ]);
    });

    it('should report an empty result', () => {
      writeQueryResult({ records: [], latestVersions: new Map() }, 'paths', false);

      expect(mockCoreInfo.mock.calls).toEqual([['No images matched the query']]);
    });

    it('should write only the records when quiet', () => {
      writeQueryResult(queryResult, 'long', true);

      expect(mockCoreInfo.mock.calls).toEqual([['2024-01-04 05:06:07\t1.5 KB\t/images/x:2.0--h1_1']]);
    });
  });
});
