import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

import { readIndicatorFile, parseIndicators, IndicatorFileError } from './indicator-file.js';
import { existsSync, readFileSync } from 'node:fs';

const FILE = '/data/indicators.json';

describe('indicator-file', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('readIndicatorFile', () => {
    it('throws when the file does not exist', () => {
      vi.mocked(existsSync).mockReturnValue(false);
      expect(() => readIndicatorFile(FILE)).toThrow(
        'Indicator file not found: /data/indicators.json'
      );
    });

    it('throws IndicatorFileError on invalid JSON', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue('[{');
      expect(() => readIndicatorFile(FILE)).toThrow(IndicatorFileError);
    });

    it('reads and normalizes indicator records', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(
        JSON.stringify({
          indicators: [
            {
              id: 1,
              name: 'Budget execution',
              target: '100%',
              satisfactoryThreshold: 90,
              criticalThreshold: 70,
              values: { Mar: '45%', Jun: '#DIV/0!', Sep: 78 },
            },
          ],
        })
      );

      expect(readIndicatorFile(FILE)).toEqual([
        {
          id: 1,
          name: 'Budget execution',
          target: 100,
          satisfactoryThreshold: 90,
          criticalThreshold: 70,
          values: [
            ['Mar', 45],
            ['Jun', null],
            ['Sep', 78],
          ],
        },
      ]);
      expect(readFileSync).toHaveBeenCalledWith(FILE, 'utf-8');
    });
  });

  describe('parseIndicators', () => {
    it('reports schema issues with their path', () => {
      expect(() =>
        parseIndicators({ indicators: [{ id: 1, name: 'A', values: { Jan: 'x' } }] }, 'input')
      ).toThrow('Invalid indicator data in input:\nindicators.0.values.Jan: "x" is not a number');
    });

    it('rejects data that is neither a list nor a wrapped list', () => {
      expect(() => parseIndicators('hello', 'input')).toThrow(
        'Invalid indicator data in input:\n(root): Invalid input'
      );
    });

    it('rejects duplicate indicator ids', () => {
      expect(() =>
        parseIndicators(
          [
            { id: 3, name: 'A' },
            { id: 3, name: 'B' },
          ],
          'input'
        )
      ).toThrow('Invalid indicator data in input: duplicate indicator id 3');
    });
  });
});
