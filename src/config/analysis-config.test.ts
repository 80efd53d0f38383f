import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

vi.mock('./paths.js', () => ({
  resolveConfigPath: vi.fn(() => '/mock/indicators.config.json'),
}));

import {
  readAnalysisConfig,
  loadAnalysisConfig,
  AnalysisConfigError,
} from './analysis-config.js';
import { DEFAULT_THRESHOLDS } from './thresholds.js';
import { existsSync, readFileSync } from 'node:fs';

describe('analysis-config', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('readAnalysisConfig', () => {
    it('returns null when file does not exist', () => {
      vi.mocked(existsSync).mockReturnValue(false);
      expect(readAnalysisConfig()).toBeNull();
      expect(existsSync).toHaveBeenCalledWith('/mock/indicators.config.json');
    });

    it('reads and validates a config file', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(
        JSON.stringify({ version: 1, thresholds: { zScoreThreshold: 2 } })
      );

      expect(readAnalysisConfig()).toEqual({
        version: 1,
        thresholds: { zScoreThreshold: 2 },
        report: { title: 'Indicator Analysis Report' },
      });
    });

    it('throws on invalid JSON', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue('{ not json');

      expect(() => readAnalysisConfig()).toThrow(AnalysisConfigError);
    });

    it('throws with the offending path on schema failure', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(
        JSON.stringify({ version: 1, thresholds: { maxAssumedMissing: -2 } })
      );

      expect(() => readAnalysisConfig('/etc/bad.json')).toThrow(
        /^Invalid config in \/etc\/bad\.json:\nthresholds\.maxAssumedMissing: /
      );
    });

    it('rejects an unknown version', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(JSON.stringify({ version: 2 }));

      expect(() => readAnalysisConfig()).toThrow(/version/);
    });
  });

  describe('loadAnalysisConfig', () => {
    it('falls back to defaults without a file', () => {
      vi.mocked(existsSync).mockReturnValue(false);

      expect(loadAnalysisConfig()).toEqual({
        thresholds: DEFAULT_THRESHOLDS,
        reportTitle: 'Indicator Analysis Report',
        source: null,
      });
    });

    it('merges file thresholds onto defaults', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(
        JSON.stringify({
          version: 1,
          thresholds: { volatilityCvPercent: 25 },
          report: { title: 'Planning Office Indicators' },
        })
      );

      const config = loadAnalysisConfig();

      expect(config.thresholds).toEqual({ ...DEFAULT_THRESHOLDS, volatilityCvPercent: 25 });
      expect(config.reportTitle).toBe('Planning Office Indicators');
      expect(config.source).toBe('/mock/indicators.config.json');
    });
  });
});
