import type { LoggerMethods } from '@docsense/logger';
import type { TokenUsageReport } from '@docsense/model';

import { QualityBand } from '@docsense/model';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import type { OracleResponder } from './testing';

import { DocumentAnalyzer } from './document-analyzer';
import { movieReviewProfile, resumeProfile } from './profiles';
import { ScriptedOracle, hangUntilAborted } from './testing';
import { InputTooShortError } from './validation';

function filler(count: number, prefix: string): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix}${i}`);
}

// 120 words, four headed sections
const RESUME = [
  'SUMMARY',
  ...filler(29, 'summary'),
  'EXPERIENCE',
  ...filler(29, 'experience'),
  'EDUCATION',
  ...filler(29, 'education'),
  'SKILLS',
  ...filler(29, 'skills'),
].join(' ');

const HOLISTIC_ANSWER = {
  summary: 'Experienced engineer with a focused resume.',
  strengths: 'Quantified results; Modern stack',
  weaknesses: 'Dense summary; Dates missing',
  recommendations: 'Shorten the summary; Add dates; Group skills',
};

function resumeResponders(
  overrides: Record<string, OracleResponder> = {},
): Record<string, OracleResponder> {
  return {
    identification: () => ({
      units: 'SUMMARY, EXPERIENCE, EDUCATION, SKILLS',
    }),
    evaluation: (call) => ({
      analysis: `Feedback on ${call.inputs.unit}`,
      score: '8/10',
    }),
    assessment: () => HOLISTIC_ANSWER,
    ...overrides,
  };
}

const delay = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('DocumentAnalyzer', () => {
  let mockLogger: LoggerMethods;

  beforeEach(() => {
    mockLogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  });

  function createAnalyzer(
    oracle: ScriptedOracle,
    options: {
      unitConcurrency?: number;
      callTimeoutMs?: number;
      onTokenUsage?: (report: TokenUsageReport) => void;
    } = {},
  ): DocumentAnalyzer {
    return new DocumentAnalyzer({
      logger: mockLogger,
      oracle,
      profile: resumeProfile,
      ...options,
    });
  }

  describe('resume analysis', () => {
    test('analyzes a four-section resume end to end', async () => {
      const oracle = new ScriptedOracle(resumeResponders());

      const result = await createAnalyzer(oracle).analyze(RESUME);

      expect(result.profile).toBe('resume');
      expect(result.units.map((unit) => unit.name)).toEqual([
        'SUMMARY',
        'EXPERIENCE',
        'EDUCATION',
        'SKILLS',
      ]);
      expect(Object.keys(result.evaluations)).toEqual([
        'SUMMARY',
        'EXPERIENCE',
        'EDUCATION',
        'SKILLS',
      ]);
      for (const evaluation of Object.values(result.evaluations)) {
        expect(evaluation.score).toBe(8);
        expect(evaluation.scoreSource).toBe('parsed');
      }
      expect(result.evaluations.SKILLS.narrative).toBe('Feedback on SKILLS');
      expect(result.holistic.summary).toBe(
        'Experienced engineer with a focused resume.',
      );
      expect(result.holistic.labeledLists).toEqual({
        strengths: ['Quantified results', 'Modern stack'],
        weaknesses: ['Dense summary', 'Dates missing'],
        recommendations: ['Shorten the summary', 'Add dates', 'Group skills'],
      });
      expect(result.stages).toEqual({
        structure: 'completed',
        evaluation: 'completed',
        holistic: 'completed',
        failedUnits: [],
      });
    });

    test('passes the whole document to every call', async () => {
      const oracle = new ScriptedOracle(resumeResponders());

      await createAnalyzer(oracle).analyze(RESUME);

      expect(oracle.calls).toHaveLength(6);
      for (const call of oracle.calls) {
        expect(call.inputs.document).toBe(RESUME);
      }
      expect(oracle.callsFor('evaluation').map((c) => c.inputs.unit)).toEqual(
        ['SUMMARY', 'EXPERIENCE', 'EDUCATION', 'SKILLS'],
      );
    });

    test('evaluates each duplicate unit name once', async () => {
      const oracle = new ScriptedOracle(
        resumeResponders({
          identification: () => ({ units: 'Skills, Skills, Experience' }),
        }),
      );

      const result = await createAnalyzer(oracle).analyze(RESUME);

      expect(result.units).toEqual([{ name: 'Skills' }, { name: 'Experience' }]);
      expect(oracle.callsFor('evaluation')).toHaveLength(2);
    });

    test('returns a deeply frozen result', async () => {
      const oracle = new ScriptedOracle(resumeResponders());

      const result = await createAnalyzer(oracle).analyze(RESUME);

      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.units)).toBe(true);
      expect(Object.isFrozen(result.evaluations.SUMMARY)).toBe(true);
      expect(Object.isFrozen(result.holistic.labeledLists.strengths)).toBe(
        true,
      );
      expect(Object.isFrozen(result.usage.total)).toBe(true);
    });
  });

  describe('validation', () => {
    test('rejects a 30-word document without calling the oracle', async () => {
      const oracle = new ScriptedOracle(resumeResponders());
      const shortResume = filler(30, 'w').join(' ');

      await expect(
        createAnalyzer(oracle).analyze(shortResume),
      ).rejects.toBeInstanceOf(InputTooShortError);
      expect(oracle.calls).toHaveLength(0);
    });

    test('rejects an empty document for a one-word profile', async () => {
      const oracle = new ScriptedOracle({});
      const analyzer = new DocumentAnalyzer({
        logger: mockLogger,
        oracle,
        profile: movieReviewProfile,
      });

      await expect(analyzer.analyze('   ')).rejects.toThrow(
        'Document is empty',
      );
      expect(oracle.calls).toHaveLength(0);
    });
  });

  describe('failure isolation', () => {
    test('keeps a unit whose evaluation failed out of evaluations only', async () => {
      const oracle = new ScriptedOracle(
        resumeResponders({
          identification: () => ({ units: 'SUMMARY, EDUCATION, SKILLS' }),
          evaluation: (call) => {
            if (call.inputs.unit === 'EDUCATION') {
              throw new Error('model crashed');
            }
            return { analysis: 'ok', score: '7' };
          },
        }),
      );

      const result = await createAnalyzer(oracle).analyze(RESUME);

      expect(result.units.map((unit) => unit.name)).toEqual([
        'SUMMARY',
        'EDUCATION',
        'SKILLS',
      ]);
      expect(Object.keys(result.evaluations)).toEqual(['SUMMARY', 'SKILLS']);
      expect(result.stages.evaluation).toBe('partial');
      expect(result.stages.failedUnits).toEqual(['EDUCATION']);
      expect(result.holistic.labeledLists.strengths).toHaveLength(2);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        '[DocumentAnalyzer] Evaluation of "EDUCATION" failed: [UnitEvaluator] evaluation call failed: model crashed',
      );
    });

    test('still runs the holistic stage when structure fails', async () => {
      const oracle = new ScriptedOracle(
        resumeResponders({
          identification: () => {
            throw new Error('connection refused');
          },
        }),
      );

      const result = await createAnalyzer(oracle).analyze(RESUME);

      expect(result.units).toEqual([]);
      expect(result.evaluations).toEqual({});
      expect(result.stages).toEqual({
        structure: 'failed',
        evaluation: 'skipped',
        holistic: 'completed',
        failedUnits: [],
      });
      expect(result.holistic.summary).toBe(HOLISTIC_ANSWER.summary);
      expect(oracle.callsFor('evaluation')).toHaveLength(0);
    });

    test('skips evaluation when no units are named', async () => {
      const oracle = new ScriptedOracle(
        resumeResponders({ identification: () => ({ units: '' }) }),
      );

      const result = await createAnalyzer(oracle).analyze(RESUME);

      expect(result.stages.structure).toBe('completed');
      expect(result.stages.evaluation).toBe('skipped');
    });

    test('fills empty holistic fields when the holistic stage fails', async () => {
      const oracle = new ScriptedOracle(
        resumeResponders({
          assessment: () => {
            throw new Error('rate limited');
          },
        }),
      );

      const result = await createAnalyzer(oracle).analyze(RESUME);

      expect(result.stages.holistic).toBe('failed');
      expect(result.holistic).toEqual({
        summary: '',
        labeledLists: { strengths: [], weaknesses: [], recommendations: [] },
        narratives: {},
        qualityRatings: {},
        rating: null,
      });
      expect(Object.keys(result.evaluations)).toHaveLength(4);
    });

    test('returns an empty but valid result when every stage fails', async () => {
      const unavailable: OracleResponder = () => {
        throw new Error('ECONNREFUSED');
      };
      const oracle = new ScriptedOracle({
        identification: unavailable,
        evaluation: unavailable,
        assessment: unavailable,
      });

      const result = await createAnalyzer(oracle).analyze(RESUME);

      expect(result.units).toEqual([]);
      expect(result.evaluations).toEqual({});
      expect(result.holistic.summary).toBe('');
      expect(result.stages).toEqual({
        structure: 'failed',
        evaluation: 'skipped',
        holistic: 'failed',
        failedUnits: [],
      });
      expect(mockLogger.error).toHaveBeenCalledWith(
        '[DocumentAnalyzer] Every stage failed, returning an empty result',
      );
    });

    test('marks evaluation failed when every unit fails', async () => {
      const oracle = new ScriptedOracle(
        resumeResponders({
          evaluation: () => {
            throw new Error('boom');
          },
        }),
      );

      const result = await createAnalyzer(oracle).analyze(RESUME);

      expect(result.stages.evaluation).toBe('failed');
      expect(result.stages.failedUnits).toEqual([
        'SUMMARY',
        'EXPERIENCE',
        'EDUCATION',
        'SKILLS',
      ]);
      expect(mockLogger.error).not.toHaveBeenCalled();
    });

    test('fails a unit whose call exceeds the deadline', async () => {
      const oracle = new ScriptedOracle(
        resumeResponders({
          evaluation: (call) =>
            call.inputs.unit === 'SKILLS'
              ? hangUntilAborted(call)
              : { analysis: 'ok', score: '6' },
        }),
      );

      const result = await createAnalyzer(oracle, {
        callTimeoutMs: 50,
      }).analyze(RESUME);

      expect(result.stages.failedUnits).toEqual(['SKILLS']);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        '[DocumentAnalyzer] Evaluation of "SKILLS" failed: [UnitEvaluator] evaluation call timed out after 50ms',
      );
      expect(oracle.callsFor('evaluation')[3].abortSignal?.aborted).toBe(true);
    });
  });

  describe('cancellation', () => {
    test('rejects with AbortError and stops issuing calls', async () => {
      const controller = new AbortController();
      const oracle = new ScriptedOracle(
        resumeResponders({
          evaluation: (call) => {
            controller.abort();
            return hangUntilAborted(call);
          },
        }),
      );

      await expect(
        createAnalyzer(oracle).analyze(RESUME, {
          abortSignal: controller.signal,
        }),
      ).rejects.toMatchObject({
        name: 'AbortError',
        message: 'Document analysis was aborted',
      });
      expect(oracle.callsFor('evaluation')).toHaveLength(1);
      expect(oracle.callsFor('assessment')).toHaveLength(0);
      expect(oracle.calls[1].abortSignal?.aborted).toBe(true);
    });

    test('makes no calls when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const oracle = new ScriptedOracle(resumeResponders());

      await expect(
        createAnalyzer(oracle).analyze(RESUME, {
          abortSignal: controller.signal,
        }),
      ).rejects.toMatchObject({ name: 'AbortError' });
      expect(oracle.calls).toHaveLength(0);
    });
  });

  describe('concurrency', () => {
    test('bounds in-flight evaluations and keeps unit order', async () => {
      let inFlight = 0;
      let maxInFlight = 0;
      const delays: Record<string, number> = {
        SUMMARY: 30,
        EXPERIENCE: 5,
        EDUCATION: 20,
        SKILLS: 1,
      };
      const oracle = new ScriptedOracle(
        resumeResponders({
          evaluation: async (call) => {
            inFlight++;
            maxInFlight = Math.max(maxInFlight, inFlight);
            await delay(delays[call.inputs.unit]);
            inFlight--;
            return { analysis: call.inputs.unit, score: '9' };
          },
        }),
      );

      const result = await createAnalyzer(oracle, {
        unitConcurrency: 2,
      }).analyze(RESUME);

      expect(maxInFlight).toBe(2);
      expect(Object.keys(result.evaluations)).toEqual([
        'SUMMARY',
        'EXPERIENCE',
        'EDUCATION',
        'SKILLS',
      ]);
    });

    test('evaluates sequentially by default', async () => {
      let inFlight = 0;
      let maxInFlight = 0;
      const oracle = new ScriptedOracle(
        resumeResponders({
          evaluation: async () => {
            inFlight++;
            maxInFlight = Math.max(maxInFlight, inFlight);
            await delay(1);
            inFlight--;
            return { analysis: 'ok', score: '4' };
          },
        }),
      );

      await createAnalyzer(oracle).analyze(RESUME);

      expect(maxInFlight).toBe(1);
    });

    test('keeps concurrent runs on one analyzer apart', async () => {
      const oracle = new ScriptedOracle(resumeResponders(), {
        tokensPerCall: { inputTokens: 10, outputTokens: 5 },
      });
      const analyzer = createAnalyzer(oracle, { unitConcurrency: 4 });

      const [first, second] = await Promise.all([
        analyzer.analyze(RESUME),
        analyzer.analyze(RESUME),
      ]);

      expect(first.usage.total.totalTokens).toBe(90);
      expect(second.usage.total.totalTokens).toBe(90);
    });
  });

  describe('token usage', () => {
    test('reports usage after each stage and on the result', async () => {
      const oracle = new ScriptedOracle(resumeResponders(), {
        tokensPerCall: { inputTokens: 10, outputTokens: 5 },
      });
      const reports: TokenUsageReport[] = [];

      const result = await createAnalyzer(oracle, {
        onTokenUsage: (report) => reports.push(report),
      }).analyze(RESUME);

      expect(reports.map((report) => report.total.totalTokens)).toEqual([
        15, 75, 90,
      ]);
      expect(result.usage.total).toEqual({
        inputTokens: 60,
        outputTokens: 30,
        totalTokens: 90,
      });
      expect(result.usage.components.map((c) => c.component)).toEqual([
        'UnitIdentifier',
        'UnitEvaluator',
        'HolisticAssessor',
      ]);
      expect(mockLogger.info).toHaveBeenCalledWith(
        'Grand total: 60 input, 30 output, 90 total',
      );
    });
  });

  describe('movie review profile', () => {
    test('title-cases genres and maps qualities and rating', async () => {
      const oracle = new ScriptedOracle({
        identification: () => ({ units: 'science fiction, NOIR' }),
        evaluation: () => ({ analysis: 'Delivers.', score: '9' }),
        assessment: () => ({
          summary: 'A detective hunts rogue androids.',
          similarMovies: 'Alien, Dark City',
          recommendations: 'Sci-fi fans',
          characterAnalysis: 'Quietly conflicted lead.',
          culturalImpact: 'Defined a visual style.',
          directing: 'excellent',
          cinematography: 'EXCELLENT and good',
          technicalAspects: 'poor',
          rating: 'I give it 11 out of 10',
        }),
      });
      const analyzer = new DocumentAnalyzer({
        logger: mockLogger,
        oracle,
        profile: movieReviewProfile,
      });

      const result = await analyzer.analyze('Blade Runner');

      expect(result.units).toEqual([
        { name: 'Science Fiction' },
        { name: 'Noir' },
      ]);
      expect(result.holistic.qualityRatings).toEqual({
        directing: QualityBand.EXCELLENT,
        cinematography: QualityBand.EXCELLENT,
        technicalAspects: QualityBand.POOR,
      });
      expect(result.holistic.rating).toEqual({ value: 10, source: 'parsed' });
      expect(result.holistic.labeledLists.similarMovies).toEqual([
        'Alien',
        'Dark City',
      ]);
    });
  });
});
