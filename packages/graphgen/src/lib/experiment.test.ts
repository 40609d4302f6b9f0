import { ConfigProvider, Effect, Either, Logger, LogLevel } from 'effect';
import { InvalidParameterError } from './errors';
import {
  decodeExperimentSettings,
  defaultExperimentSettings,
  ExperimentReport,
  ExperimentSettings,
  experimentSettingsWithDefaults,
  formatReport,
  loadExperimentSettings,
  runExperiment,
} from './experiment';

const settings: ExperimentSettings = {
  seed: 'test-seed',
  scaleFreeNodes: 20,
  scaleFreeEdgesPerStep: 2,
  recompute: 'per-node',
  randomNodes: 20,
  randomEdges: 30,
  gamma: 2.5,
};

const run = (s: ExperimentSettings) =>
  Effect.runSync(runExperiment(s).pipe(Logger.withMinimumLogLevel(LogLevel.None)));

const load = (env: ReadonlyArray<readonly [string, string]>) =>
  Effect.runSync(
    Effect.either(loadExperimentSettings).pipe(Effect.withConfigProvider(ConfigProvider.fromMap(new Map(env))))
  );

describe('runExperiment', () => {
  it('summarizes both networks', () => {
    const report = run(settings);
    expect(report.scaleFree).toMatchObject({ model: 'preferential-attachment', nodes: 40, edges: 39 });
    expect(report.random).toMatchObject({ model: 'uniform-random', nodes: 20, edges: 30 });
    expect(report.powerLaw).toHaveLength(Math.max(report.scaleFree.maxDegree, report.random.maxDegree) + 1);
    for (const summary of [report.scaleFree, report.random]) {
      expect(summary.distribution).toHaveLength(summary.maxDegree + 1);
      expect(summary.distribution.reduce((a, b) => a + b, 0)).toBeCloseTo(1);
      expect(summary.ksDistance).toBeGreaterThanOrEqual(0);
      expect(summary.ksDistance).toBeLessThanOrEqual(1);
    }
  });

  it('is deterministic for a seed', () => {
    expect(run(settings)).toEqual(run(settings));
  });

  it('fails with a typed error when the uniform network cannot have that many edges', () => {
    const result = Effect.runSync(
      Effect.either(runExperiment({ ...settings, randomNodes: 3, randomEdges: 30 })).pipe(
        Logger.withMinimumLogLevel(LogLevel.None)
      )
    );
    expect(Either.isLeft(result) && result.left).toBeInstanceOf(InvalidParameterError);
    expect(Either.isLeft(result) && result.left.parameter).toBe('edges');
  });
});

describe('experiment settings', () => {
  it('accepts the defaults', () => {
    expect(Either.getOrThrow(decodeExperimentSettings(defaultExperimentSettings))).toEqual(defaultExperimentSettings);
  });

  it('refuses a non-positive exponent', () => {
    expect(Either.isLeft(decodeExperimentSettings({ ...settings, gamma: 0 }))).toBe(true);
  });

  it('fills what is missing from the defaults', () => {
    expect(Either.getOrThrow(experimentSettingsWithDefaults({ seed: 'other', gamma: 3 }))).toEqual({
      ...defaultExperimentSettings,
      seed: 'other',
      gamma: 3,
    });
    expect(Either.isLeft(experimentSettingsWithDefaults({ randomEdges: -5 }))).toBe(true);
  });

  it('refuses more uniform edges than node pairs', () => {
    // 3 nodes have 3 pairs, the default asks for 2000 edges
    const result = experimentSettingsWithDefaults({ randomNodes: 3 });
    expect(Either.isLeft(result) && result.left.parameter).toBe('experiment settings');
    expect(Either.isRight(experimentSettingsWithDefaults({ randomNodes: 3, randomEdges: 3 }))).toBe(true);
  });

  it('reads the environment over the defaults', () => {
    const result = load([
      ['SCALE_FREE_NODES', '12'],
      ['RECOMPUTE', 'per-edge'],
    ]);
    expect(Either.getOrThrow(result)).toEqual({ ...defaultExperimentSettings, scaleFreeNodes: 12, recompute: 'per-edge' });
  });

  it('rejects values the schema does not know', () => {
    const result = load([['RECOMPUTE', 'sometimes']]);
    expect(Either.isLeft(result) && result.left._tag).toBe('InvalidParameterError');
  });

  it('rejects values that do not parse', () => {
    expect(Either.isLeft(load([['GAMMA', 'steep']]))).toBe(true);
  });
});

describe('formatReport', () => {
  it('prints one line per network', () => {
    const report: ExperimentReport = {
      scaleFree: { model: 'preferential-attachment', nodes: 4, edges: 3, maxDegree: 3, distribution: [], ksDistance: 0.25 },
      random: { model: 'uniform-random', nodes: 4, edges: 2, maxDegree: 1, distribution: [], ksDistance: 1 },
      powerLaw: [],
    };
    expect(formatReport(report)).toBe(
      [
        'preferential-attachment: 4 nodes, 3 edges, max degree 3, KS distance to power law 0.2500',
        'uniform-random: 4 nodes, 2 edges, max degree 1, KS distance to power law 1.0000',
      ].join('\n')
    );
  });
});
