import * as S from '@effect/schema/Schema';
import { Config, Effect, Either, LogLevel, pipe } from 'effect';
import { random } from '@netsci/utils/rng/random';
import { rngStateFromSeed, seedFromString } from '@netsci/utils/rng/seed';
import { Graph } from './graph';
import { preferentialAttachmentGraph } from './preferentialAttachment';
import { edgeLimitViolation, uniformRandomGraph } from './uniformRandom';
import { ksDistance, powerLawHistogram } from './distribution';
import { CountSchema, GraphModel, RecomputePolicySchema } from './types';
import { InvalidParameterError, invalidParameterError } from './errors';
import { PREFERENTIAL_ATTACHMENT_MODEL_NAME, RECOMPUTE_PER_NODE, UNIFORM_RANDOM_MODEL_NAME } from './constants';

export const ExperimentSettingsSchema = S.Struct({
  seed: S.String,
  scaleFreeNodes: CountSchema,
  scaleFreeEdgesPerStep: CountSchema,
  recompute: RecomputePolicySchema,
  randomNodes: CountSchema,
  randomEdges: CountSchema,
  gamma: S.Number.pipe(S.finite(), S.positive()),
}).pipe(S.filter((s) => edgeLimitViolation(s.randomNodes, s.randomEdges) ?? true));

export type ExperimentSettings = typeof ExperimentSettingsSchema.Type;

export const defaultExperimentSettings: ExperimentSettings = {
  seed: 'seed',
  scaleFreeNodes: 1000,
  scaleFreeEdgesPerStep: 2,
  recompute: RECOMPUTE_PER_NODE,
  randomNodes: 1000,
  randomEdges: 2000,
  gamma: 2.5,
};

export const decodeExperimentSettings = (input: unknown): Either.Either<ExperimentSettings, InvalidParameterError> =>
  pipe(
    S.decodeUnknownEither(ExperimentSettingsSchema)(input),
    Either.mapLeft((e) => invalidParameterError('experiment settings', input, e.message))
  );

export const experimentSettingsWithDefaults = (
  input: Partial<ExperimentSettings>
): Either.Either<ExperimentSettings, InvalidParameterError> =>
  decodeExperimentSettings({ ...defaultExperimentSettings, ...input });

// raw values; the schema decides what is valid
export const experimentConfig = Config.all({
  seed: Config.string('SEED').pipe(Config.withDefault(defaultExperimentSettings.seed)),
  scaleFreeNodes: Config.integer('SCALE_FREE_NODES').pipe(Config.withDefault(defaultExperimentSettings.scaleFreeNodes)),
  scaleFreeEdgesPerStep: Config.integer('SCALE_FREE_EDGES_PER_STEP').pipe(
    Config.withDefault(defaultExperimentSettings.scaleFreeEdgesPerStep)
  ),
  recompute: Config.string('RECOMPUTE').pipe(Config.withDefault(defaultExperimentSettings.recompute)),
  randomNodes: Config.integer('RANDOM_NODES').pipe(Config.withDefault(defaultExperimentSettings.randomNodes)),
  randomEdges: Config.integer('RANDOM_EDGES').pipe(Config.withDefault(defaultExperimentSettings.randomEdges)),
  gamma: Config.number('GAMMA').pipe(Config.withDefault(defaultExperimentSettings.gamma)),
});

export const logLevelConfig = Config.logLevel('LOG_LEVEL').pipe(Config.withDefault(LogLevel.Info));

export const loadExperimentSettings = Effect.flatMap(experimentConfig, decodeExperimentSettings);

export type NetworkSummary = {
  model: GraphModel;
  nodes: number;
  edges: number;
  maxDegree: number;
  distribution: ReadonlyArray<number>;
  ksDistance: number;
};

export type ExperimentReport = {
  scaleFree: NetworkSummary;
  random: NetworkSummary;
  powerLaw: ReadonlyArray<number>;
};

const summarize = (model: GraphModel, graph: Graph) => ({
  model,
  nodes: graph.size(),
  edges: graph.edgeCount(),
  maxDegree: graph.maxDegree(),
  distribution: graph.normalizedDegreeDistribution(),
});

const logGenerated = (summary: Omit<NetworkSummary, 'ksDistance'>) =>
  Effect.logInfo('network generated').pipe(
    Effect.annotateLogs({
      model: summary.model,
      nodes: summary.nodes,
      edges: summary.edges,
      maxDegree: summary.maxDegree,
    })
  );

// generator parameter errors stay typed, anything else is a defect
const generate = <A>(build: () => A): Effect.Effect<A, InvalidParameterError> =>
  Effect.try({ try: build, catch: (e) => e }).pipe(
    Effect.catchAll((e) => (e instanceof InvalidParameterError ? Effect.fail(e) : Effect.die(e)))
  );

/**
 * Grows a scale-free network and a uniform random one from the same seed and measures how far each
 * normalized degree distribution is from the power law P(k) ∝ k^-gamma.
 */
export const runExperiment = (settings: ExperimentSettings): Effect.Effect<ExperimentReport, InvalidParameterError> =>
  Effect.gen(function* () {
    const rngState0 = rngStateFromSeed(seedFromString(settings.seed));
    yield* Effect.logDebug('experiment started').pipe(Effect.annotateLogs({ seed: settings.seed }));

    const [scaleFreeGraph, rngState1] = yield* generate(() =>
      preferentialAttachmentGraph({
        nodes: settings.scaleFreeNodes,
        edgesPerStep: settings.scaleFreeEdgesPerStep,
        recompute: settings.recompute,
      })(random)(rngState0)
    ).pipe(Effect.withLogSpan(PREFERENTIAL_ATTACHMENT_MODEL_NAME));
    const scaleFree = summarize(PREFERENTIAL_ATTACHMENT_MODEL_NAME, scaleFreeGraph);
    yield* logGenerated(scaleFree);

    const [randomGraph] = yield* generate(() =>
      uniformRandomGraph({ nodes: settings.randomNodes, edges: settings.randomEdges })(random)(rngState1)
    ).pipe(Effect.withLogSpan(UNIFORM_RANDOM_MODEL_NAME));
    const uniform = summarize(UNIFORM_RANDOM_MODEL_NAME, randomGraph);
    yield* logGenerated(uniform);

    const powerLaw = powerLawHistogram(Math.max(scaleFree.maxDegree, uniform.maxDegree), settings.gamma);
    const withDistance = (summary: typeof scaleFree): NetworkSummary => ({
      ...summary,
      ksDistance: ksDistance(summary.distribution, powerLaw),
    });
    const report: ExperimentReport = {
      scaleFree: withDistance(scaleFree),
      random: withDistance(uniform),
      powerLaw,
    };
    for (const summary of [report.scaleFree, report.random]) {
      yield* Effect.logInfo('distance to power law').pipe(
        Effect.annotateLogs({ model: summary.model, gamma: settings.gamma, ksDistance: summary.ksDistance })
      );
    }
    return report;
  });

export const formatReport = ({ scaleFree, random: uniform }: ExperimentReport): string =>
  [scaleFree, uniform]
    .map(
      (s) =>
        `${s.model}: ${s.nodes} nodes, ${s.edges} edges, max degree ${s.maxDegree}, KS distance to power law ${s.ksDistance.toFixed(4)}`
    )
    .join('\n');
