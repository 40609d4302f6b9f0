import { Cause, Effect, Exit, Logger, pipe } from 'effect';
import {
  formatReport,
  loadExperimentSettings,
  logLevelConfig,
  runExperiment,
} from '@netsci/graphgen/experiment';

const program = pipe(
  loadExperimentSettings,
  Effect.flatMap(runExperiment),
  Effect.tap((report) => Effect.logInfo(`\n${formatReport(report)}`)),
  Effect.tapErrorCause((cause) => Effect.logError(Cause.pretty(cause)))
);

const main = Effect.gen(function* () {
  const level = yield* logLevelConfig;
  return yield* program.pipe(Logger.withMinimumLogLevel(level));
});

void Effect.runPromiseExit(main).then((exit) => {
  if (Exit.isFailure(exit)) process.exitCode = 1;
});
