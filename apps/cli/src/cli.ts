import {
  EngineError,
  loadLoanFile,
  resolveSimulationConfig,
  searchStrategies,
  type LoanRecord,
} from '@loansim/engine';
import { USAGE, parseCliOptions, wantsHelp } from './options.js';
import { createReporter } from './reporter.js';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  loadRecords?: (path: string) => LoanRecord[];
}

/** Runs the strategy search described by `argv`. Returns the process exit code. */
export function runCli(argv: string[], io: CliIO): number {
  if (wantsHelp(argv)) {
    io.out(USAGE);
    return 0;
  }

  try {
    const options = parseCliOptions(argv);
    const config = resolveSimulationConfig(options.simulation);
    const records = (io.loadRecords ?? loadLoanFile)(options.filename);

    const reporter = createReporter(options.verbosity, io.out);
    reporter.start(records);
    const result = searchStrategies(records, config, {
      stepPennies: options.stepPennies,
      onCandidate: reporter.onCandidate,
      observer: reporter.observer,
    });
    reporter.done(result);
    return 0;
  } catch (err) {
    if (err instanceof EngineError) {
      io.err(`${err.code}: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
