import { parseArgs } from 'node:util';
import { z } from 'zod';
import { ConfigurationError, toPennies, type DayCountBasis, type SimulationOptions } from '@loansim/engine';
import type { Verbosity } from './reporter.js';

export const USAGE = `Usage: loansim --filename <loans.csv> --savings-rate <rate> [options]

  -f, --filename <path>        CSV with columns name,principal,current_interest,interest_rate
      --savings-rate <rate>    annual return on money kept instead, e.g. 0.03
      --employer-amount <amt>  yearly employer contribution (requires --employer-month)
      --employer-month <0-11>  month the contribution arrives, 0 = January
      --employer-mode <mode>   extra_payment (default) or bill_credit
      --auto-pay-discount <r>  subtracted from every loan rate, e.g. 0.0025
      --step <amt>             spacing of candidate upfront payments (default 1000)
      --horizon <months>       months to simulate (default 120)
      --start-month <0-11>     calendar month of the first payment (default 9)
      --day-count <basis>      365 (default) or 365.25
      --accrual-basis <basis>  balance (default) or principal
  -v, --verbosity <0-3>        0 result only, 1 per strategy, 2 per month, 3 per loan
  -h, --help                   show this message`;

const decimalArg = (flag: string) =>
  z
    .string({ required_error: `--${flag} is required` })
    .trim()
    .refine((s) => s !== '' && Number.isFinite(Number(s)), { message: `--${flag} must be a number` });

const integerArg = (flag: string, min: number, max: number) =>
  z.coerce
    .number({ invalid_type_error: `--${flag} must be a number` })
    .int(`--${flag} must be a whole number`)
    .min(min, `--${flag} must be at least ${min}`)
    .max(max, `--${flag} must be at most ${max}`);

const cliArgsSchema = z.object({
  filename: z.string({ required_error: '--filename is required' }).min(1, '--filename is required'),
  'savings-rate': decimalArg('savings-rate'),
  'employer-amount': decimalArg('employer-amount').optional(),
  'employer-month': integerArg('employer-month', 0, 11).optional(),
  'employer-mode': z.enum(['extra_payment', 'bill_credit']).optional(),
  'auto-pay-discount': decimalArg('auto-pay-discount').optional(),
  step: decimalArg('step').default('1000'),
  horizon: integerArg('horizon', 1, 600).optional(),
  'start-month': integerArg('start-month', 0, 11).optional(),
  'day-count': z
    .enum(['365', '365.25'])
    .transform((v): DayCountBasis => (v === '365' ? 365 : 365.25))
    .optional(),
  'accrual-basis': z.enum(['balance', 'principal']).optional(),
  verbosity: integerArg('verbosity', 0, 3).default(0),
});

export interface CliOptions {
  filename: string;
  verbosity: Verbosity;
  stepPennies: number;
  simulation: SimulationOptions;
}

const VERBOSITY_LEVELS: readonly Verbosity[] = [0, 1, 2, 3];

function toVerbosity(level: number): Verbosity {
  return VERBOSITY_LEVELS.find((l) => l === level) ?? 0;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        filename: { type: 'string', short: 'f' },
        'savings-rate': { type: 'string' },
        'employer-amount': { type: 'string' },
        'employer-month': { type: 'string' },
        'employer-mode': { type: 'string' },
        'auto-pay-discount': { type: 'string' },
        step: { type: 'string' },
        horizon: { type: 'string' },
        'start-month': { type: 'string' },
        'day-count': { type: 'string' },
        'accrual-basis': { type: 'string' },
        verbosity: { type: 'string', short: 'v' },
        help: { type: 'boolean', short: 'h' },
      },
    }).values;
  } catch (err) {
    throw new ConfigurationError(err instanceof Error ? err.message : String(err));
  }
}

export function wantsHelp(argv: string[]): boolean {
  return argv.includes('--help') || argv.includes('-h');
}

export function parseCliOptions(argv: string[]): CliOptions {
  const parsed = cliArgsSchema.safeParse(readArgs(argv));
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((i) => i.message).join(', '));
  }

  const args = parsed.data;
  return {
    filename: args.filename,
    verbosity: toVerbosity(args.verbosity),
    stepPennies: toPennies(args.step),
    simulation: {
      annualSavingsRate: Number(args['savings-rate']),
      employerContributionPennies:
        args['employer-amount'] === undefined ? undefined : toPennies(args['employer-amount']),
      employerContributionMonth: args['employer-month'],
      employerContributionMode: args['employer-mode'],
      autoPayRateDiscount: args['auto-pay-discount'] === undefined ? undefined : Number(args['auto-pay-discount']),
      horizonMonths: args.horizon,
      startMonth: args['start-month'],
      dayCountBasis: args['day-count'],
      accrualBasis: args['accrual-basis'],
    },
  };
}
