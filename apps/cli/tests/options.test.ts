import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@loansim/engine';
import { parseCliOptions, wantsHelp } from '../src/options.js';

describe('parseCliOptions', () => {
  it('parses the required options with defaults', () => {
    expect(parseCliOptions(['--filename', 'loans.csv', '--savings-rate', '0.03'])).toEqual({
      filename: 'loans.csv',
      verbosity: 0,
      stepPennies: 100000,
      simulation: {
        annualSavingsRate: 0.03,
        employerContributionPennies: undefined,
        employerContributionMonth: undefined,
        employerContributionMode: undefined,
        autoPayRateDiscount: undefined,
        horizonMonths: undefined,
        startMonth: undefined,
        dayCountBasis: undefined,
        accrualBasis: undefined,
      },
    });
  });

  it('converts currency options to pennies', () => {
    const options = parseCliOptions([
      '-f',
      'loans.csv',
      '--savings-rate',
      '0.03',
      '--employer-amount',
      '2500.50',
      '--employer-month',
      '5',
      '--step',
      '500',
    ]);
    expect(options.stepPennies).toBe(50000);
    expect(options.simulation.employerContributionPennies).toBe(250050);
    expect(options.simulation.employerContributionMonth).toBe(5);
  });

  it('parses policy and calendar options', () => {
    const options = parseCliOptions([
      '-f',
      'loans.csv',
      '--savings-rate',
      '0.03',
      '--day-count',
      '365.25',
      '--accrual-basis',
      'principal',
      '--employer-mode',
      'bill_credit',
      '--auto-pay-discount',
      '0.0025',
      '--horizon',
      '60',
      '--start-month',
      '0',
      '-v',
      '3',
    ]);
    expect(options.verbosity).toBe(3);
    expect(options.simulation).toMatchObject({
      dayCountBasis: 365.25,
      accrualBasis: 'principal',
      employerContributionMode: 'bill_credit',
      autoPayRateDiscount: 0.0025,
      horizonMonths: 60,
      startMonth: 0,
    });
  });

  it('reports every missing required option', () => {
    expect(() => parseCliOptions([])).toThrow('--filename is required, --savings-rate is required');
  });

  it('rejects verbosity above 3', () => {
    expect(() => parseCliOptions(['-f', 'x.csv', '--savings-rate', '0.03', '-v', '4'])).toThrow(
      '--verbosity must be at most 3',
    );
  });

  it('rejects non-numeric rates', () => {
    expect(() => parseCliOptions(['-f', 'x.csv', '--savings-rate', 'lots'])).toThrow('--savings-rate must be a number');
  });

  it('turns unknown flags into configuration errors', () => {
    expect(() => parseCliOptions(['-f', 'x.csv', '--savings-rate', '0.03', '--bogus'])).toThrow(ConfigurationError);
  });
});

describe('wantsHelp', () => {
  it('detects both spellings', () => {
    expect(wantsHelp(['--help'])).toBe(true);
    expect(wantsHelp(['-h'])).toBe(true);
    expect(wantsHelp(['-f', 'x.csv'])).toBe(false);
  });
});
