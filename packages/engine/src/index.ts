export { createDb, schema } from './db/index.js';
export type { DB } from './db/index.js';
export { loanRecords } from './db/schema.js';
export { migrate } from './db/migrate.js';

export { EngineError, InputValidationError, InvariantViolationError, ConfigurationError } from './errors.js';
export { formatMoney, toPennies } from './math/money.js';

export type { LoanRecord, StoredLoanRecord } from './records/types.js';
export { loanRecordSchema } from './records/types.js';
export { parseLoanCsv, loadLoanFile, splitCsvLine, EXPECTED_COLUMNS } from './records/loader.js';
export { listLoanRecords, getLoanRecord, insertLoanRecords, deleteLoanRecord } from './records/repository.js';

export type { DayCountBasis, AccrualBasis, LoanTerms, LoanOptions, LoanState } from './loan/types.js';
export { Loan, DEFAULT_LOAN_TERMS } from './loan/loan.js';
export { LoanPortfolio } from './portfolio/portfolio.js';
export { PaymentHistory } from './history/payment-history.js';

export type { EmployerContributionMode, SimulationPolicy, EmployerContribution, SimulationConfig } from './config/types.js';
export type { SimulationOptions } from './config/schema.js';
export { simulationOptionsSchema, resolveSimulationConfig, DEFAULT_HORIZON_MONTHS, DEFAULT_START_MONTH } from './config/schema.js';

export type { MonthStats, SimulationObserver, SimulationResult } from './simulation/types.js';
export { Simulation, simulateStrategy } from './simulation/engine.js';
export type { StrategySearchOptions, StrategySearchResult } from './strategy/types.js';
export { searchStrategies, candidateUpfrontPayments, DEFAULT_STEP_PENNIES, MAX_SEARCH_CANDIDATES } from './strategy/search.js';
