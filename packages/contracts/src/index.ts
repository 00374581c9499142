/**
 * @fileoverview Main entry point for @levelscope/contracts package.
 *
 * Exports all types, error classes, and guards shared across levelscope packages.
 *
 * @module @levelscope/contracts
 */

// Market data types
export type {
  DailyBar,
  GetDailyBarsParams,
  ProviderCapabilities,
  DailyBarsLoader,
} from './market.js';

// Analysis result types
export type {
  LevelKind,
  AnnotatedBar,
  Level,
  PartitionedLevels,
  AnalysisWindow,
  AnalysisParameters,
  AnalysisResult,
} from './analysis.js';

// Error classes and guards
export {
  LevelscopeError,
  EmptyInputError,
  InsufficientDataError,
  MalformedBarError,
  InvalidParameterError,
  ProviderRateLimitError,
  SymbolResolutionError,
  ProviderError,
  isLevelscopeError,
  isEmptyInputError,
  isInsufficientDataError,
  isMalformedBarError,
  isInvalidParameterError,
  isProviderRateLimitError,
  isSymbolResolutionError,
  isProviderError,
} from './errors.js';
