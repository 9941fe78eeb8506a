export { loadSettings, parseSettings, type AppSettings } from './config/settings';
export {
  DEFAULT_CATALOG_PATH,
  getSourceCategories,
  getSourcesByCategory,
  loadDefaultSources,
  type SourceCategory,
} from './config/default-sources';
export * from './services/scraping';
export { EntityExtractor } from './services/threat-analysis/entity-extractor';
export { SentimentScorer, SENTIMENT_BANDS, type SentimentScore, type SentimentSummary } from './services/threat-analysis/sentiment-scorer';
export { RiskScorer, DEFAULT_RISK_WEIGHTS, riskLevel, type RiskWeights } from './services/threat-analysis/risk-scorer';
export { RiskAssessor } from './services/threat-analysis/risk-assessor';
export { ThreatConfirmer, DEFAULT_CONFIRMATION_CRITERIA, type CriteriaUpdate } from './services/threat-analysis/threat-confirmer';
export { IncidentAggregator, canTransition, type AddResult, type TransitionResult } from './services/threat-analysis/incident-aggregator';
export { CandidateBuilder, estimateConfidence, matchKeywords } from './services/threat-analysis/candidate-builder';
export * from './services/threat-analysis/types';
export {
  createIncidentStorage,
  DatabaseIncidentStorage,
  InMemoryIncidentStorage,
  type IIncidentStorage,
  type StoredIncident,
} from './services/incident-storage';
export {
  ThreatRadarEngine,
  type Alert,
  type CycleResult,
  type MonitoringStatus,
  type ReviewResult,
  type ThreatRadarEngineOptions,
} from './services/threat-radar/engine';
export {
  ConfigurationError,
  CoordinatorTaskFailure,
  ExtractionError,
  FetchError,
  ScoringError,
  StorageError,
} from './services/error-logging/errors';
export { ErrorLogger, type ErrorContext } from './services/error-logging/error-logger';
export { InMemoryErrorLoggingStorage, type IErrorLoggingStorage } from './services/error-logging/storage';
export { log, registerLogListener, type LogLevel } from './utils/log';
