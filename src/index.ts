// src/index.ts
export * from './analyzer/types.js';
export * from './analyzer/errors.js';
export * from './analyzer/declaration-schema.js';
export { TypeGraph, compareOrdinal } from './analyzer/type-graph.js';
export { ModelBuilder, createModelBuilder } from './analyzer/model-builder.js';
export { RuleEngine, createRuleEngine } from './analyzer/rule-engine.js';
export type { AnalyzeOptions } from './analyzer/rule-engine.js';
export * from './analyzer/rules/index.js';
export { ReportAggregator, compareFindings, renderJson, renderText } from './analyzer/report-aggregator.js';
export { AnalyzerService } from './analyzer/analyzer-service.js';
export type { AnalysisOptions } from './analyzer/analyzer-service.js';
export { createContextLogger } from './utils/logger.js';
