import { AnalyzerRegistry, type AnalyzerFactories } from '../analyzers/registry.js';
import type { Config } from '../config.js';
import { logger } from '../utils/logger.js';
import { AnalysisOrchestrator } from './orchestrator.js';
import { InMemoryTaskStore, type TaskStore } from './task-store.js';

export interface AnalysisService {
  orchestrator: AnalysisOrchestrator;
  registry: AnalyzerRegistry;
  store: TaskStore;
}

export interface ServiceOverrides {
  analyzers?: Partial<AnalyzerFactories>;
  store?: TaskStore;
}

/**
 * Wire the registry, task store and orchestrator from configuration.
 * Analyzers are built once here and shared by every submission.
 */
export async function createAnalysisService(
  config: Config,
  overrides: ServiceOverrides = {}
): Promise<AnalysisService> {
  logger.setLevel(config.logging.level);

  const registry = await AnalyzerRegistry.create(config, overrides.analyzers);
  const store = overrides.store ?? new InMemoryTaskStore();
  const orchestrator = new AnalysisOrchestrator({
    registry,
    store,
    execution: config.analysis.execution,
    maxFileSize: config.analysis.maxFileSize,
  });

  return { orchestrator, registry, store };
}
