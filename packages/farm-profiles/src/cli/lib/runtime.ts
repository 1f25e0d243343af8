/**
 * Component wiring for CLI commands
 *
 * One registry, engine, builder, updater and orchestrator per invocation,
 * all sharing the configured query service.
 *
 * @module cli/lib/runtime
 */

import { HTTPClient } from '../../core/http-client.js';
import type { GeospatialQueryService } from '../../core/types/query-service.js';
import { ExtractionEngine } from '../../extraction/extraction-engine.js';
import { HttpQueryService } from '../../query/http-query-service.js';
import { DatasetRegistry, loadDatasetRegistry } from '../../registry/dataset-registry.js';
import { TextureMap } from '../../registry/texture-map.js';
import { BulkOrchestrator } from '../../services/bulk-orchestrator.js';
import { FarmProfileBuilder } from '../../services/farm-profile-builder.js';
import { FarmProfileUpdater } from '../../services/farm-profile-updater.js';
import type { CLIConfig } from './config.js';

export interface Runtime {
  readonly config: CLIConfig;
  readonly datasets: DatasetRegistry;
  readonly engine: ExtractionEngine;
  readonly builder: FarmProfileBuilder;
  readonly updater: FarmProfileUpdater;
  readonly orchestrator: BulkOrchestrator;
}

export function createQueryService(config: CLIConfig): GeospatialQueryService {
  return new HttpQueryService({
    baseUrl: config.gateway.baseUrl,
    client: new HTTPClient({
      timeoutMs: config.gateway.timeoutMs,
      maxRetries: config.gateway.maxRetries,
    }),
  });
}

/**
 * @param queryService - Replaces the gateway-backed service (tests, offline runs)
 */
export async function createRuntime(
  config: CLIConfig,
  queryService: GeospatialQueryService = createQueryService(config)
): Promise<Runtime> {
  const datasets = await loadDatasetRegistry(config.datasetsPath);
  const engine = new ExtractionEngine({
    queryService,
    datasets,
    textures: new TextureMap(),
    defaultYear: config.defaults.year,
  });
  const builder = new FarmProfileBuilder({ engine });
  const updater = new FarmProfileUpdater({ engine, builder });
  const orchestrator = new BulkOrchestrator({ builder, updater });

  return { config, datasets, engine, builder, updater, orchestrator };
}
