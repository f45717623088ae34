/**
 * Forecast aggregator: one fetch per model, window filter, per-model columns,
 * then a left-to-right outer join on time.
 *
 * Fetches are fanned out concurrently by default and joined only after all of
 * them settle successfully. The first failure cancels the rest and aborts the build.
 */

import type { AggregatedTable, ForecastRequest, ModelKey } from '@/types/forecast';
import type { FetchMode } from '@/config/types';
import type { ModelRegistry } from '@/models/registry';
import type { AppLogger } from '@/services/logger';
import type { SeriesFetcher } from '@/services/providers/weather/series-provider';
import { NoValidModelsError } from '@/services/errors';
import { emptyTable, filterWindow, outerJoin, toModelTable } from './table';

export interface ForecastBuilder {
  build(request: ForecastRequest): Promise<AggregatedTable>;
}

export interface ForecastAggregatorDeps {
  registry: ModelRegistry;
  fetcher: SeriesFetcher;
  logger: AppLogger;
  fetchMode?: FetchMode;
}

export class ForecastAggregator implements ForecastBuilder {
  private readonly registry: ModelRegistry;
  private readonly fetcher: SeriesFetcher;
  private readonly logger: AppLogger;
  private readonly fetchMode: FetchMode;

  constructor(deps: ForecastAggregatorDeps) {
    this.registry = deps.registry;
    this.fetcher = deps.fetcher;
    this.logger = deps.logger.getSubLogger({ name: 'aggregator' });
    this.fetchMode = deps.fetchMode ?? 'concurrent';
  }

  async build(request: ForecastRequest): Promise<AggregatedTable> {
    const { models } = request;
    if (models.length === 0) throw new NoValidModelsError();

    // Resolve everything up front so an unknown name fails before any network call.
    const targets = models.map((model) => ({ model, providerId: this.registry.resolve(model) }));

    const started = Date.now();
    const tables =
      this.fetchMode === 'sequential'
        ? await this.fetchSequential(request, targets)
        : await this.fetchConcurrent(request, targets);

    const joined = tables.reduce(outerJoin, emptyTable());
    this.logger.info(
      `Built ${joined.rows.length} rows for ${models.join(',')} on ${request.date} ` +
        `${request.startHour}-${request.endHour}h in ${Date.now() - started}ms`,
    );
    return joined;
  }

  private async fetchSequential(
    request: ForecastRequest,
    targets: Array<{ model: ModelKey; providerId: string }>,
  ): Promise<AggregatedTable[]> {
    const tables: AggregatedTable[] = [];
    for (const target of targets) {
      tables.push(await this.fetchModel(request, target));
    }
    return tables;
  }

  private async fetchConcurrent(
    request: ForecastRequest,
    targets: Array<{ model: ModelKey; providerId: string }>,
  ): Promise<AggregatedTable[]> {
    const controller = new AbortController();
    try {
      return await Promise.all(
        targets.map((target) =>
          this.fetchModel(request, target, controller.signal).catch((error: unknown) => {
            controller.abort();
            throw error;
          }),
        ),
      );
    } finally {
      controller.abort();
    }
  }

  private async fetchModel(
    request: ForecastRequest,
    target: { model: ModelKey; providerId: string },
    signal?: AbortSignal,
  ): Promise<AggregatedTable> {
    const series = await this.fetcher.fetchSeries({
      latitude: request.latitude,
      longitude: request.longitude,
      timezone: request.timezone,
      providerId: target.providerId,
      signal,
    });
    const inWindow = filterWindow(series.observations, request);
    this.logger.debug(`${target.model}: ${inWindow.length}/${series.observations.length} rows in window`);
    return toModelTable(target.model, inWindow);
  }
}
