import { ConcurrentCollector } from '../collector/concurrent-collector.js';
import type { ResourceSourceDefinition, ScanSource, SourceCollection, SourceRunOptions } from './types.js';

/**
 * Wraps a typed definition into a ScanSource that runs it through the
 * concurrent collector and flattens the details into scan items.
 */
export function defineSource<TRef, TDetail>(definition: ResourceSourceDefinition<TRef, TDetail>): ScanSource {
  return {
    service: definition.service,
    label: definition.label,
    async collect(options: SourceRunOptions): Promise<SourceCollection> {
      const collector = new ConcurrentCollector({
        concurrency: options.concurrency,
        retryPolicy: options.retryPolicy,
        label: definition.label,
      });

      const { details, stats } = await collector.collectWithStats(
        definition.list(),
        (ref, signal) => definition.fetch(ref, signal),
        options.signal,
        ref => definition.describe(ref)
      );

      return { items: details.flatMap(detail => definition.extract(detail)), stats };
    },
  };
}
