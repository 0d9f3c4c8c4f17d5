import type { ClassifiedItem } from '../scan/freshness.js';
import type { PageFetcher } from './adapter.js';

/**
 * Build a delivery-queue hook that reads each listing's own page before it is
 * sent. Only listings that passed dedup reach it, so detail requests never
 * count against a scan's time budget. Returns undefined when the fetcher
 * cannot read detail pages.
 */
export function detailPreparer(
  fetcher: PageFetcher,
  timeoutMs: number,
): ((item: ClassifiedItem) => Promise<ClassifiedItem>) | undefined {
  const fetchDetails = fetcher.fetchDetails?.bind(fetcher);
  if (!fetchDetails) return undefined;

  return async (item) => {
    const details = await fetchDetails(item.url, AbortSignal.timeout(timeoutMs));
    return {
      ...item,
      description: details.description,
      tags: details.tags,
      category: details.category,
      image: item.image ?? details.image,
    };
  };
}
