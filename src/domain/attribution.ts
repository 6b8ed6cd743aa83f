/**
 * Source attribution for tool responses
 *
 * QWeather asks that the sources and licence notices it returns in `refer`
 * be shown with the data.
 */

import type { Refer } from './schemas/envelope.js';
import type { SourceMetadata } from './types.js';

const PROVIDER = 'QWeather';

/** Used when a response lists no licence of its own */
const DEFAULT_LICENSE = 'QWeather Developers License';

/**
 * Envelope fields that carry attribution; each family has a different subset
 */
export interface AttributionFields {
  refer?: Refer;
  metadata?: { sources: string[] };
  updateTime?: string;
  fxLink?: string;
}

/**
 * Build source metadata for a tool response
 *
 * @param product - QWeather product name, e.g. "Weather Now"
 * @param envelope - Decoded response; `refer` and `metadata` are both read
 */
export function buildSourceMetadata(
  product: string,
  envelope: AttributionFields
): SourceMetadata {
  const sources = [...(envelope.refer?.sources ?? []), ...(envelope.metadata?.sources ?? [])];
  const license = envelope.refer?.license ?? [];

  return {
    provider: PROVIDER,
    product,
    sources,
    license: license.length > 0 ? license : [DEFAULT_LICENSE],
    ...(envelope.updateTime ? { updateTime: envelope.updateTime } : {}),
    ...(envelope.fxLink ? { fxLink: envelope.fxLink } : {}),
  };
}

/**
 * One-line credit for text summaries
 */
export function formatCredit(source: SourceMetadata): string {
  const origin = source.sources.length > 0 ? ` (${source.sources.join(', ')})` : '';
  return `Data from ${source.provider}${origin}.`;
}
