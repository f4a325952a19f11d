// ──────────────────────────────────────────
// Event registry: static reference events keyed by slug
// ──────────────────────────────────────────

import { EventRegistry } from '../shared/contracts';
import { NotFoundError } from '../shared/errors';
import { MeasurementEvent } from '../shared/types';

const torChart = (kind: 'relay' | 'bridge', country: string): string =>
  `https://metrics.torproject.org/userstats-${kind}-country.png?start=2024-12-01&end=2025-08-15&country=${country}`;

export const EVENTS: readonly MeasurementEvent[] = [
  {
    slug: 'uk-age-verify-2025',
    name: 'UK Age Verification (2025-07-25)',
    country: 'GB',
    instant: new Date('2025-07-25T00:00:00Z'),
    links: [
      { label: 'Tor Relay Users (GB)', url: torChart('relay', 'gb') },
      { label: 'Tor Bridge Users (GB)', url: torChart('bridge', 'gb') },
      { label: 'Tor Relay Users (Global)', url: torChart('relay', 'all') },
      { label: 'Tor Bridge Users (Global)', url: torChart('bridge', 'all') },
    ],
  },
];

export class StaticEventRegistry implements EventRegistry {
  private readonly bySlug: ReadonlyMap<string, MeasurementEvent>;

  constructor(private readonly events: readonly MeasurementEvent[] = EVENTS) {
    this.bySlug = new Map(events.map((e) => [e.slug, Object.freeze(e)]));
  }

  list(): readonly MeasurementEvent[] {
    return this.events;
  }

  resolve(slug: string): MeasurementEvent {
    const event = this.bySlug.get(slug);
    if (!event) {
      throw new NotFoundError(`Unknown event: ${slug}`);
    }
    return event;
  }
}
