import { TelemetryMeasurement } from './measurement';

/**
 * Common search locations:
 *
 * - actionbar: the user typed in the URL bar and used the default engine
 * - listitem: the user picked a secondary engine from the list
 * - suggestion: the user picked a search suggestion
 */
export const SearchLocation = {
  ActionBar: 'actionbar',
  ListItem: 'listitem',
  Suggestion: 'suggestion',
} as const;

/**
 * Counts searches per `<identifier>.<location>` key
 */
export class SearchesMeasurement extends TelemetryMeasurement<Record<string, number>> {
  private counts = new Map<string, number>();

  constructor() {
    super('searches');
  }

  recordSearch(location: string, identifier: string): void {
    const key = `${identifier}.${location}`;
    this.counts.set(key, (this.counts.get(key) ?? 0) + 1);
  }

  flush(): Record<string, number> {
    const searches = Object.fromEntries(this.counts);
    this.counts = new Map();
    return searches;
  }
}
