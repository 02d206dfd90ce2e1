import { TelemetryMeasurement } from './measurement';

export interface DefaultSearchEngineProvider {
  /** Identifier of the current default search engine, or null if unknown */
  getDefaultSearchEngineIdentifier(): string | null;
}

export class DefaultSearchMeasurement extends TelemetryMeasurement<string | null> {
  private provider: DefaultSearchEngineProvider | undefined;

  constructor() {
    super('defaultSearch');
  }

  setDefaultSearchEngineProvider(provider: DefaultSearchEngineProvider): void {
    this.provider = provider;
  }

  flush(): string | null {
    return this.provider ? this.provider.getDefaultSearchEngineIdentifier() : null;
  }
}
