import { TelemetryConfiguration } from '../config/configuration';
import { DefaultSearchMeasurement } from '../measurement/defaultSearchMeasurement';
import { SearchesMeasurement } from '../measurement/searchesMeasurement';
import { SessionCountMeasurement } from '../measurement/sessionCountMeasurement';
import { SessionDurationMeasurement } from '../measurement/sessionDurationMeasurement';
import { PingBuilder, PingBuilderOptions, TelemetryPingBuilder } from './pingBuilder';

/**
 * The core ping: session counts and durations, searches, and the default
 * search engine. It can always be built.
 */
export class TelemetryCorePingBuilder extends TelemetryPingBuilder {
  static readonly TYPE = 'core';
  private static readonly VERSION = 7;

  private readonly sessionCountMeasurement: SessionCountMeasurement;
  private readonly sessionDurationMeasurement: SessionDurationMeasurement;
  private readonly searchesMeasurement: SearchesMeasurement;
  private readonly defaultSearchMeasurement: DefaultSearchMeasurement;

  constructor(configuration: TelemetryConfiguration, options: PingBuilderOptions = {}) {
    super(configuration, TelemetryCorePingBuilder.TYPE, TelemetryCorePingBuilder.VERSION, options);

    this.addTimeMeasurements();
    this.sessionCountMeasurement = this.addMeasurement(new SessionCountMeasurement());
    this.sessionDurationMeasurement = this.addMeasurement(new SessionDurationMeasurement(this.clock));
    this.searchesMeasurement = this.addMeasurement(new SearchesMeasurement());
    this.defaultSearchMeasurement = this.addMeasurement(new DefaultSearchMeasurement());
  }

  canBuild(): boolean {
    return true;
  }

  getSessionCountMeasurement(): SessionCountMeasurement {
    return this.sessionCountMeasurement;
  }

  getSessionDurationMeasurement(): SessionDurationMeasurement {
    return this.sessionDurationMeasurement;
  }

  getSearchesMeasurement(): SearchesMeasurement {
    return this.searchesMeasurement;
  }

  getDefaultSearchMeasurement(): DefaultSearchMeasurement {
    return this.defaultSearchMeasurement;
  }
}

export function isCorePingBuilder(builder: PingBuilder): builder is TelemetryCorePingBuilder {
  return builder instanceof TelemetryCorePingBuilder;
}
