import { TelemetryConfiguration } from '../config/configuration';
import { AbstractEventPingBuilder } from './eventPingBuilder';
import { PingBuilderOptions } from './pingBuilder';

export class TelemetryMobileEventPingBuilder extends AbstractEventPingBuilder {
  static readonly TYPE = 'mobile-event';
  private static readonly VERSION = 1;

  constructor(configuration: TelemetryConfiguration, options: PingBuilderOptions = {}) {
    super(configuration, TelemetryMobileEventPingBuilder.TYPE, TelemetryMobileEventPingBuilder.VERSION, options);
  }
}
