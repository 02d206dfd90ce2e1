import { PingBuilder } from './pingBuilder';

/**
 * Ping builders keyed by ping type. Registering a type again replaces the
 * previous builder.
 */
export class PingBuilderRegistry {
  private builders: Map<string, PingBuilder> = new Map();

  register(builder: PingBuilder): void {
    this.builders.set(builder.getType(), builder);
  }

  get(type: string): PingBuilder | undefined {
    return this.builders.get(type);
  }

  has(type: string): boolean {
    return this.builders.has(type);
  }

  /**
   * Snapshot of the registered builders, in registration order
   */
  getAll(): PingBuilder[] {
    return Array.from(this.builders.values());
  }

  clear(): void {
    this.builders.clear();
  }
}
