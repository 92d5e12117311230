import { consoleLogger, type Logger } from "./logger";

export type Unsubscribe = () => void;
export type Listener<T> = (payload: T) => void;

/**
 * Synchronous fan-out for one kind of notification. Listeners added or removed
 * while an emit is running take effect from the next emit.
 */
export class Emitter<T> {
  private listeners: readonly Listener<T>[] = [];

  constructor(
    readonly name: string,
    private readonly logger: Logger = consoleLogger
  ) {}

  on(listener: Listener<T>): Unsubscribe {
    this.listeners = [...this.listeners, listener];
    return () => {
      this.listeners = this.listeners.filter((candidate) => candidate !== listener);
    };
  }

  /** Runs every listener; failures are logged and rethrown together once all have run. */
  emit(payload: T): void {
    const failures: unknown[] = [];
    for (const listener of this.listeners) {
      try {
        listener(payload);
      } catch (error) {
        failures.push(error);
      }
    }
    if (failures.length === 0) {
      return;
    }
    this.logger.error(`${this.name}: ${failures.length} listener(s) failed`, failures);
    throw new AggregateError(failures, `${this.name} listener failed`);
  }

  clear(): void {
    this.listeners = [];
  }
}
