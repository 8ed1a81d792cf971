import type { Telemetry, TelemetryFields } from '../../domain/contracts';

export type LogLevel = 'debug' | 'info' | 'error';

export interface TelemetryEvent {
  level: LogLevel;
  name: string;
  fields: TelemetryFields;
  error?: { name: string; message: string };
  createdAt: string;
}

export interface TelemetrySink {
  emit(event: TelemetryEvent): void | Promise<void>;
}

/** Renders `eventName=X, key=value, ...` lines, skipping empty fields. */
export function formatEvent(event: TelemetryEvent): string {
  const parts = [`eventName=${event.name}`];
  for (const [key, value] of Object.entries(event.fields)) {
    if (value === undefined || value === null) {
      continue;
    }
    parts.push(`${key}=${value}`);
  }
  if (event.error) {
    parts.push(`error=${event.error.message}`);
  }
  return parts.join(', ');
}

export class ConsoleSink implements TelemetrySink {
  constructor(private readonly tag = 'KYB_APP') {}

  emit(event: TelemetryEvent): void {
    const line = `[${this.tag}] ${formatEvent(event)}`;
    if (event.level === 'error') {
      console.error(line);
    } else if (event.level === 'debug') {
      console.debug(line);
    } else {
      console.info(line);
    }
  }
}

export class InMemorySink implements TelemetrySink {
  private events: TelemetryEvent[] = [];

  emit(event: TelemetryEvent): void {
    this.events.push(event);
  }

  read(): readonly TelemetryEvent[] {
    return this.events;
  }

  names(): string[] {
    return this.events.map((event) => event.name);
  }

  clear(): void {
    this.events = [];
  }
}

export interface TelemetryLoggerOptions {
  sinks?: TelemetrySink[];
  /** Fields merged into every event, e.g. `screenName`. */
  defaults?: TelemetryFields;
  now?: () => Date;
}

export class TelemetryLogger implements Telemetry {
  private readonly sinks: TelemetrySink[];
  private readonly defaults: TelemetryFields;
  private readonly now: () => Date;

  constructor(options?: TelemetryLoggerOptions) {
    this.sinks = options?.sinks ?? [new ConsoleSink()];
    this.defaults = options?.defaults ?? {};
    this.now = options?.now ?? (() => new Date());
  }

  withDefaults(fields: TelemetryFields): TelemetryLogger {
    return new TelemetryLogger({
      sinks: this.sinks,
      defaults: { ...this.defaults, ...fields },
      now: this.now,
    });
  }

  event(name: string, fields?: TelemetryFields): void {
    this.dispatch({ level: 'info', name, fields: { ...this.defaults, ...fields }, createdAt: this.now().toISOString() });
  }

  debug(name: string, fields?: TelemetryFields): void {
    this.dispatch({ level: 'debug', name, fields: { ...this.defaults, ...fields }, createdAt: this.now().toISOString() });
  }

  error(name: string, error: unknown, fields?: TelemetryFields): void {
    this.dispatch({
      level: 'error',
      name,
      fields: { ...this.defaults, ...fields },
      error: describeError(error),
      createdAt: this.now().toISOString(),
    });
  }

  private dispatch(event: TelemetryEvent): void {
    for (const sink of this.sinks) {
      try {
        const pending = sink.emit(event);
        if (pending) {
          pending.catch((err: unknown) => reportSinkFailure(event, err));
        }
      } catch (err) {
        reportSinkFailure(event, err);
      }
    }
  }
}

/** Wraps any `Telemetry` so that a throwing implementation cannot reach the caller. */
export function guardTelemetry(telemetry: Telemetry): Telemetry {
  return {
    event(name, fields) {
      try {
        telemetry.event(name, fields);
      } catch (err) {
        console.warn(`telemetry dropped ${name}: ${describeError(err).message}`);
      }
    },
    error(name, error, fields) {
      try {
        telemetry.error(name, error, fields);
      } catch (err) {
        console.warn(`telemetry dropped ${name}: ${describeError(err).message}`);
      }
    },
  };
}

export function describeError(error: unknown): { name: string; message: string } {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Error', message: typeof error === 'string' ? error : 'Unknown error' };
}

function reportSinkFailure(event: TelemetryEvent, err: unknown): void {
  console.warn(`telemetry sink dropped ${event.name}: ${describeError(err).message}`);
}
