import type { SimEventBus } from './EventBus';

export type LogClass = 'normal' | 'combat' | 'economy' | 'territory' | 'system';

export interface Logger {
  log(text: string, type?: LogClass): void;
}

export interface LoggerOptions {
  /** Also write every line to the console */
  echo: boolean;
}

export function createLogger(bus: SimEventBus, options: LoggerOptions): Logger {
  return {
    log(text: string, type: LogClass = 'normal'): void {
      if (options.echo) console.log(`[${type.toUpperCase()}] ${text}`);
      bus.emit('logMessage', { text, cls: type });
    },
  };
}
