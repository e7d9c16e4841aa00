import { EventBus } from './EventBus';

export type LogClass = 'normal' | 'action' | 'system' | 'warning' | 'error';

const CLASS_MAP: Record<LogClass, string> = {
  normal:  'le',
  action:  'la',
  system:  'ls',
  warning: 'lw',
  error:   'lx',
};

const PREFIX = 'FactionAlliance';

export const Logger = {
  log(text: string, type: LogClass = 'normal'): void {
    const line = `[${PREFIX}:${type.toUpperCase()}] ${text}`;
    if (type === 'error') console.error(line);
    else if (type === 'warning') console.warn(line);
    else console.log(line);
    EventBus.emit('logMessage', { text, cls: CLASS_MAP[type] });
  },

  /** Render an unknown thrown value for a log line. */
  describe(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
  },
};
