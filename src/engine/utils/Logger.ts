import { EventBus } from './EventBus';

export type LogClass = 'normal' | 'edit' | 'invalid' | 'victory' | 'defeat' | 'system';

/** Style class a log panel applies to each line */
const CLASS_MAP: Record<LogClass, string> = {
  normal:  'log-normal',
  edit:    'log-edit',
  invalid: 'log-invalid',
  victory: 'log-victory',
  defeat:  'log-defeat',
  system:  'log-system',
};

export const Logger = {
  log(text: string, type: LogClass = 'normal'): void {
    console.log(`[${type.toUpperCase()}] ${text}`);
    EventBus.emit('logMessage', { text, cls: CLASS_MAP[type] });
  },
};
