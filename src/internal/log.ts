import { getConfig } from '../config';

const PREFIX = '[hibiki]';

export function warn(message: string, ...details: unknown[]): void {
  if (getConfig().silent) return;
  console.warn(`${PREFIX} ${message}`, ...details);
}

export function error(message: string, ...details: unknown[]): void {
  if (getConfig().silent) return;
  console.error(`${PREFIX} ${message}`, ...details);
}
