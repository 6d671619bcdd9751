import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

export function expandPath(input: string): string {
  if (input === '~') {
    return homedir();
  }
  if (input.startsWith('~/')) {
    return join(homedir(), input.slice(2));
  }
  return resolve(input);
}
