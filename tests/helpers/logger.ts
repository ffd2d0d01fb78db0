import { Logger } from '../../src/utils/logger';

export function debugRecorder(): Logger & { debugs: string[] } {
  const debugs: string[] = [];
  return {
    debugs,
    debug: (msg) => debugs.push(msg),
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
  };
}
