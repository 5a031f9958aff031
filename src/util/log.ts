import crypto from 'node:crypto';
import { performance } from 'node:perf_hooks';

export type ScopedLogger = (message: string, extra?: Record<string, unknown>) => void;

export function scopedLogger(scope: string, sink: (...args: unknown[]) => void = console.log): ScopedLogger {
  return (message, extra) => {
    if (extra && Object.keys(extra).length) {
      sink(`[${scope}] ${message}`, extra);
    } else {
      sink(`[${scope}] ${message}`);
    }
  };
}

export function warnLogger(scope: string): ScopedLogger {
  return scopedLogger(scope, console.warn);
}

export function createTraceId() {
  if (typeof crypto.randomUUID === 'function') {
    return crypto.randomUUID();
  }
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 10)}`;
}

export function elapsedMs(start: number) {
  return Math.round((performance.now() - start) * 10) / 10;
}
