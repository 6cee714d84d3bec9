/**
 * Debug Mode Registry
 *
 * Per-component log level overrides. Module-scoped state with a reset hook for tests.
 *
 * Components are named by the loggers that use them (e.g. "mllp-client", "cli").
 * Operators can raise DEBUG/TRACE output for one component through
 * MLLP_DEBUG_COMPONENTS without turning it on everywhere.
 */

import { LogLevel, shouldDisplayLogLevel } from './LogLevel.js';

const overrides = new Map<string, LogLevel>();

/**
 * Override the global level for one component.
 */
export function setComponentLevel(name: string, level: LogLevel): void {
  overrides.set(name, level);
}

export function getEffectiveLevel(name: string, globalLevel: LogLevel): LogLevel {
  return overrides.get(name) ?? globalLevel;
}

/**
 * Check if a message at the given level should be emitted for a component.
 */
export function shouldLog(name: string, messageLevel: LogLevel, globalLevel: LogLevel): boolean {
  return shouldDisplayLogLevel(messageLevel, getEffectiveLevel(name, globalLevel));
}

/**
 * Apply overrides parsed from the environment.
 * Entries look like "mllp-client" or "mllp-client:TRACE"; a bare name means DEBUG.
 */
export function initFromEnv(debugComponents: string[]): void {
  for (const entry of debugComponents) {
    const colonIndex = entry.lastIndexOf(':');
    if (colonIndex > 0) {
      const name = entry.substring(0, colonIndex);
      const level = parseOverrideLevel(entry.substring(colonIndex + 1));
      setComponentLevel(name, level);
    } else {
      setComponentLevel(entry, LogLevel.DEBUG);
    }
  }
}

function parseOverrideLevel(str: string): LogLevel {
  switch (str.toUpperCase()) {
    case 'TRACE': return LogLevel.TRACE;
    case 'DEBUG': return LogLevel.DEBUG;
    case 'INFO': return LogLevel.INFO;
    case 'WARN': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    default: return LogLevel.DEBUG;
  }
}

/**
 * Reset all registry state (for testing)
 */
export function resetDebugRegistry(): void {
  overrides.clear();
}
