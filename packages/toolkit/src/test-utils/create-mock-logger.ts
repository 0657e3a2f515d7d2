import { vi } from 'vitest';
import type { Logger } from '../create-logger.ts';

interface MockLogMessage {
  level: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface MockLoggerResult {
  logger: Logger;
  messages: MockLogMessage[];
}

export function createMockLogger(): MockLoggerResult {
  const messages: MockLogMessage[] = [];

  function build(bindings: Record<string, unknown>): Logger {
    function record(level: string): (message: string, data?: Record<string, unknown>) => void {
      return (message: string, data?: Record<string, unknown>): void => {
        messages.push(buildLogMessage(level, message, bindings, data));
      };
    }

    return {
      debug: vi.fn().mockImplementation(record('debug')),
      info: vi.fn().mockImplementation(record('info')),
      error: vi.fn().mockImplementation(record('error')),
      child: vi
        .fn()
        .mockImplementation((childBindings: Record<string, unknown>) =>
          build({ ...bindings, ...childBindings }),
        ),
    };
  }

  return { logger: build({}), messages };
}

function buildLogMessage(
  level: string,
  message: string,
  bindings: Record<string, unknown>,
  data?: Record<string, unknown>,
): MockLogMessage {
  const merged = { ...bindings, ...data };
  if (Object.keys(merged).length === 0) {
    return { level, message };
  }
  return { level, message, data: merged };
}
