import type { ConnectionState, InboundMessage, Logger, Topic } from '@tagstream/core';
import type { StateChange } from '@tagstream/client';

interface StateSource {
  on(event: 'state', listener: (change: StateChange) => void): unknown;
  off(event: 'state', listener: (change: StateChange) => void): unknown;
}

/** Resolves on the next transition into `to`. */
export function waitForState(source: StateSource, to: ConnectionState, timeoutMs = 2_000): Promise<StateChange> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      source.off('state', listener);
      reject(new Error(`state "${to}" not reached within ${timeoutMs}ms`));
    }, timeoutMs);
    const listener = (change: StateChange) => {
      if (change.to !== to) return;
      clearTimeout(timer);
      source.off('state', listener);
      resolve(change);
    };
    source.on('state', listener);
  });
}

/** Collects every transition from now on. */
export function recordStates(source: StateSource): StateChange[] {
  const changes: StateChange[] = [];
  source.on('state', (change) => changes.push(change));
  return changes;
}

export function inbound(sequence: number, topic: Topic, text = `message ${sequence}`): InboundMessage {
  return {
    topic,
    payload: new TextEncoder().encode(text),
    receivedAt: 1_700_000_000_000 + sequence,
    sequence,
  };
}

export function text(payload: Uint8Array): string {
  return new TextDecoder().decode(payload);
}

export function spyLogger(): Logger & { [K in keyof Logger]: jest.Mock } {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
