/**
 * Shared builders for dispatch tests.
 */

import { ok, type DispatchContext, type ICommand, type ILogger, type IQuery, type LogMetadata, type Next } from '../../src';

export function makeContext(overrides: Partial<DispatchContext> = {}): DispatchContext {
  return {
    dispatchId: 'dispatch-1',
    typeId: 'orders.place',
    kind: 'command',
    startedAt: 0,
    correlationId: 'corr-1',
    attempt: 0,
    items: new Map(),
    ...overrides,
  };
}

export interface PlaceOrder extends ICommand<string> {
  readonly typeId: 'orders.place';
  readonly sku: string;
  readonly quantity: number;
}

export function placeOrder(overrides: Partial<Omit<PlaceOrder, 'typeId' | 'kind'>> = {}): PlaceOrder {
  return {
    typeId: 'orders.place',
    kind: 'command',
    sku: 'SKU-42',
    quantity: 2,
    ...overrides,
  };
}

export interface GetOrder extends IQuery<{ id: string; sku: string }> {
  readonly typeId: 'orders.get';
  readonly orderId: string;
}

export function getOrder(orderId = 'order-1'): GetOrder {
  return { typeId: 'orders.get', kind: 'query', orderId };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

export type NextMock = jest.Mock<ReturnType<Next>, Parameters<Next>>;

export function mockNext(impl: Next = async () => ok('handled')): NextMock {
  return jest.fn(impl);
}

export interface RecordingLogger extends ILogger {
  debug: jest.Mock<void, [string, LogMetadata?]>;
  info: jest.Mock<void, [string, LogMetadata?]>;
  warn: jest.Mock<void, [string, LogMetadata?]>;
  error: jest.Mock<void, [string, LogMetadata?]>;
}

export function recordingLogger(): RecordingLogger {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

/** Messages logged at `level`, in order */
export function messagesAt(logger: RecordingLogger, level: keyof ILogger): string[] {
  return logger[level].mock.calls.map(([message]) => message);
}
