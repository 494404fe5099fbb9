import { afterEach, describe, it, expect, vi } from 'vitest';

import { compact, ensureRoom, fittedCapacity, grownCapacity } from './capacity.mjs';
import { CircularArray } from './circular-array.mjs';
import { getDiagnosticsLogger, setDiagnosticsLogger } from './diagnostics.mjs';
import { RingStorage } from './storage.mjs';

import type { BaseLogger } from '@dequekit/logger';

const createRecordingLogger = () => ({
  trace: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn(),
}) satisfies BaseLogger;

afterEach(() => {
  setDiagnosticsLogger();
});

describe('capacity policy', () => {
  it('should double, starting from the minimum', () => {
    expect(grownCapacity(0)).toBe(2);
    expect(grownCapacity(2)).toBe(4);
    expect(grownCapacity(12)).toBe(24);
  });

  it('should fit element counts with two spare slots', () => {
    expect(fittedCapacity(0)).toBe(2);
    expect(fittedCapacity(1)).toBe(3);
    expect(fittedCapacity(10)).toBe(12);
  });
});

describe('ensureRoom', () => {
  it('should leave storage with free slots alone', () => {
    const logger = createRecordingLogger();
    setDiagnosticsLogger(logger);
    const storage = new RingStorage([1], 2);

    ensureRoom(storage);

    expect(storage.capacity).toBe(2);
    expect(logger.debug).not.toHaveBeenCalled();
  });

  it('should grow full storage and report the reallocation', () => {
    const logger = createRecordingLogger();
    setDiagnosticsLogger(logger);
    const storage = new RingStorage([2, 3], 2);
    storage.removeFirst();
    storage.prepend(1);

    ensureRoom(storage);

    expect(storage.capacity).toBe(4);
    expect(storage.offset).toBe(0);
    expect(storage.toArray()).toEqual([1, 3]);
    expect(logger.debug).toHaveBeenCalledWith('circular array storage grow', {
      from: 2,
      to: 4,
      count: 2,
      copied: 2,
    });
  });
});

describe('compact', () => {
  it('should skip storage that is already fitted and linear', () => {
    const logger = createRecordingLogger();
    setDiagnosticsLogger(logger);
    const storage = new RingStorage([1, 2], 4);

    compact(storage);

    expect(storage.capacity).toBe(4);
    expect(logger.debug).not.toHaveBeenCalled();
  });

  it('should relinearize fitted storage that wraps', () => {
    const logger = createRecordingLogger();
    setDiagnosticsLogger(logger);
    const storage = new RingStorage([0, 1, 2], 5);
    storage.removeFirst();
    storage.append(3);

    compact(storage);

    expect(storage.capacity).toBe(5);
    expect(storage.offset).toBe(0);
    expect(storage.toArray()).toEqual([1, 2, 3]);
    expect(logger.debug).toHaveBeenCalledWith('circular array storage compact', {
      from: 5,
      to: 5,
      count: 3,
      copied: 3,
    });
  });

  it('should report growth past the fitted size as a resize', () => {
    const logger = createRecordingLogger();
    setDiagnosticsLogger(logger);
    const storage = new RingStorage([1], 3);

    compact(storage, 10);

    expect(storage.capacity).toBe(10);
    expect(logger.debug).toHaveBeenCalledWith('circular array storage resize', {
      from: 3,
      to: 10,
      count: 1,
      copied: 1,
    });
  });

  it('should ignore a minimum that is not a finite number', () => {
    const storage = new RingStorage([1], 6);
    compact(storage, Number.NaN);
    expect(storage.capacity).toBe(3);
  });
});

describe('amortized growth', () => {
  it('should copy fewer slots than twice the number of pushes', () => {
    const logger = createRecordingLogger();
    setDiagnosticsLogger(logger);
    const array = new CircularArray<number>();

    for (let i = 0; i < 1000; i++) {
      array.pushRear(i);
    }

    const copied = logger.debug.mock.calls.reduce((total, [, meta]) => {
      const value: unknown = meta?.copied;
      return total + (typeof value === 'number' ? value : 0);
    }, 0);
    expect(logger.debug).toHaveBeenCalledTimes(9);
    expect(copied).toBe(1022);
    expect(copied).toBeLessThan(2 * 1000);
    expect(array.getCapacity()).toBe(1024);
  });
});

describe('diagnostics logger', () => {
  it('should fall back to a default logger when none is set', () => {
    const logger = createRecordingLogger();
    setDiagnosticsLogger(logger);
    expect(getDiagnosticsLogger()).toBe(logger);

    setDiagnosticsLogger();
    const fallback = getDiagnosticsLogger();
    expect(fallback).not.toBe(logger);
    expect(getDiagnosticsLogger()).toBe(fallback);
    expect(typeof fallback.debug).toBe('function');
  });
});
