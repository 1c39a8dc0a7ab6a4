/**
 * Tests for the event system.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  createEventEmitter,
  createContentChangeEvent,
  createSaveEvent,
  createClipboardWriteEvent,
  createScrollRequestEvent,
} from './events.ts';

describe('Event Emitter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('addEventListener', () => {
    it('should add and call event handlers', () => {
      const emitter = createEventEmitter();
      const handler = vi.fn();

      emitter.addEventListener('save', handler);
      const event = createSaveEvent('content');
      emitter.emit('save', event);

      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler).toHaveBeenCalledWith(event);
    });

    it('should support multiple handlers for same event', () => {
      const emitter = createEventEmitter();
      const handler1 = vi.fn();
      const handler2 = vi.fn();

      emitter.addEventListener('clipboard-write', handler1);
      emitter.addEventListener('clipboard-write', handler2);
      emitter.emit('clipboard-write', createClipboardWriteEvent('copied'));

      expect(handler1).toHaveBeenCalledTimes(1);
      expect(handler2).toHaveBeenCalledTimes(1);
    });

    it('should return unsubscribe function', () => {
      const emitter = createEventEmitter();
      const handler = vi.fn();

      const unsubscribe = emitter.addEventListener('save', handler);
      emitter.emit('save', createSaveEvent(''));
      unsubscribe();
      emitter.emit('save', createSaveEvent(''));

      expect(handler).toHaveBeenCalledTimes(1);
      expect(emitter.hasListeners('save')).toBe(false);
    });

    it('should only call handlers of the emitted type', () => {
      const emitter = createEventEmitter();
      const saveHandler = vi.fn();
      emitter.addEventListener('save', saveHandler);

      emitter.emit('scroll-request', createScrollRequestEvent(40));
      expect(saveHandler).not.toHaveBeenCalled();
    });
  });

  describe('removeEventListener', () => {
    it('should remove specific handler', () => {
      const emitter = createEventEmitter();
      const handler1 = vi.fn();
      const handler2 = vi.fn();

      emitter.addEventListener('save', handler1);
      emitter.addEventListener('save', handler2);
      emitter.removeEventListener('save', handler1);
      emitter.emit('save', createSaveEvent(''));

      expect(handler1).not.toHaveBeenCalled();
      expect(handler2).toHaveBeenCalledTimes(1);
    });
  });

  describe('emit', () => {
    it('should keep calling handlers after one throws', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      const emitter = createEventEmitter();
      const handler = vi.fn();

      emitter.addEventListener('content-change', () => {
        throw new Error('listener failed');
      });
      emitter.addEventListener('content-change', handler);
      emitter.emit('content-change', createContentChangeEvent('edit', null, 1));

      expect(handler).toHaveBeenCalledTimes(1);
      expect(error).toHaveBeenCalledTimes(1);
    });
  });

  describe('removeAllListeners', () => {
    it('should remove every handler', () => {
      const emitter = createEventEmitter();
      const handler = vi.fn();
      emitter.addEventListener('save', handler);
      emitter.addEventListener('clipboard-write', handler);

      emitter.removeAllListeners();
      emitter.emit('save', createSaveEvent(''));
      emitter.emit('clipboard-write', createClipboardWriteEvent('x'));

      expect(handler).not.toHaveBeenCalled();
      expect(emitter.hasListeners('save')).toBe(false);
    });
  });

  describe('handler sets', () => {
    it('should keep one registration per handler and type', () => {
      const emitter = createEventEmitter();
      const handler = vi.fn();
      emitter.addEventListener('save', handler);
      emitter.addEventListener('save', handler);
      emitter.emit('save', createSaveEvent(''));

      expect(handler).toHaveBeenCalledTimes(1);
      emitter.removeEventListener('save', handler);
      expect(emitter.hasListeners('save')).toBe(false);
    });
  });
});

describe('Event Helpers', () => {
  it('should create frozen events with a timestamp', () => {
    const event = createContentChangeEvent('undo', null, 3);
    expect(event.type).toBe('content-change');
    expect(event.reason).toBe('undo');
    expect(event.lineCount).toBe(3);
    expect(typeof event.timestamp).toBe('number');
    expect(Object.isFrozen(event)).toBe(true);
  });
});
