import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../src/engine/event-bus.js';
import { parsePair } from '../src/market/pair.js';
import type { Position, TradingEvent } from '../src/types/index.js';

const position: Position = {
  id: 'pos-000001',
  pair: parsePair('USD/JPY'),
  direction: 'BUY',
  quantity: 1000,
  entryPrice: 110,
  openedAt: 0,
  status: 'OPEN',
};

function opened(timestamp: number): TradingEvent {
  return { type: 'POSITION_OPENED', timestamp, position };
}

describe('EventBus', () => {
  it('should deliver events only to handlers of that type', () => {
    const bus = new EventBus();
    const onOpen = vi.fn();
    const onClose = vi.fn();
    bus.on('POSITION_OPENED', onOpen);
    bus.on('POSITION_CLOSED', onClose);

    bus.emit(opened(1));
    expect(onOpen).toHaveBeenCalledWith(opened(1));
    expect(onClose).not.toHaveBeenCalled();
  });

  it('should unsubscribe with the returned function', () => {
    const bus = new EventBus();
    const handler = vi.fn();
    const off = bus.on('POSITION_OPENED', handler);
    off();
    bus.emit(opened(1));
    expect(handler).not.toHaveBeenCalled();
  });

  it('should keep only the most recent events in its log', () => {
    const bus = new EventBus(2);
    bus.emit(opened(1));
    bus.emit(opened(2));
    bus.emit(opened(3));
    expect(bus.getLog().map((e) => e.timestamp)).toEqual([2, 3]);

    bus.clearLog();
    expect(bus.getLog()).toHaveLength(0);
  });
});
