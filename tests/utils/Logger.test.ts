import { describe, it, expect, vi } from 'vitest';
import { createEventBus } from '@/engine/utils/EventBus';
import { createLogger } from '@/engine/utils/Logger';
import { record } from '../integration/helpers';

describe('createLogger', () => {
  it('emits each line with its log class', () => {
    const bus = createEventBus();
    const lines = record(bus, 'logMessage');
    const logger = createLogger(bus, { echo: false });

    logger.log('BLUE collects 3 from territory', 'economy');
    logger.log('battle starts');

    expect(lines).toEqual([
      { text: 'BLUE collects 3 from territory', cls: 'economy' },
      { text: 'battle starts', cls: 'normal' },
    ]);
  });

  it('echoes to the console only when asked', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const bus = createEventBus();

    createLogger(bus, { echo: false }).log('quiet', 'system');
    expect(spy).not.toHaveBeenCalled();

    createLogger(bus, { echo: true }).log('RED wins at tick 40', 'system');
    expect(spy).toHaveBeenCalledWith('[SYSTEM] RED wins at tick 40');

    spy.mockRestore();
  });
});
