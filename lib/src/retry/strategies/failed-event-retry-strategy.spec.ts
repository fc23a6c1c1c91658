import { defaultSettings } from '../../common/config';
import { HandlerError } from '../../common/error';
import { FailedEvent } from '../../failed-event/failed-event';
import { defaultFailedEventRetryStrategy } from './failed-event-retry-strategy';

describe('defaultFailedEventRetryStrategy', () => {
  const error = new HandlerError('failed', 'gps');
  const failedEvent: FailedEvent = {
    id: '7',
    timestamp: 1000,
    attemptedAt: 1050,
    eventData: '{}',
    handlerName: 'gps',
    imei: '490154203237518',
    attemptCount: 2,
    abandonedAt: null,
  };

  it('should retry a failed event below the max attempts', () => {
    const strategy = defaultFailedEventRetryStrategy({
      settings: { ...defaultSettings, maxAttempts: 3 },
    });

    expect(strategy(failedEvent, error)).toBe(true);
  });

  it('should not retry a failed event that reached the max attempts', () => {
    const strategy = defaultFailedEventRetryStrategy({
      settings: { ...defaultSettings, maxAttempts: 3 },
    });

    expect(strategy({ ...failedEvent, attemptCount: 3 }, error)).toBe(false);
  });

  it('should always retry when the max attempts protection is disabled', () => {
    const strategy = defaultFailedEventRetryStrategy({
      settings: {
        ...defaultSettings,
        maxAttempts: 3,
        enableMaxAttemptsProtection: false,
      },
    });

    expect(strategy({ ...failedEvent, attemptCount: 1000 }, error)).toBe(true);
  });
});
